import { TefasConfig } from '../../../config/providers';
import { Price } from '../../../types/models/price';
import { raceWithSignal, throwIfAborted } from '../../../utils/abort';
import { ProviderError, describeError } from '../../../utils/errors/provider-error';
import { PriceCache } from '../price-cache';
import { ExchangeRateSource, PriceProvider, markStale, uniqueSymbols } from '../price-provider';
import { formatTefasDate, getLastBusinessDay, isWeekend } from './business-day';
import { getFundDisplayName } from './fund-names';
import { FundRow, FundSession, TEFAS_PROVIDER_NAME } from './fund-session';
import { PlaywrightFundSession } from './playwright-fund-session';

export interface TefasProviderOptions {
  cacheTTL: number;
  maxConsecutiveFailures: number;
}

/**
 * Fund prices scraped from TEFAS through a browser session.
 *
 * Prices are quoted for the last business day; on weekends every returned
 * price is flagged stale. Requested funds missing from the day's data come
 * back as zero-price stale placeholders rather than being omitted.
 */
export class TefasProvider implements PriceProvider {
  readonly name = TEFAS_PROVIDER_NAME;

  private readonly cache: PriceCache;
  private readonly inFlight = new Map<string, Promise<FundRow[]>>();
  private starting: Promise<void> | undefined;
  private consecutiveFailures = 0;
  private disposed = false;

  constructor(
    private readonly session: FundSession,
    private readonly options: TefasProviderOptions,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.cache = new PriceCache(options.cacheTTL, () => this.clock().getTime());
  }

  static fromConfig(config: TefasConfig): TefasProvider {
    const session = new PlaywrightFundSession({
      baseURL: config.baseURL,
      headless: config.headless,
      browserChannel: config.browserChannel,
      executablePath: config.executablePath,
      navigationTimeout: config.navigationTimeout,
    });
    return new TefasProvider(session, {
      cacheTTL: config.cacheTTL,
      maxConsecutiveFailures: config.maxConsecutiveFailures,
    });
  }

  async fetch(symbols: readonly string[], signal?: AbortSignal): Promise<Price[]> {
    const requested = uniqueSymbols(symbols);
    if (requested.length === 0) {
      return [];
    }

    const cached = this.cache.getFresh(requested);
    if (cached) {
      return cached;
    }

    throwIfAborted(this.name, signal);

    try {
      const now = this.clock();
      const rows = await raceWithSignal(this.loadRows(now), this.name, signal);
      const prices = this.buildPrices(requested, rows, now);
      this.cache.setMany(prices);
      return prices;
    } catch (error) {
      // A deadline that fires mid-refresh falls back to the cache like any other failure
      const stale = this.cache.getAny(requested).map(markStale);
      if (stale.length > 0) {
        console.warn('[TEFAS] Serving stale cache after fetch failure', {
          symbols: stale.map(price => price.symbol),
          error: describeError(error),
        });
        return stale;
      }

      throw error instanceof ProviderError
        ? error
        : new ProviderError(`Failed to fetch TEFAS data: ${describeError(error)}`, this.name, 'FETCH_FAILED', true, error);
    }
  }

  async isHealthy(): Promise<boolean> {
    return !this.disposed && this.session.isReady();
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.inFlight.clear();
    // A start still in progress would otherwise leave a browser running after close
    await this.starting?.catch(() => undefined);
    await this.session.close();
  }

  getExchangeRateSource(): ExchangeRateSource | undefined {
    return undefined;
  }

  private buildPrices(symbols: readonly string[], rows: readonly FundRow[], now: Date): Price[] {
    const byCode = new Map<string, FundRow>();
    for (const row of rows) {
      byCode.set(row.code, row);
    }

    const weekend = isWeekend(now);

    return symbols.map(symbol => {
      const row = byCode.get(symbol);
      if (!row) {
        console.warn('[TEFAS] Fund not found in TEFAS response', { symbol });
        return {
          symbol,
          name: getFundDisplayName(symbol),
          price: 0,
          dailyChange: 0,
          dailyPct: 0,
          lastUpdated: now,
          stale: true,
        };
      }

      // TEFAS publishes a single closing price per day, no intraday change
      return {
        symbol: row.code,
        name: row.title || getFundDisplayName(row.code),
        price: row.price,
        dailyChange: 0,
        dailyPct: 0,
        lastUpdated: now,
        stale: weekend,
      };
    });
  }

  /**
   * Rows for the last business day; concurrent callers for the same date share one request
   */
  private loadRows(now: Date): Promise<FundRow[]> {
    const date = formatTefasDate(getLastBusinessDay(now));

    const pending = this.inFlight.get(date);
    if (pending) {
      return pending;
    }

    const request = this.requestRows(date).finally(() => {
      this.inFlight.delete(date);
    });
    this.inFlight.set(date, request);
    return request;
  }

  private async requestRows(date: string): Promise<FundRow[]> {
    if (this.disposed) {
      throw new ProviderError('TEFAS provider has been disposed', this.name, 'FETCH_FAILED');
    }

    await this.ensureStarted();
    if (this.disposed) {
      throw new ProviderError('TEFAS provider has been disposed', this.name, 'FETCH_FAILED');
    }

    try {
      const rows = await this.session.fetchRows(date);
      this.consecutiveFailures = 0;
      return rows;
    } catch (error) {
      this.consecutiveFailures += 1;
      console.error('[TEFAS] Fund row fetch failed', {
        date,
        consecutiveFailures: this.consecutiveFailures,
        error: describeError(error),
      });

      if (this.consecutiveFailures >= this.options.maxConsecutiveFailures) {
        console.warn('[TEFAS] Closing browser session after repeated failures; next fetch starts a new one');
        this.consecutiveFailures = 0;
        await this.session.close().catch((closeError: unknown) => {
          console.error('[TEFAS] Error closing browser session:', closeError);
        });
      }
      throw error;
    }
  }

  private ensureStarted(): Promise<void> {
    if (this.session.isReady()) {
      return Promise.resolve();
    }

    if (!this.starting) {
      console.log('[TEFAS] Starting TEFAS session');
      this.starting = this.session.start().finally(() => {
        this.starting = undefined;
      });
    }
    return this.starting;
  }
}
