import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { BinanceConfig, DEFAULT_BINANCE_CONFIG } from '../../config/providers';
import { Price } from '../../types/models/price';
import { abortedError, throwIfAborted } from '../../utils/abort';
import { ProviderError, describeError } from '../../utils/errors/provider-error';
import { toProviderError } from './http-error';
import { PriceCache } from './price-cache';
import { ExchangeRateSource, PriceProvider, markStale, uniqueSymbols } from './price-provider';

export const BINANCE_PROVIDER_NAME = 'binance';

const SYMBOL_NAMES: Readonly<Record<string, string>> = {
  BTCUSDT: 'Bitcoin',
  ETHUSDT: 'Ethereum',
  SOLUSDT: 'Solana',
  BNBUSDT: 'BNB',
  XRPUSDT: 'XRP',
  ADAUSDT: 'Cardano',
  DOGEUSDT: 'Dogecoin',
  DOTUSDT: 'Polkadot',
  MATICUSDT: 'Polygon',
  AVAXUSDT: 'Avalanche',
};

export const getSymbolName = (symbol: string): string => SYMBOL_NAMES[symbol] ?? symbol;

// Binance serializes decimals as strings; field presence is not trusted either
const tickerSchema = z.object({
  symbol: z.string().optional(),
  lastPrice: z.unknown(),
  priceChange: z.unknown(),
  priceChangePercent: z.unknown(),
});

/**
 * Parses a numeric field leniently: anything that is not a finite number becomes 0
 */
export const parseNumber = (value: unknown): number => {
  let parsed = Number.NaN;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value);
  }
  return Number.isFinite(parsed) ? parsed : 0;
};

/**
 * Primary crypto price source: Binance 24h ticker statistics.
 *
 * One request per symbol. A symbol whose request fails is served from cache
 * (marked stale) when possible and otherwise omitted; the call only rejects
 * when nothing at all could be returned.
 */
export class BinanceProvider implements PriceProvider {
  readonly name = BINANCE_PROVIDER_NAME;

  private readonly config: BinanceConfig;
  private readonly client: AxiosInstance;
  private readonly cache: PriceCache;

  constructor(config: Partial<BinanceConfig> = {}, private readonly now: () => number = Date.now) {
    this.config = { ...DEFAULT_BINANCE_CONFIG, ...config };
    this.client = axios.create({
      baseURL: this.config.baseURL,
      headers: { Accept: 'application/json' },
      timeout: this.config.timeout,
    });
    this.cache = new PriceCache(this.config.cacheTTL, now);
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

    // Requests cut off by the signal reject like any other failure and fall back to the cache
    const results = await Promise.allSettled(requested.map(symbol => this.fetchTicker(symbol, signal)));

    const fresh: Price[] = [];
    const prices: Price[] = [];
    let lastError: unknown;

    results.forEach((result, index) => {
      const symbol = requested[index];
      if (result.status === 'fulfilled') {
        fresh.push(result.value);
        prices.push(result.value);
        return;
      }

      lastError = result.reason;
      const previous = this.cache.peek(symbol);
      if (previous) {
        console.warn('[BINANCE] Serving stale price after fetch failure', {
          symbol,
          error: describeError(result.reason),
        });
        prices.push(markStale(previous));
      } else {
        console.error('[BINANCE] Failed to fetch ticker', { symbol, error: describeError(result.reason) });
      }
    });

    this.cache.setMany(fresh);

    if (prices.length === 0) {
      if (signal?.aborted) {
        throw abortedError(this.name, signal);
      }
      throw lastError instanceof ProviderError
        ? lastError
        : new ProviderError('All Binance ticker requests failed', this.name, 'FETCH_FAILED', true, lastError);
    }

    return prices;
  }

  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.client.get('/api/v3/ping', { signal });
      return true;
    } catch (error) {
      console.warn('[BINANCE] Health check failed:', describeError(error));
      return false;
    }
  }

  async dispose(): Promise<void> {
    this.cache.clear();
  }

  getExchangeRateSource(): ExchangeRateSource | undefined {
    return undefined;
  }

  private async fetchTicker(symbol: string, signal?: AbortSignal): Promise<Price> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/api/v3/ticker/24hr', {
        params: { symbol },
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toProviderError(error, this.name, `Ticker request for ${symbol}`, signal);
    }

    const parsed = tickerSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected ticker response for ${symbol}`, this.name, 'INVALID_RESPONSE', false, parsed.error);
    }

    const ticker = parsed.data;
    return {
      symbol,
      name: getSymbolName(symbol),
      price: Math.max(0, parseNumber(ticker.lastPrice)),
      dailyChange: parseNumber(ticker.priceChange),
      dailyPct: parseNumber(ticker.priceChangePercent),
      lastUpdated: new Date(this.now()),
      stale: false,
    };
  }
}
