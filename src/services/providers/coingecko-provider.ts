import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { CoinGeckoConfig, DEFAULT_COINGECKO_CONFIG } from '../../config/providers';
import { ExchangeRate, Price } from '../../types/models/price';
import { throwIfAborted } from '../../utils/abort';
import { ProviderError, describeError } from '../../utils/errors/provider-error';
import { toProviderError } from './http-error';
import { PriceCache } from './price-cache';
import { ExchangeRateSource, PriceProvider, markStale, uniqueSymbols } from './price-provider';

export const COINGECKO_PROVIDER_NAME = 'coingecko';

const COIN_IDS: Readonly<Record<string, string>> = {
  BTCUSDT: 'bitcoin',
  ETHUSDT: 'ethereum',
  SOLUSDT: 'solana',
  BNBUSDT: 'binancecoin',
  XRPUSDT: 'ripple',
  ADAUSDT: 'cardano',
  DOGEUSDT: 'dogecoin',
  DOTUSDT: 'polkadot',
  MATICUSDT: 'matic-network',
  AVAXUSDT: 'avalanche-2',
};

const COIN_NAMES: Readonly<Record<string, string>> = {
  bitcoin: 'Bitcoin',
  ethereum: 'Ethereum',
  solana: 'Solana',
  binancecoin: 'BNB',
  ripple: 'XRP',
  cardano: 'Cardano',
  dogecoin: 'Dogecoin',
  polkadot: 'Polkadot',
  'matic-network': 'Polygon',
  'avalanche-2': 'Avalanche',
};

// USD-pegged coin whose fiat price stands in for the USD/fiat rate
const USD_PROXY_COIN = 'tether';

/**
 * Maps a USDT trading pair to a CoinGecko coin id. Unknown pairs fall back to
 * the base asset, lowercased (FOOUSDT -> foo).
 */
export const symbolToCoinId = (symbol: string): string =>
  COIN_IDS[symbol] ?? symbol.replace(/USDT$/, '').toLowerCase();

export const coinIdToName = (coinId: string): string => COIN_NAMES[coinId] ?? coinId;

const simplePriceSchema = z.record(
  z.object({
    usd: z.number().nonnegative().optional(),
    usd_24h_change: z.number().nullable().optional(),
  }),
);

const fiatPriceSchema = z.record(z.record(z.number().nullable()));

/**
 * Secondary crypto price source backed by CoinGecko's simple price API.
 *
 * Symbols are translated to coin ids for the request; returned prices carry
 * the symbol that was asked for. Coins missing from the response are omitted.
 * Also quotes a USD/fiat rate, approximated by USDT's price in that fiat.
 */
export class CoinGeckoProvider implements PriceProvider, ExchangeRateSource {
  readonly name = COINGECKO_PROVIDER_NAME;

  private readonly config: CoinGeckoConfig;
  private readonly client: AxiosInstance;
  private readonly cache: PriceCache;
  private exchangeRate: ExchangeRate | undefined;
  private exchangeRateExpiresAt = 0;

  constructor(config: Partial<CoinGeckoConfig> = {}, private readonly now: () => number = Date.now) {
    this.config = { ...DEFAULT_COINGECKO_CONFIG, ...config };
    this.client = axios.create({
      baseURL: this.config.baseURL,
      headers: {
        Accept: 'application/json',
        ...(this.config.apiKey ? { 'x-cg-demo-api-key': this.config.apiKey } : {}),
      },
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

    const coinIds = requested.map(symbolToCoinId);
    console.log('[COINGECKO] Fetching prices', { coins: coinIds });

    let quotes: z.infer<typeof simplePriceSchema>;
    try {
      quotes = await this.getSimplePrice(coinIds, signal);
    } catch (error) {
      // A deadline firing mid-request also falls back to the cache
      const stale = this.cache.getAny(requested).map(markStale);
      if (stale.length > 0) {
        console.warn('[COINGECKO] Serving stale cache after fetch failure', { error: describeError(error) });
        return stale;
      }
      throw error;
    }

    const lastUpdated = new Date(this.now());
    const prices: Price[] = [];
    requested.forEach((symbol, index) => {
      const coinId = coinIds[index];
      const quote = quotes[coinId];
      if (!quote || quote.usd === undefined) {
        console.warn('[COINGECKO] Coin missing from response', { symbol, coinId });
        return;
      }
      prices.push({
        symbol,
        name: coinIdToName(coinId),
        price: quote.usd,
        dailyChange: 0,
        dailyPct: quote.usd_24h_change ?? 0,
        lastUpdated,
        stale: false,
      });
    });

    this.cache.setMany(prices);
    return prices;
  }

  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.client.get('/ping', { signal });
      return true;
    } catch (error) {
      console.warn('[COINGECKO] Health check failed:', describeError(error));
      return false;
    }
  }

  async dispose(): Promise<void> {
    this.cache.clear();
    this.exchangeRate = undefined;
  }

  getExchangeRateSource(): ExchangeRateSource {
    return this;
  }

  /**
   * USD to the configured fiat currency, using USDT's fiat price as a proxy.
   * The proxy drifts from the true rate by the stablecoin's peg deviation.
   */
  async fetchExchangeRate(signal?: AbortSignal): Promise<ExchangeRate> {
    if (this.exchangeRate && this.now() < this.exchangeRateExpiresAt) {
      return this.exchangeRate;
    }

    throwIfAborted(this.name, signal);

    const currency = this.config.exchangeRateCurrency;
    console.log('[COINGECKO] Fetching exchange rate', { from: 'USD', to: currency.toUpperCase() });

    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/simple/price', {
        params: { ids: USD_PROXY_COIN, vs_currencies: currency },
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toProviderError(error, this.name, 'Exchange rate request', signal);
    }

    const parsed = fiatPriceSchema.safeParse(body);
    const rate = parsed.success ? parsed.data[USD_PROXY_COIN]?.[currency] : undefined;
    if (typeof rate !== 'number' || rate <= 0) {
      throw new ProviderError('Invalid exchange rate response', this.name, 'INVALID_RESPONSE');
    }

    const exchangeRate: ExchangeRate = {
      from: 'USD',
      to: currency.toUpperCase(),
      rate,
      lastUpdated: new Date(this.now()),
    };
    this.exchangeRate = exchangeRate;
    this.exchangeRateExpiresAt = this.now() + this.config.exchangeRateTTL;

    console.log('[COINGECKO] Fetched exchange rate', { rate });
    return exchangeRate;
  }

  private async getSimplePrice(coinIds: readonly string[], signal?: AbortSignal) {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/simple/price', {
        params: { ids: coinIds.join(','), vs_currencies: 'usd', include_24hr_change: true },
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toProviderError(error, this.name, 'Price request', signal);
    }

    const parsed = simplePriceSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('Unexpected price response', this.name, 'INVALID_RESPONSE', false, parsed.error);
    }
    return parsed.data;
  }
}
