/**
 * A point-in-time quote for one tradable symbol.
 *
 * `price` is in the source's native currency and is never negative.
 * `stale` is set when the value is known or suspected to be outdated
 * (weekend data, or a cached value served after a failed fetch); it must be
 * carried through to consumers unchanged.
 */
export interface Price {
  symbol: string;
  name: string;
  price: number;
  dailyChange: number;
  dailyPct: number;
  lastUpdated: Date;
  stale: boolean;
}

/**
 * USD/fiat rate. Sources may derive it from a proxy instrument
 * (see CoinGeckoProvider.fetchExchangeRate).
 */
export interface ExchangeRate {
  from: string;
  to: string;
  rate: number;
  lastUpdated: Date;
}
