import { ExchangeRate, Price } from '../../types/models/price';

/**
 * Optional capability: quoting a USD/fiat exchange rate.
 */
export interface ExchangeRateSource {
  fetchExchangeRate(signal?: AbortSignal): Promise<ExchangeRate>;
}

/**
 * Contract every price source implements.
 *
 * - `fetch` returns quotes for the requested symbols where available. Each
 *   adapter documents whether unknown symbols are omitted or returned as
 *   stale zero-price placeholders. Result order is unspecified. Rejects with
 *   a ProviderError on hard failure, and promptly once `signal` aborts.
 * - `isHealthy` never rejects.
 * - `dispose` is idempotent.
 * - `getExchangeRateSource` is a capability query: `undefined` when the
 *   source cannot quote exchange rates.
 */
export interface PriceProvider {
  readonly name: string;
  fetch(symbols: readonly string[], signal?: AbortSignal): Promise<Price[]>;
  isHealthy(signal?: AbortSignal): Promise<boolean>;
  dispose(): Promise<void>;
  getExchangeRateSource(): ExchangeRateSource | undefined;
}

/**
 * Removes duplicates and empty entries while keeping first-seen order
 */
export const uniqueSymbols = (symbols: readonly string[]): string[] =>
  [...new Set(symbols.map(symbol => symbol.trim()).filter(symbol => symbol.length > 0))];

/**
 * Returns a copy of the price flagged as stale
 */
export const markStale = (price: Price): Price => ({ ...price, stale: true });
