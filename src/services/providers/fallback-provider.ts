import { ExchangeRate, Price } from '../../types/models/price';
import { ProviderError, describeError } from '../../utils/errors/provider-error';
import { ExchangeRateSource, PriceProvider } from './price-provider';

/**
 * Composes a primary and a secondary provider.
 *
 * The secondary is consulted only when the primary rejects. A primary result
 * is returned as-is, stale entries included. No retries: each call makes at
 * most one attempt per provider.
 */
export class FallbackProvider implements PriceProvider {
  readonly name: string;

  constructor(
    private readonly primary: PriceProvider,
    private readonly secondary: PriceProvider,
  ) {
    this.name = `${primary.name}+${secondary.name}`;
  }

  async fetch(symbols: readonly string[], signal?: AbortSignal): Promise<Price[]> {
    try {
      return await this.primary.fetch(symbols, signal);
    } catch (error) {
      console.warn(`[FALLBACK] ${this.primary.name} failed, trying ${this.secondary.name}`, {
        error: describeError(error),
      });
      return this.secondary.fetch(symbols, signal);
    }
  }

  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    if (await this.primary.isHealthy(signal)) {
      return true;
    }
    return this.secondary.isHealthy(signal);
  }

  /**
   * Disposes both providers; the first failure is rethrown once both have been attempted
   */
  async dispose(): Promise<void> {
    const results = await Promise.allSettled([this.primary.dispose(), this.secondary.dispose()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
    }
  }

  getExchangeRateSource(): ExchangeRateSource | undefined {
    if (!this.primary.getExchangeRateSource() && !this.secondary.getExchangeRateSource()) {
      return undefined;
    }
    return { fetchExchangeRate: signal => this.fetchExchangeRate(signal) };
  }

  private async fetchExchangeRate(signal?: AbortSignal): Promise<ExchangeRate> {
    let lastError: unknown;

    for (const provider of [this.primary, this.secondary]) {
      const source = provider.getExchangeRateSource();
      if (!source) {
        continue;
      }
      try {
        return await source.fetchExchangeRate(signal);
      } catch (error) {
        console.warn(`[FALLBACK] Exchange rate from ${provider.name} failed`, { error: describeError(error) });
        lastError = error;
      }
    }

    throw lastError ?? new ProviderError('No provider supports exchange rates', this.name, 'UNSUPPORTED');
  }
}
