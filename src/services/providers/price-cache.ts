import { Price } from '../../types/models/price';

interface PriceCacheEntry {
  price: Price;
  cachedAt: number;
}

/**
 * In-memory TTL cache of prices keyed by symbol, owned by a single provider.
 *
 * Every method is synchronous, so under the event loop a reader never sees a
 * batch written by `setMany` half-applied.
 */
export class PriceCache {
  private readonly entries = new Map<string, PriceCacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get ttl(): number {
    return this.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns cached prices only when every symbol has an unexpired entry
   */
  getFresh(symbols: readonly string[]): Price[] | null {
    if (symbols.length === 0) {
      return null;
    }

    const now = this.now();
    const prices: Price[] = [];

    for (const symbol of symbols) {
      const entry = this.entries.get(symbol);
      if (!entry || now - entry.cachedAt >= this.ttlMs) {
        return null;
      }
      prices.push(entry.price);
    }

    return prices;
  }

  /**
   * Returns whatever is cached for the symbols, regardless of age
   */
  getAny(symbols: readonly string[]): Price[] {
    const prices: Price[] = [];
    for (const symbol of symbols) {
      const entry = this.entries.get(symbol);
      if (entry) {
        prices.push(entry.price);
      }
    }
    return prices;
  }

  peek(symbol: string): Price | undefined {
    return this.entries.get(symbol)?.price;
  }

  setMany(prices: readonly Price[]): void {
    const cachedAt = this.now();
    for (const price of prices) {
      this.entries.set(price.symbol, { price, cachedAt });
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
