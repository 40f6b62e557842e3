import { HoldingType } from '../common/enums';

/**
 * A price joined with the matching holding (if any).
 * Built fresh for every valuation, never persisted.
 */
export interface ValuedAsset {
  type: HoldingType;
  symbol: string;
  name: string;
  price: number;
  dailyChange: number;
  dailyPct: number;
  quantity: number;
  value: number;
  costBasis: number;
  pnl: number;
  pnlPct: number;
  lastUpdated: Date;
  stale: boolean;
}

export interface ValuationTotals {
  value: number;
  costBasis: number;
  pnl: number;
  pnlPct: number;
}

export interface AssetClassValuation {
  type: HoldingType;
  assets: ValuedAsset[];
  totals: ValuationTotals;
  /**
   * Set when the class could not be priced: holdings exist but no provider is
   * configured, or the fetch failed. Symbols missing from a successful fetch
   * become placeholders without setting it.
   */
  degraded: boolean;
}

export interface PortfolioSummary {
  totals: ValuationTotals;
  funds: AssetClassValuation;
  cryptos: AssetClassValuation;
  lastUpdated: Date;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: Date;
  providers: Partial<Record<HoldingType, string>>;
}
