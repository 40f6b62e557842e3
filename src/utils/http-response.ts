import { APIGatewayProxyResult } from 'aws-lambda';
import { HTTP_HEADERS, HTTP_STATUS } from '../constants/http';
import { IHolding } from '../types/models/holding';
import { ExchangeRate } from '../types/models/price';
import {
  AssetClassValuation,
  HealthReport,
  PortfolioSummary,
  ValuationTotals,
  ValuedAsset,
} from '../types/models/valuation';

export const successResponse = (data: unknown, statusCode: number = HTTP_STATUS.OK): APIGatewayProxyResult => ({
  statusCode,
  headers: HTTP_HEADERS,
  body: JSON.stringify({ status: 'success', data }),
});

// Wire format is snake_case with ISO-8601 timestamps

export const serializeAsset = (asset: ValuedAsset) => ({
  type: asset.type,
  symbol: asset.symbol,
  name: asset.name,
  price: asset.price,
  daily_change: asset.dailyChange,
  daily_pct: asset.dailyPct,
  quantity: asset.quantity,
  value: asset.value,
  cost_basis: asset.costBasis,
  pnl: asset.pnl,
  pnl_pct: asset.pnlPct,
  last_updated: asset.lastUpdated.toISOString(),
  stale: asset.stale,
});

const serializeTotals = (totals: ValuationTotals) => ({
  value: totals.value,
  cost_basis: totals.costBasis,
  pnl: totals.pnl,
  pnl_pct: totals.pnlPct,
});

export const serializeAssetClass = (valuation: AssetClassValuation) => ({
  type: valuation.type,
  assets: valuation.assets.map(serializeAsset),
  totals: serializeTotals(valuation.totals),
  degraded: valuation.degraded,
});

export const serializeSummary = (summary: PortfolioSummary) => ({
  total_value: summary.totals.value,
  total_cost_basis: summary.totals.costBasis,
  total_pnl: summary.totals.pnl,
  total_pnl_pct: summary.totals.pnlPct,
  funds: serializeAssetClass(summary.funds),
  cryptos: serializeAssetClass(summary.cryptos),
  last_updated: summary.lastUpdated.toISOString(),
});

export const serializeHolding = (holding: IHolding) => ({
  id: holding.id,
  type: holding.type,
  symbol: holding.symbol,
  quantity: holding.quantity,
  cost_basis: holding.costBasis,
  created_at: holding.createdAt.toISOString(),
  updated_at: holding.updatedAt.toISOString(),
});

/**
 * The rate is derived from a USD stablecoin's fiat price, not an FX market quote
 */
export const serializeExchangeRate = (rate: ExchangeRate) => ({
  from: rate.from,
  to: rate.to,
  rate: rate.rate,
  last_updated: rate.lastUpdated.toISOString(),
  source: 'usdt-proxy',
});

export const serializeHealth = (report: HealthReport) => ({
  status: report.status,
  timestamp: report.timestamp.toISOString(),
  providers: report.providers,
});
