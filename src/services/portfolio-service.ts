import { HoldingRepository } from '../repositories/holding-repository';
import { HOLDING_TYPES, HoldingType, ProviderStatus } from '../types/common/enums';
import { IHolding } from '../types/models/holding';
import { ExchangeRate, Price } from '../types/models/price';
import {
  AssetClassValuation,
  HealthReport,
  PortfolioSummary,
  ValuationTotals,
  ValuedAsset,
} from '../types/models/valuation';
import { NotFoundError, ServiceUnavailableError } from '../utils/errors/app-error';
import { describeError } from '../utils/errors/provider-error';
import { getSymbolName } from './providers/binance-provider';
import { PriceProvider } from './providers/price-provider';
import { ProviderSet, getProviders } from './providers/provider-registry';
import { getFundDisplayName } from './providers/tefas/fund-names';

export const VALUATION_TIMEOUT_MS = 30000;
export const EXCHANGE_RATE_TIMEOUT_MS = 10000;
export const HEALTH_TIMEOUT_MS = 5000;

/**
 * The part of the holdings store the valuation reads
 */
export type HoldingReader = Pick<HoldingRepository, 'findByType' | 'findBySymbol'>;

export const getDisplayName = (type: HoldingType, symbol: string): string =>
  type === HoldingType.FUND ? getFundDisplayName(symbol) : getSymbolName(symbol);

const percentOf = (pnl: number, costBasis: number): number => (costBasis > 0 ? (pnl / costBasis) * 100 : 0);

/**
 * Joins a price with the holding in the same symbol; without a holding the
 * position counts as zero quantity and zero cost.
 */
export const valueAsset = (type: HoldingType, price: Price, holding?: IHolding): ValuedAsset => {
  const quantity = holding?.quantity ?? 0;
  const costBasis = holding?.costBasis ?? 0;
  const value = price.price * quantity;
  const pnl = value - costBasis;

  return {
    type,
    symbol: price.symbol,
    name: price.name,
    price: price.price,
    dailyChange: price.dailyChange,
    dailyPct: price.dailyPct,
    quantity,
    value,
    costBasis,
    pnl,
    pnlPct: percentOf(pnl, costBasis),
    lastUpdated: price.lastUpdated,
    stale: price.stale,
  };
};

/**
 * Zero-price stale entry for a holding that has no usable price
 */
export const placeholderAsset = (holding: IHolding, now: Date = new Date()): ValuedAsset => ({
  type: holding.type,
  symbol: holding.symbol,
  name: getDisplayName(holding.type, holding.symbol),
  price: 0,
  dailyChange: 0,
  dailyPct: 0,
  quantity: holding.quantity,
  value: 0,
  costBasis: holding.costBasis,
  pnl: 0,
  pnlPct: 0,
  lastUpdated: now,
  stale: true,
});

export const sumTotals = (assets: readonly ValuedAsset[]): ValuationTotals => {
  let value = 0;
  let costBasis = 0;
  for (const asset of assets) {
    value += asset.value;
    costBasis += asset.costBasis;
  }
  const pnl = value - costBasis;
  return { value, costBasis, pnl, pnlPct: percentOf(pnl, costBasis) };
};

/**
 * Probes each configured provider with a 5-second deadline. Needs no
 * holdings store, so a database outage does not hide provider liveness.
 */
export const checkProviderHealth = async (providers: ProviderSet): Promise<HealthReport> => {
  const statuses: HealthReport['providers'] = {};
  let healthy = true;

  await Promise.all(
    HOLDING_TYPES.map(async type => {
      const provider = providers[type];
      if (!provider) {
        return;
      }
      const ok = await provider.isHealthy(AbortSignal.timeout(HEALTH_TIMEOUT_MS));
      statuses[type] = ok ? ProviderStatus.HEALTHY : ProviderStatus.UNHEALTHY;
      healthy = healthy && ok;
    }),
  );

  return { status: healthy ? 'ok' : 'degraded', timestamp: new Date(), providers: statuses };
};

/**
 * Values holdings against live prices.
 *
 * A missing provider or a failed fetch never fails a valuation: affected
 * holdings are reported as stale zero-price placeholders instead.
 */
export class PortfolioService {
  constructor(
    private readonly holdings: HoldingReader,
    private readonly providers: ProviderSet,
  ) {}

  /**
   * Creates and initializes a new instance of PortfolioService with all required dependencies
   */
  public static async initialize(): Promise<PortfolioService> {
    const holdingRepository = await HoldingRepository.initialize();
    return new PortfolioService(holdingRepository, getProviders());
  }

  async valueAssetClass(
    type: HoldingType,
    holdings: readonly IHolding[],
    provider: PriceProvider | undefined,
    signal?: AbortSignal,
  ): Promise<AssetClassValuation> {
    const symbols = [...new Set(holdings.map(holding => holding.symbol))];

    if (!provider || symbols.length === 0) {
      if (!provider && holdings.length > 0) {
        console.warn(`[PORTFOLIO] No ${type} provider configured; returning placeholders`);
      }
      return this.placeholderValuation(type, holdings, holdings.length > 0);
    }

    let prices: Price[];
    try {
      prices = await provider.fetch(symbols, signal);
    } catch (error) {
      console.error(`[PORTFOLIO] Failed to fetch ${type} prices from ${provider.name}:`, describeError(error));
      return this.placeholderValuation(type, holdings, true);
    }

    const bySymbol = new Map<string, IHolding>();
    for (const holding of holdings) {
      bySymbol.set(holding.symbol, holding);
    }

    const priced = new Set<string>();
    const assets: ValuedAsset[] = [];
    for (const price of prices) {
      priced.add(price.symbol);
      assets.push(valueAsset(type, price, bySymbol.get(price.symbol)));
    }

    const now = new Date();
    for (const holding of holdings) {
      if (!priced.has(holding.symbol)) {
        console.warn(`[PORTFOLIO] No ${type} price returned for ${holding.symbol}`);
        assets.push(placeholderAsset(holding, now));
      }
    }

    return { type, assets, totals: sumTotals(assets), degraded: false };
  }

  async getAssetClass(type: HoldingType, signal?: AbortSignal): Promise<AssetClassValuation> {
    const holdings = await this.holdings.findByType(type);
    return this.valueAssetClass(
      type,
      holdings,
      this.providers[type],
      signal ?? AbortSignal.timeout(VALUATION_TIMEOUT_MS),
    );
  }

  /**
   * Both asset classes valued concurrently; the grand totals are the sums of the class totals
   */
  async getPortfolioSummary(signal?: AbortSignal): Promise<PortfolioSummary> {
    const deadline = signal ?? AbortSignal.timeout(VALUATION_TIMEOUT_MS);
    const [funds, cryptos] = await Promise.all([
      this.getAssetClass(HoldingType.FUND, deadline),
      this.getAssetClass(HoldingType.CRYPTO, deadline),
    ]);

    const value = funds.totals.value + cryptos.totals.value;
    const costBasis = funds.totals.costBasis + cryptos.totals.costBasis;
    const pnl = value - costBasis;

    return {
      totals: { value, costBasis, pnl, pnlPct: percentOf(pnl, costBasis) },
      funds,
      cryptos,
      lastUpdated: new Date(),
    };
  }

  /**
   * Single-symbol lookup, joined with the holding when one exists
   * @throws NotFoundError when no price can be obtained for the symbol
   */
  async getAsset(type: HoldingType, symbol: string, signal?: AbortSignal): Promise<ValuedAsset> {
    const provider = this.providers[type];
    if (!provider) {
      throw new NotFoundError(`No ${type} provider configured`, { type, symbol });
    }

    let prices: Price[];
    try {
      prices = await provider.fetch([symbol], signal ?? AbortSignal.timeout(VALUATION_TIMEOUT_MS));
    } catch (error) {
      console.error(`[PORTFOLIO] Failed to fetch ${type} ${symbol}:`, describeError(error));
      throw new NotFoundError(`Price not available for ${symbol}`, { type, symbol });
    }

    const price = prices.find(candidate => candidate.symbol === symbol);
    if (!price) {
      throw new NotFoundError(`Price not available for ${symbol}`, { type, symbol });
    }

    const holding = await this.holdings.findBySymbol(type, symbol);
    return valueAsset(type, price, holding ?? undefined);
  }

  /**
   * USD/fiat rate from the crypto provider's exchange-rate capability
   * @throws ServiceUnavailableError when no source can quote the rate
   */
  async getExchangeRate(signal?: AbortSignal): Promise<ExchangeRate> {
    const source = this.providers[HoldingType.CRYPTO]?.getExchangeRateSource();
    if (!source) {
      throw new ServiceUnavailableError('Exchange rate provider not available');
    }

    try {
      return await source.fetchExchangeRate(signal ?? AbortSignal.timeout(EXCHANGE_RATE_TIMEOUT_MS));
    } catch (error) {
      console.error('[PORTFOLIO] Failed to fetch exchange rate:', describeError(error));
      throw new ServiceUnavailableError('Failed to fetch exchange rate');
    }
  }

  async getHealth(): Promise<HealthReport> {
    return checkProviderHealth(this.providers);
  }

  private placeholderValuation(
    type: HoldingType,
    holdings: readonly IHolding[],
    degraded: boolean,
  ): AssetClassValuation {
    const now = new Date();
    const assets = holdings.map(holding => placeholderAsset(holding, now));
    return { type, assets, totals: sumTotals(assets), degraded };
  }
}
