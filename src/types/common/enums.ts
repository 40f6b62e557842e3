/**
 * Asset classes a holding can belong to
 */
export enum HoldingType {
  FUND = 'fund',
  CRYPTO = 'crypto'
}

export const HOLDING_TYPES: readonly HoldingType[] = [HoldingType.FUND, HoldingType.CRYPTO];

/**
 * Provider liveness as reported by the health endpoint
 */
export enum ProviderStatus {
  HEALTHY = 'healthy',
  UNHEALTHY = 'unhealthy'
}
