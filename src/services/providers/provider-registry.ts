import { ProviderConfig, loadProviderConfig } from '../../config/providers';
import { HoldingType } from '../../types/common/enums';
import { describeError } from '../../utils/errors/provider-error';
import { BinanceProvider } from './binance-provider';
import { CoinGeckoProvider } from './coingecko-provider';
import { FallbackProvider } from './fallback-provider';
import { PriceProvider } from './price-provider';
import { TefasProvider } from './tefas/tefas-provider';

export type ProviderSet = Partial<Record<HoldingType, PriceProvider>>;

export const SHUTDOWN_TIMEOUT_MS = 30000;

/**
 * Runs a provider factory; a failure is logged and leaves the provider absent
 */
const tryBuild = <T extends PriceProvider>(label: string, factory: () => T): T | undefined => {
  try {
    return factory();
  } catch (error) {
    console.error(`[PROVIDERS] Failed to initialize ${label} provider:`, describeError(error));
    return undefined;
  }
};

const buildCryptoProvider = (config: ProviderConfig): PriceProvider | undefined => {
  const binance =
    config.binance.enabled && config.binance.symbols.length > 0
      ? tryBuild('binance', () => new BinanceProvider(config.binance))
      : undefined;
  const coingecko = config.coingecko.enabled
    ? tryBuild('coingecko', () => new CoinGeckoProvider(config.coingecko))
    : undefined;

  if (binance && coingecko) {
    return new FallbackProvider(binance, coingecko);
  }
  return binance ?? coingecko;
};

/**
 * Builds the fund and crypto providers for a configuration.
 *
 * - fund: TEFAS, when enabled with at least one tracked fund
 * - crypto: Binance with CoinGecko fallback, or whichever of the two is enabled
 */
export const buildProviders = (config: ProviderConfig): ProviderSet => {
  const providers: ProviderSet = {};

  if (config.tefas.enabled && config.tefas.funds.length > 0) {
    console.log('[PROVIDERS] Initializing TEFAS provider', { funds: config.tefas.funds });
    const tefas = tryBuild('tefas', () => TefasProvider.fromConfig(config.tefas));
    if (tefas) {
      providers[HoldingType.FUND] = tefas;
    }
  }

  const crypto = buildCryptoProvider(config);
  if (crypto) {
    console.log('[PROVIDERS] Initializing crypto provider', {
      provider: crypto.name,
      symbols: config.binance.symbols,
    });
    providers[HoldingType.CRYPTO] = crypto;
  }

  return providers;
};

let providerSet: ProviderSet | undefined;

/**
 * Process-wide provider set, built from the environment on first use.
 * A malformed configuration leaves every provider absent.
 */
export const getProviders = (): ProviderSet => {
  if (!providerSet) {
    try {
      providerSet = buildProviders(loadProviderConfig());
    } catch (error) {
      console.error('[PROVIDERS] Invalid provider configuration:', describeError(error));
      providerSet = {};
    }
  }
  return providerSet;
};

/**
 * Disposes every provider in the set. Failures are logged; one provider's
 * failure does not prevent the others from being disposed.
 */
export const disposeProviders = async (providers: ProviderSet = getProviders()): Promise<void> => {
  const entries = Object.entries(providers).filter(
    (entry): entry is [string, PriceProvider] => entry[1] !== undefined,
  );
  const results = await Promise.allSettled(entries.map(([, provider]) => provider.dispose()));

  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      console.error(`[PROVIDERS] Failed to dispose ${entries[index][0]} provider:`, describeError(result.reason));
    }
  });

  if (providers === providerSet) {
    providerSet = undefined;
  }
};

/**
 * Disposes providers, giving up after `timeoutMs`
 * @returns false when the timeout elapsed first
 */
export const shutdownProviders = async (
  providers: ProviderSet = getProviders(),
  timeoutMs: number = SHUTDOWN_TIMEOUT_MS,
): Promise<boolean> => {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([disposeProviders(providers).then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
};

let hooksRegistered = false;

/**
 * Disposes providers on SIGTERM or SIGINT, waiting at most 30 seconds before exiting
 */
export const registerShutdownHooks = (): void => {
  if (hooksRegistered) {
    return;
  }
  hooksRegistered = true;

  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`[PROVIDERS] Received ${signal}, disposing providers`);
    shutdownProviders()
      .then(completed => {
        if (!completed) {
          console.error(`[PROVIDERS] Provider shutdown exceeded ${SHUTDOWN_TIMEOUT_MS}ms`);
        }
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('[PROVIDERS] Provider shutdown failed:', describeError(error));
        process.exit(1);
      });
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
};

/**
 * Replaces the process-wide provider set; intended for tests
 */
export const setProviders = (providers: ProviderSet | undefined): void => {
  providerSet = providers;
};
