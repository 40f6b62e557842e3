import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

/**
 * TEFAS fund-price provider settings
 */
export interface TefasConfig {
  enabled: boolean;
  /** Fund codes to track (e.g. KUT, TI2) */
  funds: string[];
  headless: boolean;
  baseURL: string;
  /** Chrome channel to drive ("chrome", "msedge"); ignored when executablePath is set */
  browserChannel?: string;
  executablePath?: string;
  navigationTimeout: number;
  cacheTTL: number;
  /** Consecutive failed fetches before the browser session is restarted */
  maxConsecutiveFailures: number;
}

/**
 * Binance market-data provider settings
 */
export interface BinanceConfig {
  enabled: boolean;
  /** Trading pairs to track (e.g. BTCUSDT) */
  symbols: string[];
  baseURL: string;
  timeout: number;
  cacheTTL: number;
}

/**
 * CoinGecko market-data provider settings
 */
export interface CoinGeckoConfig {
  enabled: boolean;
  /** Optional demo API key for higher rate limits */
  apiKey?: string;
  baseURL: string;
  timeout: number;
  cacheTTL: number;
  exchangeRateTTL: number;
  /** Fiat currency the exchange rate is quoted in (CoinGecko vs_currency code) */
  exchangeRateCurrency: string;
}

export interface ProviderConfig {
  tefas: TefasConfig;
  binance: BinanceConfig;
  coingecko: CoinGeckoConfig;
}

export const DEFAULT_TEFAS_CONFIG: TefasConfig = {
  enabled: true,
  funds: [],
  headless: true,
  baseURL: 'https://www.tefas.gov.tr',
  navigationTimeout: 30000,
  cacheTTL: 5 * 60 * 1000,
  maxConsecutiveFailures: 3,
};

export const DEFAULT_BINANCE_CONFIG: BinanceConfig = {
  enabled: true,
  symbols: [],
  baseURL: 'https://api.binance.com',
  timeout: 10000,
  cacheTTL: 30 * 1000,
};

export const DEFAULT_COINGECKO_CONFIG: CoinGeckoConfig = {
  enabled: true,
  baseURL: 'https://api.coingecko.com/api/v3',
  timeout: 10000,
  cacheTTL: 60 * 1000,
  exchangeRateTTL: 5 * 60 * 1000,
  exchangeRateCurrency: 'try',
};

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['false', '0', 'no', 'off'].includes(normalized)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a boolean, received "${value}"`,
      });
      return z.NEVER;
    });

const list = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0),
  );

const optionalText = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const milliseconds = z.coerce.number().int().positive().optional();

const providerEnvSchema = z.object({
  TEFAS_ENABLED: flag(DEFAULT_TEFAS_CONFIG.enabled),
  TEFAS_FUNDS: list,
  TEFAS_HEADLESS: flag(DEFAULT_TEFAS_CONFIG.headless),
  TEFAS_BASE_URL: optionalText,
  TEFAS_BROWSER_CHANNEL: optionalText,
  TEFAS_EXECUTABLE_PATH: optionalText,
  BINANCE_ENABLED: flag(DEFAULT_BINANCE_CONFIG.enabled),
  BINANCE_SYMBOLS: list,
  BINANCE_BASE_URL: optionalText,
  COINGECKO_ENABLED: flag(DEFAULT_COINGECKO_CONFIG.enabled),
  COINGECKO_API_KEY: optionalText,
  COINGECKO_BASE_URL: optionalText,
  EXCHANGE_RATE_CURRENCY: optionalText,
  PROVIDER_REQUEST_TIMEOUT_MS: milliseconds,
});

/**
 * Builds provider configuration from environment variables.
 * @throws ZodError when a variable is present but malformed
 */
export const loadProviderConfig = (env: NodeJS.ProcessEnv = process.env): ProviderConfig => {
  const parsed = providerEnvSchema.parse(env);
  const requestTimeout = parsed.PROVIDER_REQUEST_TIMEOUT_MS;

  return {
    tefas: {
      ...DEFAULT_TEFAS_CONFIG,
      enabled: parsed.TEFAS_ENABLED,
      funds: parsed.TEFAS_FUNDS.map(code => code.toUpperCase()),
      headless: parsed.TEFAS_HEADLESS,
      baseURL: parsed.TEFAS_BASE_URL ?? DEFAULT_TEFAS_CONFIG.baseURL,
      browserChannel: parsed.TEFAS_BROWSER_CHANNEL,
      executablePath: parsed.TEFAS_EXECUTABLE_PATH,
    },
    binance: {
      ...DEFAULT_BINANCE_CONFIG,
      enabled: parsed.BINANCE_ENABLED,
      symbols: parsed.BINANCE_SYMBOLS.map(symbol => symbol.toUpperCase()),
      baseURL: parsed.BINANCE_BASE_URL ?? DEFAULT_BINANCE_CONFIG.baseURL,
      timeout: requestTimeout ?? DEFAULT_BINANCE_CONFIG.timeout,
    },
    coingecko: {
      ...DEFAULT_COINGECKO_CONFIG,
      enabled: parsed.COINGECKO_ENABLED,
      apiKey: parsed.COINGECKO_API_KEY,
      baseURL: parsed.COINGECKO_BASE_URL ?? DEFAULT_COINGECKO_CONFIG.baseURL,
      timeout: requestTimeout ?? DEFAULT_COINGECKO_CONFIG.timeout,
      exchangeRateCurrency: (
        parsed.EXCHANGE_RATE_CURRENCY ?? DEFAULT_COINGECKO_CONFIG.exchangeRateCurrency
      ).toLowerCase(),
    },
  };
};
