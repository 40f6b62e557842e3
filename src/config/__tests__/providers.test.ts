import { ZodError } from 'zod';
import {
  DEFAULT_BINANCE_CONFIG,
  DEFAULT_COINGECKO_CONFIG,
  DEFAULT_TEFAS_CONFIG,
  loadProviderConfig,
} from '../providers';

describe('loadProviderConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadProviderConfig({});

    expect(config.tefas).toEqual({
      ...DEFAULT_TEFAS_CONFIG,
      browserChannel: undefined,
      executablePath: undefined,
    });
    expect(config.binance).toEqual(DEFAULT_BINANCE_CONFIG);
    expect(config.coingecko).toEqual({ ...DEFAULT_COINGECKO_CONFIG, apiKey: undefined });
  });

  it('should parse lists and normalize their case', () => {
    const config = loadProviderConfig({
      TEFAS_FUNDS: ' kut, TI2 ,,afT ',
      BINANCE_SYMBOLS: 'btcusdt,ETHUSDT',
      EXCHANGE_RATE_CURRENCY: 'EUR',
    });

    expect(config.tefas.funds).toEqual(['KUT', 'TI2', 'AFT']);
    expect(config.binance.symbols).toEqual(['BTCUSDT', 'ETHUSDT']);
    expect(config.coingecko.exchangeRateCurrency).toBe('eur');
  });

  it('should parse boolean flags', () => {
    const config = loadProviderConfig({
      TEFAS_HEADLESS: 'false',
      TEFAS_ENABLED: 'yes',
      BINANCE_ENABLED: '0',
      COINGECKO_ENABLED: 'ON',
    });

    expect(config.tefas.headless).toBe(false);
    expect(config.tefas.enabled).toBe(true);
    expect(config.binance.enabled).toBe(false);
    expect(config.coingecko.enabled).toBe(true);
  });

  it('should apply the shared request timeout to both crypto providers', () => {
    const config = loadProviderConfig({ PROVIDER_REQUEST_TIMEOUT_MS: '2500' });

    expect(config.binance.timeout).toBe(2500);
    expect(config.coingecko.timeout).toBe(2500);
  });

  it('should keep optional settings when provided', () => {
    const config = loadProviderConfig({
      TEFAS_EXECUTABLE_PATH: '/usr/bin/chromium',
      TEFAS_BROWSER_CHANNEL: 'chrome',
      COINGECKO_API_KEY: 'test-key',
    });

    expect(config.tefas.executablePath).toBe('/usr/bin/chromium');
    expect(config.tefas.browserChannel).toBe('chrome');
    expect(config.coingecko.apiKey).toBe('test-key');
  });

  it('should reject malformed values', () => {
    expect(() => loadProviderConfig({ TEFAS_HEADLESS: 'maybe' })).toThrow(ZodError);
    expect(() => loadProviderConfig({ PROVIDER_REQUEST_TIMEOUT_MS: '-1' })).toThrow(ZodError);
  });
});
