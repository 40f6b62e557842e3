import axios from 'axios';
import { BinanceProvider, parseNumber } from '../binance-provider';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const ticker = (symbol: string, lastPrice: unknown, priceChange: unknown = '0', priceChangePercent: unknown = '0') => ({
  data: { symbol, lastPrice, priceChange, priceChangePercent },
});

// Settles only when the request's signal fires, rejecting the way axios does on cancel
const hangUntilAborted = (_url: string, config: { signal?: AbortSignal }) =>
  new Promise((_resolve, reject) => {
    config.signal?.addEventListener('abort', () => reject(new Error('canceled')));
  });

describe('BinanceProvider', () => {
  let client: { get: jest.Mock };
  let now: number;
  let provider: BinanceProvider;

  beforeEach(() => {
    client = { get: jest.fn() };
    mockedAxios.create.mockReturnValue(client as any);
    now = Date.UTC(2024, 5, 5, 12, 0);
    provider = new BinanceProvider({ baseURL: 'https://binance.test', timeout: 1000, cacheTTL: 30_000 }, () => now);

    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should configure the axios client from the config', () => {
    expect(mockedAxios.create).toHaveBeenCalledWith(
      expect.objectContaining({ baseURL: 'https://binance.test', timeout: 1000 }),
    );
  });

  describe('fetch', () => {
    it('should request one ticker per symbol and map the fields', async () => {
      client.get
        .mockResolvedValueOnce(ticker('BTCUSDT', '64000.50', '-120.25', '-0.19'))
        .mockResolvedValueOnce(ticker('FOOUSDT', '1.5'));

      const prices = await provider.fetch(['BTCUSDT', 'FOOUSDT']);

      expect(client.get).toHaveBeenCalledTimes(2);
      expect(client.get).toHaveBeenCalledWith('/api/v3/ticker/24hr', { params: { symbol: 'BTCUSDT' }, signal: undefined });
      expect(prices).toEqual([
        {
          symbol: 'BTCUSDT',
          name: 'Bitcoin',
          price: 64000.5,
          dailyChange: -120.25,
          dailyPct: -0.19,
          lastUpdated: new Date(now),
          stale: false,
        },
        {
          symbol: 'FOOUSDT',
          name: 'FOOUSDT',
          price: 1.5,
          dailyChange: 0,
          dailyPct: 0,
          lastUpdated: new Date(now),
          stale: false,
        },
      ]);
    });

    it('should turn a non-numeric price into 0 without throwing', async () => {
      client.get.mockResolvedValueOnce(ticker('BTCUSDT', 'not-a-number', 'x', null));

      const [price] = await provider.fetch(['BTCUSDT']);

      expect(price.price).toBe(0);
      expect(price.dailyChange).toBe(0);
      expect(price.dailyPct).toBe(0);
      expect(price.stale).toBe(false);
    });

    it('should clamp a negative price to 0', async () => {
      client.get.mockResolvedValueOnce(ticker('BTCUSDT', '-5'));

      const [price] = await provider.fetch(['BTCUSDT']);

      expect(price.price).toBe(0);
    });

    it('should serve the cache within the ttl', async () => {
      client.get.mockResolvedValueOnce(ticker('BTCUSDT', '100'));

      const first = await provider.fetch(['BTCUSDT']);
      now += 10_000;
      const second = await provider.fetch(['BTCUSDT']);

      expect(client.get).toHaveBeenCalledTimes(1);
      expect(second[0]).toBe(first[0]);
    });

    it('should fall back to a stale cached price for a failed symbol', async () => {
      client.get
        .mockResolvedValueOnce(ticker('BTCUSDT', '100'))
        .mockResolvedValueOnce(ticker('ETHUSDT', '10'));
      await provider.fetch(['BTCUSDT', 'ETHUSDT']);

      now += 31_000;
      client.get
        .mockResolvedValueOnce(ticker('BTCUSDT', '101'))
        .mockRejectedValueOnce(new Error('socket hang up'));

      const prices = await provider.fetch(['BTCUSDT', 'ETHUSDT']);

      expect(prices).toHaveLength(2);
      expect(prices[0]).toMatchObject({ symbol: 'BTCUSDT', price: 101, stale: false });
      expect(prices[1]).toMatchObject({ symbol: 'ETHUSDT', price: 10, stale: true });
    });

    it('should omit a failed symbol that has never been cached', async () => {
      client.get
        .mockResolvedValueOnce(ticker('BTCUSDT', '100'))
        .mockRejectedValueOnce(new Error('invalid symbol'));

      const prices = await provider.fetch(['BTCUSDT', 'NOPEUSDT']);

      expect(prices.map(price => price.symbol)).toEqual(['BTCUSDT']);
    });

    it('should reject when every symbol fails and nothing is cached', async () => {
      client.get.mockRejectedValue(new Error('network down'));

      await expect(provider.fetch(['BTCUSDT', 'ETHUSDT'])).rejects.toMatchObject({
        name: 'ProviderError',
        provider: 'binance',
        code: 'FETCH_FAILED',
      });
    });

    it('should reject a ticker payload that is not an object', async () => {
      client.get.mockResolvedValueOnce({ data: 'maintenance' });

      await expect(provider.fetch(['BTCUSDT'])).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    });

    it('should reject with ABORTED when the signal has fired', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(provider.fetch(['BTCUSDT'], controller.signal)).rejects.toMatchObject({ code: 'ABORTED' });
      expect(client.get).not.toHaveBeenCalled();
    });

    it('should reject with ABORTED when the signal fires mid-request and nothing is cached', async () => {
      client.get.mockImplementation(hangUntilAborted);
      const controller = new AbortController();

      const pending = provider.fetch(['BTCUSDT', 'ETHUSDT'], controller.signal);
      controller.abort();

      await expect(pending).rejects.toMatchObject({ provider: 'binance', code: 'ABORTED' });
    });

    it('should serve stale cached prices when the signal fires mid-request', async () => {
      client.get.mockResolvedValueOnce(ticker('BTCUSDT', '100'));
      await provider.fetch(['BTCUSDT']);
      now += 31_000;
      client.get.mockImplementation(hangUntilAborted);
      const controller = new AbortController();

      const pending = provider.fetch(['BTCUSDT'], controller.signal);
      controller.abort();
      const prices = await pending;

      expect(prices).toEqual([expect.objectContaining({ symbol: 'BTCUSDT', price: 100, stale: true })]);
    });
  });

  describe('isHealthy', () => {
    it('should ping the api', async () => {
      client.get.mockResolvedValueOnce({ data: {} });

      await expect(provider.isHealthy()).resolves.toBe(true);
      expect(client.get).toHaveBeenCalledWith('/api/v3/ping', { signal: undefined });
    });

    it('should resolve false when the ping fails', async () => {
      client.get.mockRejectedValueOnce(new Error('down'));

      await expect(provider.isHealthy()).resolves.toBe(false);
    });
  });

  it('should not offer exchange rates', () => {
    expect(provider.getExchangeRateSource()).toBeUndefined();
  });
});

describe('parseNumber', () => {
  it.each([
    ['12.5', 12.5],
    [7, 7],
    ['', 0],
    ['12abc', 0],
    [undefined, 0],
    [Number.NaN, 0],
  ])('should parse %p as %p', (input, expected) => {
    expect(parseNumber(input)).toBe(expected);
  });
});
