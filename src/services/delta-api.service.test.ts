import { createHmac } from 'node:crypto';

import axios from 'axios';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { defaultConfig } from '../utils/config';

import {
  DeltaApiService,
  createDeltaApiService,
  signRequest,
  type DeltaApiOptions,
} from './delta-api.service';

// Mock axios
vi.mock('axios', () => ({
  default: {
    get: vi.fn(),
    post: vi.fn(),
    isAxiosError: vi.fn(),
  },
}));

// Mock chalk to prevent styling in tests
vi.mock('chalk', () => {
  const plain = (text: string) => text;
  const styled = Object.assign(plain, { bold: plain });
  return {
    default: {
      bold: styled,
      green: styled,
      red: styled,
      cyan: styled,
      yellow: styled,
      dim: styled,
    },
  };
});

const mockedAxios = {
  get: vi.mocked(axios.get),
  post: vi.mocked(axios.post),
  isAxiosError: vi.mocked(axios.isAxiosError),
};

const BASE_URL = 'https://delta.test';
const NOW_MS = 1_700_000_000_000;
const TIMESTAMP = '1700000000';

const hmac = (message: string) =>
  createHmac('sha256', 'test-secret').update(message).digest('hex');

const createService = (overrides: Partial<DeltaApiOptions> = {}) =>
  new DeltaApiService({
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    baseUrl: BASE_URL,
    userAgent: 'trendbreak-test',
    timeoutMs: 1000,
    retries: 2,
    retryDelayMs: 0,
    live: false,
    leverage: 100,
    now: () => NOW_MS,
    ...overrides,
  });

describe('DeltaApiService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('signRequest', () => {
    it('should sign METHOD + timestamp + path + body', () => {
      expect(signRequest('test-secret', 'POST', TIMESTAMP, '/v2/orders', '{"a":1}')).toBe(
        hmac('POST1700000000/v2/orders{"a":1}')
      );
    });

    it('should upper-case the method', () => {
      expect(signRequest('test-secret', 'get', TIMESTAMP, '/v2/positions')).toBe(
        signRequest('test-secret', 'GET', TIMESTAMP, '/v2/positions')
      );
    });
  });

  describe('fetchCandles', () => {
    it('should request the window ending now', async () => {
      const candles = [{ time: 1, open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 }];
      mockedAxios.get.mockResolvedValue({ data: { success: true, result: candles } });

      const result = await createService().fetchCandles('BTCUSD', '15m', 300);

      expect(result).toEqual(candles);
      expect(mockedAxios.get).toHaveBeenCalledWith(`${BASE_URL}/v2/history/candles`, {
        headers: { 'User-Agent': 'trendbreak-test' },
        params: {
          symbol: 'BTCUSD',
          resolution: '15m',
          start: 1700000000 - 300 * 900,
          end: 1700000000,
        },
        timeout: 1000,
      });
    });

    it('should fall back to a 15 minute step for unknown resolutions', async () => {
      mockedAxios.get.mockResolvedValue({ data: { success: true, result: [] } });

      await createService().fetchCandles('BTCUSD', '3h', 10);

      expect(mockedAxios.get).toHaveBeenCalledWith(
        `${BASE_URL}/v2/history/candles`,
        expect.objectContaining({
          params: { symbol: 'BTCUSD', resolution: '3h', start: 1700000000 - 9000, end: 1700000000 },
        })
      );
    });

    it('should retry a transport failure', async () => {
      mockedAxios.get
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValueOnce({ data: { success: true, result: [[1, 2, 3, 1, 2, 5]] } });

      await expect(createService().fetchCandles('ETHUSD', '1h', 160)).resolves.toEqual([
        [1, 2, 3, 1, 2, 5],
      ]);
      expect(mockedAxios.get).toHaveBeenCalledTimes(2);
    });

    it('should return null once every attempt failed', async () => {
      mockedAxios.get.mockResolvedValue({ data: { success: false, error: 'bad_schema' } });

      await expect(createService().fetchCandles('ETHUSD', '1h', 160)).resolves.toBeNull();
      expect(mockedAxios.get).toHaveBeenCalledTimes(3);
      expect(console.log).toHaveBeenCalledWith(
        '❌ fetchCandles failed for ETHUSD 1h: candles request for ETHUSD 1h was not successful'
      );
    });

    it('should return an empty list for a successful response without rows', async () => {
      mockedAxios.get.mockResolvedValue({ data: { success: true } });

      await expect(createService().fetchCandles('ETHUSD', '1h', 160)).resolves.toEqual([]);
    });
  });

  describe('getProductsMap', () => {
    it('should map watchlist symbols to product ids', async () => {
      mockedAxios.get.mockResolvedValue({
        data: {
          success: true,
          result: [
            { symbol: 'btcusd', id: 27 },
            { symbol: 'ETHUSD', id: '3136' },
            { symbol: 'XRPUSD', id: 5 },
            { id: 9 },
          ],
        },
      });

      await expect(createService().getProductsMap(['BTCUSD', 'ethusd'])).resolves.toEqual({
        BTCUSD: 27,
        ETHUSD: 3136,
      });
    });

    it('should return an empty map on failure', async () => {
      mockedAxios.get.mockRejectedValue(new Error('offline'));

      await expect(createService().getProductsMap(['BTCUSD'])).resolves.toEqual({});
      expect(console.log).toHaveBeenCalledWith('❌ getProductsMap: offline');
    });
  });

  describe('getBalanceUsd', () => {
    it('should send signed headers', async () => {
      mockedAxios.get.mockResolvedValue({ data: { success: true, result: [] } });

      await createService().getBalanceUsd();

      expect(mockedAxios.get).toHaveBeenCalledWith(`${BASE_URL}/v2/wallet/balances`, {
        headers: {
          'User-Agent': 'trendbreak-test',
          'api-key': 'test-key',
          timestamp: TIMESTAMP,
          signature: hmac('GET1700000000/v2/wallet/balances'),
          'Content-Type': 'application/json',
        },
        params: undefined,
        timeout: 1000,
      });
    });

    it('should read the first USD-like wallet', async () => {
      mockedAxios.get.mockResolvedValue({
        data: {
          success: true,
          result: [
            { asset_symbol: 'BTC', available_balance: '1' },
            { asset_symbol: 'usdt', available_balance: '12.5' },
          ],
        },
      });

      await expect(createService().getBalanceUsd()).resolves.toBe(12.5);
    });

    it('should fall back to the first row', async () => {
      mockedAxios.get.mockResolvedValue({
        data: { success: true, result: [{ asset_symbol: 'INR', available_balance: '3' }] },
      });

      await expect(createService().getBalanceUsd()).resolves.toBe(3);
    });

    it('should be 0 when the request fails', async () => {
      mockedAxios.get.mockRejectedValue(new Error('socket hang up'));

      await expect(createService().getBalanceUsd()).resolves.toBe(0);
      expect(console.log).toHaveBeenCalledWith(
        '❌ Could not get balance: {"success":false,"error":"network_error","detail":"socket hang up"}'
      );
    });
  });

  describe('hasOpenPosition', () => {
    it('should fall back to the second positions endpoint', async () => {
      mockedAxios.get
        .mockResolvedValueOnce({ data: { success: false } })
        .mockResolvedValueOnce({
          data: { success: true, result: [{ product_id: 27, size: '-2' }] },
        });

      await expect(createService().hasOpenPosition(27)).resolves.toBe(true);
      expect(mockedAxios.get).toHaveBeenNthCalledWith(
        1,
        `${BASE_URL}/v2/positions/margined`,
        expect.anything()
      );
      expect(mockedAxios.get).toHaveBeenNthCalledWith(
        2,
        `${BASE_URL}/v2/positions`,
        expect.anything()
      );
    });

    it('should ignore flat and unrelated positions', async () => {
      mockedAxios.get.mockResolvedValue({
        data: {
          success: true,
          result: [
            { product_id: 27, size: 0 },
            { product_id: 28, size: '1' },
          ],
        },
      });

      const service = createService();
      await expect(service.hasOpenPosition(27)).resolves.toBe(false);
      await expect(service.hasOpenPosition(29)).resolves.toBe(false);
      await expect(service.hasOpenPosition(28)).resolves.toBe(true);
    });
  });

  describe('orders', () => {
    it('should answer orders locally in dry-run mode', async () => {
      const response = await createService().placeMarketOrder(27, 'buy', 0.7);

      expect(response).toEqual({
        success: true,
        dry_run: true,
        path: '/v2/orders',
        payload: {
          order_type: 'market',
          product_id: 27,
          size: '0.7',
          side: 'buy',
          leverage: '100',
          reduce_only: false,
        },
      });
      expect(mockedAxios.post).not.toHaveBeenCalled();
    });

    it('should build reduce-only exit orders', async () => {
      const service = createService();

      const takeProfit = await service.placeLimitReduceOrder(27, 'sell', 0.7, 108.4);
      const stop = await service.placeStopMarketOrder(27, 'sell', 0.7, 101.5);

      expect(takeProfit.payload).toEqual({
        order_type: 'limit',
        product_id: 27,
        size: '0.7',
        limit_price: '108.4',
        side: 'sell',
        reduce_only: true,
      });
      expect(stop.payload).toEqual({
        order_type: 'stop_market',
        product_id: 27,
        size: '0.7',
        stop_price: '101.5',
        side: 'sell',
        reduce_only: true,
      });
    });

    it('should post signed orders when live', async () => {
      mockedAxios.post.mockResolvedValue({ data: { success: true, result: { id: 1 } } });
      const body =
        '{"order_type":"limit","product_id":27,"size":"0.7","limit_price":"108.4","side":"sell","reduce_only":true}';

      const response = await createService({ live: true }).placeLimitReduceOrder(
        27,
        'sell',
        0.7,
        108.4
      );

      expect(response).toEqual({ success: true, result: { id: 1 }, error: undefined });
      expect(mockedAxios.post).toHaveBeenCalledWith(`${BASE_URL}/v2/orders`, body, {
        headers: expect.objectContaining({
          'api-key': 'test-key',
          timestamp: TIMESTAMP,
          signature: hmac(`POST1700000000/v2/orders${body}`),
        }),
        timeout: 1000,
      });
    });

    it('should fold transport errors into the response', async () => {
      mockedAxios.post.mockRejectedValue(new Error('socket hang up'));

      await expect(createService({ live: true }).placeMarketOrder(27, 'sell', 1)).resolves.toEqual({
        success: false,
        error: 'network_error',
        detail: 'socket hang up',
      });
    });
  });

  describe('createDeltaApiService', () => {
    it('should take its settings from the config', async () => {
      const service = createDeltaApiService(defaultConfig(), {
        apiKey: 'test-key',
        apiSecret: 'test-secret',
      });

      const response = await service.placeMarketOrder(27, 'buy', 1);

      expect(response.dry_run).toBe(true);
      expect(response.payload?.leverage).toBe('100');
    });
  });
});
