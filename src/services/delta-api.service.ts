import { createHmac } from 'node:crypto';

import axios from 'axios';
import chalk from 'chalk';

import type { ApiCredentials, Config } from '../utils/config';
import { withRetry } from '../utils/retry';
import { toNumber } from '../utils/series-builder';

export type OrderSide = 'buy' | 'sell';

/**
 * Envelope of every Delta Exchange REST response. Transport failures are folded
 * into the same shape (`error: 'network_error'`) so callers never catch.
 */
export interface DeltaResponse {
  success?: boolean;
  result?: unknown;
  error?: unknown;
  detail?: string;
  dry_run?: boolean;
  payload?: Record<string, unknown>;
  path?: string;
}

export interface MarketDataSource {
  fetchCandles(symbol: string, resolution: string, limit: number): Promise<unknown[] | null>;
}

export interface TradingGateway extends MarketDataSource {
  getBalanceUsd(): Promise<number>;
  hasOpenPosition(productId: number): Promise<boolean>;
  placeMarketOrder(productId: number, side: OrderSide, size: number): Promise<DeltaResponse>;
  placeLimitReduceOrder(
    productId: number,
    side: OrderSide,
    size: number,
    limitPrice: number
  ): Promise<DeltaResponse>;
  placeStopMarketOrder(
    productId: number,
    side: OrderSide,
    size: number,
    stopPrice: number
  ): Promise<DeltaResponse>;
}

export interface DeltaApiOptions extends ApiCredentials {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  live: boolean;
  leverage: number;
  now?: () => number;
}

export const RESOLUTION_SECONDS: Record<string, number> = {
  '1m': 60,
  '5m': 300,
  '15m': 900,
  '30m': 1800,
  '1h': 3600,
  '2h': 7200,
  '4h': 14400,
  '1d': 86400,
};

const QUOTE_ASSETS = ['USD', 'USDT', 'USDC'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toResponse = (data: unknown): DeltaResponse => {
  if (!isRecord(data)) {
    return { success: false, error: 'invalid_response' };
  }
  return {
    success: data.success === true,
    result: data.result,
    error: data.error,
  };
};

const describeError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return error.response
      ? `${error.response.status} ${error.response.statusText}`
      : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

/**
 * Hex HMAC-SHA256 over METHOD + timestamp + path(+query) + body
 */
export const signRequest = (
  secret: string,
  method: string,
  timestamp: string,
  path: string,
  body = ''
): string =>
  createHmac('sha256', secret)
    .update(method.toUpperCase() + timestamp + path + body)
    .digest('hex');

export class DeltaApiService implements TradingGateway {
  private options: DeltaApiOptions;
  private now: () => number;

  constructor(options: DeltaApiOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  private get publicHeaders() {
    return { 'User-Agent': this.options.userAgent };
  }

  private nowSeconds = (): number => Math.floor(this.now() / 1000);

  /**
   * Signed request against a private endpoint. POSTs are answered locally in dry-run mode.
   */
  private request = async (
    method: 'GET' | 'POST',
    path: string,
    payload?: Record<string, unknown>,
    params?: Record<string, string | number>
  ): Promise<DeltaResponse> => {
    const url = this.options.baseUrl + path;
    const body = payload ? JSON.stringify(payload) : '';
    const query = params
      ? new URLSearchParams(
          Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
        ).toString()
      : '';
    const timestamp = String(this.nowSeconds());
    const signature = signRequest(
      this.options.apiSecret,
      method,
      timestamp,
      query ? `${path}?${query}` : path,
      body
    );

    const headers = {
      ...this.publicHeaders,
      'api-key': this.options.apiKey,
      timestamp,
      signature,
      'Content-Type': 'application/json',
    };

    if (process.env.DEBUG) {
      console.log(chalk.dim(`Delta ${method} ${url}${query ? `?${query}` : ''}`));
    }

    try {
      if (method === 'GET') {
        const response = await axios.get<unknown>(url, {
          headers,
          params,
          timeout: this.options.timeoutMs,
        });
        return toResponse(response.data);
      }

      if (!this.options.live) {
        return { success: true, dry_run: true, payload, path };
      }

      const response = await axios.post<unknown>(url, body, {
        headers,
        timeout: this.options.timeoutMs,
      });
      return toResponse(response.data);
    } catch (error) {
      return { success: false, error: 'network_error', detail: describeError(error) };
    }
  };

  /**
   * Fetch the most recent `limit` candles. Returns null when every attempt failed.
   */
  fetchCandles = async (
    symbol: string,
    resolution: string,
    limit: number
  ): Promise<unknown[] | null> => {
    const interval = RESOLUTION_SECONDS[resolution] ?? 900;
    const url = `${this.options.baseUrl}/v2/history/candles`;

    try {
      return await withRetry(
        async () => {
          const end = this.nowSeconds();
          const start = end - limit * interval;
          const response = await axios.get<unknown>(url, {
            headers: this.publicHeaders,
            params: { symbol, resolution, start, end },
            timeout: this.options.timeoutMs,
          });
          const data = toResponse(response.data);
          if (!data.success) {
            throw new Error(`candles request for ${symbol} ${resolution} was not successful`);
          }
          return Array.isArray(data.result) ? data.result : [];
        },
        {
          retries: this.options.retries,
          delayMs: this.options.retryDelayMs,
          label: `fetchCandles ${symbol} ${resolution}`,
        }
      );
    } catch (error) {
      console.log(
        chalk.red(`❌ fetchCandles failed for ${symbol} ${resolution}: ${describeError(error)}`)
      );
      return null;
    }
  };

  /**
   * Map of upper-cased watchlist symbol to product id
   */
  getProductsMap = async (watchlist: readonly string[]): Promise<Record<string, number>> => {
    const watch = new Set(watchlist.map(symbol => symbol.toUpperCase()));
    try {
      const response = await axios.get<unknown>(`${this.options.baseUrl}/v2/products`, {
        headers: this.publicHeaders,
        timeout: this.options.timeoutMs,
      });
      const data = toResponse(response.data);
      const rows = Array.isArray(data.result) ? data.result : [];

      const map: Record<string, number> = {};
      for (const row of rows) {
        if (!isRecord(row) || typeof row.symbol !== 'string') continue;
        const symbol = row.symbol.toUpperCase();
        const id = toNumber(row.id);
        if (watch.has(symbol) && id !== undefined) {
          map[symbol] = id;
        }
      }
      return map;
    } catch (error) {
      console.log(chalk.red(`❌ getProductsMap: ${describeError(error)}`));
      return {};
    }
  };

  /**
   * Available balance of the first USD-like wallet row, 0 when it cannot be read
   */
  getBalanceUsd = async (): Promise<number> => {
    const data = await this.request('GET', '/v2/wallet/balances');
    if (!data.success) {
      console.log(chalk.red(`❌ Could not get balance: ${JSON.stringify(data)}`));
      return 0;
    }

    const rows = Array.isArray(data.result) ? data.result.filter(isRecord) : [];
    for (const row of rows) {
      const asset = typeof row.asset_symbol === 'string' ? row.asset_symbol.toUpperCase() : '';
      if (!QUOTE_ASSETS.includes(asset)) continue;
      const balance = toNumber(row.available_balance || row.balance || 0);
      if (balance !== undefined) return balance;
    }

    if (rows.length > 0) {
      return toNumber(rows[0].available_balance || 0) ?? 0;
    }
    return 0;
  };

  getOpenPositions = async (): Promise<Record<string, unknown>[]> => {
    for (const path of ['/v2/positions/margined', '/v2/positions']) {
      const data = await this.request('GET', path);
      if (data.success) {
        return Array.isArray(data.result) ? data.result.filter(isRecord) : [];
      }
    }
    return [];
  };

  hasOpenPosition = async (productId: number): Promise<boolean> => {
    const positions = await this.getOpenPositions();
    return positions.some(position => {
      const id = toNumber(position.product_id || position.id || 0);
      const size = toNumber(position.size || position.quantity || 0) ?? 0;
      return id === productId && Math.abs(size) > 0;
    });
  };

  placeMarketOrder = (productId: number, side: OrderSide, size: number): Promise<DeltaResponse> =>
    this.request('POST', '/v2/orders', {
      order_type: 'market',
      product_id: productId,
      size: String(size),
      side,
      leverage: String(this.options.leverage),
      reduce_only: false,
    });

  placeLimitReduceOrder = (
    productId: number,
    side: OrderSide,
    size: number,
    limitPrice: number
  ): Promise<DeltaResponse> =>
    this.request('POST', '/v2/orders', {
      order_type: 'limit',
      product_id: productId,
      size: String(size),
      limit_price: String(limitPrice),
      side,
      reduce_only: true,
    });

  placeStopMarketOrder = (
    productId: number,
    side: OrderSide,
    size: number,
    stopPrice: number
  ): Promise<DeltaResponse> =>
    this.request('POST', '/v2/orders', {
      order_type: 'stop_market',
      product_id: productId,
      size: String(size),
      stop_price: String(stopPrice),
      side,
      reduce_only: true,
    });
}

export const createDeltaApiService = (
  config: Config,
  credentials: ApiCredentials
): DeltaApiService =>
  new DeltaApiService({
    ...credentials,
    baseUrl: config.exchange.baseUrl,
    userAgent: config.exchange.userAgent,
    timeoutMs: config.exchange.timeoutMs,
    retries: config.exchange.retries,
    retryDelayMs: config.exchange.retryDelayMs,
    live: config.trading.live,
    leverage: config.trading.leverage,
  });
