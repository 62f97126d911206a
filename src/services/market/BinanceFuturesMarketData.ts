import axios, { AxiosInstance } from 'axios';
import logger from '../../utils/logger';
import { TransientDataError } from '../../utils/errors';
import { RetryConfig, withRetry } from '../../utils/retry';
import { Bar } from '../../types/trading';
import { MarketDataSource } from './MarketDataSource';

export interface BinanceFuturesOptions {
  baseUrl?: string;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  client?: AxiosInstance;
}

const MAX_KLINES_PER_REQUEST = 1500;

const INTERVAL_MS: Record<string, number> = {
  '1m': 60000,
  '3m': 180000,
  '5m': 300000,
  '15m': 900000,
  '30m': 1800000,
  '1h': 3600000,
  '2h': 7200000,
  '4h': 14400000,
  '6h': 21600000,
  '8h': 28800000,
  '12h': 43200000,
  '1d': 86400000,
};

export function intervalToMs(interval: string): number {
  const ms = INTERVAL_MS[interval];
  if (ms === undefined) {
    throw new TransientDataError(`Unsupported bar interval ${interval}`, false);
  }
  return ms;
}

function toNumber(value: unknown, field: string): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new TransientDataError(`Malformed ${field} in market data response: ${String(value)}`, false);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Kline rows are positional: [openTime, open, high, low, close, volume, closeTime, ...].
 */
export function parseKlines(payload: unknown): Bar[] {
  if (!Array.isArray(payload)) {
    throw new TransientDataError('Kline response is not an array', false);
  }
  return payload.map((row: unknown) => {
    if (!Array.isArray(row) || row.length < 6) {
      throw new TransientDataError('Malformed kline row', false);
    }
    return {
      timestamp: new Date(toNumber(row[0], 'openTime')),
      open: toNumber(row[1], 'open'),
      high: toNumber(row[2], 'high'),
      low: toNumber(row[3], 'low'),
      close: toNumber(row[4], 'close'),
      volume: toNumber(row[5], 'volume'),
    };
  });
}

/**
 * Public USDⓈ-M futures REST endpoints. No credentials are needed for market data.
 */
export class BinanceFuturesMarketData implements MarketDataSource {
  private readonly client: AxiosInstance;
  private readonly retry: Partial<RetryConfig>;

  constructor(options: BinanceFuturesOptions = {}) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl ?? 'https://fapi.binance.com',
        timeout: options.timeoutMs ?? 10000,
      });
    this.retry = options.retry ?? {};
  }

  async fetchBars(symbol: string, interval: string, limit: number, signal?: AbortSignal): Promise<Bar[]> {
    return withRetry(
      async () => {
        const response = await this.client.get('/fapi/v1/klines', {
          params: { symbol, interval, limit: Math.min(limit, MAX_KLINES_PER_REQUEST) },
          signal,
        });
        return parseKlines(response.data);
      },
      { ...this.retry, label: `klines ${symbol} ${interval}`, signal }
    );
  }

  async fetchPrice(symbol: string, signal?: AbortSignal): Promise<number> {
    return withRetry(
      async () => {
        const response = await this.client.get('/fapi/v1/ticker/price', { params: { symbol }, signal });
        const data: unknown = response.data;
        if (!isRecord(data)) {
          throw new TransientDataError(`Malformed price response for ${symbol}`, false);
        }
        return toNumber(data.price, 'price');
      },
      { ...this.retry, label: `price ${symbol}`, signal }
    );
  }

  async fetchFundingRate(symbol: string, signal?: AbortSignal): Promise<number | undefined> {
    return withRetry(
      async () => {
        const response = await this.client.get('/fapi/v1/premiumIndex', { params: { symbol }, signal });
        const data: unknown = response.data;
        if (!isRecord(data) || data.lastFundingRate === undefined || data.lastFundingRate === '') {
          return undefined;
        }
        // Venue reports a fraction per interval
        return toNumber(data.lastFundingRate, 'lastFundingRate') * 100;
      },
      { ...this.retry, label: `funding ${symbol}`, signal }
    );
  }

  /**
   * Pages through klines between `start` and `end` (inclusive of bars opening in range).
   */
  async fetchHistoricalBars(symbol: string, interval: string, start: Date, end: Date): Promise<Bar[]> {
    const step = intervalToMs(interval);
    const bars: Bar[] = [];
    let cursor = start.getTime();

    while (cursor <= end.getTime()) {
      const startTime = cursor;
      const page = await withRetry(
        async () => {
          const response = await this.client.get('/fapi/v1/klines', {
            params: { symbol, interval, startTime, endTime: end.getTime(), limit: MAX_KLINES_PER_REQUEST },
          });
          return parseKlines(response.data);
        },
        { ...this.retry, label: `historical klines ${symbol} ${interval}` }
      );

      if (page.length === 0) break;
      bars.push(...page);
      cursor = page[page.length - 1].timestamp.getTime() + step;
      logger.debug(`Fetched ${page.length} ${symbol} bars, ${bars.length} total`);
    }

    return bars;
  }
}
