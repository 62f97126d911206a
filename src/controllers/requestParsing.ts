/**
 * Typed readers for request bodies that already passed express-validator.
 * Anything missing or of the wrong shape reads as undefined.
 */

import { Bar } from '../types/trading';
import { InvalidOrderError } from '../utils/errors';
import { StrategySpec } from '../services/strategies';
import { SentimentGateOptions } from '../services/strategies/SentimentGate';

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNumber(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

export function readString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function readBoolean(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function readStringArray(source: JsonObject, key: string): string[] | undefined {
  const value = source[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string').map((item) => item.trim().toUpperCase());
}

export function readObject(source: JsonObject, key: string): JsonObject {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/**
 * Copies the listed numeric fields that are present.
 */
export function pickNumbers<K extends string>(source: JsonObject, keys: readonly K[]): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = readNumber(source, key);
    if (value !== undefined) picked[key] = value;
  }
  return picked;
}

export function parseStrategySpec(value: unknown): StrategySpec {
  if (typeof value === 'string') {
    return { name: value };
  }
  if (!isRecord(value)) {
    throw new InvalidOrderError('Strategy is required');
  }

  const name = readString(value, 'name') ?? '';
  const params: Record<string, number> = {};
  for (const [key, param] of Object.entries(readObject(value, 'params'))) {
    if (typeof param === 'number') params[key] = param;
  }

  let sentiment: Partial<SentimentGateOptions> | boolean | undefined;
  const rawSentiment = value.sentiment;
  if (typeof rawSentiment === 'boolean') {
    sentiment = rawSentiment;
  } else if (isRecord(rawSentiment)) {
    sentiment = pickNumbers(rawSentiment, ['minConfidence', 'vetoThreshold']);
  }

  return { name, params, sentiment };
}

function parseBar(value: unknown, symbol: string, index: number): Bar {
  if (!isRecord(value)) {
    throw new InvalidOrderError(`Bar ${index} of ${symbol} is not an object`);
  }
  const rawTimestamp = value.timestamp;
  const timestamp =
    typeof rawTimestamp === 'number' || typeof rawTimestamp === 'string' ? new Date(rawTimestamp) : undefined;
  const open = readNumber(value, 'open');
  const high = readNumber(value, 'high');
  const low = readNumber(value, 'low');
  const close = readNumber(value, 'close');
  const volume = readNumber(value, 'volume') ?? 0;

  if (!timestamp || Number.isNaN(timestamp.getTime()) || open === undefined || high === undefined || low === undefined || close === undefined) {
    throw new InvalidOrderError(`Bar ${index} of ${symbol} needs timestamp, open, high, low and close`);
  }
  if (high < low || open <= 0 || close <= 0 || low <= 0) {
    throw new InvalidOrderError(`Bar ${index} of ${symbol} has inconsistent prices`);
  }
  return { timestamp, open, high, low, close, volume };
}

/**
 * `{ "BTCUSDT": [{ timestamp, open, high, low, close, volume }, ...] }`
 */
export function parseBarSeries(value: unknown): Record<string, Bar[]> {
  if (!isRecord(value)) {
    throw new InvalidOrderError('Bars must map symbols to bar arrays');
  }
  const series: Record<string, Bar[]> = {};
  for (const [symbol, rows] of Object.entries(value)) {
    if (!Array.isArray(rows)) {
      throw new InvalidOrderError(`Bars for ${symbol} must be an array`);
    }
    series[symbol.toUpperCase()] = rows
      .map((row, index) => parseBar(row, symbol, index))
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
  return series;
}
