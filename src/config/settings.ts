/**
 * Trading Configuration
 * Loads engine, bot and infrastructure settings from the environment and
 * range-checks every numeric field once, at load time.
 */

import * as dotenv from 'dotenv';
import logger from '../utils/logger';
import { ConfigurationError } from '../utils/errors';
import { DEFAULT_RETRY_CONFIG, RetryConfig } from '../utils/retry';

dotenv.config();

export interface EngineSettings {
  accountName: string;
  startingEquity: number;
  slippageRate: number;
  takerFeeRate: number;
  makerFeeRate: number;
  defaultLeverage: number;
  maxLeverage: number;
  defaultTickSize: number;
  tickSizes: Record<string, number>;
}

export interface BotSettings {
  symbols: string[];
  pollIntervalMs: number;
  barInterval: string;
  historyBars: number;
  timeLimitMs?: number;
  maxLossLimit?: number;
  summaryIntervalMs: number;
  fetchConcurrency: number;
  strategyTimeoutMs: number;
  maxOpenPositions: number;
  positionSizePercent: number;
  closePositionsOnStop: boolean;
}

export interface InfrastructureSettings {
  port: number;
  binanceBaseUrl: string;
  requestTimeoutMs: number;
  retry: RetryConfig;
  supabase?: { url: string; serviceKey: string };
  redis?: { host: string; port: number; password?: string };
}

export interface TradingConfig {
  engine: EngineSettings;
  bot: BotSettings;
  infrastructure: InfrastructureSettings;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  accountName: 'paper',
  startingEquity: 10000,
  slippageRate: 0.001,
  takerFeeRate: 0.0005,
  makerFeeRate: 0.0002,
  defaultLeverage: 2,
  maxLeverage: 20,
  defaultTickSize: 0.01,
  tickSizes: {},
};

export const DEFAULT_BOT_SETTINGS: BotSettings = {
  symbols: ['BTCUSDT'],
  pollIntervalMs: 60000,
  barInterval: '1m',
  historyBars: 200,
  summaryIntervalMs: 60000,
  fetchConcurrency: 4,
  strategyTimeoutMs: 5000,
  maxOpenPositions: 1,
  positionSizePercent: 10,
  closePositionsOnStop: false,
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw);
}

function readOptionalNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
}

/**
 * Parses `BTCUSDT:0.1,ETHUSDT:0.01` into a tick-size map.
 */
function readTickSizes(env: Env, key: string): Record<string, number> {
  const raw = env[key];
  const sizes: Record<string, number> = {};
  if (!raw) return sizes;

  for (const entry of raw.split(',')) {
    const [symbol, size] = entry.split(':').map((part) => part.trim());
    if (symbol && size) {
      sizes[symbol.toUpperCase()] = Number(size);
    }
  }
  return sizes;
}

function checkRange(errors: string[], name: string, value: number | undefined, min: number, max: number): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < min || value > max) {
    errors.push(`${name} must be between ${min} and ${max} (got ${value})`);
  }
}

export function validateEngineSettings(settings: EngineSettings): void {
  const errors: string[] = [];

  if (!settings.accountName.trim()) {
    errors.push('accountName is required');
  }
  checkRange(errors, 'startingEquity', settings.startingEquity, 1, 1e12);
  checkRange(errors, 'slippageRate', settings.slippageRate, 0, 0.1);
  checkRange(errors, 'takerFeeRate', settings.takerFeeRate, 0, 0.1);
  checkRange(errors, 'makerFeeRate', settings.makerFeeRate, 0, 0.1);
  checkRange(errors, 'maxLeverage', settings.maxLeverage, 1, 125);
  checkRange(errors, 'defaultLeverage', settings.defaultLeverage, 1, settings.maxLeverage);
  checkRange(errors, 'defaultTickSize', settings.defaultTickSize, 1e-12, 1e6);
  for (const [symbol, tick] of Object.entries(settings.tickSizes)) {
    checkRange(errors, `tickSizes.${symbol}`, tick, 1e-12, 1e6);
  }

  if (errors.length > 0) {
    throw new ConfigurationError('engine', errors);
  }
}

export function validateBotSettings(settings: BotSettings): void {
  const errors: string[] = [];

  if (settings.symbols.length === 0) {
    errors.push('at least one symbol is required');
  }
  checkRange(errors, 'pollIntervalMs', settings.pollIntervalMs, 1, 86400000);
  checkRange(errors, 'historyBars', settings.historyBars, 1, 1500);
  checkRange(errors, 'timeLimitMs', settings.timeLimitMs, 1, 365 * 86400000);
  checkRange(errors, 'maxLossLimit', settings.maxLossLimit, 0.01, 1e12);
  checkRange(errors, 'summaryIntervalMs', settings.summaryIntervalMs, 1, 86400000);
  checkRange(errors, 'fetchConcurrency', settings.fetchConcurrency, 1, 32);
  checkRange(errors, 'strategyTimeoutMs', settings.strategyTimeoutMs, 1, 600000);
  checkRange(errors, 'maxOpenPositions', settings.maxOpenPositions, 1, 100);
  checkRange(errors, 'positionSizePercent', settings.positionSizePercent, 0.01, 100);

  if (errors.length > 0) {
    throw new ConfigurationError('bot', errors);
  }
}

export class TradingConfigManager {
  private static instance: TradingConfigManager | undefined;
  private readonly config: TradingConfig;

  constructor(env: Env = process.env) {
    this.config = TradingConfigManager.load(env);
    this.validateConfiguration();
  }

  static getInstance(): TradingConfigManager {
    if (!TradingConfigManager.instance) {
      TradingConfigManager.instance = new TradingConfigManager();
    }
    return TradingConfigManager.instance;
  }

  private static load(env: Env): TradingConfig {
    const supabaseUrl = env.SUPABASE_URL;
    const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY;

    return {
      engine: {
        accountName: env.PAPER_ACCOUNT_NAME || DEFAULT_ENGINE_SETTINGS.accountName,
        startingEquity: readNumber(env, 'PAPER_STARTING_EQUITY', DEFAULT_ENGINE_SETTINGS.startingEquity),
        slippageRate: readNumber(env, 'PAPER_SLIPPAGE_RATE', DEFAULT_ENGINE_SETTINGS.slippageRate),
        takerFeeRate: readNumber(env, 'PAPER_TAKER_FEE_RATE', DEFAULT_ENGINE_SETTINGS.takerFeeRate),
        makerFeeRate: readNumber(env, 'PAPER_MAKER_FEE_RATE', DEFAULT_ENGINE_SETTINGS.makerFeeRate),
        defaultLeverage: readNumber(env, 'PAPER_DEFAULT_LEVERAGE', DEFAULT_ENGINE_SETTINGS.defaultLeverage),
        maxLeverage: readNumber(env, 'PAPER_MAX_LEVERAGE', DEFAULT_ENGINE_SETTINGS.maxLeverage),
        defaultTickSize: readNumber(env, 'PAPER_DEFAULT_TICK_SIZE', DEFAULT_ENGINE_SETTINGS.defaultTickSize),
        tickSizes: readTickSizes(env, 'PAPER_TICK_SIZES'),
      },
      bot: {
        symbols: readList(env, 'BOT_SYMBOLS', DEFAULT_BOT_SETTINGS.symbols),
        pollIntervalMs: readNumber(env, 'BOT_POLL_INTERVAL_MS', DEFAULT_BOT_SETTINGS.pollIntervalMs),
        barInterval: env.BOT_BAR_INTERVAL || DEFAULT_BOT_SETTINGS.barInterval,
        historyBars: readNumber(env, 'BOT_HISTORY_BARS', DEFAULT_BOT_SETTINGS.historyBars),
        timeLimitMs: readOptionalNumber(env, 'BOT_TIME_LIMIT_MS'),
        maxLossLimit: readOptionalNumber(env, 'BOT_MAX_LOSS_LIMIT'),
        summaryIntervalMs: readNumber(env, 'BOT_SUMMARY_INTERVAL_MS', DEFAULT_BOT_SETTINGS.summaryIntervalMs),
        fetchConcurrency: readNumber(env, 'BOT_FETCH_CONCURRENCY', DEFAULT_BOT_SETTINGS.fetchConcurrency),
        strategyTimeoutMs: readNumber(env, 'BOT_STRATEGY_TIMEOUT_MS', DEFAULT_BOT_SETTINGS.strategyTimeoutMs),
        maxOpenPositions: readNumber(env, 'BOT_MAX_OPEN_POSITIONS', DEFAULT_BOT_SETTINGS.maxOpenPositions),
        positionSizePercent: readNumber(env, 'BOT_POSITION_SIZE_PERCENT', DEFAULT_BOT_SETTINGS.positionSizePercent),
        closePositionsOnStop: env.BOT_CLOSE_POSITIONS_ON_STOP === 'true',
      },
      infrastructure: {
        port: readNumber(env, 'PORT', 3001),
        binanceBaseUrl: env.BINANCE_FUTURES_URL || 'https://fapi.binance.com',
        requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', 10000),
        retry: {
          maxAttempts: readNumber(env, 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_CONFIG.maxAttempts),
          baseDelay: readNumber(env, 'RETRY_BASE_DELAY_MS', DEFAULT_RETRY_CONFIG.baseDelay),
          maxDelay: readNumber(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_CONFIG.maxDelay),
          backoffMultiplier: DEFAULT_RETRY_CONFIG.backoffMultiplier,
          jitterMax: DEFAULT_RETRY_CONFIG.jitterMax,
        },
        supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceKey: supabaseKey } : undefined,
        redis: env.REDIS_HOST
          ? {
              host: env.REDIS_HOST,
              port: readNumber(env, 'REDIS_PORT', 6379),
              password: env.REDIS_PASSWORD,
            }
          : undefined,
      },
    };
  }

  private validateConfiguration(): void {
    const errors: string[] = [];

    for (const validate of [
      () => validateEngineSettings(this.config.engine),
      () => validateBotSettings(this.config.bot),
    ]) {
      try {
        validate();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          errors.push(...error.violations);
        } else {
          throw error;
        }
      }
    }

    const { infrastructure } = this.config;
    checkRange(errors, 'PORT', infrastructure.port, 1, 65535);
    checkRange(errors, 'REQUEST_TIMEOUT_MS', infrastructure.requestTimeoutMs, 100, 120000);
    checkRange(errors, 'RETRY_MAX_ATTEMPTS', infrastructure.retry.maxAttempts, 1, 10);
    checkRange(errors, 'RETRY_BASE_DELAY_MS', infrastructure.retry.baseDelay, 0, 60000);
    checkRange(errors, 'RETRY_MAX_DELAY_MS', infrastructure.retry.maxDelay, 0, 300000);

    if (errors.length > 0) {
      throw new ConfigurationError('trading', errors);
    }

    logger.info('Configuration validated successfully', {
      account: this.config.engine.accountName,
      symbols: this.config.bot.symbols,
      persistence: infrastructure.supabase ? 'supabase' : 'memory',
      runState: infrastructure.redis ? 'redis' : 'memory',
    });
  }

  getConfig(): TradingConfig {
    return this.config;
  }

  getEngineSettings(): EngineSettings {
    return this.config.engine;
  }

  getBotSettings(): BotSettings {
    return this.config.bot;
  }

  getInfrastructureSettings(): InfrastructureSettings {
    return this.config.infrastructure;
  }
}
