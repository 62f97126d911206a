import { jest, describe, it, expect } from '@jest/globals';
import {
  DEFAULT_BOT_SETTINGS,
  DEFAULT_ENGINE_SETTINGS,
  TradingConfigManager,
  validateBotSettings,
  validateEngineSettings,
} from '../../config/settings';
import { ConfigurationError } from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function configurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('TradingConfigManager', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = new TradingConfigManager({}).getConfig();

    expect(config.engine).toEqual(DEFAULT_ENGINE_SETTINGS);
    expect(config.bot).toEqual({ ...DEFAULT_BOT_SETTINGS, timeLimitMs: undefined, maxLossLimit: undefined });
    expect(config.infrastructure.port).toBe(3001);
    expect(config.infrastructure.supabase).toBeUndefined();
    expect(config.infrastructure.redis).toBeUndefined();
  });

  it('should read overrides, symbol lists and tick sizes', () => {
    const manager = new TradingConfigManager({
      PAPER_ACCOUNT_NAME: 'desk-a',
      PAPER_STARTING_EQUITY: '2500',
      PAPER_TICK_SIZES: 'btcusdt:0.1, ETHUSDT:0.01',
      BOT_SYMBOLS: 'btcusdt, ethusdt,,',
      BOT_MAX_LOSS_LIMIT: '250',
      BOT_CLOSE_POSITIONS_ON_STOP: 'true',
      REDIS_HOST: 'localhost',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });

    expect(manager.getEngineSettings().accountName).toBe('desk-a');
    expect(manager.getEngineSettings().startingEquity).toBe(2500);
    expect(manager.getEngineSettings().tickSizes).toEqual({ BTCUSDT: 0.1, ETHUSDT: 0.01 });
    expect(manager.getBotSettings().symbols).toEqual(['BTCUSDT', 'ETHUSDT']);
    expect(manager.getBotSettings().maxLossLimit).toBe(250);
    expect(manager.getBotSettings().closePositionsOnStop).toBe(true);
    expect(manager.getInfrastructureSettings().redis).toEqual({ host: 'localhost', port: 6379, password: undefined });
    expect(manager.getInfrastructureSettings().supabase).toEqual({
      url: 'http://localhost:54321',
      serviceKey: 'test-secret',
    });
  });

  it('should report every violation at once', () => {
    const error = configurationError(
      () =>
        new TradingConfigManager({
          PAPER_SLIPPAGE_RATE: '0.5',
          PAPER_DEFAULT_LEVERAGE: '50',
          BOT_POLL_INTERVAL_MS: 'soon',
          PORT: '70000',
        })
    );

    expect(error.violations).toEqual([
      'slippageRate must be between 0 and 0.1 (got 0.5)',
      'defaultLeverage must be between 1 and 20 (got 50)',
      'pollIntervalMs must be between 1 and 86400000 (got NaN)',
      'PORT must be between 1 and 65535 (got 70000)',
    ]);
  });
});

describe('settings validators', () => {
  it('should accept the defaults', () => {
    expect(() => validateEngineSettings(DEFAULT_ENGINE_SETTINGS)).not.toThrow();
    expect(() => validateBotSettings(DEFAULT_BOT_SETTINGS)).not.toThrow();
  });

  it('should reject an empty account name and symbol list', () => {
    expect(configurationError(() => validateEngineSettings({ ...DEFAULT_ENGINE_SETTINGS, accountName: ' ' })).violations)
      .toEqual(['accountName is required']);
    expect(configurationError(() => validateBotSettings({ ...DEFAULT_BOT_SETTINGS, symbols: [] })).violations)
      .toEqual(['at least one symbol is required']);
  });

  it('should range-check optional limits only when set', () => {
    const error = configurationError(() =>
      validateBotSettings({ ...DEFAULT_BOT_SETTINGS, maxLossLimit: 0, positionSizePercent: 150 })
    );
    expect(error.violations).toEqual([
      'maxLossLimit must be between 0.01 and 1000000000000 (got 0)',
      'positionSizePercent must be between 0.01 and 100 (got 150)',
    ]);
  });
});
