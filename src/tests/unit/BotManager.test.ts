import { jest, describe, beforeEach, afterEach, it, expect } from '@jest/globals';
import logger from '../../utils/logger';
import { BotManager } from '../../services/trading/BotManager';
import { SimulationEngine } from '../../services/trading/SimulationEngine';
import { InMemoryLedgerRepository } from '../../services/ledger/InMemoryLedgerRepository';
import { InMemoryRunStateStore } from '../../services/trading/StateManager';
import { DEFAULT_BOT_SETTINGS, DEFAULT_ENGINE_SETTINGS } from '../../config/settings';
import { InvalidStateError } from '../../utils/errors';
import { FakeMarketData } from '../utils/fakes';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('BotManager', () => {
  let repository: InMemoryLedgerRepository;
  let manager: BotManager;

  beforeEach(() => {
    jest.clearAllMocks();
    repository = new InMemoryLedgerRepository();
    manager = new BotManager({
      repository,
      marketData: new FakeMarketData({ BTCUSDT: 100 }),
      stateStore: new InMemoryRunStateStore(),
      engineSettings: { ...DEFAULT_ENGINE_SETTINGS, accountName: 'acct' },
      botSettings: { ...DEFAULT_BOT_SETTINGS, pollIntervalMs: 60000 },
    });
  });

  afterEach(async () => {
    await manager.stopAll();
  });

  describe('startRun', () => {
    it('should let only one of two simultaneous starts on an account through', async () => {
      const results = await Promise.allSettled([
        manager.startRun({ strategy: { name: 'breakout' } }),
        manager.startRun({ strategy: { name: 'mean_reversion' } }),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      const [, second] = results;
      expect(second.status === 'rejected' ? second.reason : undefined).toBeInstanceOf(InvalidStateError);

      const runs = await manager.listRuns();
      expect(runs.filter((run) => run.status === 'RUNNING')).toHaveLength(1);
    });

    it('should start runs on different accounts side by side', async () => {
      const [a, b] = await Promise.all([
        manager.startRun({ strategy: { name: 'breakout' }, accountName: 'a' }),
        manager.startRun({ strategy: { name: 'breakout' }, accountName: 'b' }),
      ]);

      expect([a.accountName, b.accountName]).toEqual(['a', 'b']);
      expect(a.status).toBe('RUNNING');
      expect(b.status).toBe('RUNNING');
    });

    it('should allow a new start after the account fails to load', async () => {
      jest.spyOn(repository, 'loadAccount').mockRejectedValueOnce(new Error('ledger offline'));

      await expect(manager.startRun({ strategy: { name: 'breakout' } })).rejects.toThrow('ledger offline');
      const run = await manager.startRun({ strategy: { name: 'breakout' } });

      expect(run.status).toBe('RUNNING');
    });

    it('should warn when a starting equity is given for an existing account', async () => {
      const first = await manager.startRun({ strategy: { name: 'breakout' }, startingEquity: 5000 });
      await manager.stopRun(first.runId);
      expect(logger.warn).not.toHaveBeenCalledWith(expect.stringContaining('already exists'));

      await manager.startRun({ strategy: { name: 'breakout' }, startingEquity: 7000 });

      expect(logger.warn).toHaveBeenCalledWith(
        'Account acct already exists with starting equity 5000; ignoring 7000'
      );
      expect(manager.getSummary(first.runId).equity.toString()).toBe('5000');
    });

    it('should warn when the account was stored by an earlier process', async () => {
      await SimulationEngine.create({ repository, settings: { accountName: 'acct', startingEquity: 2500 } });

      await manager.startRun({ strategy: { name: 'breakout' }, startingEquity: 10000 });

      expect(logger.warn).toHaveBeenCalledWith(
        'Account acct already exists with starting equity 2500; ignoring 10000'
      );
    });

    it('should stay quiet when the requested starting equity matches', async () => {
      await SimulationEngine.create({ repository, settings: { accountName: 'acct', startingEquity: 2500 } });

      await manager.startRun({ strategy: { name: 'breakout' }, startingEquity: 2500 });

      expect(logger.warn).not.toHaveBeenCalledWith(expect.stringContaining('already exists'));
    });
  });
});
