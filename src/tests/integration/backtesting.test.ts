import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { BacktestService, mergeSeries } from '../../services/backtest/BacktestService';
import { BreakoutStrategy } from '../../services/strategies/BreakoutStrategy';
import { Decision, OpenDecision } from '../../services/strategies/Strategy';
import { InvalidOrderError } from '../../utils/errors';
import { dec, sum } from '../../utils/money';
import { MINUTE, ScriptedStrategy, T0, flatBars, makeBars } from '../utils/fakes';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const openLongOnce =
  (extra: Partial<OpenDecision> = {}) =>
  (_context: unknown, call: number): Decision =>
    call === 1 ? { kind: 'open', direction: 'long', confidence: 7, reason: 'test entry', ...extra } : { kind: 'hold' };

describe('Backtesting Integration Tests', () => {
  let service: BacktestService;

  beforeEach(() => {
    service = new BacktestService();
  });

  describe('Replay', () => {
    it('should leave equity untouched when the strategy never trades', async () => {
      const result = await service.run({
        strategy: new ScriptedStrategy(),
        series: { BTCUSDT: flatBars(10, 100) },
      });

      expect(result.stopReason).toBe('end_of_data');
      expect(result.barsProcessed).toBe(10);
      expect(result.trades).toHaveLength(0);
      expect(result.summary.equity.toString()).toBe('10000');
      expect(result.equityCurve.every((point) => point.equity === 10000)).toBe(true);
      expect(result.stats.totalTrades).toBe(0);
    });

    it('should close what is still open when the data runs out', async () => {
      const result = await service.run({
        strategy: new ScriptedStrategy(openLongOnce()),
        series: { BTCUSDT: flatBars(5, 100) },
      });

      expect(result.trades).toHaveLength(1);
      const [trade] = result.trades;
      expect(trade.closeReason).toBe('end_of_data');
      expect(trade.entryPrice.toString()).toBe('100.1');
      expect(trade.exitPrice.toString()).toBe('99.9');
      // Gross -2 less 1.0 in fees
      expect(trade.netPnl.toString()).toBe('-3');
      expect(result.summary.openPositions).toHaveLength(0);
      expect(result.equityCurve[result.equityCurve.length - 1].equity).toBe(9997);
      expect(result.endedAt.getTime()).toBe(T0.getTime() + 4 * MINUTE);
    });

    it('should fire stops against the bar range', async () => {
      const result = await service.run({
        strategy: new ScriptedStrategy(openLongOnce({ stopLoss: 95 })),
        series: {
          BTCUSDT: makeBars([{ close: 100 }, { open: 99, high: 100, low: 94, close: 96 }, { close: 97 }]),
        },
      });

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0].closeReason).toBe('stop_loss');
      expect(result.trades[0].exitPrice.toString()).toBe('94.9');
      expect(result.trades[0].netPnl.toString()).toBe('-52.975');
      expect(result.stats.losingTrades).toBe(1);
    });

    it('should cap the strategy window at the configured history', async () => {
      const strategy = new ScriptedStrategy();
      await service.run({ strategy, series: { BTCUSDT: flatBars(6, 100) }, settings: { historyBars: 3 } });

      expect(strategy.contexts.map((c) => c.bars.length)).toEqual([1, 2, 3, 3, 3, 3]);
    });

    it('should supply the latest funding rate at each bar', async () => {
      const strategy = new ScriptedStrategy();
      await service.run({
        strategy,
        series: { BTCUSDT: flatBars(3, 100) },
        fundingRates: {
          BTCUSDT: [
            { timestamp: new Date(T0.getTime() + 2 * MINUTE), rate: 0.02 },
            { timestamp: T0, rate: 0.01 },
          ],
        },
      });

      expect(strategy.contexts.map((c) => c.fundingRate)).toEqual([0.01, 0.01, 0.02]);
    });

    it('should match stops on a series keyed by a lower-case symbol', async () => {
      const result = await service.run({
        strategy: new ScriptedStrategy(openLongOnce({ stopLoss: 95 })),
        series: {
          btcusdt: makeBars([{ close: 100 }, { open: 99, high: 100, low: 85, close: 96 }, { close: 97 }]),
        },
      });

      expect(result.symbols).toEqual(['BTCUSDT']);
      expect(result.trades.map((t) => t.closeReason)).toEqual(['stop_loss']);
      expect(result.trades[0].symbol).toBe('BTCUSDT');
    });

    it('should reject a symbol given twice in different case', async () => {
      await expect(
        service.run({
          strategy: new ScriptedStrategy(),
          series: { btcusdt: flatBars(2, 100), BTCUSDT: flatBars(2, 100) },
        })
      ).rejects.toThrow('Symbol BTCUSDT is given more than once');
    });

    it('should number ids from one so replays are repeatable', async () => {
      const replay = () =>
        service.run({
          strategy: new ScriptedStrategy(openLongOnce()),
          series: { BTCUSDT: flatBars(3, 100) },
        });

      const first = await replay();
      const second = await replay();

      expect(first.runId).toBe(`backtest_scripted_${T0.getTime()}`);
      expect(second.runId).toBe(first.runId);
      expect(first.trades.map((t) => [t.id, t.positionId])).toEqual([['trd_1', 'pos_1']]);
      expect(second.trades.map((t) => [t.id, t.positionId])).toEqual([['trd_1', 'pos_1']]);
    });

    it('should reject an empty series', async () => {
      await expect(service.run({ strategy: new ScriptedStrategy(), series: {} })).rejects.toBeInstanceOf(
        InvalidOrderError
      );
    });
  });

  describe('Breakers', () => {
    it('should stop on the loss limit and leave the position open', async () => {
      const result = await service.run({
        strategy: new ScriptedStrategy(openLongOnce()),
        series: { BTCUSDT: makeBars([{ close: 100 }, { close: 90 }, { close: 80 }]) },
        settings: { maxLossLimit: 50 },
      });

      expect(result.stopReason).toBe('loss_limit');
      expect(result.barsProcessed).toBe(2);
      expect(result.trades).toHaveLength(0);
      expect(result.summary.openPositions).toHaveLength(1);
      // Unrealized (90 - 100.1) * 10 and the entry fee
      expect(result.summary.totalPnl.toString()).toBe('-101.5005');
    });

    it('should stop on the time limit measured in series time', async () => {
      const result = await service.run({
        strategy: new ScriptedStrategy(),
        series: { BTCUSDT: flatBars(10, 100) },
        settings: { timeLimitMs: 2 * MINUTE },
      });

      expect(result.stopReason).toBe('time_limit');
      expect(result.barsProcessed).toBe(3);
    });
  });

  describe('Multiple symbols', () => {
    it('should merge series by timestamp and process shared bars in one tick', async () => {
      const series = {
        ETHUSDT: flatBars(2, 50, new Date(T0.getTime() + MINUTE)),
        BTCUSDT: flatBars(2, 100),
      };

      const slices = mergeSeries(series);
      expect(slices.map((s) => s.bars.map((b) => b.symbol))).toEqual([['BTCUSDT'], ['BTCUSDT', 'ETHUSDT'], ['ETHUSDT']]);

      const strategy = new ScriptedStrategy();
      const result = await service.run({ strategy, series });

      expect(result.symbols).toEqual(['BTCUSDT', 'ETHUSDT']);
      expect(result.barsProcessed).toBe(3);
      expect(strategy.contexts.map((c) => c.symbol)).toEqual(['BTCUSDT', 'BTCUSDT', 'ETHUSDT', 'ETHUSDT']);
    });
  });

  describe('Real strategies', () => {
    it('should run a breakout strategy through a trending series', async () => {
      const shapes = [
        ...Array.from({ length: 30 }, (_, i) => ({ close: 100 + (i % 2), high: 101.5, low: 99.5, volume: 100 })),
        { open: 101, close: 104, high: 104.5, low: 101, volume: 400 },
        ...Array.from({ length: 10 }, (_, i) => ({ close: 105 + i, high: 106 + i, low: 104 + i, volume: 200 })),
      ];

      const result = await service.run({
        strategy: new BreakoutStrategy({ lookback: 20, volumePeriod: 20, atrPeriod: 14 }),
        series: { BTCUSDT: makeBars(shapes) },
      });

      expect(result.barsProcessed).toBe(41);
      expect(result.trades.length).toBeGreaterThanOrEqual(1);
      expect(result.trades[0].direction).toBe('long');
      expect(result.summary.openPositions).toHaveLength(0);
      expect(result.summary.balance.toNumber()).toBeCloseTo(
        dec(10000).plus(sum(result.trades.map((t) => t.netPnl))).toNumber(),
        8
      );
    });
  });
});
