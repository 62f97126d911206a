import { jest, describe, beforeEach, it, expect } from '@jest/globals';
import { SimulationEngine } from '../../services/trading/SimulationEngine';
import { InMemoryLedgerRepository } from '../../services/ledger/InMemoryLedgerRepository';
import { ManualClock } from '../../utils/clock';
import { ConcurrentMutationError, InvalidOrderError, InvalidStateError } from '../../utils/errors';
import { dec, sum } from '../../utils/money';
import { OpenPositionRequest } from '../../types/trading';
import { T0 } from '../utils/fakes';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const longRequest = (overrides: Partial<OpenPositionRequest> = {}): OpenPositionRequest => ({
  symbol: 'BTCUSDT',
  direction: 'long',
  sizing: { kind: 'notional', notional: 2000 },
  referencePrice: 100,
  leverage: 2,
  strategyId: 'test',
  ...overrides,
});

describe('SimulationEngine', () => {
  let repository: InMemoryLedgerRepository;
  let clock: ManualClock;
  let engine: SimulationEngine;

  beforeEach(async () => {
    repository = new InMemoryLedgerRepository();
    clock = new ManualClock(T0);
    engine = await SimulationEngine.create({
      repository,
      clock,
      settings: {
        accountName: 'test',
        startingEquity: 10000,
        slippageRate: 0.001,
        takerFeeRate: 0.0005,
        defaultLeverage: 2,
        defaultTickSize: 0.01,
      },
    });
  });

  describe('account lifecycle', () => {
    it('should create and persist a fresh account on first use', async () => {
      const stored = await repository.loadAccount('test');
      expect(stored?.balance.toString()).toBe('10000');
      expect(engine.getAccount().startingEquity.toString()).toBe('10000');
    });

    it('should reload an existing account instead of recreating it', async () => {
      await engine.open(longRequest());
      const reloaded = await SimulationEngine.create({ repository, clock, settings: { accountName: 'test' } });

      expect(reloaded.getAccount().balance.toString()).toBe('8997.999');
      expect(reloaded.getOpenPositions()).toHaveLength(1);
    });
  });

  describe('open', () => {
    it('should fill with slippage, debit margin and fee', async () => {
      const result = await engine.open(longRequest());

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      expect(result.value.entryPrice.toString()).toBe('100.1');
      expect(result.value.size.toString()).toBe('20');
      expect(result.value.margin.toString()).toBe('1001');
      expect(result.value.entryFee.toString()).toBe('1.001');
      expect(engine.getAccount().balance.toString()).toBe('8997.999');
    });

    it('should reject a second open on the same symbol without touching the balance', async () => {
      await engine.open(longRequest());
      const second = await engine.open(longRequest({ direction: 'short' }));

      expect(second.accepted).toBe(false);
      if (second.accepted) return;
      expect(second.rejection.code).toBe('DUPLICATE_OPEN_POSITION');
      expect(engine.getAccount().balance.toString()).toBe('8997.999');
      expect(engine.getOpenPositions()).toHaveLength(1);
    });

    it('should store symbols upper-cased and find them in any case', async () => {
      const result = await engine.open(longRequest({ symbol: ' btcusdt' }));

      expect(result.accepted ? result.value.symbol : '').toBe('BTCUSDT');
      expect(engine.getOpenPosition('btcusdt')?.symbol).toBe('BTCUSDT');
      const found = await engine.transaction((tx) => tx.findOpenPosition('BtcUsdt')?.id);
      expect(found).toBe(engine.getOpenPosition('BTCUSDT')?.id);
    });

    it('should reject when margin plus fee exceeds the balance', async () => {
      const result = await engine.open(longRequest({ sizing: { kind: 'notional', notional: 20000 }, leverage: 2 }));

      expect(result.accepted).toBe(false);
      if (result.accepted) return;
      expect(result.rejection.code).toBe('INSUFFICIENT_MARGIN');
      expect(engine.getAccount().balance.toString()).toBe('10000');
    });

    it('should reject leverage outside the allowed range', async () => {
      const tooHigh = await engine.open(longRequest({ leverage: 21 }));
      const tooLow = await engine.open(longRequest({ leverage: 0 }));

      expect(tooHigh.accepted ? '' : tooHigh.rejection.code).toBe('LEVERAGE_OUT_OF_BOUNDS');
      expect(tooLow.accepted ? '' : tooLow.rejection.code).toBe('LEVERAGE_OUT_OF_BOUNDS');
    });

    it('should reject stop and target levels on the wrong side of the price', async () => {
      const badStop = await engine.open(longRequest({ stopLoss: 101 }));
      const badTarget = await engine.open(longRequest({ direction: 'short', takeProfit: 105 }));

      expect(badStop.accepted ? '' : badStop.rejection.code).toBe('INVALID_ORDER');
      expect(badTarget.accepted ? '' : badTarget.rejection.code).toBe('INVALID_ORDER');
      expect(engine.getRejections()).toHaveLength(2);
    });

    it('should size balancePercent orders from the current balance', async () => {
      const result = await engine.open(longRequest({ sizing: { kind: 'balancePercent', percent: 10 } }));

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      // 10% of 10000 at a reference of 100
      expect(result.value.size.toString()).toBe('10');
    });
  });

  describe('close', () => {
    it('should settle a take-profit exit with fees on both legs', async () => {
      const opened = await engine.open(longRequest({ takeProfit: 104 }));
      if (!opened.accepted) throw new Error('open rejected');

      clock.advance(60_000);
      const position = engine.getOpenPositions()[0];
      const hit = engine.checkRiskTriggers(position, 105);
      expect(hit?.reason).toBe('take_profit');
      if (!hit) return;

      const closed = await engine.close(position.id, hit.referencePrice, hit.reason);
      expect(closed.accepted).toBe(true);
      if (!closed.accepted) return;

      const trade = closed.value;
      expect(trade.exitPrice.toString()).toBe('103.89');
      expect(trade.exitFee.toString()).toBe('1.0389');
      expect(trade.grossPnl.toString()).toBe('75.8');
      expect(trade.netPnl.toString()).toBe('73.7601');
      expect(trade.closeReason).toBe('take_profit');
      expect(trade.holdingMs).toBe(60_000);
      expect(engine.getAccount().balance.toString()).toBe('10073.7601');
      expect(engine.getAccount().winCount).toBe(1);
    });

    it('should reject closing a position twice', async () => {
      const opened = await engine.open(longRequest());
      if (!opened.accepted) throw new Error('open rejected');

      await engine.close(opened.value.id, 100, 'manual');
      const balance = engine.getAccount().balance.toString();
      const again = await engine.close(opened.value.id, 100, 'manual');

      expect(again.accepted ? '' : again.rejection.code).toBe('POSITION_ALREADY_CLOSED');
      expect(engine.getAccount().balance.toString()).toBe(balance);
      expect(engine.getTrades()).toHaveLength(1);
    });

    it('should reject unknown positions', async () => {
      const result = await engine.close('pos_missing', 100, 'manual');
      expect(result.accepted ? '' : result.rejection.code).toBe('POSITION_NOT_FOUND');
    });

    it('should keep balance equal to starting equity plus net trade PnL once flat', async () => {
      const prices = [
        { symbol: 'BTCUSDT', direction: 'long' as const, entry: 100, exit: 97 },
        { symbol: 'ETHUSDT', direction: 'short' as const, entry: 50, exit: 45 },
        { symbol: 'BTCUSDT', direction: 'short' as const, entry: 99, exit: 101.3 },
      ];

      for (const leg of prices) {
        const opened = await engine.open(
          longRequest({
            symbol: leg.symbol,
            direction: leg.direction,
            referencePrice: leg.entry,
            sizing: { kind: 'units', size: 10 },
          })
        );
        if (!opened.accepted) throw new Error('open rejected');
        await engine.close(opened.value.id, leg.exit, 'strategy_signal');
      }

      const trades = engine.getTrades();
      const expected = dec(10000).plus(sum(trades.map((t) => t.netPnl)));
      expect(trades).toHaveLength(3);
      expect(engine.getAccount().balance.toString()).toBe(expected.toString());
    });

    it('should return the latest trades up to a positive limit', async () => {
      for (const symbol of ['BTCUSDT', 'ETHUSDT']) {
        const opened = await engine.open(longRequest({ symbol }));
        if (!opened.accepted) throw new Error('open rejected');
        await engine.close(opened.value.id, 100, 'strategy_signal');
      }

      expect(engine.getTrades(1).map((t) => t.symbol)).toEqual(['ETHUSDT']);
      expect(engine.getTrades(5).map((t) => t.symbol)).toEqual(['BTCUSDT', 'ETHUSDT']);
      expect(() => engine.getTrades(0)).toThrow('Trade limit must be a positive integer (got 0)');
      expect(() => engine.getTrades(Number.NaN)).toThrow(InvalidOrderError);
    });
  });

  describe('transactions', () => {
    it('should leave state untouched when the commit fails', async () => {
      jest.spyOn(repository, 'commit').mockRejectedValueOnce(new Error('storage offline'));

      await expect(engine.open(longRequest())).rejects.toThrow('storage offline');
      expect(engine.getAccount().balance.toString()).toBe('10000');
      expect(engine.getOpenPositions()).toHaveLength(0);
      expect(await repository.loadOpenPositions('test')).toHaveLength(0);
    });

    it('should apply several operations as one commit', async () => {
      const commit = jest.spyOn(repository, 'commit');

      await engine.transaction((tx) => {
        tx.open(longRequest());
        tx.open(longRequest({ symbol: 'ETHUSDT', referencePrice: 50 }));
      });

      expect(commit).toHaveBeenCalledTimes(1);
      expect(engine.getOpenPositions()).toHaveLength(2);
    });

    it('should queue concurrent transactions', async () => {
      const [first, second] = await Promise.all([
        engine.open(longRequest()),
        engine.open(longRequest({ symbol: 'ETHUSDT', referencePrice: 50 })),
      ]);

      expect(first.accepted && second.accepted).toBe(true);
      expect(engine.getOpenPositions()).toHaveLength(2);
    });

    it('should reject a transaction started from inside another', async () => {
      let nested: Promise<unknown> = Promise.resolve();
      await engine.transaction(() => {
        nested = engine.open(longRequest()).catch((error: unknown) => error);
      });

      expect(await nested).toBeInstanceOf(ConcurrentMutationError);
      expect(engine.getOpenPositions()).toHaveLength(0);
    });
  });

  describe('mark to market and summary', () => {
    it('should report equity as balance plus margin plus unrealized PnL', async () => {
      await engine.open(longRequest());
      const unrealized = await engine.markToMarket({ BTCUSDT: 102 });

      // (102 - 100.1) * 20
      expect(unrealized.toString()).toBe('38');

      const summary = engine.getSummary({ BTCUSDT: 102 });
      expect(summary.equity.toString()).toBe('10036.999');
      expect(summary.totalPnl.toString()).toBe('36.999');
      expect(summary.openPositions[0].unrealizedPnl.toString()).toBe('38');
    });

    it('should fall back to the cached mark when no price is given', async () => {
      await engine.open(longRequest());
      await engine.markToMarket({ BTCUSDT: 99 });

      expect(engine.getUnrealizedPnl().toString()).toBe('-22');
    });
  });

  describe('reset', () => {
    it('should refuse while positions are open', async () => {
      await engine.open(longRequest());
      await expect(engine.reset()).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('should restore a fresh account and clear history', async () => {
      const opened = await engine.open(longRequest());
      if (!opened.accepted) throw new Error('open rejected');
      await engine.close(opened.value.id, 101, 'manual');

      const account = await engine.reset(5000);
      expect(account.balance.toString()).toBe('5000');
      expect(engine.getTrades()).toHaveLength(0);
      expect(await repository.loadTrades('test')).toHaveLength(0);
    });
  });
});
