import { describe, it, expect } from '@jest/globals';
import { InMemoryLedgerRepository } from '../../services/ledger/InMemoryLedgerRepository';
import { isEmptyChangeSet } from '../../services/ledger/LedgerRepository';
import { fromPositionRow, toAccountRow, toPositionRow, fromAccountRow } from '../../services/database/ledgerRows';
import { DuplicateOpenPositionError } from '../../utils/errors';
import { ZERO, dec } from '../../utils/money';
import { Account, Position } from '../../types/trading';
import { T0 } from '../utils/fakes';

function account(overrides: Partial<Account> = {}): Account {
  return {
    name: 'desk',
    startingEquity: dec(1000),
    balance: dec(1000),
    defaultLeverage: 2,
    makerFeeRate: dec('0.0002'),
    takerFeeRate: dec('0.0005'),
    realizedPnl: ZERO,
    totalFees: ZERO,
    tradeCount: 0,
    winCount: 0,
    lossCount: 0,
    peakEquity: dec(1000),
    maxDrawdownPct: ZERO,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

function position(overrides: Partial<Position> = {}): Position {
  return {
    id: 'pos_1',
    accountName: 'desk',
    symbol: 'BTCUSDT',
    direction: 'long',
    size: dec('0.5'),
    entryPrice: dec('100.1'),
    referencePrice: dec(100),
    leverage: 2,
    margin: dec('25.025'),
    entryFee: dec('0.025025'),
    highWaterPrice: dec('100.1'),
    openedAt: T0,
    strategyId: 'test',
    status: 'open',
    unrealizedPnl: ZERO,
    ...overrides,
  };
}

describe('InMemoryLedgerRepository', () => {
  it('should return nothing for unknown accounts', async () => {
    const repository = new InMemoryLedgerRepository();
    expect(await repository.loadAccount('nobody')).toBeNull();
    expect(await repository.loadOpenPositions('nobody')).toEqual([]);
    expect(await repository.loadTrades('nobody')).toEqual([]);
  });

  it('should store a committed change set and hand back copies', async () => {
    const repository = new InMemoryLedgerRepository();
    await repository.commit({ account: account({ balance: dec(974) }), positions: [position()], orders: [], trades: [] });

    const [loaded] = await repository.loadOpenPositions('desk');
    loaded.symbol = 'MUTATED';

    expect((await repository.loadAccount('desk'))?.balance.toString()).toBe('974');
    expect((await repository.loadOpenPositions('desk'))[0].symbol).toBe('BTCUSDT');
  });

  it('should refuse a second open position on the same symbol and keep the prior state', async () => {
    const repository = new InMemoryLedgerRepository();
    await repository.commit({ account: account(), positions: [position()], orders: [], trades: [] });

    await expect(
      repository.commit({
        account: account({ balance: dec(1) }),
        positions: [position({ id: 'pos_2' })],
        orders: [],
        trades: [],
      })
    ).rejects.toBeInstanceOf(DuplicateOpenPositionError);

    expect((await repository.loadAccount('desk'))?.balance.toString()).toBe('1000');
    expect(await repository.loadOpenPositions('desk')).toHaveLength(1);
  });

  it('should allow reopening a symbol once the earlier position closed', async () => {
    const repository = new InMemoryLedgerRepository();
    await repository.commit({ account: account(), positions: [position()], orders: [], trades: [] });
    await repository.commit({
      account: account(),
      positions: [position({ status: 'closed', closedAt: T0 }), position({ id: 'pos_2' })],
      orders: [],
      trades: [],
    });

    const open = await repository.loadOpenPositions('desk');
    expect(open.map((p) => p.id)).toEqual(['pos_2']);
  });

  it('should treat a change set without rows as empty', () => {
    expect(isEmptyChangeSet({ account: account(), positions: [], orders: [], trades: [] })).toBe(true);
    expect(isEmptyChangeSet({ account: account(), positions: [position()], orders: [], trades: [] })).toBe(false);
  });
});

describe('ledger rows', () => {
  it('should write decimals as exact strings', () => {
    const row = toPositionRow(position({ stopLoss: dec('95.123456789012345678901') }));

    expect(row.size).toBe('0.5');
    expect(row.stop_loss).toBe('95.123456789012345678901');
    expect(row.take_profit).toBeNull();
    expect(row.opened_at).toBe('2024-01-01T00:00:00.000Z');
  });

  it('should read numeric columns delivered as numbers or strings', () => {
    const row = { ...toPositionRow(position()), size: 0.5, margin: '25.025', mark_price: null, note: null };
    const restored = fromPositionRow(row);

    expect(restored.size.toString()).toBe('0.5');
    expect(restored.margin.toString()).toBe('25.025');
    expect(restored.markPrice).toBeUndefined();
    expect(restored.openedAt.getTime()).toBe(T0.getTime());
  });

  it('should keep account balances exact through a row', () => {
    const restored = fromAccountRow(toAccountRow(account({ balance: dec('10073.7601') })));
    expect(restored.balance.toString()).toBe('10073.7601');
    expect(restored.takerFeeRate.toString()).toBe('0.0005');
  });
});
