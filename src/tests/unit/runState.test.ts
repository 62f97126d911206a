import { jest, describe, it, expect } from '@jest/globals';
import { RunHandle, statusForStopReason } from '../../services/trading/RunHandle';
import {
  InMemoryRunStateStore,
  RunRecord,
  StateManager,
  isRunRecord,
  toRunRecord,
} from '../../services/trading/StateManager';
import { InvalidStateError } from '../../utils/errors';
import { RunSnapshot } from '../../types/trading';
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

jest.mock('ioredis', () => {
  const store = new Map<string, string>();
  const sets = new Map<string, Set<string>>();
  const published: Array<{ channel: string; message: string }> = [];

  class FakeRedis {
    on(): this {
      return this;
    }
    async ping(): Promise<string> {
      return 'PONG';
    }
    async setex(key: string, _ttl: number, value: string): Promise<string> {
      store.set(key, value);
      return 'OK';
    }
    async get(key: string): Promise<string | null> {
      return store.get(key) ?? null;
    }
    async sadd(key: string, member: string): Promise<number> {
      const set = sets.get(key) ?? new Set<string>();
      set.add(member);
      sets.set(key, set);
      return 1;
    }
    async smembers(key: string): Promise<string[]> {
      return [...(sets.get(key) ?? [])];
    }
    async srem(key: string, member: string): Promise<number> {
      return sets.get(key)?.delete(member) ? 1 : 0;
    }
    async publish(channel: string, message: string): Promise<number> {
      published.push({ channel, message });
      return 0;
    }
    async quit(): Promise<string> {
      return 'OK';
    }
  }

  return { __esModule: true, default: FakeRedis, store, sets, published };
});

interface RedisMockState {
  store: Map<string, string>;
  sets: Map<string, Set<string>>;
  published: Array<{ channel: string; message: string }>;
}

const redisMock = jest.requireMock<RedisMockState>('ioredis');

function snapshot(overrides: Partial<RunSnapshot> = {}): RunSnapshot {
  return {
    runId: 'run_1',
    accountName: 'desk',
    status: 'RUNNING',
    symbols: ['BTCUSDT'],
    strategyId: 'breakout',
    startedAt: T0,
    ticks: 3,
    tradesClosed: 1,
    rejections: 0,
    skippedFetches: 2,
    ...overrides,
  };
}

describe('RunHandle', () => {
  it('should move from IDLE to RUNNING once', () => {
    const handle = new RunHandle('run_1');
    expect(handle.getStatus()).toBe('IDLE');

    handle.start(T0);
    expect(handle.isRunning()).toBe(true);
    expect(() => handle.start(T0)).toThrow(InvalidStateError);
  });

  it('should keep the first stop reason and abort the signal', () => {
    const handle = new RunHandle('run_1');
    handle.start(T0);

    expect(handle.requestStop('loss_limit')).toBe(true);
    expect(handle.requestStop('signal')).toBe(false);
    expect(handle.signal.aborted).toBe(true);
    expect(handle.stopRequested).toBe('loss_limit');

    expect(handle.finish(T0)).toBe('STOPPED_BY_LOSS_LIMIT');
    expect(handle.stopReason).toBe('loss_limit');
    expect(handle.isTerminal()).toBe(true);
  });

  it('should record the error message of a failed run', () => {
    const handle = new RunHandle('run_1');
    handle.start(T0);
    handle.requestStop('error', 'ledger offline');

    expect(handle.finish(T0)).toBe('ERROR');
    expect(handle.lastError).toBe('ledger offline');
  });

  it('should ignore stop requests after finishing', () => {
    const handle = new RunHandle('run_1');
    handle.start(T0);
    expect(handle.finish(T0)).toBe('STOPPED_BY_SIGNAL');
    expect(handle.requestStop('time_limit')).toBe(false);
    expect(handle.finish(T0)).toBe('STOPPED_BY_SIGNAL');
  });

  it('should map every stop reason to a terminal status', () => {
    expect(statusForStopReason('time_limit')).toBe('STOPPED_BY_TIME_LIMIT');
    expect(statusForStopReason('loss_limit')).toBe('STOPPED_BY_LOSS_LIMIT');
    expect(statusForStopReason('signal')).toBe('STOPPED_BY_SIGNAL');
    expect(statusForStopReason('end_of_data')).toBe('STOPPED_BY_SIGNAL');
    expect(statusForStopReason('error')).toBe('ERROR');
  });
});

describe('run records', () => {
  it('should flatten a snapshot into JSON-safe fields', () => {
    const record = toRunRecord(snapshot(), new Date('2024-01-01T00:05:00.000Z'));

    expect(record).toEqual({
      runId: 'run_1',
      accountName: 'desk',
      status: 'RUNNING',
      symbols: ['BTCUSDT'],
      strategyId: 'breakout',
      startedAt: '2024-01-01T00:00:00.000Z',
      stoppedAt: undefined,
      stopReason: undefined,
      lastError: undefined,
      ticks: 3,
      tradesClosed: 1,
      rejections: 0,
      skippedFetches: 2,
      equity: undefined,
      totalPnl: undefined,
      openPositions: 0,
      updatedAt: '2024-01-01T00:05:00.000Z',
    });
    expect(isRunRecord(JSON.parse(JSON.stringify(record)))).toBe(true);
  });

  it('should reject values that are not run records', () => {
    expect(isRunRecord(null)).toBe(false);
    expect(isRunRecord({ runId: 'run_1', status: 'RUNNING' })).toBe(false);
  });
});

describe('InMemoryRunStateStore', () => {
  it('should keep the latest record per run', async () => {
    const store = new InMemoryRunStateStore();
    await store.saveRun(toRunRecord(snapshot(), T0));
    await store.saveRun(toRunRecord(snapshot({ ticks: 4 }), T0));

    expect((await store.getRun('run_1'))?.ticks).toBe(4);
    expect(await store.listRuns()).toHaveLength(1);
    expect(await store.getRun('run_2')).toBeNull();
  });
});

describe('StateManager', () => {
  const record = (runId: string): RunRecord => toRunRecord(snapshot({ runId }), T0);

  it('should store runs under their key and index them', async () => {
    const manager = new StateManager({ host: 'localhost', port: 6379 });
    await manager.initialize();
    await manager.saveRun(record('run_a'));

    expect(redisMock.store.has('paper:run:run_a')).toBe(true);
    expect((await manager.getRun('run_a'))?.runId).toBe('run_a');
    expect((await manager.listRuns()).map((r) => r.runId)).toContain('run_a');
  });

  it('should drop expired runs from the index while listing', async () => {
    const manager = new StateManager({ host: 'localhost', port: 6379 });
    await manager.saveRun(record('run_b'));
    redisMock.store.delete('paper:run:run_b');

    const runs = await manager.listRuns();
    expect(runs.map((r) => r.runId)).not.toContain('run_b');
    expect(redisMock.sets.get('paper:runs')?.has('run_b')).toBe(false);
  });

  it('should ignore stored values that are not run records', async () => {
    const manager = new StateManager({ host: 'localhost', port: 6379 });
    redisMock.store.set('paper:run:run_c', JSON.stringify({ unexpected: true }));
    expect(await manager.getRun('run_c')).toBeNull();
  });

  it('should publish events on the events channel', async () => {
    const manager = new StateManager({ host: 'localhost', port: 6379 });
    await manager.publishEvent({ type: 'status', runId: 'run_a', timestamp: T0.toISOString(), data: { status: 'RUNNING' } });

    const last = redisMock.published[redisMock.published.length - 1];
    expect(last.channel).toBe('paper:events');
    expect(JSON.parse(last.message)).toEqual({
      type: 'status',
      runId: 'run_a',
      timestamp: '2024-01-01T00:00:00.000Z',
      data: { status: 'RUNNING' },
    });
    await manager.close();
  });
});
