import Redis from 'ioredis';
import logger from '../../utils/logger';
import { AccountSummary, RunSnapshot, RunStatus, StopReason } from '../../types/trading';

/**
 * JSON-safe copy of a run snapshot, as kept in Redis and served over HTTP
 * once the in-process handle is gone.
 */
export interface RunRecord {
  runId: string;
  accountName: string;
  status: RunStatus;
  symbols: string[];
  strategyId: string;
  startedAt?: string;
  stoppedAt?: string;
  stopReason?: StopReason;
  lastError?: string;
  ticks: number;
  tradesClosed: number;
  rejections: number;
  skippedFetches: number;
  equity?: string;
  totalPnl?: string;
  openPositions: number;
  updatedAt: string;
}

export type RunEventType = 'status' | 'summary' | 'trade' | 'position_opened' | 'rejected';

export interface RunEvent {
  type: RunEventType;
  runId: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface RunStateStore {
  saveRun(record: RunRecord): Promise<void>;
  getRun(runId: string): Promise<RunRecord | null>;
  listRuns(): Promise<RunRecord[]>;
  publishEvent(event: RunEvent): Promise<void>;
  close(): Promise<void>;
}

export function toRunRecord(snapshot: RunSnapshot, now: Date = new Date()): RunRecord {
  const summary: AccountSummary | undefined = snapshot.summary;
  return {
    runId: snapshot.runId,
    accountName: snapshot.accountName,
    status: snapshot.status,
    symbols: [...snapshot.symbols],
    strategyId: snapshot.strategyId,
    startedAt: snapshot.startedAt?.toISOString(),
    stoppedAt: snapshot.stoppedAt?.toISOString(),
    stopReason: snapshot.stopReason,
    lastError: snapshot.lastError,
    ticks: snapshot.ticks,
    tradesClosed: snapshot.tradesClosed,
    rejections: snapshot.rejections,
    skippedFetches: snapshot.skippedFetches,
    equity: summary?.equity.toString(),
    totalPnl: summary?.totalPnl.toString(),
    openPositions: summary?.openPositions.length ?? 0,
    updatedAt: now.toISOString(),
  };
}

export function isRunRecord(value: unknown): value is RunRecord {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'runId' in value &&
    typeof value.runId === 'string' &&
    'status' in value &&
    typeof value.status === 'string' &&
    'symbols' in value &&
    Array.isArray(value.symbols) &&
    'ticks' in value &&
    typeof value.ticks === 'number'
  );
}

function parseRecord(data: string | null): RunRecord | null {
  if (!data) return null;
  const parsed: unknown = JSON.parse(data);
  return isRunRecord(parsed) ? parsed : null;
}

export class InMemoryRunStateStore implements RunStateStore {
  private readonly runs = new Map<string, RunRecord>();
  readonly events: RunEvent[] = [];

  async saveRun(record: RunRecord): Promise<void> {
    this.runs.set(record.runId, { ...record, symbols: [...record.symbols] });
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    return this.runs.get(runId) ?? null;
  }

  async listRuns(): Promise<RunRecord[]> {
    return [...this.runs.values()];
  }

  async publishEvent(event: RunEvent): Promise<void> {
    this.events.push(event);
  }

  async close(): Promise<void> {
    this.runs.clear();
  }
}

export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
}

/**
 * Redis-backed run state: one key per run with a TTL, an index set of run ids,
 * and a pub/sub channel carrying run events.
 */
export class StateManager implements RunStateStore {
  private redis: Redis;
  private redisPub: Redis;

  // Redis key prefixes
  private readonly KEYS = {
    RUN: 'paper:run:',
    RUN_INDEX: 'paper:runs',
    EVENTS: 'paper:events',
  };

  // TTL values (in seconds)
  private readonly TTL = {
    RUN: 7 * 86400,
  };

  constructor(config: RedisConnectionConfig) {
    const redisConfig = {
      host: config.host,
      port: config.port,
      password: config.password,
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
    };

    this.redis = new Redis(redisConfig);
    this.redisPub = new Redis(redisConfig);

    this.redis.on('connect', () => logger.info('Redis connected'));
    this.redis.on('error', (err) => logger.error('Redis error:', err));
  }

  async initialize(): Promise<void> {
    try {
      await this.redis.ping();
      logger.info('State Manager initialized with Redis');
    } catch (error) {
      logger.error('Failed to initialize State Manager:', error);
      throw error;
    }
  }

  async saveRun(record: RunRecord): Promise<void> {
    const key = this.KEYS.RUN + record.runId;
    await this.redis.setex(key, this.TTL.RUN, JSON.stringify(record));
    await this.redis.sadd(this.KEYS.RUN_INDEX, record.runId);
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    return parseRecord(await this.redis.get(this.KEYS.RUN + runId));
  }

  async listRuns(): Promise<RunRecord[]> {
    const runIds = await this.redis.smembers(this.KEYS.RUN_INDEX);
    const runs: RunRecord[] = [];

    for (const runId of runIds) {
      const run = await this.getRun(runId);
      if (run) {
        runs.push(run);
      } else {
        // Expired
        await this.redis.srem(this.KEYS.RUN_INDEX, runId);
      }
    }

    return runs;
  }

  async publishEvent(event: RunEvent): Promise<void> {
    await this.redisPub.publish(this.KEYS.EVENTS, JSON.stringify(event));
  }

  async close(): Promise<void> {
    await this.redis.quit();
    await this.redisPub.quit();
    logger.info('State Manager closed');
  }
}
