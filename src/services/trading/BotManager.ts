import logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/clock';
import { InvalidStateError, RunNotFoundError, errorMessage } from '../../utils/errors';
import { BotSettings, EngineSettings } from '../../config/settings';
import { AccountSummary, StopReason, Trade } from '../../types/trading';
import { LedgerRepository } from '../ledger/LedgerRepository';
import { MarketDataSource, SentimentSource } from '../market/MarketDataSource';
import { StrategySpec, createStrategy } from '../strategies';
import { SimulationEngine } from './SimulationEngine';
import { TradingBotService } from './TradingBotService';
import { RunRecord, RunStateStore, toRunRecord } from './StateManager';

export interface StartRunRequest {
  accountName?: string;
  startingEquity?: number;
  symbols?: string[];
  strategy: StrategySpec;
  settings?: Partial<BotSettings>;
}

export interface BotManagerDependencies {
  repository: LedgerRepository;
  marketData: MarketDataSource;
  stateStore: RunStateStore;
  engineSettings: EngineSettings;
  botSettings: BotSettings;
  sentiment?: SentimentSource;
  clock?: Clock;
}

/**
 * Owns the live runs of this process and one engine per account.
 * At most one running bot may trade a given account.
 */
export class BotManager {
  private readonly runs = new Map<string, TradingBotService>();
  private readonly engines = new Map<string, Promise<SimulationEngine>>();
  /** Accounts between the active-run check and their bot starting. */
  private readonly starting = new Set<string>();
  private readonly clock: Clock;

  constructor(private readonly deps: BotManagerDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  async startRun(request: StartRunRequest): Promise<RunRecord> {
    const accountName = request.accountName ?? this.deps.engineSettings.accountName;

    if (this.starting.has(accountName)) {
      throw new InvalidStateError(`Account ${accountName} already has a run starting`);
    }
    const active = [...this.runs.values()].find((run) => run.isRunning() && run.accountName === accountName);
    if (active) {
      throw new InvalidStateError(`Account ${accountName} is already traded by run ${active.runId}`);
    }

    this.starting.add(accountName);
    try {
      const strategy = createStrategy(request.strategy);
      const engine = await this.engineFor(accountName, request.startingEquity);

      const bot = new TradingBotService({
        engine,
        strategy,
        marketData: this.deps.marketData,
        sentiment: this.deps.sentiment,
        stateStore: this.deps.stateStore,
        clock: this.clock,
        settings: {
          ...this.deps.botSettings,
          ...request.settings,
          symbols: request.symbols ?? request.settings?.symbols ?? this.deps.botSettings.symbols,
        },
      });

      this.runs.set(bot.runId, bot);
      const snapshot = await bot.start();
      return toRunRecord(snapshot, this.clock.now());
    } finally {
      this.starting.delete(accountName);
    }
  }

  async stopRun(runId: string, reason: StopReason = 'signal'): Promise<RunRecord> {
    const bot = this.requireRun(runId);
    const snapshot = await bot.stop(reason);
    return toRunRecord(snapshot, this.clock.now());
  }

  /**
   * Live runs come from memory; finished runs of earlier processes from the state store.
   */
  async getRun(runId: string): Promise<RunRecord> {
    const bot = this.runs.get(runId);
    if (bot) {
      return toRunRecord(bot.getSnapshot(), this.clock.now());
    }
    const stored = await this.deps.stateStore.getRun(runId);
    if (!stored) {
      throw new RunNotFoundError(runId);
    }
    return stored;
  }

  async listRuns(): Promise<RunRecord[]> {
    const live = [...this.runs.values()].map((bot) => toRunRecord(bot.getSnapshot(), this.clock.now()));
    const liveIds = new Set(live.map((run) => run.runId));
    const stored = await this.deps.stateStore.listRuns();
    return [...live, ...stored.filter((run) => !liveIds.has(run.runId))];
  }

  getSummary(runId: string): AccountSummary {
    return this.requireRun(runId).getSummary();
  }

  getTrades(runId: string, limit?: number): Trade[] {
    return this.requireRun(runId).getTrades(limit);
  }

  /**
   * Stops every running bot. Used on host shutdown.
   */
  async stopAll(reason: StopReason = 'signal'): Promise<void> {
    const running = [...this.runs.values()].filter((bot) => bot.isRunning());
    const results = await Promise.allSettled(running.map((bot) => bot.stop(reason)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error(`Failed to stop run ${running[index].runId}: ${errorMessage(result.reason)}`);
      }
    });
  }

  private requireRun(runId: string): TradingBotService {
    const bot = this.runs.get(runId);
    if (!bot) {
      throw new RunNotFoundError(runId);
    }
    return bot;
  }

  private async engineFor(accountName: string, startingEquity?: number): Promise<SimulationEngine> {
    let pending = this.engines.get(accountName);
    if (!pending) {
      pending = SimulationEngine.create({
        repository: this.deps.repository,
        clock: this.clock,
        settings: {
          ...this.deps.engineSettings,
          accountName,
          startingEquity: startingEquity ?? this.deps.engineSettings.startingEquity,
        },
      });
      this.engines.set(accountName, pending);
      void pending.catch(() => this.engines.delete(accountName));
    }

    const engine = await pending;
    const current = engine.getAccount().startingEquity;
    if (startingEquity !== undefined && !current.eq(startingEquity)) {
      logger.warn(
        `Account ${accountName} already exists with starting equity ${current.toString()}; ignoring ${startingEquity}`
      );
    }
    return engine;
  }
}
