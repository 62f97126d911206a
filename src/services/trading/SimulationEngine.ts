/**
 * SimulationEngine - the single accounting core shared by the live bot and the backtester.
 * Owns the account, its open positions and the trade history; every mutation goes
 * through `transaction()` and reaches storage as one atomic change set.
 */

import { EventEmitter } from 'events';
import Decimal from 'decimal.js';
import logger from '../../utils/logger';
import { Clock, IdGenerator, createId, systemClock } from '../../utils/clock';
import { ConcurrentMutationError, InvalidOrderError, InvalidStateError } from '../../utils/errors';
import { DecimalInput, ZERO, dec, sum } from '../../utils/money';
import { DEFAULT_ENGINE_SETTINGS, EngineSettings, validateEngineSettings } from '../../config/settings';
import { LedgerRepository, cloneAccount, clonePosition, isEmptyChangeSet } from '../ledger/LedgerRepository';
import { ExecutionParameters, LedgerSnapshot, LedgerTransaction, normalizeSymbol } from '../ledger/LedgerTransaction';
import { checkRiskTriggers } from './riskTriggers';
import { unrealizedPnl } from './pricing';
import {
  Account,
  AccountSummary,
  CloseReason,
  LedgerResult,
  OpenPositionRequest,
  Position,
  PositionView,
  PriceObservation,
  Rejection,
  Trade,
  TriggerHit,
} from '../../types/trading';

export interface SimulationEngineOptions {
  repository: LedgerRepository;
  settings?: Partial<EngineSettings>;
  clock?: Clock;
  /** Position, order and trade ids; random unless given. */
  idGenerator?: IdGenerator;
}

export class SimulationEngine extends EventEmitter {
  private account: Account;
  private openPositions: Map<string, Position>;
  private closedPositionIds: Set<string>;
  private trades: Trade[];
  private rejections: Rejection[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private working = false;

  private constructor(
    private readonly repository: LedgerRepository,
    private readonly settings: EngineSettings,
    private readonly params: ExecutionParameters,
    private readonly clock: Clock,
    account: Account,
    openPositions: Position[],
    trades: Trade[]
  ) {
    super();
    this.account = account;
    this.openPositions = new Map(openPositions.map((p) => [p.id, p]));
    this.trades = trades;
    this.closedPositionIds = new Set(trades.map((t) => t.positionId));
  }

  /**
   * Loads the named account from the repository, creating it on first use.
   */
  static async create(options: SimulationEngineOptions): Promise<SimulationEngine> {
    const settings: EngineSettings = { ...DEFAULT_ENGINE_SETTINGS, ...options.settings };
    validateEngineSettings(settings);

    const clock = options.clock ?? systemClock;
    const params: ExecutionParameters = {
      slippageRate: dec(settings.slippageRate),
      maxLeverage: settings.maxLeverage,
      defaultTickSize: dec(settings.defaultTickSize),
      tickSizes: new Map(
        Object.entries(settings.tickSizes).map(([symbol, tick]) => [normalizeSymbol(symbol), dec(tick)])
      ),
      nextId: options.idGenerator ?? createId,
    };

    try {
      let account = await options.repository.loadAccount(settings.accountName);
      if (!account) {
        account = SimulationEngine.freshAccount(settings, clock.now());
        await options.repository.resetAccount(account);
        logger.info(`Created paper account ${account.name} with ${account.startingEquity.toFixed(2)}`);
      }

      const [openPositions, trades] = await Promise.all([
        options.repository.loadOpenPositions(settings.accountName),
        options.repository.loadTrades(settings.accountName),
      ]);

      return new SimulationEngine(options.repository, settings, params, clock, account, openPositions, trades);
    } catch (error) {
      logger.error(`Failed to load paper account ${settings.accountName}:`, error);
      throw error;
    }
  }

  private static freshAccount(settings: EngineSettings, now: Date, startingEquity?: number): Account {
    const equity = dec(startingEquity ?? settings.startingEquity);
    return {
      name: settings.accountName,
      startingEquity: equity,
      balance: equity,
      defaultLeverage: settings.defaultLeverage,
      makerFeeRate: dec(settings.makerFeeRate),
      takerFeeRate: dec(settings.takerFeeRate),
      realizedPnl: ZERO,
      totalFees: ZERO,
      tradeCount: 0,
      winCount: 0,
      lossCount: 0,
      peakEquity: equity,
      maxDrawdownPct: ZERO,
      createdAt: now,
      updatedAt: now,
    };
  }

  // Transactions

  /**
   * Runs `work` against a working copy of the ledger, commits what it staged,
   * and adopts the new state only after the commit succeeds. Calls made while
   * another transaction is committing wait their turn; calling back into the
   * engine from inside `work` is rejected.
   */
  transaction<T>(work: (tx: LedgerTransaction) => T): Promise<T> {
    if (this.working) {
      return Promise.reject(new ConcurrentMutationError());
    }
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(work: (tx: LedgerTransaction) => T): Promise<T> {
    const tx = new LedgerTransaction(this.snapshot(), this.params, this.clock);
    const result = this.runWork(tx, work);

    const changes = tx.changes();
    if (!isEmptyChangeSet(changes)) {
      try {
        await this.repository.commit(changes);
      } catch (error) {
        logger.error('Ledger commit failed, transaction rolled back:', error);
        throw error;
      }
    }

    this.adopt(tx.snapshot());
    const staged = tx.getStagedTrades();
    this.trades.push(...staged);
    const rejections = tx.getRejections();
    this.rejections.push(...rejections);

    for (const position of tx.getOpenedPositions()) {
      this.emit('positionOpened', position);
    }
    for (const trade of staged) {
      this.emit('tradeClosed', trade);
    }
    for (const rejection of rejections) {
      this.emit('rejected', rejection);
    }

    return result;
  }

  private runWork<T>(tx: LedgerTransaction, work: (tx: LedgerTransaction) => T): T {
    this.working = true;
    try {
      return work(tx);
    } finally {
      this.working = false;
    }
  }

  private snapshot(): LedgerSnapshot {
    return {
      account: this.account,
      openPositions: this.openPositions,
      closedPositionIds: this.closedPositionIds,
    };
  }

  private adopt(snapshot: LedgerSnapshot): void {
    this.account = cloneAccount(snapshot.account);
    this.openPositions = new Map(snapshot.openPositions);
    this.closedPositionIds = new Set(snapshot.closedPositionIds);
  }

  // Operations

  open(request: OpenPositionRequest): Promise<LedgerResult<Position>> {
    return this.transaction((tx) => tx.open(request));
  }

  close(positionId: string, referencePrice: DecimalInput, reason: CloseReason): Promise<LedgerResult<Trade>> {
    return this.transaction((tx) => tx.close(positionId, referencePrice, reason));
  }

  /**
   * Refreshes cached unrealized PnL for every open position with a price in `prices`.
   */
  markToMarket(prices: Record<string, number>): Promise<Decimal> {
    return this.transaction((tx) => {
      let total = ZERO;
      for (const position of tx.getOpenPositions()) {
        const price = prices[position.symbol];
        if (price === undefined) continue;
        total = total.plus(tx.markToMarket(position.id, price));
      }
      return total;
    });
  }

  checkRiskTriggers(position: Position, observation: PriceObservation): TriggerHit | null {
    return checkRiskTriggers(position, observation);
  }

  /**
   * Restores the account to a fresh starting state. Refused while positions are open.
   */
  reset(startingEquity?: number): Promise<Account> {
    if (this.working) {
      return Promise.reject(new ConcurrentMutationError());
    }
    const run = this.queue.then(() => this.runReset(startingEquity));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runReset(startingEquity?: number): Promise<Account> {
    if (this.openPositions.size > 0) {
      throw new InvalidStateError(`Account ${this.account.name} has ${this.openPositions.size} open position(s)`);
    }

    const account = SimulationEngine.freshAccount(this.settings, this.clock.now(), startingEquity);
    await this.repository.resetAccount(account);

    this.account = account;
    this.openPositions = new Map();
    this.closedPositionIds = new Set();
    this.trades = [];
    this.rejections = [];
    logger.info(`Paper account ${account.name} reset to ${account.startingEquity.toFixed(2)}`);
    return cloneAccount(account);
  }

  // Views

  getAccount(): Account {
    return cloneAccount(this.account);
  }

  getOpenPositions(): Position[] {
    return [...this.openPositions.values()].map(clonePosition);
  }

  getOpenPosition(symbol: string): Position | undefined {
    const key = normalizeSymbol(symbol);
    const position = [...this.openPositions.values()].find((p) => p.symbol === key);
    return position ? clonePosition(position) : undefined;
  }

  /** The most recent `limit` closed trades, oldest first; all of them without a limit. */
  getTrades(limit?: number): Trade[] {
    if (limit === undefined) return [...this.trades];
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidOrderError(`Trade limit must be a positive integer (got ${limit})`);
    }
    return this.trades.slice(-limit);
  }

  getRejections(): Rejection[] {
    return [...this.rejections];
  }

  /**
   * Unrealized PnL uses `prices` where given and each position's cached mark otherwise.
   */
  getUnrealizedPnl(prices: Record<string, number> = {}): Decimal {
    return sum(this.getOpenPositions().map((p) => this.unrealizedFor(p, prices)));
  }

  getSummary(prices: Record<string, number> = {}): AccountSummary {
    const account = this.account;
    const positions = this.getOpenPositions();
    const views: PositionView[] = positions.map((p) => ({
      id: p.id,
      symbol: p.symbol,
      direction: p.direction,
      size: p.size,
      entryPrice: p.entryPrice,
      leverage: p.leverage,
      margin: p.margin,
      stopLoss: p.stopLoss,
      takeProfit: p.takeProfit,
      markPrice: prices[p.symbol] !== undefined ? dec(prices[p.symbol]) : p.markPrice,
      unrealizedPnl: this.unrealizedFor(p, prices),
      openedAt: p.openedAt,
      strategyId: p.strategyId,
    }));

    const unrealized = sum(views.map((v) => v.unrealizedPnl));
    const committed = sum(positions.map((p) => p.margin));
    const equity = account.balance.plus(committed).plus(unrealized);

    return {
      accountName: account.name,
      startingEquity: account.startingEquity,
      balance: account.balance,
      equity,
      realizedPnl: account.realizedPnl,
      unrealizedPnl: unrealized,
      totalPnl: equity.minus(account.startingEquity),
      totalFees: account.totalFees,
      tradeCount: account.tradeCount,
      winCount: account.winCount,
      lossCount: account.lossCount,
      winRate: account.tradeCount === 0 ? 0 : (account.winCount / account.tradeCount) * 100,
      peakEquity: account.peakEquity,
      maxDrawdownPct: account.maxDrawdownPct,
      openPositions: views,
      rejections: this.rejections.length,
      generatedAt: this.clock.now(),
    };
  }

  private unrealizedFor(position: Position, prices: Record<string, number>): Decimal {
    const price = prices[position.symbol];
    if (price !== undefined) {
      return unrealizedPnl(position, dec(price));
    }
    return position.unrealizedPnl;
  }
}
