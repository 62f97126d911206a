/**
 * TradingBotService - one live paper-trading run.
 * Polls market data on an interval, feeds each tick through the TickProcessor,
 * emits summaries on a cadence and stops on the first breaker trip or stop request.
 */

import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { Clock, createId, systemClock } from '../../utils/clock';
import { mapWithConcurrency, sleep } from '../../utils/async';
import { errorMessage } from '../../utils/errors';
import { BotSettings, DEFAULT_BOT_SETTINGS, validateBotSettings } from '../../config/settings';
import { AccountSummary, RunSnapshot, RunStatus, StopReason, Trade } from '../../types/trading';
import { MarketDataSource, SentimentSource } from '../market/MarketDataSource';
import { SentimentReading, Strategy } from '../strategies/Strategy';
import { normalizeSymbol } from '../ledger/LedgerTransaction';
import { SimulationEngine } from './SimulationEngine';
import { SymbolMarketState, TickOutcome, TickProcessor } from './TickProcessor';
import { RunHandle } from './RunHandle';
import { RunEventType, RunStateStore, toRunRecord } from './StateManager';

export interface TradingBotOptions {
  runId?: string;
  engine: SimulationEngine;
  strategy: Strategy;
  marketData: MarketDataSource;
  settings?: Partial<BotSettings>;
  sentiment?: SentimentSource;
  stateStore?: RunStateStore;
  clock?: Clock;
}

export class TradingBotService extends EventEmitter {
  readonly runId: string;
  private readonly handle: RunHandle;
  private readonly settings: BotSettings;
  private readonly processor: TickProcessor;
  private readonly clock: Clock;
  private loop: Promise<void> | null = null;
  private lastPrices: Record<string, number> = {};
  private lastSummaryAt = 0;

  // Run counters
  private ticks = 0;
  private tradesClosed = 0;
  private rejections = 0;
  private skippedFetches = 0;

  constructor(private readonly options: TradingBotOptions) {
    super();
    const settings = { ...DEFAULT_BOT_SETTINGS, ...options.settings };
    this.settings = { ...settings, symbols: [...new Set(settings.symbols.map(normalizeSymbol))] };
    validateBotSettings(this.settings);

    this.runId = options.runId ?? createId('run');
    this.handle = new RunHandle(this.runId);
    this.clock = options.clock ?? systemClock;
    this.processor = new TickProcessor(options.engine, options.strategy, {
      maxOpenPositions: this.settings.maxOpenPositions,
      positionSizePercent: this.settings.positionSizePercent,
      strategyTimeoutMs: this.settings.strategyTimeoutMs,
    });
  }

  get accountName(): string {
    return this.options.engine.getAccount().name;
  }

  getStatus(): RunStatus {
    return this.handle.getStatus();
  }

  isRunning(): boolean {
    return this.handle.isRunning();
  }

  async start(): Promise<RunSnapshot> {
    this.handle.start(this.clock.now());
    this.lastSummaryAt = this.clock.now().getTime();

    logger.info(`Run ${this.runId} started`, {
      account: this.accountName,
      strategy: this.options.strategy.id,
      symbols: this.settings.symbols,
    });

    await this.persist();
    await this.publish('status', { status: this.handle.getStatus() });
    this.loop = this.runLoop();
    return this.getSnapshot();
  }

  /**
   * Requests a stop and waits for the in-flight tick and final summary.
   */
  async stop(reason: StopReason = 'signal'): Promise<RunSnapshot> {
    if (this.handle.requestStop(reason)) {
      logger.info(`Run ${this.runId} stop requested: ${reason}`);
    }
    if (!this.loop) {
      // Never started
      this.handle.finish(this.clock.now());
      return this.getSnapshot();
    }
    await this.loop;
    return this.getSnapshot();
  }

  /** Resolves once the run has reached a terminal state. */
  async waitForStop(): Promise<RunSnapshot> {
    if (this.loop) await this.loop;
    return this.getSnapshot();
  }

  getSummary(): AccountSummary {
    return this.options.engine.getSummary(this.lastPrices);
  }

  getTrades(limit?: number): Trade[] {
    return this.options.engine.getTrades(limit);
  }

  getSnapshot(): RunSnapshot {
    return {
      runId: this.runId,
      accountName: this.accountName,
      status: this.handle.getStatus(),
      symbols: [...this.settings.symbols],
      strategyId: this.options.strategy.id,
      startedAt: this.handle.startedAt,
      stoppedAt: this.handle.stoppedAt,
      stopReason: this.handle.stopReason,
      lastError: this.handle.lastError,
      ticks: this.ticks,
      tradesClosed: this.tradesClosed,
      rejections: this.rejections,
      skippedFetches: this.skippedFetches,
      summary: this.getSummary(),
    };
  }

  // Loop

  private async runLoop(): Promise<void> {
    try {
      while (!this.handle.stopRequested) {
        await this.tick();
        this.checkBreakers();
        if (this.handle.stopRequested) break;
        await sleep(this.settings.pollIntervalMs, this.handle.signal);
      }
    } catch (error) {
      logger.error(`Run ${this.runId} failed:`, error);
      this.handle.requestStop('error', errorMessage(error));
    }

    await this.finalize();
  }

  private async tick(): Promise<void> {
    const now = this.clock.now();
    const results = await mapWithConcurrency(this.settings.symbols, this.settings.fetchConcurrency, (symbol) =>
      this.fetchMarket(symbol, now)
    );

    const markets: SymbolMarketState[] = [];
    results.forEach((result, index) => {
      const symbol = this.settings.symbols[index];
      if (result.status === 'fulfilled') {
        markets.push(result.value);
        this.lastPrices[symbol] = result.value.price;
      } else {
        this.skippedFetches++;
        logger.warn(`Skipping ${symbol} this tick, market data unavailable: ${errorMessage(result.reason)}`);
      }
    });

    // No ledger writes once cancelled
    if (this.handle.stopRequested) return;

    const outcome = await this.processor.process(markets, {
      allowOpens: true,
      now,
      signal: this.handle.signal,
    });

    this.ticks++;
    await this.recordOutcome(outcome);

    if (now.getTime() - this.lastSummaryAt >= this.settings.summaryIntervalMs) {
      this.lastSummaryAt = now.getTime();
      await this.emitSummary();
    }

    await this.persist();
  }

  private async fetchMarket(symbol: string, now: Date): Promise<SymbolMarketState> {
    const { marketData, strategy, sentiment } = this.options;
    const signal = this.handle.signal;

    const [bars, price] = await Promise.all([
      marketData.fetchBars(symbol, this.settings.barInterval, this.settings.historyBars, signal),
      marketData.fetchPrice(symbol, signal),
    ]);

    const fundingRate =
      strategy.family === 'funding_carry' && marketData.fetchFundingRate
        ? await marketData.fetchFundingRate(symbol, signal)
        : undefined;

    let reading: SentimentReading | undefined;
    if (sentiment) {
      try {
        reading = await sentiment.getScore(symbol, now);
      } catch (error) {
        logger.warn(`Sentiment unavailable for ${symbol}: ${errorMessage(error)}`);
      }
    }

    return { symbol, bars, price, observation: price, fundingRate, sentiment: reading };
  }

  private async recordOutcome(outcome: TickOutcome): Promise<void> {
    this.tradesClosed += outcome.closed.length;
    this.rejections += outcome.rejections.length;

    for (const position of outcome.opened) {
      await this.publish('position_opened', { positionId: position.id, symbol: position.symbol });
    }
    for (const trade of outcome.closed) {
      this.emit('trade', trade);
      await this.publish('trade', {
        tradeId: trade.id,
        symbol: trade.symbol,
        closeReason: trade.closeReason,
        netPnl: trade.netPnl.toString(),
      });
    }
    for (const rejection of outcome.rejections) {
      await this.publish('rejected', { symbol: rejection.symbol, code: rejection.code, message: rejection.message });
    }
  }

  private checkBreakers(): void {
    const { maxLossLimit, timeLimitMs } = this.settings;

    if (maxLossLimit !== undefined) {
      const totalPnl = this.getSummary().totalPnl;
      if (totalPnl.lte(-maxLossLimit)) {
        logger.warn(`Run ${this.runId} loss limit reached: PnL ${totalPnl.toFixed(2)} <= -${maxLossLimit}`);
        this.handle.requestStop('loss_limit');
        return;
      }
    }

    if (timeLimitMs !== undefined && this.handle.startedAt) {
      const elapsed = this.clock.now().getTime() - this.handle.startedAt.getTime();
      if (elapsed >= timeLimitMs) {
        logger.info(`Run ${this.runId} time limit reached after ${elapsed}ms`);
        this.handle.requestStop('time_limit');
      }
    }
  }

  private async finalize(): Promise<void> {
    if (this.settings.closePositionsOnStop && this.options.engine.getOpenPositions().length > 0) {
      try {
        const closed = await this.processor.closeAll(this.lastPrices, 'shutdown');
        await this.recordOutcome({ opened: [], closed, rejections: [], decisions: {} });
      } catch (error) {
        logger.error(`Failed to close positions for run ${this.runId}:`, error);
        this.handle.lastError = errorMessage(error);
      }
    }

    const status = this.handle.finish(this.clock.now());
    const open = this.options.engine.getOpenPositions();
    logger.info(`Run ${this.runId} finished with ${status}`, {
      stopReason: this.handle.stopReason,
      openPositions: open.map((p) => `${p.direction} ${p.symbol}`),
    });

    await this.emitSummary();
    await this.persist();
    await this.publish('status', { status, stopReason: this.handle.stopReason });
    this.emit('stopped', this.getSnapshot());
  }

  private async emitSummary(): Promise<void> {
    const summary = this.getSummary();
    logger.info(`Run ${this.runId} summary`, {
      equity: summary.equity.toFixed(2),
      realizedPnl: summary.realizedPnl.toFixed(2),
      unrealizedPnl: summary.unrealizedPnl.toFixed(2),
      trades: summary.tradeCount,
      winRate: summary.winRate.toFixed(1),
      openPositions: summary.openPositions.length,
    });
    this.emit('summary', summary);
    await this.publish('summary', {
      equity: summary.equity.toString(),
      totalPnl: summary.totalPnl.toString(),
      tradeCount: summary.tradeCount,
    });
  }

  // State store

  private async persist(): Promise<void> {
    const store = this.options.stateStore;
    if (!store) return;
    try {
      await store.saveRun(toRunRecord(this.getSnapshot(), this.clock.now()));
    } catch (error) {
      logger.warn(`Failed to persist run ${this.runId}: ${errorMessage(error)}`);
    }
  }

  private async publish(type: RunEventType, data: Record<string, unknown>): Promise<void> {
    const store = this.options.stateStore;
    if (!store) return;
    try {
      await store.publishEvent({ type, runId: this.runId, timestamp: this.clock.now().toISOString(), data });
    } catch (error) {
      logger.warn(`Failed to publish ${type} event for run ${this.runId}: ${errorMessage(error)}`);
    }
  }
}
