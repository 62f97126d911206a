/**
 * BacktestService - replays historical bars through the same TickProcessor the
 * live bot uses. Time comes from the bars, never from the wall clock.
 */

import logger from '../../utils/logger';
import { ManualClock, sequentialIds } from '../../utils/clock';
import { InvalidOrderError } from '../../utils/errors';
import { EngineSettings } from '../../config/settings';
import { AccountSummary, Bar, Rejection, StopReason, Trade } from '../../types/trading';
import { InMemoryLedgerRepository } from '../ledger/InMemoryLedgerRepository';
import { normalizeSymbol } from '../ledger/LedgerTransaction';
import { SimulationEngine } from '../trading/SimulationEngine';
import { SymbolMarketState, TickProcessor } from '../trading/TickProcessor';
import { EquityPoint, PerformanceStats, calculatePerformanceStats } from '../trading/PerformanceStats';
import { Strategy } from '../strategies/Strategy';

export interface FundingPoint {
  timestamp: Date;
  /** Percent per funding interval. */
  rate: number;
}

export interface BacktestSettings {
  maxOpenPositions: number;
  positionSizePercent: number;
  strategyTimeoutMs: number;
  /** Bars kept in the strategy window; raised to the strategy's minimum when smaller. */
  historyBars: number;
  maxLossLimit?: number;
  /** Measured on series time. */
  timeLimitMs?: number;
}

export const DEFAULT_BACKTEST_SETTINGS: BacktestSettings = {
  maxOpenPositions: 1,
  positionSizePercent: 10,
  strategyTimeoutMs: 5000,
  historyBars: 200,
};

export interface BacktestRequest {
  strategy: Strategy;
  series: Record<string, Bar[]>;
  fundingRates?: Record<string, FundingPoint[]>;
  engineSettings?: Partial<EngineSettings>;
  settings?: Partial<BacktestSettings>;
  runId?: string;
}

export interface BacktestResult {
  runId: string;
  strategyId: string;
  symbols: string[];
  startedAt: Date;
  endedAt: Date;
  barsProcessed: number;
  stopReason: StopReason;
  summary: AccountSummary;
  trades: Trade[];
  rejections: Rejection[];
  equityCurve: EquityPoint[];
  stats: PerformanceStats;
}

interface TimeSlice {
  timestamp: Date;
  bars: Array<{ symbol: string; bar: Bar }>;
}

/**
 * Merges per-symbol series into time slices. Bars sharing a timestamp are
 * processed in one tick, in symbol order.
 */
export function mergeSeries(series: Record<string, Bar[]>): TimeSlice[] {
  const slices = new Map<number, TimeSlice>();

  for (const symbol of Object.keys(series).sort()) {
    for (const bar of series[symbol]) {
      const key = bar.timestamp.getTime();
      const slice = slices.get(key) ?? { timestamp: bar.timestamp, bars: [] };
      slice.bars.push({ symbol, bar });
      slices.set(key, slice);
    }
  }

  return [...slices.entries()].sort(([a], [b]) => a - b).map(([, slice]) => slice);
}

function fundingAt(points: FundingPoint[] | undefined, at: Date): number | undefined {
  if (!points) return undefined;
  let rate: number | undefined;
  for (const point of points) {
    if (point.timestamp.getTime() > at.getTime()) break;
    rate = point.rate;
  }
  return rate;
}

/** Re-keys a per-symbol record by normalized symbol. */
function bySymbol<T>(record: Record<string, T>): Record<string, T> {
  const normalized: Record<string, T> = {};
  for (const [symbol, value] of Object.entries(record)) {
    const key = normalizeSymbol(symbol);
    if (key in normalized) {
      throw new InvalidOrderError(`Symbol ${key} is given more than once`);
    }
    normalized[key] = value;
  }
  return normalized;
}

export class BacktestService {
  async run(request: BacktestRequest): Promise<BacktestResult> {
    const series = bySymbol(request.series);
    const symbols = Object.keys(series).sort();
    const slices = mergeSeries(series);
    if (slices.length === 0) {
      throw new InvalidOrderError('Backtest needs at least one bar');
    }

    const settings: BacktestSettings = { ...DEFAULT_BACKTEST_SETTINGS, ...request.settings };
    const { strategy } = request;
    const firstAt = slices[0].timestamp;
    const runId = request.runId ?? `backtest_${strategy.id}_${firstAt.getTime()}`;
    const windowSize = Math.max(settings.historyBars, strategy.minimumBarsRequired);

    const fundingRates: Record<string, FundingPoint[]> = {};
    for (const [symbol, points] of Object.entries(bySymbol(request.fundingRates ?? {}))) {
      fundingRates[symbol] = [...points].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    }

    const clock = new ManualClock(firstAt);
    const engine = await SimulationEngine.create({
      repository: new InMemoryLedgerRepository(),
      settings: { accountName: runId, ...request.engineSettings },
      clock,
      idGenerator: sequentialIds(),
    });
    const processor = new TickProcessor(engine, strategy, settings);

    logger.info(`Backtest ${runId} started`, {
      strategy: strategy.id,
      symbols,
      bars: slices.length,
      from: firstAt.toISOString(),
    });

    const windows = new Map<string, Bar[]>(symbols.map((symbol) => [symbol, []]));
    const lastPrices: Record<string, number> = {};
    const equityCurve: EquityPoint[] = [];
    let stopReason: StopReason = 'end_of_data';
    let barsProcessed = 0;

    for (const slice of slices) {
      clock.set(slice.timestamp);
      const markets: SymbolMarketState[] = [];

      for (const { symbol, bar } of slice.bars) {
        const window = windows.get(symbol) ?? [];
        window.push(bar);
        if (window.length > windowSize) window.shift();
        windows.set(symbol, window);
        lastPrices[symbol] = bar.close;

        markets.push({
          symbol,
          bars: [...window],
          price: bar.close,
          observation: bar,
          fundingRate: fundingAt(fundingRates[symbol], slice.timestamp),
        });
      }

      await processor.process(markets, { allowOpens: true, now: slice.timestamp });
      barsProcessed++;

      const summary = engine.getSummary(lastPrices);
      equityCurve.push({ timestamp: slice.timestamp, equity: summary.equity.toNumber() });

      if (settings.maxLossLimit !== undefined && summary.totalPnl.lte(-settings.maxLossLimit)) {
        stopReason = 'loss_limit';
        logger.info(`Backtest ${runId} hit its loss limit at ${slice.timestamp.toISOString()}`);
        break;
      }
      if (
        settings.timeLimitMs !== undefined &&
        slice.timestamp.getTime() - firstAt.getTime() >= settings.timeLimitMs
      ) {
        stopReason = 'time_limit';
        logger.info(`Backtest ${runId} reached its time limit at ${slice.timestamp.toISOString()}`);
        break;
      }
    }

    if (stopReason === 'end_of_data' && engine.getOpenPositions().length > 0) {
      await processor.closeAll(lastPrices, 'end_of_data');
      const last = equityCurve[equityCurve.length - 1];
      last.equity = engine.getSummary(lastPrices).equity.toNumber();
    }

    const account = engine.getAccount();
    const trades = engine.getTrades();
    const result: BacktestResult = {
      runId,
      strategyId: strategy.id,
      symbols,
      startedAt: firstAt,
      endedAt: clock.now(),
      barsProcessed,
      stopReason,
      summary: engine.getSummary(lastPrices),
      trades,
      rejections: engine.getRejections(),
      equityCurve,
      stats: calculatePerformanceStats(trades, account.startingEquity),
    };

    logger.info(`Backtest ${runId} finished (${stopReason})`, {
      trades: result.stats.totalTrades,
      netPnl: result.stats.totalNetPnl,
      winRate: result.stats.winRate,
    });
    return result;
  }
}
