/**
 * BacktestController - runs a strategy over supplied or downloaded bars
 */

import { NextFunction, Request, Response } from 'express';
import { Bar } from '../types/trading';
import { EngineSettings } from '../config/settings';
import { InvalidOrderError } from '../utils/errors';
import { BacktestService, BacktestSettings, FundingPoint } from '../services/backtest/BacktestService';
import { createStrategy } from '../services/strategies';
import { parseBarsCsv } from '../services/market/csvBars';
import {
  JsonObject,
  isRecord,
  parseBarSeries,
  parseStrategySpec,
  pickNumbers,
  readObject,
  readString,
  readStringArray,
} from './requestParsing';

export interface HistoricalBarSource {
  fetchHistoricalBars(symbol: string, interval: string, start: Date, end: Date): Promise<Bar[]>;
}

const ENGINE_FIELDS = [
  'startingEquity',
  'slippageRate',
  'takerFeeRate',
  'makerFeeRate',
  'defaultLeverage',
  'maxLeverage',
  'defaultTickSize',
] as const;

const BACKTEST_FIELDS = [
  'maxOpenPositions',
  'positionSizePercent',
  'strategyTimeoutMs',
  'historyBars',
  'maxLossLimit',
  'timeLimitMs',
] as const;

function parseFundingRates(value: unknown): Record<string, FundingPoint[]> | undefined {
  if (!isRecord(value)) return undefined;
  const rates: Record<string, FundingPoint[]> = {};
  for (const [symbol, points] of Object.entries(value)) {
    if (!Array.isArray(points)) continue;
    rates[symbol.toUpperCase()] = points.filter(isRecord).flatMap((point) => {
      const rate = point.rate;
      const timestamp = point.timestamp;
      if (typeof rate !== 'number' || (typeof timestamp !== 'string' && typeof timestamp !== 'number')) {
        return [];
      }
      return [{ timestamp: new Date(timestamp), rate }];
    });
  }
  return rates;
}

export class BacktestController {
  constructor(
    private readonly backtestService: BacktestService,
    private readonly historySource?: HistoricalBarSource
  ) {}

  /**
   * Run a backtest
   * POST /api/v1/backtests
   */
  runBacktest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: JsonObject = isRecord(req.body) ? req.body : {};
      const strategy = createStrategy(parseStrategySpec(body.strategy));
      const series = await this.loadSeries(body);

      const engineSettings: Partial<EngineSettings> = pickNumbers(readObject(body, 'engine'), ENGINE_FIELDS);
      const settings: Partial<BacktestSettings> = pickNumbers(readObject(body, 'settings'), BACKTEST_FIELDS);

      const result = await this.backtestService.run({
        strategy,
        series,
        fundingRates: parseFundingRates(body.fundingRates),
        engineSettings,
        settings,
      });

      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  };

  private async loadSeries(body: JsonObject): Promise<Record<string, Bar[]>> {
    if (body.bars !== undefined) {
      return parseBarSeries(body.bars);
    }

    if (isRecord(body.csv)) {
      const series: Record<string, Bar[]> = {};
      for (const [symbol, content] of Object.entries(body.csv)) {
        if (typeof content !== 'string') {
          throw new InvalidOrderError(`CSV for ${symbol} must be a string`);
        }
        series[symbol.toUpperCase()] = parseBarsCsv(content);
      }
      return series;
    }

    const history = readObject(body, 'history');
    const symbols = readStringArray(history, 'symbols') ?? [];
    const interval = readString(history, 'interval') ?? '1h';
    const start = new Date(readString(history, 'start') ?? '');
    const end = new Date(readString(history, 'end') ?? '');

    if (!this.historySource) {
      throw new InvalidOrderError('Historical download is not configured');
    }
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || start >= end) {
      throw new InvalidOrderError('History needs a start before its end');
    }

    const series: Record<string, Bar[]> = {};
    for (const symbol of symbols) {
      series[symbol] = await this.historySource.fetchHistoricalBars(symbol, interval, start, end);
    }
    return series;
  }
}
