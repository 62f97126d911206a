/**
 * BotController - REST endpoints for starting, stopping and inspecting paper-trading runs
 */

import { NextFunction, Request, Response } from 'express';
import logger from '../utils/logger';
import { BotManager, StartRunRequest } from '../services/trading/BotManager';
import { BotSettings } from '../config/settings';
import {
  isRecord,
  parseStrategySpec,
  pickNumbers,
  readBoolean,
  readNumber,
  readObject,
  readString,
  readStringArray,
} from './requestParsing';

const NUMERIC_BOT_SETTINGS = [
  'pollIntervalMs',
  'historyBars',
  'timeLimitMs',
  'maxLossLimit',
  'summaryIntervalMs',
  'fetchConcurrency',
  'strategyTimeoutMs',
  'maxOpenPositions',
  'positionSizePercent',
] as const;

export function parseStartRunRequest(body: unknown): StartRunRequest {
  const source = isRecord(body) ? body : {};
  const rawSettings = readObject(source, 'settings');

  const settings: Partial<BotSettings> = pickNumbers(rawSettings, NUMERIC_BOT_SETTINGS);
  const barInterval = readString(rawSettings, 'barInterval');
  if (barInterval) settings.barInterval = barInterval;
  const closePositionsOnStop = readBoolean(rawSettings, 'closePositionsOnStop');
  if (closePositionsOnStop !== undefined) settings.closePositionsOnStop = closePositionsOnStop;

  return {
    accountName: readString(source, 'accountName'),
    startingEquity: readNumber(source, 'startingEquity'),
    symbols: readStringArray(source, 'symbols'),
    strategy: parseStrategySpec(source.strategy),
    settings,
  };
}

export class BotController {
  constructor(private readonly botManager: BotManager) {}

  /**
   * Start a paper-trading run
   * POST /api/v1/bots
   */
  startBot = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const run = await this.botManager.startRun(parseStartRunRequest(req.body));
      logger.info(`Paper trading run ${run.runId} started for ${run.accountName}`);
      res.status(201).json({ success: true, data: run });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Stop a run; resolves after the final summary
   * POST /api/v1/bots/:runId/stop
   */
  stopBot = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const run = await this.botManager.stopRun(req.params.runId, 'signal');
      res.json({ success: true, data: run });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/bots/:runId
   */
  getBot = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json({ success: true, data: await this.botManager.getRun(req.params.runId) });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/bots
   */
  listBots = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json({ success: true, data: await this.botManager.listRuns() });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/bots/:runId/summary
   */
  getSummary = (req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json({ success: true, data: this.botManager.getSummary(req.params.runId) });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/bots/:runId/trades?limit=50
   */
  getTrades = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : undefined;
      res.json({ success: true, data: this.botManager.getTrades(req.params.runId, limit) });
    } catch (error) {
      next(error);
    }
  };
}
