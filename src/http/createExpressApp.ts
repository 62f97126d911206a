/**
 * HTTP surface: middleware, routes and error mapping.
 * Built from its collaborators so the server and the tests share one wiring.
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import logger from '../utils/logger';
import { ConfigurationError, isTradingError } from '../utils/errors';
import { BotController } from '../controllers/BotController';
import { BacktestController, HistoricalBarSource } from '../controllers/BacktestController';
import { BotManager } from '../services/trading/BotManager';
import { BacktestService } from '../services/backtest/BacktestService';
import { apiLimiter, backtestLimiter, botControlLimiter } from '../middleware/rateLimiter';
import {
  validateBacktest,
  validateRunId,
  validateStartBot,
  validateTradesQuery,
} from '../middleware/validation';

export interface AppDependencies {
  botManager: BotManager;
  backtestService: BacktestService;
  historySource?: HistoricalBarSource;
  services?: Record<string, string>;
}

function statusOf(err: unknown): number {
  if (isTradingError(err)) return err.status;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createExpressApp(deps: AppDependencies): express.Application {
  const app = express();

  // CORS configuration
  app.use(
    cors({
      origin: process.env.FRONTEND_URL || 'http://localhost:5173',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Requested-With'],
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      success: true,
      message: 'Paper trading API is running',
      timestamp: new Date().toISOString(),
      services: deps.services ?? {},
    });
  });

  const botController = new BotController(deps.botManager);
  const backtestController = new BacktestController(deps.backtestService, deps.historySource);

  const apiRouter = express.Router();
  apiRouter.use(apiLimiter);

  // Bot runs
  apiRouter.post('/bots', botControlLimiter, validateStartBot, botController.startBot);
  apiRouter.get('/bots', botController.listBots);
  apiRouter.get('/bots/:runId', validateRunId, botController.getBot);
  apiRouter.post('/bots/:runId/stop', botControlLimiter, validateRunId, botController.stopBot);
  apiRouter.get('/bots/:runId/summary', validateRunId, botController.getSummary);
  apiRouter.get('/bots/:runId/trades', validateTradesQuery, botController.getTrades);

  // Backtests
  apiRouter.post('/backtests', backtestLimiter, validateBacktest, backtestController.runBacktest);

  app.use('/api/v1', apiRouter);

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found',
      path: req.path,
    });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : 'Internal server error';

    if (status >= 500) {
      logger.error('API Error:', { status, message, path: req.path, method: req.method, error: err });
    } else {
      logger.warn('Request rejected:', { status, message, path: req.path, method: req.method });
    }

    res.status(status).json({
      success: false,
      error: status >= 500 && !isTradingError(err) ? 'Internal server error' : message,
      ...(isTradingError(err) && { code: err.code }),
      ...(err instanceof ConfigurationError && { violations: err.violations }),
    });
  });

  return app;
}
