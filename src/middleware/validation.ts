/**
 * Validation Middleware
 * Input validation for bot control and backtest endpoints
 */

import { Request, Response, NextFunction } from 'express';
import { body, param, query, validationResult } from 'express-validator';
import logger from '../utils/logger';
import { STRATEGY_NAMES } from '../services/strategies';

const SYMBOL_PATTERN = /^[A-Z0-9]{2,20}$/;

/**
 * Handle validation errors
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    logger.warn('Validation error:', {
      path: req.path,
      errors: errors.array(),
    });

    res.status(400).json({
      success: false,
      error: 'Validation failed',
      details: errors.array().map((err) => ({
        field: err.type === 'field' ? err.path : err.type,
        message: err.msg,
      })),
    });
    return;
  }
  next();
};

const strategyChain = [
  body('strategy')
    .exists()
    .withMessage('Strategy is required')
    .custom((value) => {
      const name = typeof value === 'string' ? value : value?.name;
      if (typeof name !== 'string' || !STRATEGY_NAMES.some((candidate) => candidate === name)) {
        throw new Error(`Strategy must be one of ${STRATEGY_NAMES.join(', ')}`);
      }
      return true;
    }),
  body('strategy.params')
    .optional()
    .isObject()
    .withMessage('Strategy params must be an object')
    .custom((value: Record<string, unknown>) => {
      for (const [key, param] of Object.entries(value)) {
        if (typeof param !== 'number' || !Number.isFinite(param)) {
          throw new Error(`Strategy param ${key} must be a number`);
        }
      }
      return true;
    }),
];

/**
 * Bot run validations
 */
export const validateStartBot = [
  ...strategyChain,
  body('accountName')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Account name must be 1-64 characters'),
  body('startingEquity')
    .optional()
    .isFloat({ min: 1, max: 1e12 })
    .withMessage('Starting equity must be a positive amount'),
  body('symbols')
    .optional()
    .isArray({ min: 1, max: 20 })
    .withMessage('Symbols must be an array of 1 to 20 entries'),
  body('symbols.*')
    .isString()
    .trim()
    .toUpperCase()
    .matches(SYMBOL_PATTERN)
    .withMessage('Invalid symbol format'),
  body('settings.pollIntervalMs')
    .optional()
    .isInt({ min: 1000, max: 3600000 })
    .withMessage('Poll interval must be between 1 second and 1 hour'),
  body('settings.timeLimitMs')
    .optional()
    .isInt({ min: 1 })
    .withMessage('Time limit must be a positive number of milliseconds'),
  body('settings.maxLossLimit')
    .optional()
    .isFloat({ min: 0.01 })
    .withMessage('Max loss limit must be positive'),
  body('settings.maxOpenPositions')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Max open positions must be between 1 and 100'),
  body('settings.positionSizePercent')
    .optional()
    .isFloat({ min: 0.01, max: 100 })
    .withMessage('Position size must be between 0.01% and 100%'),
  body('settings.closePositionsOnStop')
    .optional()
    .isBoolean()
    .withMessage('closePositionsOnStop must be a boolean'),
  handleValidationErrors,
];

const runIdParam = () =>
  param('runId')
    .isString()
    .matches(/^run_[A-Za-z0-9_]+$/)
    .withMessage('Invalid run id');

export const validateRunId = [runIdParam(), handleValidationErrors];

export const validateTradesQuery = [
  runIdParam(),
  query('limit')
    .optional()
    .isInt({ min: 1, max: 1000 })
    .withMessage('Limit must be between 1 and 1000'),
  handleValidationErrors,
];

/**
 * Backtest validations
 */
export const validateBacktest = [
  ...strategyChain,
  body().custom((value) => {
    const sources = ['bars', 'csv', 'history'].filter((key) => value?.[key] !== undefined);
    if (sources.length !== 1) {
      throw new Error('Provide exactly one of bars, csv or history');
    }
    return true;
  }),
  body('bars')
    .optional()
    .isObject()
    .withMessage('Bars must map symbols to bar arrays'),
  body('csv')
    .optional()
    .isObject()
    .withMessage('CSV must map symbols to CSV content'),
  body('history.symbols')
    .if(body('history').exists())
    .isArray({ min: 1, max: 10 })
    .withMessage('History symbols must be an array of 1 to 10 entries'),
  body('history.interval')
    .if(body('history').exists())
    .isString()
    .withMessage('History interval is required'),
  body('history.start')
    .if(body('history').exists())
    .isISO8601()
    .withMessage('History start must be an ISO date'),
  body('history.end')
    .if(body('history').exists())
    .isISO8601()
    .withMessage('History end must be an ISO date'),
  body('settings.maxLossLimit')
    .optional()
    .isFloat({ min: 0.01 })
    .withMessage('Max loss limit must be positive'),
  body('settings.positionSizePercent')
    .optional()
    .isFloat({ min: 0.01, max: 100 })
    .withMessage('Position size must be between 0.01% and 100%'),
  body('engine.startingEquity')
    .optional()
    .isFloat({ min: 1, max: 1e12 })
    .withMessage('Starting equity must be a positive amount'),
  handleValidationErrors,
];
