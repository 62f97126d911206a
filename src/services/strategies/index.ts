/**
 * Strategy Services Index
 * Exports all available strategies and a registry for building them by name
 */

import { BreakoutConfig, BreakoutStrategy } from './BreakoutStrategy';
import { FundingCarryConfig, FundingCarryStrategy } from './FundingCarryStrategy';
import { MeanReversionConfig, MeanReversionStrategy } from './MeanReversionStrategy';
import { SentimentGate, SentimentGateOptions } from './SentimentGate';
import { Strategy } from './Strategy';
import { ConfigurationError } from '../../utils/errors';

export { BreakoutStrategy } from './BreakoutStrategy';
export { MeanReversionStrategy } from './MeanReversionStrategy';
export { FundingCarryStrategy } from './FundingCarryStrategy';
export { SentimentGate } from './SentimentGate';
export { evaluateStrategy } from './StrategyRunner';
export type { Strategy, StrategyContext, Decision, OpenDecision, SentimentReading } from './Strategy';

// Strategy registry for construction from API requests
export const strategies = {
  breakout: (params: Partial<BreakoutConfig>) => new BreakoutStrategy(params),
  mean_reversion: (params: Partial<MeanReversionConfig>) => new MeanReversionStrategy(params),
  funding_carry: (params: Partial<FundingCarryConfig>) => new FundingCarryStrategy(params),
};

export type StrategyName = keyof typeof strategies;

export const STRATEGY_NAMES: StrategyName[] = ['breakout', 'mean_reversion', 'funding_carry'];

export function isStrategyName(name: string): name is StrategyName {
  return STRATEGY_NAMES.some((candidate) => candidate === name);
}

export interface StrategySpec {
  name: string;
  params?: Record<string, number>;
  sentiment?: Partial<SentimentGateOptions> | boolean;
}

export function createStrategy(spec: StrategySpec): Strategy {
  if (!isStrategyName(spec.name)) {
    throw new ConfigurationError('strategy', [`unknown strategy "${spec.name}" (expected one of ${STRATEGY_NAMES.join(', ')})`]);
  }

  const strategy = strategies[spec.name](spec.params ?? {});
  if (!spec.sentiment) {
    return strategy;
  }
  return new SentimentGate(strategy, spec.sentiment === true ? {} : spec.sentiment);
}
