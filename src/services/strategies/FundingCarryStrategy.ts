/**
 * Funding Carry Strategy
 * Holds a short perpetual position while the funding rate pays shorts.
 * Rates are percent per funding interval (8h on most venues).
 */

import { TechnicalIndicators, closes } from './indicators';
import {
  BaseStrategy,
  BaseStrategyConfig,
  Decision,
  ParameterRules,
  StrategyContext,
  StrategyFamily,
  StrategyPositionView,
  hold,
} from './Strategy';

export interface FundingCarryConfig extends BaseStrategyConfig {
  minFundingRatePct: number;
  targetFundingRatePct: number;
  /** Close once the rate decays below this fraction of the minimum. */
  exitFraction: number;
  minHoldingMs: number;
  maxPriceDeviationPct: number;
  maxPositionPercent: number;
  leverage: number;
  volatilityPeriod: number;
}

export const DEFAULT_FUNDING_CARRY_CONFIG: FundingCarryConfig = {
  cooldownMs: 0,
  minConfidence: 3,
  minFundingRatePct: 0.01,
  targetFundingRatePct: 0.05,
  exitFraction: 0.5,
  minHoldingMs: 24 * 3600000,
  maxPriceDeviationPct: 5,
  maxPositionPercent: 50,
  leverage: 2,
  volatilityPeriod: 24,
};

const RULES: ParameterRules<FundingCarryConfig> = {
  minFundingRatePct: { min: 0.0001, max: 5 },
  targetFundingRatePct: { min: 0.0001, max: 5 },
  exitFraction: { min: 0, max: 1 },
  minHoldingMs: { min: 0, max: 30 * 86400000 },
  maxPriceDeviationPct: { min: 0.1, max: 100 },
  maxPositionPercent: { min: 0.1, max: 100 },
  leverage: { min: 1, max: 125 },
  volatilityPeriod: { min: 2, max: 500, integer: true },
};

export class FundingCarryStrategy extends BaseStrategy<FundingCarryConfig> {
  readonly family: StrategyFamily = 'funding_carry';

  constructor(overrides: Partial<FundingCarryConfig> = {}, id: string = 'funding_carry') {
    super(id, DEFAULT_FUNDING_CARRY_CONFIG, overrides, RULES);
  }

  get minimumBarsRequired(): number {
    return this.config.volatilityPeriod + 1;
  }

  protected evaluateEntry(context: StrategyContext): Decision {
    const rate = context.fundingRate;
    if (rate === undefined) {
      return hold('no_funding_data');
    }
    if (rate < this.config.minFundingRatePct) {
      return hold(`funding_${rate.toFixed(4)}%_below_min`);
    }

    const volatility = TechnicalIndicators.volatility(closes(context.bars), this.config.volatilityPeriod);
    const confidence = this.confidence(rate, volatility);
    if (confidence < this.config.minConfidence) {
      return hold(`confidence_${confidence.toFixed(1)}`);
    }

    const annualized = rate * ((365 * 24) / 8);
    return {
      kind: 'open',
      direction: 'short',
      confidence,
      leverage: this.config.leverage,
      sizePercent: Math.min(this.config.maxPositionPercent, confidence * 5),
      reason: `funding ${rate.toFixed(4)}% per 8h (~${annualized.toFixed(1)}% annualized), volatility ${volatility.toFixed(2)}%`,
    };
  }

  protected evaluateExit(context: StrategyContext, position: StrategyPositionView): Decision {
    const price = context.bars[context.bars.length - 1].close;
    const deviation = (Math.abs(price - position.entryPrice) / position.entryPrice) * 100;
    if (deviation > this.config.maxPriceDeviationPct) {
      return { kind: 'close', reason: `price moved ${deviation.toFixed(2)}% from entry` };
    }

    const rate = context.fundingRate;
    if (rate === undefined) {
      return hold('no_funding_data');
    }
    if (rate < 0) {
      return { kind: 'close', reason: `funding turned negative (${rate.toFixed(4)}%)` };
    }
    const floor = this.config.minFundingRatePct * this.config.exitFraction;
    if (rate < floor) {
      return { kind: 'close', reason: `funding ${rate.toFixed(4)}% below ${floor.toFixed(4)}%` };
    }

    const heldMs = context.now.getTime() - position.openedAt.getTime();
    if (heldMs >= this.config.minHoldingMs && rate < this.config.minFundingRatePct) {
      return { kind: 'close', reason: `held ${(heldMs / 3600000).toFixed(1)}h and funding below minimum` };
    }
    return hold();
  }

  /**
   * 0-10: funding level (up to 5), low volatility (up to 2), and a flat 3 for venue liquidity.
   */
  private confidence(rate: number, volatility: number): number {
    let score = 3;
    if (rate >= this.config.targetFundingRatePct) {
      score += 5;
    } else {
      const span = this.config.targetFundingRatePct - this.config.minFundingRatePct;
      const ratio = span > 0 ? (rate - this.config.minFundingRatePct) / span : 1;
      score += 2.5 + ratio * 2.5;
    }

    if (volatility < 1) score += 2;
    else if (volatility < 2) score += 1;
    else if (volatility < 3) score += 0.5;

    return Math.min(10, score);
  }
}
