/**
 * Mean Reversion Strategy
 * Fades an impulse that fails to follow through while RSI sits at an extreme.
 * Exits are fixed in account currency: a profit target, a loss budget and a
 * maximum holding time.
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

export interface MeanReversionConfig extends BaseStrategyConfig {
  rsiPeriod: number;
  rsiOversold: number;
  rsiOverbought: number;
  impulseBars: number;
  impulseThresholdPct: number;
  followThroughBars: number;
  /** Follow-through below this fraction of the impulse threshold counts as a failed impulse. */
  followThroughFraction: number;
  targetProfitUsd: number;
  maxLossUsd: number;
  maxHoldingMs: number;
  stopPercent: number;
}

export const DEFAULT_MEAN_REVERSION_CONFIG: MeanReversionConfig = {
  cooldownMs: 120000,
  minConfidence: 5,
  rsiPeriod: 14,
  rsiOversold: 30,
  rsiOverbought: 70,
  impulseBars: 4,
  impulseThresholdPct: 0.8,
  followThroughBars: 2,
  followThroughFraction: 0.25,
  targetProfitUsd: 50,
  maxLossUsd: 25,
  maxHoldingMs: 900000,
  stopPercent: 2,
};

const RULES: ParameterRules<MeanReversionConfig> = {
  rsiPeriod: { min: 2, max: 100, integer: true },
  rsiOversold: { min: 1, max: 50 },
  rsiOverbought: { min: 50, max: 99 },
  impulseBars: { min: 2, max: 100, integer: true },
  impulseThresholdPct: { min: 0.01, max: 50 },
  followThroughBars: { min: 1, max: 50, integer: true },
  followThroughFraction: { min: 0, max: 1 },
  targetProfitUsd: { min: 0.01, max: 1e9 },
  maxLossUsd: { min: 0.01, max: 1e9 },
  maxHoldingMs: { min: 1000, max: 30 * 86400000 },
  stopPercent: { min: 0, max: 50 },
};

export class MeanReversionStrategy extends BaseStrategy<MeanReversionConfig> {
  readonly family: StrategyFamily = 'mean_reversion';

  constructor(overrides: Partial<MeanReversionConfig> = {}, id: string = 'mean_reversion') {
    super(id, DEFAULT_MEAN_REVERSION_CONFIG, overrides, RULES);
  }

  get minimumBarsRequired(): number {
    return Math.max(this.config.rsiPeriod + 1, this.config.impulseBars + 1, this.config.followThroughBars + 1);
  }

  protected evaluateEntry(context: StrategyContext): Decision {
    const prices = closes(context.bars);
    const impulse = TechnicalIndicators.percentChange(prices, this.config.impulseBars);
    if (Math.abs(impulse) < this.config.impulseThresholdPct) {
      return hold('no_impulse');
    }

    const followThrough = Math.abs(TechnicalIndicators.percentChange(prices, this.config.followThroughBars));
    if (followThrough >= this.config.impulseThresholdPct * this.config.followThroughFraction) {
      return hold('impulse_continuing');
    }

    const rsi = TechnicalIndicators.RSI(prices, this.config.rsiPeriod);
    let direction: 'long' | 'short' | null = null;
    let extremity = 0;
    if (impulse > 0 && rsi >= this.config.rsiOverbought) {
      direction = 'short';
      extremity = (rsi - this.config.rsiOverbought) / (100 - this.config.rsiOverbought);
    } else if (impulse < 0 && rsi <= this.config.rsiOversold) {
      direction = 'long';
      extremity = (this.config.rsiOversold - rsi) / this.config.rsiOversold;
    }

    if (!direction) {
      return hold(`rsi_${rsi.toFixed(1)}`);
    }

    const confidence = Math.min(10, 5 + Math.min(3, Math.abs(impulse) / this.config.impulseThresholdPct) + 2 * extremity);
    if (confidence < this.config.minConfidence) {
      return hold(`confidence_${confidence.toFixed(1)}`);
    }

    const price = prices[prices.length - 1];
    const stopDistance = price * (this.config.stopPercent / 100);

    return {
      kind: 'open',
      direction,
      confidence,
      stopLoss: stopDistance > 0 ? (direction === 'long' ? price - stopDistance : price + stopDistance) : undefined,
      reason: `failed ${impulse > 0 ? 'up' : 'down'} impulse ${impulse.toFixed(2)}% with RSI ${rsi.toFixed(1)}`,
    };
  }

  protected evaluateExit(context: StrategyContext, position: StrategyPositionView): Decision {
    if (position.unrealizedPnl >= this.config.targetProfitUsd) {
      return { kind: 'close', reason: `profit target ${position.unrealizedPnl.toFixed(2)} reached` };
    }
    if (position.unrealizedPnl <= -this.config.maxLossUsd) {
      return { kind: 'close', reason: `loss budget ${position.unrealizedPnl.toFixed(2)} exhausted` };
    }
    const heldMs = context.now.getTime() - position.openedAt.getTime();
    if (heldMs >= this.config.maxHoldingMs) {
      return { kind: 'close', reason: `max holding time ${Math.round(heldMs / 1000)}s` };
    }
    return hold();
  }
}
