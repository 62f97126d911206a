/**
 * Breakout Strategy
 * Trades closes that break out of the rolling support/resistance band with
 * volume confirmation, in the direction of the prevailing trend. Stops sit an ATR multiple away (at least `minStopPercent`),
 * targets at `riskRewardRatio` times the risk.
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

export interface BreakoutConfig extends BaseStrategyConfig {
  lookback: number;
  breakoutThresholdPct: number;
  minVolumeRatio: number;
  volumePeriod: number;
  atrPeriod: number;
  atrMultiplier: number;
  minStopPercent: number;
  riskRewardRatio: number;
  /** Close an open position once the band narrows below this width (percent of mid). */
  consolidationThresholdPct: number;
  trailingStopPercent: number;
  /** Closes averaged for the trend filter; 0 turns the filter off. */
  trendPeriod: number;
  /** How far (percent) the close may sit on the wrong side of the trend average. */
  trendTolerancePct: number;
}

export const DEFAULT_BREAKOUT_CONFIG: BreakoutConfig = {
  cooldownMs: 0,
  minConfidence: 4,
  lookback: 30,
  breakoutThresholdPct: 0.5,
  minVolumeRatio: 1.5,
  volumePeriod: 20,
  atrPeriod: 14,
  atrMultiplier: 2,
  minStopPercent: 2,
  riskRewardRatio: 2,
  consolidationThresholdPct: 0,
  trailingStopPercent: 0,
  trendPeriod: 20,
  trendTolerancePct: 1,
};

const RULES: ParameterRules<BreakoutConfig> = {
  lookback: { min: 5, max: 500, integer: true },
  breakoutThresholdPct: { min: 0, max: 20 },
  minVolumeRatio: { min: 0, max: 20 },
  volumePeriod: { min: 1, max: 500, integer: true },
  atrPeriod: { min: 1, max: 200, integer: true },
  atrMultiplier: { min: 0.1, max: 20 },
  minStopPercent: { min: 0, max: 50 },
  riskRewardRatio: { min: 0.1, max: 20 },
  consolidationThresholdPct: { min: 0, max: 50 },
  trailingStopPercent: { min: 0, max: 50 },
  trendPeriod: { min: 0, max: 500, integer: true },
  trendTolerancePct: { min: 0, max: 20 },
};

export class BreakoutStrategy extends BaseStrategy<BreakoutConfig> {
  readonly family: StrategyFamily = 'breakout';

  constructor(overrides: Partial<BreakoutConfig> = {}, id: string = 'breakout') {
    super(id, DEFAULT_BREAKOUT_CONFIG, overrides, RULES);
  }

  get minimumBarsRequired(): number {
    const { lookback, volumePeriod, atrPeriod, trendPeriod } = this.config;
    return Math.max(lookback, volumePeriod, atrPeriod, trendPeriod) + 1;
  }

  /** Band over the `lookback` bars before the latest one. */
  private band(context: StrategyContext): { support: number; resistance: number } {
    const window = context.bars.slice(-this.config.lookback - 1, -1);
    const { high, low } = TechnicalIndicators.range(window);
    return { support: low, resistance: high };
  }

  protected evaluateEntry(context: StrategyContext): Decision {
    const { bars } = context;
    const last = bars[bars.length - 1];
    const previous = bars[bars.length - 2];
    const { support, resistance } = this.band(context);
    const volumeRatio = TechnicalIndicators.volumeRatio(bars, this.config.volumePeriod);

    const upStrength = ((last.close - resistance) / resistance) * 100;
    const downStrength = ((support - last.close) / support) * 100;

    let direction: 'long' | 'short' | null = null;
    let strength = 0;
    if (previous.close <= resistance && upStrength >= this.config.breakoutThresholdPct && upStrength > 0) {
      direction = 'long';
      strength = upStrength;
    } else if (previous.close >= support && downStrength >= this.config.breakoutThresholdPct && downStrength > 0) {
      direction = 'short';
      strength = downStrength;
    }

    if (!direction) {
      return hold('inside_band');
    }
    if (this.againstTrend(direction, bars.slice(0, -1).map((bar) => bar.close), last.close)) {
      return hold(`trend_against_${direction}`);
    }
    if (volumeRatio < this.config.minVolumeRatio) {
      return hold(`volume_ratio_${volumeRatio.toFixed(2)}`);
    }

    const confidence = this.confidence(strength, volumeRatio, closes(bars));
    if (confidence < this.config.minConfidence) {
      return hold(`confidence_${confidence.toFixed(1)}`);
    }

    const price = last.close;
    const atr = TechnicalIndicators.ATR(bars, this.config.atrPeriod);
    const minDistance = price * (this.config.minStopPercent / 100);
    const risk = Math.max(atr * this.config.atrMultiplier, minDistance);
    const isLong = direction === 'long';

    return {
      kind: 'open',
      direction,
      confidence,
      stopLoss: isLong ? price - risk : price + risk,
      takeProfit: isLong ? price + risk * this.config.riskRewardRatio : price - risk * this.config.riskRewardRatio,
      trailingStopPercent: this.config.trailingStopPercent > 0 ? this.config.trailingStopPercent : undefined,
      reason: `${isLong ? 'breakout above' : 'breakdown below'} ${(isLong ? resistance : support).toFixed(2)} strength=${strength.toFixed(2)}% volume=${volumeRatio.toFixed(1)}x`,
    };
  }

  /** A long needs the close above the trend average, a short below it, within the tolerance. */
  private againstTrend(direction: 'long' | 'short', history: number[], close: number): boolean {
    const { trendPeriod, trendTolerancePct } = this.config;
    if (trendPeriod === 0 || history.length < trendPeriod) {
      return false;
    }
    const average = TechnicalIndicators.SMA(history, trendPeriod);
    const tolerance = trendTolerancePct / 100;
    return direction === 'long' ? close < average * (1 - tolerance) : close > average * (1 + tolerance);
  }

  protected evaluateExit(context: StrategyContext, _position: StrategyPositionView): Decision {
    if (this.config.consolidationThresholdPct <= 0) {
      return hold();
    }
    const { support, resistance } = this.band(context);
    const mid = (support + resistance) / 2;
    const width = mid === 0 ? 0 : ((resistance - support) / mid) * 100;
    if (width < this.config.consolidationThresholdPct) {
      return { kind: 'close', reason: `band contracted to ${width.toFixed(2)}%` };
    }
    return hold();
  }

  /**
   * 0-10: breakout strength (up to 3), volume (up to 2), RSI agreement (up to 2)
   * and moderate volatility (up to 3).
   */
  private confidence(strength: number, volumeRatio: number, prices: number[]): number {
    let score = 0;
    const threshold = this.config.breakoutThresholdPct > 0 ? this.config.breakoutThresholdPct : 0.5;
    score += Math.min(3, (strength / threshold) * 1.5);
    score += Math.min(2, Math.max(0, (volumeRatio - 1) * 2));

    const rsi = TechnicalIndicators.RSI(prices, 14);
    if (rsi > 30 && rsi < 80) score += 2;
    else score += 1;

    const volatility = TechnicalIndicators.volatility(prices, 20);
    if (volatility >= 0.5 && volatility <= 3) score += 3;
    else if (volatility >= 0.3 && volatility <= 5) score += 1.5;

    return Math.min(10, score);
  }
}
