/**
 * Strategy contract
 * Strategies read a window of bars plus an optional view of the open position
 * and answer with a Decision. They never touch the ledger.
 */

import { BarSeries, Direction } from '../../types/trading';
import { ConfigurationError } from '../../utils/errors';

export type StrategyFamily = 'breakout' | 'mean_reversion' | 'funding_carry';

/** Score in [-1, 1] (bearish to bullish) with a confidence in [0, 1]. */
export interface SentimentReading {
  score: number;
  confidence: number;
}

export interface StrategyPositionView {
  readonly id: string;
  readonly direction: Direction;
  readonly size: number;
  readonly entryPrice: number;
  readonly leverage: number;
  readonly openedAt: Date;
  readonly unrealizedPnl: number;
}

export interface StrategyContext {
  symbol: string;
  bars: BarSeries;
  position: StrategyPositionView | null;
  now: Date;
  /** Funding rate in percent per funding interval, when the data source supplies one. */
  fundingRate?: number;
  sentiment?: SentimentReading;
  signal: AbortSignal;
}

export interface OpenDecision {
  kind: 'open';
  direction: Direction;
  /** 0-10 */
  confidence: number;
  stopLoss?: number;
  takeProfit?: number;
  trailingStopPercent?: number;
  sizePercent?: number;
  leverage?: number;
  reason: string;
}

export interface CloseDecision {
  kind: 'close';
  reason: string;
}

export interface HoldDecision {
  kind: 'hold';
  reason?: string;
}

export type Decision = OpenDecision | CloseDecision | HoldDecision;

export const hold = (reason?: string): HoldDecision => ({ kind: 'hold', reason });

export interface Strategy {
  readonly id: string;
  readonly family: StrategyFamily;
  readonly minimumBarsRequired: number;
  evaluate(context: StrategyContext): Decision | Promise<Decision>;
  onPositionClosed?(symbol: string, at: Date): void;
}

export interface ParameterRule {
  min: number;
  max: number;
  integer?: boolean;
}

export type ParameterRules<TConfig> = { [K in keyof TConfig]?: ParameterRule };

export interface BaseStrategyConfig {
  /** Time after a close before the same symbol may be opened again. */
  cooldownMs: number;
  minConfidence: number;
}

export const BASE_PARAMETER_RULES: ParameterRules<BaseStrategyConfig> = {
  cooldownMs: { min: 0, max: 7 * 86400000, integer: true },
  minConfidence: { min: 0, max: 10 },
};

function collectViolations<TConfig extends object>(config: TConfig, rules: ParameterRules<TConfig>): string[] {
  const violations: string[] = [];

  for (const key in rules) {
    const rule = rules[key];
    if (!rule) continue;
    const value = config[key];

    if (typeof value !== 'number' || !Number.isFinite(value)) {
      violations.push(`${key} must be a finite number`);
      continue;
    }
    if (value < rule.min || value > rule.max) {
      violations.push(`${key} must be between ${rule.min} and ${rule.max} (got ${value})`);
    }
    if (rule.integer && !Number.isInteger(value)) {
      violations.push(`${key} must be an integer (got ${value})`);
    }
  }

  return violations;
}

export function validateParameters<TConfig extends BaseStrategyConfig>(
  scope: string,
  config: TConfig,
  rules: ParameterRules<TConfig>
): void {
  const violations = [
    ...collectViolations<BaseStrategyConfig>(config, BASE_PARAMETER_RULES),
    ...collectViolations(config, rules),
  ];

  if (violations.length > 0) {
    throw new ConfigurationError(scope, violations);
  }
}

/**
 * Shared plumbing: parameter validation at construction, the warm-up guard
 * and a per-symbol cooldown after each close. Subclasses decide entries and exits.
 */
export abstract class BaseStrategy<TConfig extends BaseStrategyConfig> implements Strategy {
  abstract readonly family: StrategyFamily;
  abstract readonly minimumBarsRequired: number;
  readonly id: string;
  protected readonly config: TConfig;
  private lastCloseBySymbol: Map<string, number> = new Map();

  protected constructor(id: string, defaults: TConfig, overrides: Partial<TConfig>, rules: ParameterRules<TConfig>) {
    this.id = id;
    this.config = { ...defaults, ...overrides };
    validateParameters(`${id} strategy`, this.config, rules);
  }

  getConfig(): Readonly<TConfig> {
    return this.config;
  }

  evaluate(context: StrategyContext): Decision | Promise<Decision> {
    if (context.bars.length < this.minimumBarsRequired) {
      return hold('warming_up');
    }
    if (context.position) {
      return this.evaluateExit(context, context.position);
    }
    if (this.inCooldown(context.symbol, context.now)) {
      return hold('cooldown');
    }
    return this.evaluateEntry(context);
  }

  onPositionClosed(symbol: string, at: Date): void {
    this.lastCloseBySymbol.set(symbol, at.getTime());
  }

  protected inCooldown(symbol: string, now: Date): boolean {
    const lastClose = this.lastCloseBySymbol.get(symbol);
    return lastClose !== undefined && now.getTime() - lastClose < this.config.cooldownMs;
  }

  protected abstract evaluateEntry(context: StrategyContext): Decision | Promise<Decision>;

  protected abstract evaluateExit(
    context: StrategyContext,
    position: StrategyPositionView
  ): Decision | Promise<Decision>;
}
