import { Decision, Strategy, StrategyContext, StrategyFamily, hold } from './Strategy';
import { ConfigurationError } from '../../utils/errors';

export interface SentimentGateOptions {
  /** Readings below this confidence are ignored. */
  minConfidence: number;
  /** Absolute score at which a reading counts as opposing a trade. */
  vetoThreshold: number;
}

export const DEFAULT_SENTIMENT_GATE_OPTIONS: SentimentGateOptions = {
  minConfidence: 0.5,
  vetoThreshold: 0.3,
};

/**
 * Wraps a strategy and vetoes opens that run against a confident sentiment
 * reading. Closes and holds pass through untouched.
 */
export class SentimentGate implements Strategy {
  readonly id: string;
  readonly family: StrategyFamily;
  private readonly options: SentimentGateOptions;

  constructor(private readonly inner: Strategy, options: Partial<SentimentGateOptions> = {}) {
    this.id = `${inner.id}+sentiment`;
    this.family = inner.family;
    this.options = { ...DEFAULT_SENTIMENT_GATE_OPTIONS, ...options };

    const violations: string[] = [];
    if (!(this.options.minConfidence >= 0 && this.options.minConfidence <= 1)) {
      violations.push(`minConfidence must be between 0 and 1 (got ${this.options.minConfidence})`);
    }
    if (!(this.options.vetoThreshold >= 0 && this.options.vetoThreshold <= 1)) {
      violations.push(`vetoThreshold must be between 0 and 1 (got ${this.options.vetoThreshold})`);
    }
    if (violations.length > 0) {
      throw new ConfigurationError('sentiment gate', violations);
    }
  }

  get minimumBarsRequired(): number {
    return this.inner.minimumBarsRequired;
  }

  async evaluate(context: StrategyContext): Promise<Decision> {
    const decision = await this.inner.evaluate(context);
    const reading = context.sentiment;
    if (decision.kind !== 'open' || !reading || reading.confidence < this.options.minConfidence) {
      return decision;
    }

    const opposed =
      decision.direction === 'long'
        ? reading.score <= -this.options.vetoThreshold
        : reading.score >= this.options.vetoThreshold;

    return opposed ? hold(`sentiment_veto_${reading.score.toFixed(2)}`) : decision;
  }

  onPositionClosed(symbol: string, at: Date): void {
    this.inner.onPositionClosed?.(symbol, at);
  }
}
