import Decimal from 'decimal.js';
import { Position, PriceObservation, TriggerHit } from '../../types/trading';
import { ONE, dec } from '../../utils/money';

interface ObservedRange {
  open: Decimal;
  high: Decimal;
  low: Decimal;
}

function toRange(observation: PriceObservation): ObservedRange {
  if (typeof observation === 'number') {
    const price = dec(observation);
    return { open: price, high: price, low: price };
  }
  return { open: dec(observation.open), high: dec(observation.high), low: dec(observation.low) };
}

type TriggerPosition = Pick<
  Position,
  'direction' | 'stopLoss' | 'takeProfit' | 'trailingStopPercent' | 'highWaterPrice' | 'entryPrice'
>;

/**
 * Returns at most one exit for the observation. When a bar reaches both the
 * stop and the target, the stop wins.
 *
 * Stops fill at their level, or at the bar open when price gapped through it.
 * Targets fill at their level.
 */
export function checkRiskTriggers(position: TriggerPosition, observation: PriceObservation): TriggerHit | null {
  const range = toRange(observation);
  const isLong = position.direction === 'long';
  const stop = position.stopLoss;

  if (stop) {
    const hit = isLong ? range.low.lessThanOrEqualTo(stop) : range.high.greaterThanOrEqualTo(stop);
    if (hit) {
      const gapped = isLong ? range.open.lessThan(stop) : range.open.greaterThan(stop);
      return {
        reason: isTrailingStop(position, stop) ? 'trailing_stop' : 'stop_loss',
        referencePrice: gapped ? range.open : stop,
      };
    }
  }

  const target = position.takeProfit;
  if (target) {
    const hit = isLong ? range.high.greaterThanOrEqualTo(target) : range.low.lessThanOrEqualTo(target);
    if (hit) {
      return { reason: 'take_profit', referencePrice: target };
    }
  }

  return null;
}

/** Reported as a trailing stop only once it sits beyond the entry price. */
function isTrailingStop(position: TriggerPosition, stop: Decimal): boolean {
  if (!position.trailingStopPercent) return false;
  return position.direction === 'long'
    ? stop.greaterThan(position.entryPrice)
    : stop.lessThan(position.entryPrice);
}

/**
 * Moves the high-water price and, with it, the trailing stop toward the market.
 * The stop never moves away from price. Returns null when nothing changes.
 */
export function ratchetTrailingStop(
  position: TriggerPosition,
  observedPrice: Decimal
): { highWaterPrice: Decimal; stopLoss: Decimal } | null {
  const percent = position.trailingStopPercent;
  if (!percent) return null;

  const fraction = percent.dividedBy(100);
  const isLong = position.direction === 'long';
  const improved = isLong
    ? observedPrice.greaterThan(position.highWaterPrice)
    : observedPrice.lessThan(position.highWaterPrice);
  const highWaterPrice = improved ? observedPrice : position.highWaterPrice;

  const candidate = isLong
    ? highWaterPrice.times(ONE.minus(fraction))
    : highWaterPrice.times(ONE.plus(fraction));

  const current = position.stopLoss;
  const tighter = !current || (isLong ? candidate.greaterThan(current) : candidate.lessThan(current));

  if (!improved && !tighter) return null;
  return { highWaterPrice, stopLoss: tighter ? candidate : current ?? candidate };
}
