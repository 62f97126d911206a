import Decimal from 'decimal.js';
import { Direction, OrderSide, Position } from '../../types/trading';
import { ONE, ZERO } from '../../utils/money';

export function entrySide(direction: Direction): OrderSide {
  return direction === 'long' ? 'buy' : 'sell';
}

export function exitSide(direction: Direction): OrderSide {
  return direction === 'long' ? 'sell' : 'buy';
}

export function directionSign(direction: Direction): number {
  return direction === 'long' ? 1 : -1;
}

/**
 * Buys fill above the reference price, sells below it.
 */
export function applySlippage(reference: Decimal, side: OrderSide, slippageRate: Decimal): Decimal {
  return side === 'buy' ? reference.times(ONE.plus(slippageRate)) : reference.times(ONE.minus(slippageRate));
}

/**
 * Rounds to the tick grid against the trader: buys round up, sells round down.
 */
export function roundToTick(price: Decimal, tickSize: Decimal, side: OrderSide): Decimal {
  const ticks = price.dividedBy(tickSize);
  const rounded = side === 'buy' ? ticks.ceil() : ticks.floor();
  return rounded.times(tickSize);
}

export function fillPrice(reference: Decimal, side: OrderSide, slippageRate: Decimal, tickSize: Decimal): Decimal {
  return roundToTick(applySlippage(reference, side, slippageRate), tickSize, side);
}

export function fee(price: Decimal, size: Decimal, feeRate: Decimal): Decimal {
  return price.times(size).times(feeRate);
}

export function initialMargin(price: Decimal, size: Decimal, leverage: number): Decimal {
  return price.times(size).dividedBy(leverage);
}

export function grossPnl(direction: Direction, entryPrice: Decimal, exitPrice: Decimal, size: Decimal): Decimal {
  return exitPrice.minus(entryPrice).times(size).times(directionSign(direction));
}

export function unrealizedPnl(position: Pick<Position, 'direction' | 'entryPrice' | 'size'>, markPrice: Decimal): Decimal {
  return grossPnl(position.direction, position.entryPrice, markPrice, position.size);
}

/** Net PnL as a percentage of the margin committed. */
export function returnOnMargin(netPnl: Decimal, margin: Decimal): Decimal {
  return margin.isZero() ? ZERO : netPnl.dividedBy(margin).times(100);
}
