import Decimal from 'decimal.js';
import logger from '../../utils/logger';
import { Clock, IdGenerator } from '../../utils/clock';
import { DecimalInput, ZERO, dec, sum } from '../../utils/money';
import {
  DuplicateOpenPositionError,
  InsufficientMarginError,
  InvalidOrderError,
  LeverageOutOfBoundsError,
  PositionAlreadyClosedError,
  PositionNotFoundError,
  TradingError,
} from '../../utils/errors';
import {
  Account,
  CloseReason,
  LedgerResult,
  OpenPositionRequest,
  Order,
  OrderType,
  Position,
  Rejection,
  Trade,
} from '../../types/trading';
import { LedgerChangeSet, cloneAccount, clonePosition } from './LedgerRepository';
import {
  entrySide,
  exitSide,
  fee,
  fillPrice,
  grossPnl,
  initialMargin,
  returnOnMargin,
  unrealizedPnl,
} from '../trading/pricing';
import { ratchetTrailingStop } from '../trading/riskTriggers';

export interface ExecutionParameters {
  slippageRate: Decimal;
  maxLeverage: number;
  defaultTickSize: Decimal;
  tickSizes: ReadonlyMap<string, Decimal>;
  nextId: IdGenerator;
}

/** Symbols are stored and looked up upper-cased. */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export interface LedgerSnapshot {
  account: Account;
  openPositions: ReadonlyMap<string, Position>;
  closedPositionIds: ReadonlySet<string>;
}

const ORDER_TYPE_BY_REASON: Record<CloseReason, OrderType> = {
  stop_loss: 'stop_loss',
  trailing_stop: 'stop_loss',
  take_profit: 'take_profit',
  strategy_signal: 'market_close',
  manual: 'market_close',
  end_of_data: 'market_close',
  shutdown: 'market_close',
};

/**
 * Working copy of the ledger for one engine transaction. All operations are
 * synchronous; nothing here reaches storage. The engine commits `changes()`
 * and adopts this state only after the commit succeeds.
 */
export class LedgerTransaction {
  private account: Account;
  private readonly openPositions: Map<string, Position>;
  private readonly closedPositionIds: Set<string>;
  private readonly touched: Map<string, Position> = new Map();
  private readonly orders: Order[] = [];
  private readonly trades: Trade[] = [];
  private readonly rejections: Rejection[] = [];
  private readonly opened: Position[] = [];

  constructor(
    snapshot: LedgerSnapshot,
    private readonly params: ExecutionParameters,
    private readonly clock: Clock
  ) {
    this.account = cloneAccount(snapshot.account);
    this.openPositions = new Map([...snapshot.openPositions].map(([id, p]) => [id, clonePosition(p)]));
    this.closedPositionIds = new Set(snapshot.closedPositionIds);
  }

  // Views

  getAccount(): Account {
    return cloneAccount(this.account);
  }

  getOpenPositions(): Position[] {
    return [...this.openPositions.values()].map(clonePosition);
  }

  findOpenPosition(symbol: string): Position | undefined {
    const key = normalizeSymbol(symbol);
    for (const position of this.openPositions.values()) {
      if (position.symbol === key) return clonePosition(position);
    }
    return undefined;
  }

  openPositionCount(): number {
    return this.openPositions.size;
  }

  // Mutations

  open(request: OpenPositionRequest): LedgerResult<Position> {
    const symbol = normalizeSymbol(request.symbol);
    try {
      const position = this.applyOpen({ ...request, symbol });
      return { accepted: true, value: clonePosition(position) };
    } catch (error) {
      return this.reject(error, symbol);
    }
  }

  close(positionId: string, referencePrice: DecimalInput, reason: CloseReason): LedgerResult<Trade> {
    const symbol = this.openPositions.get(positionId)?.symbol ?? '';
    try {
      return { accepted: true, value: this.applyClose(positionId, dec(referencePrice), reason) };
    } catch (error) {
      return this.reject(error, symbol);
    }
  }

  /**
   * Refreshes the cached mark price and unrealized PnL of a position.
   */
  markToMarket(positionId: string, price: DecimalInput): Decimal {
    const position = this.requireOpen(positionId);
    const mark = dec(price);
    position.markPrice = mark;
    position.unrealizedPnl = unrealizedPnl(position, mark);
    this.touched.set(position.id, position);
    return position.unrealizedPnl;
  }

  ratchetTrailingStop(positionId: string, price: DecimalInput): boolean {
    const position = this.requireOpen(positionId);
    const update = ratchetTrailingStop(position, dec(price));
    if (!update) return false;

    position.highWaterPrice = update.highWaterPrice;
    position.stopLoss = update.stopLoss;
    this.touched.set(position.id, position);
    return true;
  }

  /** Everything staged so far, in the form a repository commits. */
  changes(): LedgerChangeSet {
    return {
      account: cloneAccount(this.account),
      positions: [...this.touched.values()].map(clonePosition),
      orders: [...this.orders],
      trades: [...this.trades],
    };
  }

  getStagedTrades(): Trade[] {
    return [...this.trades];
  }

  getOpenedPositions(): Position[] {
    return this.opened.map(clonePosition);
  }

  getRejections(): Rejection[] {
    return [...this.rejections];
  }

  snapshot(): LedgerSnapshot {
    return {
      account: cloneAccount(this.account),
      openPositions: new Map(this.openPositions),
      closedPositionIds: new Set(this.closedPositionIds),
    };
  }

  // Internals

  private applyOpen(request: OpenPositionRequest): Position {
    const { symbol } = request;
    if (!symbol) {
      throw new InvalidOrderError('Symbol is required');
    }
    if (!Number.isFinite(request.referencePrice) || request.referencePrice <= 0) {
      throw new InvalidOrderError(`Reference price must be positive (got ${request.referencePrice})`);
    }
    if (this.findOpenPosition(symbol)) {
      throw new DuplicateOpenPositionError(this.account.name, symbol);
    }

    const leverage = request.leverage ?? this.account.defaultLeverage;
    if (!Number.isFinite(leverage) || leverage < 1 || leverage > this.params.maxLeverage) {
      throw new LeverageOutOfBoundsError(`Leverage ${leverage} is outside 1..${this.params.maxLeverage}`);
    }

    const reference = dec(request.referencePrice);
    const size = this.resolveSize(request, reference);
    if (!size.isFinite() || size.lessThanOrEqualTo(0)) {
      throw new InvalidOrderError(`Position size must be positive (got ${size.toString()})`);
    }

    const stopLoss = request.stopLoss !== undefined ? dec(request.stopLoss) : undefined;
    const takeProfit = request.takeProfit !== undefined ? dec(request.takeProfit) : undefined;
    this.validateExitLevels(request.direction === 'long', reference, stopLoss, takeProfit);

    const side = entrySide(request.direction);
    const entryPrice = fillPrice(reference, side, this.params.slippageRate, this.tickSizeFor(symbol));
    const margin = initialMargin(entryPrice, size, leverage);
    const entryFee = fee(entryPrice, size, this.account.takerFeeRate);
    const required = margin.plus(entryFee);

    if (required.greaterThan(this.account.balance)) {
      throw new InsufficientMarginError(
        `Required ${required.toFixed(2)} (margin ${margin.toFixed(2)} + fee ${entryFee.toFixed(4)}) exceeds balance ${this.account.balance.toFixed(2)}`
      );
    }

    const now = this.clock.now();
    const position: Position = {
      id: this.params.nextId('pos'),
      accountName: this.account.name,
      symbol,
      direction: request.direction,
      size,
      entryPrice,
      referencePrice: reference,
      leverage,
      margin,
      entryFee,
      stopLoss,
      takeProfit,
      trailingStopPercent:
        request.trailingStopPercent !== undefined ? dec(request.trailingStopPercent) : undefined,
      highWaterPrice: entryPrice,
      openedAt: now,
      strategyId: request.strategyId,
      status: 'open',
      unrealizedPnl: ZERO,
      markPrice: entryPrice,
      note: request.note,
    };

    this.account = {
      ...this.account,
      balance: this.account.balance.minus(required),
      totalFees: this.account.totalFees.plus(entryFee),
      updatedAt: now,
    };

    this.orders.push({
      id: this.params.nextId('ord'),
      accountName: this.account.name,
      positionId: position.id,
      symbol,
      side,
      type: 'market_open',
      requestedPrice: reference,
      filledPrice: entryPrice,
      size,
      slippageRate: this.params.slippageRate,
      fee: entryFee,
      status: 'filled',
      createdAt: now,
    });

    this.openPositions.set(position.id, position);
    this.touched.set(position.id, position);
    this.opened.push(position);

    logger.info(
      `Opened ${position.direction} ${symbol} size=${size.toString()} @ ${entryPrice.toString()} lev=${leverage}x margin=${margin.toFixed(2)}`
    );
    return position;
  }

  private applyClose(positionId: string, reference: Decimal, reason: CloseReason): Trade {
    if (this.closedPositionIds.has(positionId)) {
      throw new PositionAlreadyClosedError(positionId);
    }
    const position = this.openPositions.get(positionId);
    if (!position) {
      throw new PositionNotFoundError(positionId);
    }
    if (!reference.isFinite() || reference.lessThanOrEqualTo(0)) {
      throw new InvalidOrderError(`Reference price must be positive (got ${reference.toString()})`);
    }

    const side = exitSide(position.direction);
    const exitPrice = fillPrice(reference, side, this.params.slippageRate, this.tickSizeFor(position.symbol));
    const exitFee = fee(exitPrice, position.size, this.account.takerFeeRate);
    const gross = grossPnl(position.direction, position.entryPrice, exitPrice, position.size);
    const fees = position.entryFee.plus(exitFee);
    const net = gross.minus(fees);
    const now = this.clock.now();

    const balance = this.account.balance.plus(position.margin).plus(gross).minus(exitFee);
    const won = net.greaterThan(0);
    this.account = {
      ...this.account,
      balance,
      realizedPnl: this.account.realizedPnl.plus(gross),
      totalFees: this.account.totalFees.plus(exitFee),
      tradeCount: this.account.tradeCount + 1,
      winCount: this.account.winCount + (won ? 1 : 0),
      lossCount: this.account.lossCount + (won ? 0 : 1),
      updatedAt: now,
    };

    this.openPositions.delete(positionId);
    this.closedPositionIds.add(positionId);
    this.updateDrawdown();

    const closed: Position = {
      ...position,
      status: 'closed',
      closedAt: now,
      markPrice: exitPrice,
      unrealizedPnl: ZERO,
    };
    this.touched.set(closed.id, closed);

    this.orders.push({
      id: this.params.nextId('ord'),
      accountName: this.account.name,
      positionId,
      symbol: position.symbol,
      side,
      type: ORDER_TYPE_BY_REASON[reason],
      requestedPrice: reference,
      filledPrice: exitPrice,
      size: position.size,
      slippageRate: this.params.slippageRate,
      fee: exitFee,
      status: 'filled',
      createdAt: now,
    });

    const trade: Trade = {
      id: this.params.nextId('trd'),
      accountName: this.account.name,
      positionId,
      symbol: position.symbol,
      direction: position.direction,
      size: position.size,
      leverage: position.leverage,
      entryPrice: position.entryPrice,
      exitPrice,
      entryFee: position.entryFee,
      exitFee,
      fees,
      grossPnl: gross,
      netPnl: net,
      returnPct: returnOnMargin(net, position.margin),
      openedAt: position.openedAt,
      closedAt: now,
      holdingMs: now.getTime() - position.openedAt.getTime(),
      closeReason: reason,
      strategyId: position.strategyId,
    };
    this.trades.push(trade);

    logger.info(
      `Closed ${position.direction} ${position.symbol} @ ${exitPrice.toString()} reason=${reason} net=${net.toFixed(4)}`
    );
    return trade;
  }

  /** Peak and drawdown are tracked on realized equity: cash plus margin still committed. */
  private updateDrawdown(): void {
    const committed = sum([...this.openPositions.values()].map((p) => p.margin));
    const equity = this.account.balance.plus(committed);
    const peak = equity.greaterThan(this.account.peakEquity) ? equity : this.account.peakEquity;
    const drawdownPct = peak.isZero() ? ZERO : peak.minus(equity).dividedBy(peak).times(100);

    this.account = {
      ...this.account,
      peakEquity: peak,
      maxDrawdownPct: drawdownPct.greaterThan(this.account.maxDrawdownPct) ? drawdownPct : this.account.maxDrawdownPct,
    };
  }

  private resolveSize(request: OpenPositionRequest, reference: Decimal): Decimal {
    const { sizing } = request;
    switch (sizing.kind) {
      case 'units':
        return dec(sizing.size);
      case 'notional':
        return dec(sizing.notional).dividedBy(reference);
      case 'balancePercent':
        if (sizing.percent <= 0 || sizing.percent > 100) {
          throw new InvalidOrderError(`Balance percent must be within (0, 100] (got ${sizing.percent})`);
        }
        return this.account.balance.times(sizing.percent).dividedBy(100).dividedBy(reference);
    }
  }

  private validateExitLevels(isLong: boolean, reference: Decimal, stopLoss?: Decimal, takeProfit?: Decimal): void {
    if (stopLoss && (isLong ? stopLoss.greaterThanOrEqualTo(reference) : stopLoss.lessThanOrEqualTo(reference))) {
      throw new InvalidOrderError(
        `Stop loss ${stopLoss.toString()} must be ${isLong ? 'below' : 'above'} the entry reference ${reference.toString()}`
      );
    }
    if (takeProfit && (isLong ? takeProfit.lessThanOrEqualTo(reference) : takeProfit.greaterThanOrEqualTo(reference))) {
      throw new InvalidOrderError(
        `Take profit ${takeProfit.toString()} must be ${isLong ? 'above' : 'below'} the entry reference ${reference.toString()}`
      );
    }
  }

  private tickSizeFor(symbol: string): Decimal {
    return this.params.tickSizes.get(symbol) ?? this.params.defaultTickSize;
  }

  private requireOpen(positionId: string): Position {
    const position = this.openPositions.get(positionId);
    if (!position) {
      throw this.closedPositionIds.has(positionId)
        ? new PositionAlreadyClosedError(positionId)
        : new PositionNotFoundError(positionId);
    }
    return position;
  }

  private reject(error: unknown, symbol: string): { accepted: false; rejection: Rejection } {
    if (!(error instanceof TradingError)) {
      throw error;
    }
    const rejection: Rejection = { code: error.code, message: error.message, symbol, at: this.clock.now() };
    this.rejections.push(rejection);
    logger.warn(`Ledger rejected ${symbol || 'request'}: [${error.code}] ${error.message}`);
    return { accepted: false, rejection };
  }
}
