// Paper Trading Type Definitions

import type Decimal from 'decimal.js';

export type Direction = 'long' | 'short';
export type OrderSide = 'buy' | 'sell';
export type PositionStatus = 'open' | 'closed';
export type OrderType = 'market_open' | 'market_close' | 'stop_loss' | 'take_profit';

export type CloseReason =
  | 'stop_loss'
  | 'take_profit'
  | 'trailing_stop'
  | 'strategy_signal'
  | 'manual'
  | 'end_of_data'
  | 'shutdown';

export interface Account {
  name: string;
  startingEquity: Decimal;
  balance: Decimal;
  defaultLeverage: number;
  makerFeeRate: Decimal;
  takerFeeRate: Decimal;
  realizedPnl: Decimal;
  totalFees: Decimal;
  tradeCount: number;
  winCount: number;
  lossCount: number;
  peakEquity: Decimal;
  maxDrawdownPct: Decimal;
  createdAt: Date;
  updatedAt: Date;
}

export interface Position {
  id: string;
  accountName: string;
  symbol: string;
  direction: Direction;
  size: Decimal;
  entryPrice: Decimal;
  referencePrice: Decimal;
  leverage: number;
  margin: Decimal;
  entryFee: Decimal;
  stopLoss?: Decimal;
  takeProfit?: Decimal;
  trailingStopPercent?: Decimal;
  highWaterPrice: Decimal;
  openedAt: Date;
  strategyId: string;
  status: PositionStatus;
  unrealizedPnl: Decimal;
  markPrice?: Decimal;
  closedAt?: Date;
  note?: string;
}

export interface Order {
  id: string;
  accountName: string;
  positionId: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  requestedPrice: Decimal;
  filledPrice: Decimal;
  size: Decimal;
  slippageRate: Decimal;
  fee: Decimal;
  status: 'filled';
  createdAt: Date;
}

export interface Trade {
  id: string;
  accountName: string;
  positionId: string;
  symbol: string;
  direction: Direction;
  size: Decimal;
  leverage: number;
  entryPrice: Decimal;
  exitPrice: Decimal;
  entryFee: Decimal;
  exitFee: Decimal;
  fees: Decimal;
  grossPnl: Decimal;
  netPnl: Decimal;
  returnPct: Decimal;
  openedAt: Date;
  closedAt: Date;
  holdingMs: number;
  closeReason: CloseReason;
  strategyId: string;
}

export interface Bar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type BarSeries = readonly Bar[];

// Order requests

export type PositionSizing =
  | { kind: 'units'; size: number }
  | { kind: 'notional'; notional: number }
  | { kind: 'balancePercent'; percent: number };

export interface OpenPositionRequest {
  symbol: string;
  direction: Direction;
  sizing: PositionSizing;
  referencePrice: number;
  leverage?: number;
  stopLoss?: number;
  takeProfit?: number;
  trailingStopPercent?: number;
  strategyId: string;
  note?: string;
}

export interface Rejection {
  code: string;
  message: string;
  symbol: string;
  at: Date;
}

export type LedgerResult<T> = { accepted: true; value: T } | { accepted: false; rejection: Rejection };

/**
 * A risk exit observed for a position. `referencePrice` is the price slippage is applied to.
 */
export interface TriggerHit {
  reason: Extract<CloseReason, 'stop_loss' | 'take_profit' | 'trailing_stop'>;
  referencePrice: Decimal;
}

export type PriceObservation = number | Pick<Bar, 'open' | 'high' | 'low' | 'close'>;

// Summaries

export interface PositionView {
  id: string;
  symbol: string;
  direction: Direction;
  size: Decimal;
  entryPrice: Decimal;
  leverage: number;
  margin: Decimal;
  stopLoss?: Decimal;
  takeProfit?: Decimal;
  markPrice?: Decimal;
  unrealizedPnl: Decimal;
  openedAt: Date;
  strategyId: string;
}

export interface AccountSummary {
  accountName: string;
  startingEquity: Decimal;
  balance: Decimal;
  equity: Decimal;
  realizedPnl: Decimal;
  unrealizedPnl: Decimal;
  totalPnl: Decimal;
  totalFees: Decimal;
  tradeCount: number;
  winCount: number;
  lossCount: number;
  winRate: number;
  peakEquity: Decimal;
  maxDrawdownPct: Decimal;
  openPositions: PositionView[];
  rejections: number;
  generatedAt: Date;
}

// Run lifecycle

export type RunStatus =
  | 'IDLE'
  | 'RUNNING'
  | 'STOPPED_BY_TIME_LIMIT'
  | 'STOPPED_BY_LOSS_LIMIT'
  | 'STOPPED_BY_SIGNAL'
  | 'ERROR';

export type StopReason = 'time_limit' | 'loss_limit' | 'signal' | 'error' | 'end_of_data';

export interface RunSnapshot {
  runId: string;
  accountName: string;
  status: RunStatus;
  symbols: string[];
  strategyId: string;
  startedAt?: Date;
  stoppedAt?: Date;
  stopReason?: StopReason;
  lastError?: string;
  ticks: number;
  tradesClosed: number;
  rejections: number;
  skippedFetches: number;
  summary?: AccountSummary;
}
