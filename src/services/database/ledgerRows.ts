import { Account, CloseReason, Direction, Order, OrderSide, OrderType, Position, PositionStatus, Trade } from '../../types/trading';
import { dec } from '../../utils/money';

// PostgREST returns numeric columns as numbers or strings depending on size
type NumericColumn = number | string;

export interface AccountRow {
  name: string;
  starting_equity: NumericColumn;
  balance: NumericColumn;
  default_leverage: number;
  maker_fee_rate: NumericColumn;
  taker_fee_rate: NumericColumn;
  realized_pnl: NumericColumn;
  total_fees: NumericColumn;
  trade_count: number;
  win_count: number;
  loss_count: number;
  peak_equity: NumericColumn;
  max_drawdown_pct: NumericColumn;
  created_at: string;
  updated_at: string;
}

export interface PositionRow {
  id: string;
  account_name: string;
  symbol: string;
  direction: Direction;
  size: NumericColumn;
  entry_price: NumericColumn;
  reference_price: NumericColumn;
  leverage: number;
  margin: NumericColumn;
  entry_fee: NumericColumn;
  stop_loss: NumericColumn | null;
  take_profit: NumericColumn | null;
  trailing_stop_percent: NumericColumn | null;
  high_water_price: NumericColumn;
  opened_at: string;
  closed_at: string | null;
  strategy_id: string;
  status: PositionStatus;
  unrealized_pnl: NumericColumn;
  mark_price: NumericColumn | null;
  note: string | null;
}

export interface OrderRow {
  id: string;
  account_name: string;
  position_id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  requested_price: NumericColumn;
  filled_price: NumericColumn;
  size: NumericColumn;
  slippage_rate: NumericColumn;
  fee: NumericColumn;
  status: 'filled';
  created_at: string;
}

export interface TradeRow {
  id: string;
  account_name: string;
  position_id: string;
  symbol: string;
  direction: Direction;
  size: NumericColumn;
  leverage: number;
  entry_price: NumericColumn;
  exit_price: NumericColumn;
  entry_fee: NumericColumn;
  exit_fee: NumericColumn;
  fees: NumericColumn;
  gross_pnl: NumericColumn;
  net_pnl: NumericColumn;
  return_pct: NumericColumn;
  opened_at: string;
  closed_at: string;
  holding_ms: number;
  close_reason: CloseReason;
  strategy_id: string;
}

const optional = (value: NumericColumn | null) => (value === null ? undefined : dec(value));

// Accounts

export function toAccountRow(account: Account): AccountRow {
  return {
    name: account.name,
    starting_equity: account.startingEquity.toString(),
    balance: account.balance.toString(),
    default_leverage: account.defaultLeverage,
    maker_fee_rate: account.makerFeeRate.toString(),
    taker_fee_rate: account.takerFeeRate.toString(),
    realized_pnl: account.realizedPnl.toString(),
    total_fees: account.totalFees.toString(),
    trade_count: account.tradeCount,
    win_count: account.winCount,
    loss_count: account.lossCount,
    peak_equity: account.peakEquity.toString(),
    max_drawdown_pct: account.maxDrawdownPct.toString(),
    created_at: account.createdAt.toISOString(),
    updated_at: account.updatedAt.toISOString(),
  };
}

export function fromAccountRow(row: AccountRow): Account {
  return {
    name: row.name,
    startingEquity: dec(row.starting_equity),
    balance: dec(row.balance),
    defaultLeverage: row.default_leverage,
    makerFeeRate: dec(row.maker_fee_rate),
    takerFeeRate: dec(row.taker_fee_rate),
    realizedPnl: dec(row.realized_pnl),
    totalFees: dec(row.total_fees),
    tradeCount: row.trade_count,
    winCount: row.win_count,
    lossCount: row.loss_count,
    peakEquity: dec(row.peak_equity),
    maxDrawdownPct: dec(row.max_drawdown_pct),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

// Positions

export function toPositionRow(position: Position): PositionRow {
  return {
    id: position.id,
    account_name: position.accountName,
    symbol: position.symbol,
    direction: position.direction,
    size: position.size.toString(),
    entry_price: position.entryPrice.toString(),
    reference_price: position.referencePrice.toString(),
    leverage: position.leverage,
    margin: position.margin.toString(),
    entry_fee: position.entryFee.toString(),
    stop_loss: position.stopLoss?.toString() ?? null,
    take_profit: position.takeProfit?.toString() ?? null,
    trailing_stop_percent: position.trailingStopPercent?.toString() ?? null,
    high_water_price: position.highWaterPrice.toString(),
    opened_at: position.openedAt.toISOString(),
    closed_at: position.closedAt?.toISOString() ?? null,
    strategy_id: position.strategyId,
    status: position.status,
    unrealized_pnl: position.unrealizedPnl.toString(),
    mark_price: position.markPrice?.toString() ?? null,
    note: position.note ?? null,
  };
}

export function fromPositionRow(row: PositionRow): Position {
  return {
    id: row.id,
    accountName: row.account_name,
    symbol: row.symbol,
    direction: row.direction,
    size: dec(row.size),
    entryPrice: dec(row.entry_price),
    referencePrice: dec(row.reference_price),
    leverage: row.leverage,
    margin: dec(row.margin),
    entryFee: dec(row.entry_fee),
    stopLoss: optional(row.stop_loss),
    takeProfit: optional(row.take_profit),
    trailingStopPercent: optional(row.trailing_stop_percent),
    highWaterPrice: dec(row.high_water_price),
    openedAt: new Date(row.opened_at),
    closedAt: row.closed_at ? new Date(row.closed_at) : undefined,
    strategyId: row.strategy_id,
    status: row.status,
    unrealizedPnl: dec(row.unrealized_pnl),
    markPrice: optional(row.mark_price),
    note: row.note ?? undefined,
  };
}

// Orders

export function toOrderRow(order: Order): OrderRow {
  return {
    id: order.id,
    account_name: order.accountName,
    position_id: order.positionId,
    symbol: order.symbol,
    side: order.side,
    type: order.type,
    requested_price: order.requestedPrice.toString(),
    filled_price: order.filledPrice.toString(),
    size: order.size.toString(),
    slippage_rate: order.slippageRate.toString(),
    fee: order.fee.toString(),
    status: order.status,
    created_at: order.createdAt.toISOString(),
  };
}

export function fromOrderRow(row: OrderRow): Order {
  return {
    id: row.id,
    accountName: row.account_name,
    positionId: row.position_id,
    symbol: row.symbol,
    side: row.side,
    type: row.type,
    requestedPrice: dec(row.requested_price),
    filledPrice: dec(row.filled_price),
    size: dec(row.size),
    slippageRate: dec(row.slippage_rate),
    fee: dec(row.fee),
    status: row.status,
    createdAt: new Date(row.created_at),
  };
}

// Trades

export function toTradeRow(trade: Trade): TradeRow {
  return {
    id: trade.id,
    account_name: trade.accountName,
    position_id: trade.positionId,
    symbol: trade.symbol,
    direction: trade.direction,
    size: trade.size.toString(),
    leverage: trade.leverage,
    entry_price: trade.entryPrice.toString(),
    exit_price: trade.exitPrice.toString(),
    entry_fee: trade.entryFee.toString(),
    exit_fee: trade.exitFee.toString(),
    fees: trade.fees.toString(),
    gross_pnl: trade.grossPnl.toString(),
    net_pnl: trade.netPnl.toString(),
    return_pct: trade.returnPct.toString(),
    opened_at: trade.openedAt.toISOString(),
    closed_at: trade.closedAt.toISOString(),
    holding_ms: trade.holdingMs,
    close_reason: trade.closeReason,
    strategy_id: trade.strategyId,
  };
}

export function fromTradeRow(row: TradeRow): Trade {
  return {
    id: row.id,
    accountName: row.account_name,
    positionId: row.position_id,
    symbol: row.symbol,
    direction: row.direction,
    size: dec(row.size),
    leverage: row.leverage,
    entryPrice: dec(row.entry_price),
    exitPrice: dec(row.exit_price),
    entryFee: dec(row.entry_fee),
    exitFee: dec(row.exit_fee),
    fees: dec(row.fees),
    grossPnl: dec(row.gross_pnl),
    netPnl: dec(row.net_pnl),
    returnPct: dec(row.return_pct),
    openedAt: new Date(row.opened_at),
    closedAt: new Date(row.closed_at),
    holdingMs: row.holding_ms,
    closeReason: row.close_reason,
    strategyId: row.strategy_id,
  };
}
