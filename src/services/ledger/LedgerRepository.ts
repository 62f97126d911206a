import { Account, Order, Position, Trade } from '../../types/trading';

/**
 * Everything one engine transaction changed. A repository applies it
 * entirely or not at all.
 */
export interface LedgerChangeSet {
  account: Account;
  /** Positions opened, updated or closed in the transaction, in their final state. */
  positions: Position[];
  orders: Order[];
  trades: Trade[];
}

export interface LedgerRepository {
  loadAccount(accountName: string): Promise<Account | null>;
  loadOpenPositions(accountName: string): Promise<Position[]>;
  /** Chronological; with `limit`, only the most recent `limit` entries. */
  loadTrades(accountName: string, limit?: number): Promise<Trade[]>;
  loadOrders(accountName: string, limit?: number): Promise<Order[]>;
  commit(changes: LedgerChangeSet): Promise<void>;
  /** Drops every position, order and trade of the account and stores the fresh account row. */
  resetAccount(account: Account): Promise<void>;
}

export function clonePosition(position: Position): Position {
  return { ...position };
}

export function cloneAccount(account: Account): Account {
  return { ...account };
}

export function isEmptyChangeSet(changes: LedgerChangeSet): boolean {
  return changes.positions.length === 0 && changes.orders.length === 0 && changes.trades.length === 0;
}
