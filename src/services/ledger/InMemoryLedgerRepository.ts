import { Account, Order, Position, Trade } from '../../types/trading';
import { DuplicateOpenPositionError } from '../../utils/errors';
import { LedgerChangeSet, LedgerRepository, cloneAccount, clonePosition } from './LedgerRepository';

interface AccountBook {
  account: Account;
  positions: Map<string, Position>;
  orders: Order[];
  trades: Trade[];
}

/**
 * Process-local ledger store used by backtests and tests. Mirrors the
 * storage constraints of the Postgres schema, including the unique open
 * position per (account, symbol).
 */
export class InMemoryLedgerRepository implements LedgerRepository {
  private books: Map<string, AccountBook> = new Map();

  async loadAccount(accountName: string): Promise<Account | null> {
    const book = this.books.get(accountName);
    return book ? cloneAccount(book.account) : null;
  }

  async loadOpenPositions(accountName: string): Promise<Position[]> {
    const book = this.books.get(accountName);
    if (!book) return [];
    return [...book.positions.values()].filter((p) => p.status === 'open').map(clonePosition);
  }

  async loadTrades(accountName: string, limit?: number): Promise<Trade[]> {
    const trades = this.books.get(accountName)?.trades ?? [];
    return limit === undefined ? [...trades] : trades.slice(-limit);
  }

  async loadOrders(accountName: string, limit?: number): Promise<Order[]> {
    const orders = this.books.get(accountName)?.orders ?? [];
    return limit === undefined ? [...orders] : orders.slice(-limit);
  }

  async commit(changes: LedgerChangeSet): Promise<void> {
    const accountName = changes.account.name;
    const existing = this.books.get(accountName);

    // Stage on a copy so a constraint violation leaves the store untouched
    const positions = new Map(existing?.positions ?? []);
    for (const position of changes.positions) {
      positions.set(position.id, clonePosition(position));
    }

    const openSymbols = new Set<string>();
    for (const position of positions.values()) {
      if (position.status !== 'open') continue;
      if (openSymbols.has(position.symbol)) {
        throw new DuplicateOpenPositionError(accountName, position.symbol);
      }
      openSymbols.add(position.symbol);
    }

    this.books.set(accountName, {
      account: cloneAccount(changes.account),
      positions,
      orders: [...(existing?.orders ?? []), ...changes.orders],
      trades: [...(existing?.trades ?? []), ...changes.trades],
    });
  }

  async resetAccount(account: Account): Promise<void> {
    this.books.set(account.name, {
      account: cloneAccount(account),
      positions: new Map(),
      orders: [],
      trades: [],
    });
  }
}
