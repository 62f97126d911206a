import { SupabaseClient, createClient } from '@supabase/supabase-js';
import logger from '../../utils/logger';
import { DuplicateOpenPositionError } from '../../utils/errors';
import { Account, Order, Position, Trade } from '../../types/trading';
import { LedgerChangeSet, LedgerRepository } from '../ledger/LedgerRepository';
import {
  AccountRow,
  OrderRow,
  PositionRow,
  TradeRow,
  fromAccountRow,
  fromOrderRow,
  fromPositionRow,
  fromTradeRow,
  toAccountRow,
  toOrderRow,
  toPositionRow,
  toTradeRow,
} from './ledgerRows';

const UNIQUE_VIOLATION = '23505';

export interface SupabaseConnection {
  url: string;
  serviceKey: string;
}

/**
 * Ledger storage in Postgres. Reads go through the table API; every commit is a
 * single `apply_ledger_changes` call, so a change set lands in one database
 * transaction or not at all.
 */
export class SupabaseLedgerRepository implements LedgerRepository {
  private supabase: SupabaseClient;

  constructor(connection: SupabaseConnection) {
    this.supabase = createClient(connection.url, connection.serviceKey, {
      auth: { persistSession: false },
    });
  }

  async loadAccount(accountName: string): Promise<Account | null> {
    try {
      const { data, error } = await this.supabase
        .from('paper_accounts')
        .select('*')
        .eq('name', accountName)
        .maybeSingle();

      if (error) throw error;
      if (!data) return null;
      const row: AccountRow = data;
      return fromAccountRow(row);
    } catch (error) {
      logger.error('Failed to load paper account:', error);
      throw error;
    }
  }

  async loadOpenPositions(accountName: string): Promise<Position[]> {
    try {
      const { data, error } = await this.supabase
        .from('paper_positions')
        .select('*')
        .eq('account_name', accountName)
        .eq('status', 'open')
        .order('opened_at', { ascending: true });

      if (error) throw error;
      const rows: PositionRow[] = data ?? [];
      return rows.map(fromPositionRow);
    } catch (error) {
      logger.error('Failed to load open positions:', error);
      throw error;
    }
  }

  async loadTrades(accountName: string, limit?: number): Promise<Trade[]> {
    try {
      let query = this.supabase
        .from('paper_trades')
        .select('*')
        .eq('account_name', accountName)
        .order('closed_at', { ascending: false });

      if (limit !== undefined) {
        query = query.limit(limit);
      }

      const { data, error } = await query;
      if (error) throw error;
      const rows: TradeRow[] = data ?? [];
      return rows.map(fromTradeRow).reverse();
    } catch (error) {
      logger.error('Failed to load trades:', error);
      throw error;
    }
  }

  async loadOrders(accountName: string, limit?: number): Promise<Order[]> {
    try {
      let query = this.supabase
        .from('paper_orders')
        .select('*')
        .eq('account_name', accountName)
        .order('created_at', { ascending: false });

      if (limit !== undefined) {
        query = query.limit(limit);
      }

      const { data, error } = await query;
      if (error) throw error;
      const rows: OrderRow[] = data ?? [];
      return rows.map(fromOrderRow).reverse();
    } catch (error) {
      logger.error('Failed to load orders:', error);
      throw error;
    }
  }

  async commit(changes: LedgerChangeSet): Promise<void> {
    const payload = {
      account: toAccountRow(changes.account),
      positions: changes.positions.map(toPositionRow),
      orders: changes.orders.map(toOrderRow),
      trades: changes.trades.map(toTradeRow),
    };

    const { error } = await this.supabase.rpc('apply_ledger_changes', { changes: payload });
    if (!error) return;

    if (error.code === UNIQUE_VIOLATION) {
      const symbols = changes.positions.filter((p) => p.status === 'open').map((p) => p.symbol);
      logger.warn(`Open position constraint rejected commit for ${changes.account.name}: ${error.message}`);
      throw new DuplicateOpenPositionError(changes.account.name, symbols.join(', '));
    }

    logger.error('Failed to commit ledger changes:', error);
    throw new Error(`Ledger commit failed: ${error.message}`);
  }

  async resetAccount(account: Account): Promise<void> {
    const { error } = await this.supabase.rpc('reset_paper_account', { account: toAccountRow(account) });
    if (error) {
      logger.error('Failed to reset paper account:', error);
      throw new Error(`Account reset failed: ${error.message}`);
    }
  }
}
