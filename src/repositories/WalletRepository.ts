/**
 * Wallet Repository
 *
 * The only writer of wallet rows. applyDelta is a single conditional UPDATE:
 * the non-negativity check and the write happen under the same row lock, so
 * two concurrent debits cannot both pass against a stale balance.
 */

import { BaseRepository, numeric, param } from './BaseRepository';
import type { WalletRepository } from './types';
import type { CurrencyTotals, Wallet, WalletDelta, WalletKey } from '../types';
import type Decimal from 'decimal.js';

interface WalletRow {
  account_id: string;
  currency: string;
  balance: string;
  locked_balance: string;
  updated_at: Date;
}

function compareKeys(a: WalletKey, b: WalletKey): number {
  if (a.accountId !== b.accountId) return a.accountId < b.accountId ? -1 : 1;
  if (a.currency !== b.currency) return a.currency < b.currency ? -1 : 1;
  return 0;
}

/**
 * Deduplicate and order keys so every multi-row lock is taken in the same order.
 */
export function orderWalletKeys(keys: WalletKey[]): WalletKey[] {
  const unique = new Map<string, WalletKey>();
  for (const key of keys) unique.set(`${key.accountId}:${key.currency}`, key);
  return [...unique.values()].sort(compareKeys);
}

export class PgWalletRepository extends BaseRepository<WalletRow, Wallet> implements WalletRepository {
  protected readonly tableName = 'wallets';

  protected toDomain(row: WalletRow): Wallet {
    return {
      accountId: row.account_id,
      currency: row.currency,
      balance: numeric(row.balance),
      lockedBalance: numeric(row.locked_balance),
      updatedAt: row.updated_at,
    };
  }

  async insertMany(
    accountId: string,
    rows: { currency: string; balance: Decimal }[],
    now: Date
  ): Promise<void> {
    if (rows.length === 0) return;
    await this.query(
      `INSERT INTO ${this.tableName} (account_id, currency, balance, locked_balance, updated_at)
       SELECT $1, c.currency, c.balance, 0, $4
       FROM unnest($2::text[], $3::numeric[]) AS c(currency, balance)`,
      [accountId, rows.map((r) => r.currency), rows.map((r) => param(r.balance)), now]
    );
  }

  async find(key: WalletKey): Promise<Wallet | null> {
    return this.one(
      `SELECT * FROM ${this.tableName} WHERE account_id = $1 AND currency = $2`,
      [key.accountId, key.currency]
    );
  }

  async findByAccount(accountId: string): Promise<Wallet[]> {
    return this.many(
      `SELECT * FROM ${this.tableName} WHERE account_id = $1 ORDER BY currency`,
      [accountId]
    );
  }

  async lockRows(keys: WalletKey[]): Promise<Wallet[]> {
    const ordered = orderWalletKeys(keys);
    if (ordered.length === 0) return [];
    return this.many(
      `SELECT w.* FROM ${this.tableName} w
       JOIN unnest($1::text[], $2::text[]) AS k(account_id, currency)
         ON w.account_id = k.account_id AND w.currency = k.currency
       ORDER BY w.account_id, w.currency
       FOR UPDATE OF w`,
      [ordered.map((k) => k.accountId), ordered.map((k) => k.currency)]
    );
  }

  async applyDelta(key: WalletKey, delta: WalletDelta, now: Date): Promise<Wallet | null> {
    return this.one(
      `UPDATE ${this.tableName}
       SET balance = balance + $3::numeric,
           locked_balance = locked_balance + $4::numeric,
           updated_at = $5
       WHERE account_id = $1 AND currency = $2
         AND balance + $3::numeric >= 0
         AND locked_balance + $4::numeric >= 0
       RETURNING *`,
      [key.accountId, key.currency, param(delta.balance), param(delta.locked), now]
    );
  }

  async listAll(): Promise<Wallet[]> {
    return this.many(`SELECT * FROM ${this.tableName} ORDER BY account_id, currency`);
  }

  async listByCurrency(currency: string, limit: number): Promise<Wallet[]> {
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE currency = $1 AND balance > 0
       ORDER BY balance DESC, account_id ASC
       LIMIT $2`,
      [currency, limit]
    );
  }

  async totalsByCurrency(): Promise<CurrencyTotals[]> {
    const result = await this.query<{ currency: string; balance: string; locked_balance: string }>(
      `SELECT currency,
              COALESCE(SUM(balance), 0)::text AS balance,
              COALESCE(SUM(locked_balance), 0)::text AS locked_balance
       FROM ${this.tableName}
       GROUP BY currency
       ORDER BY currency`
    );
    return result.rows.map((row) => ({
      currency: row.currency,
      balance: numeric(row.balance),
      lockedBalance: numeric(row.locked_balance),
    }));
  }
}
