/**
 * Transaction Repository
 *
 * Append-only audit trail of executed market orders. UPDATE and DELETE are
 * rejected by a trigger in the schema.
 */

import { BaseRepository, numeric, param } from './BaseRepository';
import type { TransactionRepository } from './types';
import type { OrderSide, Transaction } from '../types';

interface TransactionRow {
  id: string;
  account_id: string;
  pair: string;
  kind: OrderSide;
  amount: string;
  price: string;
  fee: string;
  fee_currency: string;
  total: string;
  created_at: Date;
}

export class PgTransactionRepository
  extends BaseRepository<TransactionRow, Transaction>
  implements TransactionRepository
{
  protected readonly tableName = 'transactions';

  protected toDomain(row: TransactionRow): Transaction {
    return {
      id: row.id,
      accountId: row.account_id,
      pair: row.pair,
      kind: row.kind,
      amount: numeric(row.amount),
      price: numeric(row.price),
      fee: numeric(row.fee),
      feeCurrency: row.fee_currency,
      total: numeric(row.total),
      createdAt: row.created_at,
    };
  }

  async append(record: Transaction): Promise<Transaction> {
    const inserted = await this.one(
      `INSERT INTO ${this.tableName} (
        id, account_id, pair, kind, amount, price, fee, fee_currency, total, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING *`,
      [
        record.id,
        record.accountId,
        record.pair,
        record.kind,
        param(record.amount),
        param(record.price),
        param(record.fee),
        record.feeCurrency,
        param(record.total),
        record.createdAt,
      ]
    );
    return inserted ?? record;
  }

  async listByAccount(
    accountId: string,
    options: { pair?: string; limit: number }
  ): Promise<Transaction[]> {
    if (options.pair) {
      return this.many(
        `SELECT * FROM ${this.tableName}
         WHERE account_id = $1 AND pair = $2
         ORDER BY created_at DESC, id DESC
         LIMIT $3`,
        [accountId, options.pair, options.limit]
      );
    }
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE account_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [accountId, options.limit]
    );
  }
}
