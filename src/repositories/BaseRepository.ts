/**
 * Base Repository Pattern
 *
 * Postgres repositories are bound to one QueryFn: the pool's autocommit query
 * for reads, or the transaction-scoped query handed out by the store.
 * NUMERIC columns arrive as strings and are converted to Decimals here, so no
 * float ever touches a balance.
 */

import Decimal from 'decimal.js';
import type { QueryFn } from '../db';

export abstract class BaseRepository<TRow, T> {
  protected abstract readonly tableName: string;

  constructor(protected readonly query: QueryFn) {}

  protected abstract toDomain(row: TRow): T;

  protected async one(sql: string, params: unknown[]): Promise<T | null> {
    const result = await this.query<TRow>(sql, params);
    const row = result.rows[0];
    return row ? this.toDomain(row) : null;
  }

  protected async many(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.query<TRow>(sql, params);
    return result.rows.map((row) => this.toDomain(row));
  }
}

export function numeric(value: string | number): Decimal {
  return new Decimal(value);
}

export function param(value: Decimal): string {
  return value.toFixed();
}
