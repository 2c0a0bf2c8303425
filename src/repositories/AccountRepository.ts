/**
 * Account Repository
 *
 * external_id carries a UNIQUE constraint; insertIfAbsent relies on it instead
 * of a check-then-insert.
 */

import { BaseRepository } from './BaseRepository';
import type { AccountRepository } from './types';
import type { Account } from '../types';

interface AccountRow {
  id: string;
  external_id: string;
  display_name: string;
  created_at: Date;
  last_login_at: Date;
  last_bonus_claim: Date | null;
}

export class PgAccountRepository extends BaseRepository<AccountRow, Account> implements AccountRepository {
  protected readonly tableName = 'accounts';

  protected toDomain(row: AccountRow): Account {
    return {
      id: row.id,
      externalId: row.external_id,
      displayName: row.display_name,
      createdAt: row.created_at,
      lastLoginAt: row.last_login_at,
      lastBonusClaim: row.last_bonus_claim,
    };
  }

  async insertIfAbsent(data: {
    id: string;
    externalId: string;
    displayName: string;
    now: Date;
  }): Promise<Account | null> {
    return this.one(
      `INSERT INTO ${this.tableName} (id, external_id, display_name, created_at, last_login_at)
       VALUES ($1, $2, $3, $4, $4)
       ON CONFLICT (external_id) DO NOTHING
       RETURNING *`,
      [data.id, data.externalId, data.displayName, data.now]
    );
  }

  async findById(id: string): Promise<Account | null> {
    return this.one(`SELECT * FROM ${this.tableName} WHERE id = $1`, [id]);
  }

  async findByExternalId(externalId: string): Promise<Account | null> {
    return this.one(`SELECT * FROM ${this.tableName} WHERE external_id = $1`, [externalId]);
  }

  async touchLogin(id: string, displayName: string, now: Date): Promise<Account | null> {
    return this.one(
      `UPDATE ${this.tableName} SET display_name = $2, last_login_at = $3 WHERE id = $1 RETURNING *`,
      [id, displayName, now]
    );
  }

  async claimBonusWindow(id: string, now: Date, cooldownMs: number): Promise<Account | null> {
    return this.one(
      `UPDATE ${this.tableName}
       SET last_bonus_claim = $2
       WHERE id = $1
         AND (last_bonus_claim IS NULL
              OR last_bonus_claim <= $2::timestamptz - ($3::double precision * interval '1 millisecond'))
       RETURNING *`,
      [id, now, cooldownMs]
    );
  }

  async list(): Promise<Account[]> {
    return this.many(`SELECT * FROM ${this.tableName} ORDER BY id`);
  }
}
