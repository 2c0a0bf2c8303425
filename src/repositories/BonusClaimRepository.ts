/**
 * Bonus Claim Repository
 *
 * Day-keyed audit log of credited bonuses. Derived from successful claims;
 * eligibility is decided on accounts.last_bonus_claim alone.
 */

import { BaseRepository, numeric, param } from './BaseRepository';
import type { BonusClaimRepository } from './types';
import type { BonusClaim } from '../types';

interface BonusClaimRow {
  id: string;
  account_id: string;
  claim_day: string;
  amount: string;
  claimed_at: Date;
}

export class PgBonusClaimRepository
  extends BaseRepository<BonusClaimRow, BonusClaim>
  implements BonusClaimRepository
{
  protected readonly tableName = 'bonus_claims';

  protected toDomain(row: BonusClaimRow): BonusClaim {
    return {
      id: row.id,
      accountId: row.account_id,
      claimDay: row.claim_day,
      amount: numeric(row.amount),
      claimedAt: row.claimed_at,
    };
  }

  async record(claim: BonusClaim): Promise<void> {
    await this.query(
      `INSERT INTO ${this.tableName} (id, account_id, claim_day, amount, claimed_at)
       VALUES ($1, $2, $3::date, $4, $5)`,
      [claim.id, claim.accountId, claim.claimDay, param(claim.amount), claim.claimedAt]
    );
  }

  async listByAccount(accountId: string, limit: number): Promise<BonusClaim[]> {
    return this.many(
      `SELECT id, account_id, claim_day::text AS claim_day, amount, claimed_at
       FROM ${this.tableName}
       WHERE account_id = $1
       ORDER BY claimed_at DESC
       LIMIT $2`,
      [accountId, limit]
    );
  }
}
