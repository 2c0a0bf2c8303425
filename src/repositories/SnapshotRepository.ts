import { BaseRepository, numeric, param } from './BaseRepository';
import type { PortfolioSnapshotRepository } from './types';
import type { PortfolioSnapshot } from '../types';

interface SnapshotRow {
  id: string;
  account_id: string;
  total_value: string;
  recorded_at: Date;
}

export class PgSnapshotRepository
  extends BaseRepository<SnapshotRow, PortfolioSnapshot>
  implements PortfolioSnapshotRepository
{
  protected readonly tableName = 'portfolio_snapshots';

  protected toDomain(row: SnapshotRow): PortfolioSnapshot {
    return {
      id: row.id,
      accountId: row.account_id,
      totalValue: numeric(row.total_value),
      recordedAt: row.recorded_at,
    };
  }

  async insert(snapshot: PortfolioSnapshot): Promise<PortfolioSnapshot> {
    const inserted = await this.one(
      `INSERT INTO ${this.tableName} (id, account_id, total_value, recorded_at)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [snapshot.id, snapshot.accountId, param(snapshot.totalValue), snapshot.recordedAt]
    );
    return inserted ?? snapshot;
  }

  async listByAccount(accountId: string, limit: number): Promise<PortfolioSnapshot[]> {
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE account_id = $1
       ORDER BY recorded_at DESC
       LIMIT $2`,
      [accountId, limit]
    );
  }
}
