import { BaseRepository, numeric, param } from './BaseRepository';
import type { SettlementRepository } from './types';
import type { P2PSettlement } from '../types';

interface SettlementRow {
  id: string;
  offer_id: string;
  creator_id: string;
  acceptor_id: string;
  offering_currency: string;
  offering_amount: string;
  requesting_currency: string;
  requesting_amount: string;
  created_at: Date;
}

export class PgSettlementRepository
  extends BaseRepository<SettlementRow, P2PSettlement>
  implements SettlementRepository
{
  protected readonly tableName = 'p2p_settlements';

  protected toDomain(row: SettlementRow): P2PSettlement {
    return {
      id: row.id,
      offerId: row.offer_id,
      creatorId: row.creator_id,
      acceptorId: row.acceptor_id,
      offeringCurrency: row.offering_currency,
      offeringAmount: numeric(row.offering_amount),
      requestingCurrency: row.requesting_currency,
      requestingAmount: numeric(row.requesting_amount),
      createdAt: row.created_at,
    };
  }

  async append(record: P2PSettlement): Promise<P2PSettlement> {
    const inserted = await this.one(
      `INSERT INTO ${this.tableName} (
        id, offer_id, creator_id, acceptor_id,
        offering_currency, offering_amount, requesting_currency, requesting_amount, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING *`,
      [
        record.id,
        record.offerId,
        record.creatorId,
        record.acceptorId,
        record.offeringCurrency,
        param(record.offeringAmount),
        record.requestingCurrency,
        param(record.requestingAmount),
        record.createdAt,
      ]
    );
    return inserted ?? record;
  }

  async listByAccount(accountId: string, limit: number): Promise<P2PSettlement[]> {
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE creator_id = $1 OR acceptor_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [accountId, limit]
    );
  }
}
