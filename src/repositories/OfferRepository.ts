/**
 * Trade Offer Repository
 *
 * Status changes are conditional on the current status, so a terminal offer
 * can never be written again even if a caller skips the state check.
 */

import { BaseRepository, numeric, param } from './BaseRepository';
import type { OfferRepository } from './types';
import type { OfferStatus, TradeOffer } from '../types';

interface OfferRow {
  id: string;
  creator_id: string;
  offering_currency: string;
  offering_amount: string;
  requesting_currency: string;
  requesting_amount: string;
  status: OfferStatus;
  accepted_by: string | null;
  created_at: Date;
  updated_at: Date;
}

export class PgOfferRepository extends BaseRepository<OfferRow, TradeOffer> implements OfferRepository {
  protected readonly tableName = 'trade_offers';

  protected toDomain(row: OfferRow): TradeOffer {
    return {
      id: row.id,
      creatorId: row.creator_id,
      offeringCurrency: row.offering_currency,
      offeringAmount: numeric(row.offering_amount),
      requestingCurrency: row.requesting_currency,
      requestingAmount: numeric(row.requesting_amount),
      status: row.status,
      acceptedBy: row.accepted_by,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async insert(offer: TradeOffer): Promise<TradeOffer> {
    const inserted = await this.one(
      `INSERT INTO ${this.tableName} (
        id, creator_id, offering_currency, offering_amount,
        requesting_currency, requesting_amount, status, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING *`,
      [
        offer.id,
        offer.creatorId,
        offer.offeringCurrency,
        param(offer.offeringAmount),
        offer.requestingCurrency,
        param(offer.requestingAmount),
        offer.status,
        offer.createdAt,
        offer.updatedAt,
      ]
    );
    return inserted ?? offer;
  }

  async findById(id: string): Promise<TradeOffer | null> {
    return this.one(`SELECT * FROM ${this.tableName} WHERE id = $1`, [id]);
  }

  async findByIdForUpdate(id: string): Promise<TradeOffer | null> {
    return this.one(`SELECT * FROM ${this.tableName} WHERE id = $1 FOR UPDATE`, [id]);
  }

  async transition(
    id: string,
    from: OfferStatus,
    to: OfferStatus,
    now: Date,
    acceptedBy?: string
  ): Promise<TradeOffer | null> {
    return this.one(
      `UPDATE ${this.tableName}
       SET status = $3, updated_at = $4, accepted_by = COALESCE($5, accepted_by)
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [id, from, to, now, acceptedBy ?? null]
    );
  }

  async listActive(excludeAccountId?: string): Promise<TradeOffer[]> {
    if (excludeAccountId) {
      return this.many(
        `SELECT * FROM ${this.tableName}
         WHERE status = 'active' AND creator_id <> $1
         ORDER BY created_at DESC, id DESC`,
        [excludeAccountId]
      );
    }
    return this.many(
      `SELECT * FROM ${this.tableName} WHERE status = 'active' ORDER BY created_at DESC, id DESC`
    );
  }

  async listByCreator(creatorId: string, status?: OfferStatus): Promise<TradeOffer[]> {
    if (status) {
      return this.many(
        `SELECT * FROM ${this.tableName}
         WHERE creator_id = $1 AND status = $2
         ORDER BY created_at DESC, id DESC`,
        [creatorId, status]
      );
    }
    return this.many(
      `SELECT * FROM ${this.tableName} WHERE creator_id = $1 ORDER BY created_at DESC, id DESC`,
      [creatorId]
    );
  }
}
