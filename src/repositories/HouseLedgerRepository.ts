/**
 * House Ledger Repository
 *
 * One row per currency. Fees land in fees_collected, value exchanged with the
 * simulated market in market_position, and seeds/bonuses in issued.
 */

import { ZERO } from '../lib/money';
import { BaseRepository, numeric, param } from './BaseRepository';
import type { HouseLedgerRepository } from './types';
import type { HouseDelta, HouseEntry } from '../types';

interface HouseRow {
  currency: string;
  issued: string;
  fees_collected: string;
  market_position: string;
}

export class PgHouseLedgerRepository
  extends BaseRepository<HouseRow, HouseEntry>
  implements HouseLedgerRepository
{
  protected readonly tableName = 'house_ledger';

  protected toDomain(row: HouseRow): HouseEntry {
    return {
      currency: row.currency,
      issued: numeric(row.issued),
      feesCollected: numeric(row.fees_collected),
      marketPosition: numeric(row.market_position),
    };
  }

  async apply(currency: string, delta: HouseDelta): Promise<void> {
    await this.query(
      `INSERT INTO ${this.tableName} (currency, issued, fees_collected, market_position)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (currency) DO UPDATE SET
         issued = ${this.tableName}.issued + EXCLUDED.issued,
         fees_collected = ${this.tableName}.fees_collected + EXCLUDED.fees_collected,
         market_position = ${this.tableName}.market_position + EXCLUDED.market_position`,
      [
        currency,
        param(delta.issued ?? ZERO),
        param(delta.feesCollected ?? ZERO),
        param(delta.marketPosition ?? ZERO),
      ]
    );
  }

  async list(): Promise<HouseEntry[]> {
    return this.many(`SELECT * FROM ${this.tableName} ORDER BY currency`);
  }
}
