/**
 * Postgres-backed LedgerStore.
 *
 * Each store transaction is one SERIALIZABLE database transaction. Conflicts
 * (40001/40P01) roll back completely and are re-run; connection failures and
 * exhausted retries surface as StorageUnavailableError, for lock-free reads
 * as well as transactions.
 */

import {
  isCheckViolation,
  isSerializationFailure,
  isTransientDbError,
  type Database,
  type QueryFn,
} from '../db';
import { withRetry } from '../lib/db/retry';
import { AppError, InvariantViolationError, StorageUnavailableError } from '../lib/errors';
import { dbLogger } from '../logger';
import { PgAccountRepository } from './AccountRepository';
import { PgBonusClaimRepository } from './BonusClaimRepository';
import { PgHouseLedgerRepository } from './HouseLedgerRepository';
import { PgOfferRepository } from './OfferRepository';
import { PgSettlementRepository } from './SettlementRepository';
import { PgSnapshotRepository } from './SnapshotRepository';
import { PgTransactionRepository } from './TransactionRepository';
import { PgWalletRepository } from './WalletRepository';
import type { LedgerRepositories, LedgerStore } from './types';

export function createPgRepositories(query: QueryFn): LedgerRepositories {
  return {
    accounts: new PgAccountRepository(query),
    wallets: new PgWalletRepository(query),
    transactions: new PgTransactionRepository(query),
    offers: new PgOfferRepository(query),
    settlements: new PgSettlementRepository(query),
    bonusClaims: new PgBonusClaimRepository(query),
    house: new PgHouseLedgerRepository(query),
    snapshots: new PgSnapshotRepository(query),
  };
}

function translateStorageError(error: unknown): unknown {
  if (error instanceof AppError) return error;

  if (isCheckViolation(error)) {
    const violation = new InvariantViolationError('Ledger constraint rejected a write', {
      constraint: error.constraint,
      table: error.table,
    });
    dbLogger.fatal({ err: error, constraint: error.constraint }, 'Ledger CHECK constraint violated');
    return violation;
  }

  if (isSerializationFailure(error) || isTransientDbError(error)) {
    return new StorageUnavailableError('Storage temporarily unavailable, safe to retry', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return error;
}

/** Autocommit reads fail the same way transactions do. */
function translatingQuery(query: QueryFn): QueryFn {
  return async <T = Record<string, unknown>>(sql: string, params?: unknown[]) => {
    try {
      return await query<T>(sql, params);
    } catch (error) {
      throw translateStorageError(error);
    }
  };
}

export class PgLedgerStore implements LedgerStore {
  readonly read: LedgerRepositories;

  constructor(
    private readonly db: Database,
    private readonly options: { serializationRetries: number } = { serializationRetries: 3 }
  ) {
    this.read = createPgRepositories(translatingQuery(db.query));
  }

  async transaction<T>(fn: (repos: LedgerRepositories) => Promise<T>): Promise<T> {
    try {
      return await withRetry(
        () => this.db.serializableTransaction((query) => fn(createPgRepositories(query))),
        {
          maxRetries: this.options.serializationRetries,
          shouldRetry: isSerializationFailure,
        }
      );
    } catch (error) {
      throw translateStorageError(error);
    }
  }
}
