/**
 * PgLedgerStore error translation and serialization retries, against a fake
 * Database.
 */
import { describe, it, expect, vi } from 'vitest';
import type { Database } from '../../src/db';
import { withRetry } from '../../src/lib/db/retry';
import {
  InsufficientFundsError,
  InvariantViolationError,
  StorageUnavailableError,
} from '../../src/lib/errors';
import { PgLedgerStore } from '../../src/repositories';
import { createMockQuery } from '../../src/test/mocks/factories';

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function createFakeDatabase(failures: unknown[]) {
  let attempts = 0;
  const { query, raw } = createMockQuery();
  const db: Database = {
    query,
    async serializableTransaction(fn) {
      attempts += 1;
      const failure = failures.shift();
      if (failure !== undefined) throw failure;
      return fn(query);
    },
    healthCheck: async () => ({ connected: true, latencyMs: 0 }),
    close: async () => undefined,
  };
  return { db, raw, attempts: () => attempts };
}

describe('PgLedgerStore.transaction', () => {
  it('re-runs the whole transaction after a serialization failure', async () => {
    const { db, attempts } = createFakeDatabase([pgError('40001', 'could not serialize access')]);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    await expect(store.transaction(async () => 'committed')).resolves.toBe('committed');
    expect(attempts()).toBe(2);
  });

  it('retries deadlocks too', async () => {
    const { db, attempts } = createFakeDatabase([pgError('40P01', 'deadlock detected')]);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    await store.transaction(async () => undefined);
    expect(attempts()).toBe(2);
  });

  it('fails StorageUnavailable once retries are exhausted', async () => {
    const { db, attempts } = createFakeDatabase([
      pgError('40001', 'could not serialize access'),
      pgError('40001', 'could not serialize access'),
    ]);
    const store = new PgLedgerStore(db, { serializationRetries: 1 });

    await expect(store.transaction(async () => 'never')).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(attempts()).toBe(2);
  });

  it('maps a connection failure to StorageUnavailable without retrying', async () => {
    const { db, attempts } = createFakeDatabase([pgError('ECONNRESET', 'socket hang up')]);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    await expect(store.transaction(async () => 'never')).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(attempts()).toBe(1);
  });

  it('surfaces a CHECK violation as InvariantViolation', async () => {
    const { db } = createFakeDatabase([
      Object.assign(pgError('23514', 'new row violates check constraint'), { constraint: 'wallets_non_negative' }),
    ]);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    const error = await store.transaction(async () => 'never').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvariantViolationError);
    if (error instanceof InvariantViolationError) {
      expect(error.details).toEqual({ constraint: 'wallets_non_negative', table: undefined });
    }
  });

  it('passes domain errors through untouched', async () => {
    const { db, attempts } = createFakeDatabase([]);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });
    const domainError = new InsufficientFundsError('short');

    await expect(
      store.transaction(async () => {
        throw domainError;
      })
    ).rejects.toBe(domainError);
    expect(attempts()).toBe(1);
  });
});

describe('PgLedgerStore.read', () => {
  it('maps a connection failure to StorageUnavailable', async () => {
    const { db, raw } = createFakeDatabase([]);
    raw.mockRejectedValueOnce(pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432'));
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    await expect(store.read.wallets.findByAccount('acc-1')).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('passes other driver errors through', async () => {
    const { db, raw } = createFakeDatabase([]);
    const syntax = pgError('42601', 'syntax error at or near "FROM"');
    raw.mockRejectedValueOnce(syntax);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    await expect(store.read.offers.findById('offer-1')).rejects.toBe(syntax);
  });

  it('returns rows when the query succeeds', async () => {
    const { db } = createFakeDatabase([]);
    const store = new PgLedgerStore(db, { serializationRetries: 3 });

    await expect(store.read.wallets.findByAccount('acc-1')).resolves.toEqual([]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('transient'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { maxRetries: 2, baseDelay: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors the predicate rejects', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('permanent'));

    await expect(withRetry(fn, { maxRetries: 5, baseDelay: 0, shouldRetry: () => false })).rejects.toThrow(
      'permanent'
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last error after maxRetries + 1 attempts', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('still failing'));

    await expect(withRetry(fn, { maxRetries: 2, baseDelay: 0 })).rejects.toThrow('still failing');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
