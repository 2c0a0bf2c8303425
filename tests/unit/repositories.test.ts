/**
 * Postgres repository unit tests against a mocked QueryFn.
 */
import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
  PgAccountRepository,
  PgHouseLedgerRepository,
  PgOfferRepository,
  PgTransactionRepository,
  PgWalletRepository,
  orderWalletKeys,
} from '../../src/repositories';
import { createMockQuery } from '../../src/test/mocks/factories';

const NOW = new Date('2024-03-01T12:00:00.000Z');

function walletRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    account_id: 'acc-1',
    currency: 'USDT',
    balance: '9995.00000000',
    locked_balance: '5.00000000',
    updated_at: NOW,
    ...overrides,
  };
}

describe('orderWalletKeys', () => {
  it('sorts by account then currency and drops duplicates', () => {
    expect(
      orderWalletKeys([
        { accountId: 'b', currency: 'USDT' },
        { accountId: 'a', currency: 'USDT' },
        { accountId: 'a', currency: 'BTC' },
        { accountId: 'b', currency: 'USDT' },
      ])
    ).toEqual([
      { accountId: 'a', currency: 'BTC' },
      { accountId: 'a', currency: 'USDT' },
      { accountId: 'b', currency: 'USDT' },
    ]);
  });
});

describe('PgWalletRepository', () => {
  it('maps NUMERIC strings to Decimals', async () => {
    const { query, raw } = createMockQuery([walletRow()]);
    const wallet = await new PgWalletRepository(query).find({ accountId: 'acc-1', currency: 'USDT' });

    expect(wallet?.balance.toFixed()).toBe('9995');
    expect(wallet?.lockedBalance.toFixed()).toBe('5');
    expect(raw.mock.calls[0]?.[1]).toEqual(['acc-1', 'USDT']);
  });

  it('applyDelta sends both deltas as exact decimal strings', async () => {
    const { query, raw } = createMockQuery([walletRow()]);
    await new PgWalletRepository(query).applyDelta(
      { accountId: 'acc-1', currency: 'USDT' },
      { balance: new Decimal('-0.00000001'), locked: new Decimal(0) },
      NOW
    );

    const [sql, params] = raw.mock.calls[0] ?? [];
    expect(sql).toContain('balance + $3::numeric >= 0');
    expect(sql).toContain('locked_balance + $4::numeric >= 0');
    expect(params).toEqual(['acc-1', 'USDT', '-0.00000001', '0', NOW]);
  });

  it('applyDelta returns null when the conditional update matches no row', async () => {
    const { query } = createMockQuery([]);
    const result = await new PgWalletRepository(query).applyDelta(
      { accountId: 'acc-1', currency: 'USDT' },
      { balance: new Decimal('-100000'), locked: new Decimal(0) },
      NOW
    );
    expect(result).toBeNull();
  });

  it('lockRows locks in key order with FOR UPDATE', async () => {
    const { query, raw } = createMockQuery([]);
    await new PgWalletRepository(query).lockRows([
      { accountId: 'acc-2', currency: 'BTC' },
      { accountId: 'acc-1', currency: 'USDT' },
    ]);

    const [sql, params] = raw.mock.calls[0] ?? [];
    expect(sql).toContain('FOR UPDATE OF w');
    expect(params).toEqual([
      ['acc-1', 'acc-2'],
      ['USDT', 'BTC'],
    ]);
  });

  it('lockRows does not query for an empty key set', async () => {
    const { query, raw } = createMockQuery();
    expect(await new PgWalletRepository(query).lockRows([])).toEqual([]);
    expect(raw).not.toHaveBeenCalled();
  });

  it('insertMany passes currencies and balances as parallel arrays', async () => {
    const { query, raw } = createMockQuery([]);
    await new PgWalletRepository(query).insertMany(
      'acc-1',
      [
        { currency: 'BTC', balance: new Decimal(0) },
        { currency: 'USDT', balance: new Decimal(10000) },
      ],
      NOW
    );
    expect(raw.mock.calls[0]?.[1]).toEqual(['acc-1', ['BTC', 'USDT'], ['0', '10000'], NOW]);
  });

  it('totalsByCurrency converts sums', async () => {
    const { query } = createMockQuery([{ currency: 'BTC', balance: '0.3', locked_balance: '0.1' }]);
    const [totals] = await new PgWalletRepository(query).totalsByCurrency();
    expect(totals?.currency).toBe('BTC');
    expect(totals?.balance.toFixed()).toBe('0.3');
    expect(totals?.lockedBalance.toFixed()).toBe('0.1');
  });
});

describe('PgAccountRepository', () => {
  it('claimBonusWindow passes now and the cooldown to the conditional update', async () => {
    const { query, raw } = createMockQuery([]);
    const result = await new PgAccountRepository(query).claimBonusWindow('acc-1', NOW, 86_400_000);

    expect(result).toBeNull();
    const [sql, params] = raw.mock.calls[0] ?? [];
    expect(sql).toContain('last_bonus_claim IS NULL');
    expect(params).toEqual(['acc-1', NOW, 86_400_000]);
  });

  it('insertIfAbsent relies on ON CONFLICT (external_id)', async () => {
    const { query, raw } = createMockQuery([]);
    const result = await new PgAccountRepository(query).insertIfAbsent({
      id: 'acc-1',
      externalId: 'oauth|1',
      displayName: 'Ada',
      now: NOW,
    });
    expect(result).toBeNull();
    expect(raw.mock.calls[0]?.[0]).toContain('ON CONFLICT (external_id) DO NOTHING');
  });
});

describe('PgOfferRepository', () => {
  it('transition is conditional on the current status', async () => {
    const { query, raw } = createMockQuery([]);
    const result = await new PgOfferRepository(query).transition('offer-1', 'active', 'completed', NOW, 'acc-2');
    expect(result).toBeNull();
    expect(raw.mock.calls[0]?.[1]).toEqual(['offer-1', 'active', 'completed', NOW, 'acc-2']);
  });
});

describe('PgTransactionRepository', () => {
  it('filters by pair when one is given', async () => {
    const { query, raw } = createMockQuery([]);
    await new PgTransactionRepository(query).listByAccount('acc-1', { pair: 'BTC/USDT', limit: 5 });
    expect(raw.mock.calls[0]?.[1]).toEqual(['acc-1', 'BTC/USDT', 5]);
  });

  it('omits the pair filter otherwise', async () => {
    const { query, raw } = createMockQuery([]);
    await new PgTransactionRepository(query).listByAccount('acc-1', { limit: 5 });
    expect(raw.mock.calls[0]?.[1]).toEqual(['acc-1', 5]);
  });
});

describe('PgHouseLedgerRepository', () => {
  it('upserts missing delta fields as zero', async () => {
    const { query, raw } = createMockQuery([]);
    await new PgHouseLedgerRepository(query).apply('USDT', { feesCollected: new Decimal('5') });
    expect(raw.mock.calls[0]?.[1]).toEqual(['USDT', '0', '5', '0']);
  });
});
