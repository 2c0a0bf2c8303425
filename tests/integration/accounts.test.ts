/**
 * Account registry: identity resolution and wallet seeding.
 */
import { describe, it, expect } from 'vitest';
import { InvalidOperationError, NotFoundError } from '../../src/lib/errors';
import { HOUR_MS, TEST_START, createTestGame } from '../../src/test/mocks/factories';

describe('createOrGetAccount', () => {
  it('creates an account with one wallet per currency, seeding the base currency', async () => {
    const { game } = createTestGame();

    const { account, created } = await game.createOrGetAccount('oauth|alice', 'Alice');
    expect(created).toBe(true);
    expect(account.externalId).toBe('oauth|alice');
    expect(account.lastBonusClaim).toBeNull();
    expect(account.createdAt).toEqual(TEST_START);

    const wallets = await game.getWallets(account.id);
    expect(wallets.map((w) => [w.currency, w.balance.toFixed(), w.lockedBalance.toFixed()])).toEqual([
      ['BTC', '0', '0'],
      ['ETH', '0', '0'],
      ['USDT', '10000', '0'],
    ]);
  });

  it('returns the existing account and refreshes name and login time', async () => {
    const { game, time } = createTestGame();
    const first = await game.createOrGetAccount('oauth|alice', 'Alice');

    time.advance(HOUR_MS);
    const second = await game.createOrGetAccount('oauth|alice', 'Alice B.');

    expect(second.created).toBe(false);
    expect(second.account.id).toBe(first.account.id);
    expect(second.account.displayName).toBe('Alice B.');
    expect(second.account.lastLoginAt).toEqual(new Date(TEST_START.getTime() + HOUR_MS));
  });

  it('does not seed again for a returning account', async () => {
    const { game } = createTestGame();
    const { account } = await game.createOrGetAccount('oauth|alice', 'Alice');
    await game.createOrGetAccount('oauth|alice', 'Alice');

    const usdt = (await game.getWallets(account.id)).find((w) => w.currency === 'USDT');
    expect(usdt?.balance.toFixed()).toBe('10000');
  });

  it('creates exactly one account under concurrent duplicates', async () => {
    const { game } = createTestGame();

    const results = await Promise.all(
      Array.from({ length: 5 }, () => game.createOrGetAccount('oauth|alice', 'Alice'))
    );

    expect(results.filter((r) => r.created)).toHaveLength(1);
    expect(new Set(results.map((r) => r.account.id)).size).toBe(1);
    expect(await game.ledger.read.accounts.list()).toHaveLength(1);
  });

  it('records the seed as issued in the house ledger', async () => {
    const { game } = createTestGame();
    await game.createOrGetAccount('oauth|alice', 'Alice');
    await game.createOrGetAccount('oauth|bob', 'Bob');

    const [usdt] = await game.ledger.read.house.list();
    expect(usdt?.currency).toBe('USDT');
    expect(usdt?.issued.toFixed()).toBe('20000');
  });

  it('rejects an empty identity', async () => {
    const { game } = createTestGame();
    await expect(game.createOrGetAccount('', 'Nobody')).rejects.toBeInstanceOf(InvalidOperationError);
  });
});

describe('signIn', () => {
  it('resolves the identity the provider supplies', async () => {
    const { game } = createTestGame();
    const provider = { authenticate: async () => ({ externalId: 'oauth|carol', displayName: 'Carol' }) };

    const { account, created } = await game.signIn(provider);
    expect(created).toBe(true);
    expect(account.displayName).toBe('Carol');
  });
});

describe('getWallets', () => {
  it('fails NotFound for an unknown account', async () => {
    const { game } = createTestGame();
    await expect(game.getWallets('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});
