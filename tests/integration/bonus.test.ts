/**
 * Rolling-window bonus claims.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { TradingGame } from '../../src/game';
import { NotFoundError, TooEarlyError } from '../../src/lib/errors';
import { HOUR_MS, TEST_START, createTestGame } from '../../src/test/mocks/factories';

let game: TradingGame;
let time: ReturnType<typeof createTestGame>['time'];
let store: ReturnType<typeof createTestGame>['store'];
let accountId: string;

async function usdt(): Promise<string> {
  const wallet = (await game.getWallets(accountId)).find((w) => w.currency === 'USDT');
  return wallet?.balance.toFixed() ?? 'missing';
}

beforeEach(async () => {
  ({ game, time, store } = createTestGame());
  accountId = (await game.createOrGetAccount('oauth|alice', 'Alice')).account.id;
});

describe('claimBonus', () => {
  it('credits the bonus on the first claim', async () => {
    const { claim, wallet } = await game.claimBonus(accountId);

    expect(wallet.balance.toFixed()).toBe('10050');
    expect(claim.amount.toFixed()).toBe('50');
    expect(claim.claimDay).toBe('2024-03-01');
    expect(claim.claimedAt).toEqual(TEST_START);
    expect(await usdt()).toBe('10050');
  });

  it('refuses a second claim inside the window and says when to retry', async () => {
    await game.claimBonus(accountId);
    time.advance(HOUR_MS);

    const error = await game.claimBonus(accountId).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TooEarlyError);
    expect(error instanceof TooEarlyError && error.retryAfterMs).toBe(23 * HOUR_MS);
    expect(error instanceof TooEarlyError && error.details?.nextEligibleAt).toBe('2024-03-02T12:00:00.000Z');
    expect(await usdt()).toBe('10050');
  });

  it('allows a claim once the full window has elapsed', async () => {
    await game.claimBonus(accountId);
    time.advance(24 * HOUR_MS);

    const { claim } = await game.claimBonus(accountId);

    expect(claim.claimDay).toBe('2024-03-02');
    expect(await usdt()).toBe('10100');
    expect((await game.bonus.history(accountId)).map((c) => c.claimDay)).toEqual(['2024-03-02', '2024-03-01']);
  });

  it('issues the bonus through the house ledger', async () => {
    await game.claimBonus(accountId);

    const report = await game.verifyLedger();
    const base = report.currencies.find((c) => c.currency === 'USDT');
    expect(base?.issued.toFixed()).toBe('10050');
    expect(base?.difference.isZero()).toBe(true);
  });

  it('fails NotFound for an unknown account', async () => {
    await expect(game.claimBonus('no-such-account')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('grants exactly one of several simultaneous claims', async () => {
    const results = await Promise.allSettled(Array.from({ length: 5 }, () => game.claimBonus(accountId)));

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    for (const result of results) {
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(TooEarlyError);
      }
    }
    expect(await usdt()).toBe('10050');
    expect(store.stats.rolledBack).toBe(4);
  });
});

describe('bonusStatus', () => {
  it('is eligible before any claim', async () => {
    const status = await game.bonusStatus(accountId);

    expect(status).toMatchObject({ eligible: true, lastClaimAt: null, nextEligibleAt: null, retryAfterMs: 0 });
    expect(status.amount.toFixed()).toBe('50');
  });

  it('reports the remaining wait after a claim', async () => {
    await game.claimBonus(accountId);
    time.advance(10 * HOUR_MS);

    const status = await game.bonusStatus(accountId);

    expect(status.eligible).toBe(false);
    expect(status.lastClaimAt).toEqual(TEST_START);
    expect(status.nextEligibleAt).toEqual(new Date('2024-03-02T12:00:00.000Z'));
    expect(status.retryAfterMs).toBe(14 * HOUR_MS);
  });
});
