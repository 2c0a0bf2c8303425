/**
 * BonusService
 *
 * Rolling-window bonus. The conditional update of accounts.last_bonus_claim is
 * the only gate; the bonus_claims row is written after the gate passes and is
 * never consulted for eligibility.
 */

import type Decimal from 'decimal.js';
import { ulid } from 'ulidx';
import type { GameConfig } from '../config';
import { AppError, TooEarlyError } from '../lib/errors';
import { positiveAmount } from '../lib/money';
import { idSchema, parseInput } from '../lib/validators';
import { bonusLogger } from '../logger';
import type { Account, BonusClaim, Wallet } from '../types';
import type { LedgerService } from './LedgerService';

export interface BonusClaimResult {
  claim: BonusClaim;
  wallet: Wallet;
}

export interface BonusStatus {
  eligible: boolean;
  lastClaimAt: Date | null;
  nextEligibleAt: Date | null;
  retryAfterMs: number;
  amount: Decimal;
}

export interface BonusServiceDeps {
  ledger: LedgerService;
  game: GameConfig;
  generateId?: () => string;
}

function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class BonusService {
  private readonly ledger: LedgerService;
  private readonly game: GameConfig;
  private readonly generateId: () => string;

  constructor(deps: BonusServiceDeps) {
    this.ledger = deps.ledger;
    this.game = deps.game;
    this.generateId = deps.generateId ?? ulid;
  }

  private get amount(): Decimal {
    return positiveAmount(this.game.bonusAmount, this.ledger.amountScale, 'bonusAmount');
  }

  /** Milliseconds until the account may claim again; 0 when it may claim now. */
  private remainingMs(account: Account, now: Date): number {
    if (!account.lastBonusClaim) return 0;
    const elapsed = now.getTime() - account.lastBonusClaim.getTime();
    return Math.max(0, this.game.bonusCooldownMs - elapsed);
  }

  async claim(accountId: string): Promise<BonusClaimResult> {
    parseInput(idSchema, accountId);
    const amount = this.amount;
    const currency = this.game.baseCurrency;

    const result = await this.ledger.run(async (legs) => {
      const { repos } = legs;
      const gate = await repos.accounts.claimBonusWindow(accountId, legs.now, this.game.bonusCooldownMs);

      if (!gate) {
        const account = await repos.accounts.findById(accountId);
        if (!account) {
          throw AppError.notFound('Account', accountId);
        }
        const retryAfterMs = this.remainingMs(account, legs.now);
        throw new TooEarlyError('Bonus already claimed in the current window', retryAfterMs, {
          accountId,
          nextEligibleAt: new Date(legs.now.getTime() + retryAfterMs).toISOString(),
        });
      }

      await legs.lockWallets([{ accountId, currency }]);
      const wallet = await legs.transfer(accountId, currency, amount);
      await legs.house(currency, { issued: amount });

      const claim: BonusClaim = {
        id: this.generateId(),
        accountId,
        claimDay: utcDay(legs.now),
        amount,
        claimedAt: legs.now,
      };
      await repos.bonusClaims.record(claim);
      return { claim, wallet };
    });

    bonusLogger.info(
      { accountId, amount: amount.toFixed(), currency, claimDay: result.claim.claimDay },
      'Bonus credited'
    );
    return result;
  }

  async status(accountId: string): Promise<BonusStatus> {
    const account = await this.ledger.read.accounts.findById(accountId);
    if (!account) {
      throw AppError.notFound('Account', accountId);
    }
    const now = this.ledger.now();
    const retryAfterMs = this.remainingMs(account, now);
    return {
      eligible: retryAfterMs === 0,
      lastClaimAt: account.lastBonusClaim,
      nextEligibleAt: account.lastBonusClaim
        ? new Date(account.lastBonusClaim.getTime() + this.game.bonusCooldownMs)
        : null,
      retryAfterMs,
      amount: this.amount,
    };
  }

  async history(accountId: string, limit: number = 30): Promise<BonusClaim[]> {
    return this.ledger.read.bonusClaims.listByAccount(accountId, limit);
  }
}
