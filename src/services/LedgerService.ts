/**
 * LEDGER SERVICE
 *
 * Balance primitives over wallet rows. Every primitive is one conditional
 * write: it applies completely or not at all, and a refusal is classified into
 * the domain error that caused it.
 *
 * Primitives are only reachable through `LedgerLegs`, which is bound to an
 * open store transaction. A balance therefore never changes without the order,
 * offer or bonus record written in that same transaction.
 */

import {
  AppError,
  InvalidOperationError,
  InvariantViolationError,
} from '../lib/errors';
import { ZERO, positiveAmount, toDecimal, type AmountInput } from '../lib/money';
import { ledgerLogger } from '../logger';
import type { LedgerRepositories, LedgerStore } from '../repositories/types';
import type { LedgerConfig } from '../config';
import type { Clock, HouseDelta, Wallet, WalletDelta, WalletKey } from '../types';

type LegOperation = 'transfer' | 'lock' | 'unlock' | 'consumeLocked';

export class LedgerLegs {
  constructor(
    readonly repos: LedgerRepositories,
    readonly now: Date,
    private readonly scale: number
  ) {}

  /**
   * Row-lock every wallet the operation will touch, in key order. Fails if
   * any of them does not exist (unsupported currency).
   */
  async lockWallets(keys: WalletKey[]): Promise<Map<string, Wallet>> {
    const locked = await this.repos.wallets.lockRows(keys);
    const byKey = new Map(locked.map((w): [string, Wallet] => [walletKeyOf(w), w]));
    for (const key of keys) {
      if (!byKey.has(walletKeyOf(key))) {
        throw new InvalidOperationError(`Unsupported currency ${key.currency}`, {
          accountId: key.accountId,
          currency: key.currency,
        });
      }
    }
    return byKey;
  }

  /**
   * balance += delta, only if the result stays >= 0.
   */
  async transfer(accountId: string, currency: string, delta: AmountInput): Promise<Wallet> {
    const amount = toDecimal(delta, 'delta');
    if (amount.isZero()) {
      throw new InvalidOperationError('Transfer delta must be non-zero');
    }
    positiveAmount(amount.abs(), this.scale, 'delta');
    return this.apply({ accountId, currency }, { balance: amount, locked: ZERO }, 'transfer');
  }

  /**
   * Move `amount` from spendable to locked balance.
   */
  async lock(accountId: string, currency: string, amount: AmountInput): Promise<Wallet> {
    const value = positiveAmount(amount, this.scale);
    return this.apply({ accountId, currency }, { balance: value.neg(), locked: value }, 'lock');
  }

  /**
   * Move `amount` from locked back to spendable balance.
   */
  async unlock(accountId: string, currency: string, amount: AmountInput): Promise<Wallet> {
    const value = positiveAmount(amount, this.scale);
    return this.apply({ accountId, currency }, { balance: value, locked: value.neg() }, 'unlock');
  }

  /**
   * Remove `amount` from locked balance; used when escrowed funds settle.
   */
  async consumeLocked(accountId: string, currency: string, amount: AmountInput): Promise<Wallet> {
    const value = positiveAmount(amount, this.scale);
    return this.apply({ accountId, currency }, { balance: ZERO, locked: value.neg() }, 'consumeLocked');
  }

  async house(currency: string, delta: HouseDelta): Promise<void> {
    await this.repos.house.apply(currency, delta);
  }

  private async apply(key: WalletKey, delta: WalletDelta, op: LegOperation): Promise<Wallet> {
    const updated = await this.repos.wallets.applyDelta(key, delta, this.now);
    if (updated) return updated;
    throw await this.classifyRefusal(key, delta, op);
  }

  private async classifyRefusal(key: WalletKey, delta: WalletDelta, op: LegOperation): Promise<AppError> {
    const wallet = await this.repos.wallets.find(key);
    if (!wallet) {
      return new InvalidOperationError(`Unsupported currency ${key.currency}`, {
        accountId: key.accountId,
        currency: key.currency,
      });
    }

    if (wallet.balance.plus(delta.balance).isNegative()) {
      return AppError.insufficientFunds(
        key.accountId,
        key.currency,
        delta.balance.neg().toFixed(),
        wallet.balance.toFixed()
      );
    }

    const violation = new InvariantViolationError(
      `${op} would take locked ${key.currency} below zero`,
      {
        accountId: key.accountId,
        currency: key.currency,
        lockedBalance: wallet.lockedBalance.toFixed(),
        lockedDelta: delta.locked.toFixed(),
      }
    );
    ledgerLogger.fatal({ err: violation, ...violation.details }, 'Ledger invariant violated');
    return violation;
  }
}

export function walletKeyOf(key: WalletKey): string {
  return `${key.accountId}:${key.currency}`;
}

export interface LedgerServiceDeps {
  store: LedgerStore;
  ledger: LedgerConfig;
  clock?: Clock;
}

export class LedgerService {
  private readonly store: LedgerStore;
  private readonly scale: number;
  private readonly clock: Clock;

  constructor(deps: LedgerServiceDeps) {
    this.store = deps.store;
    this.scale = deps.ledger.scale;
    this.clock = deps.clock ?? (() => new Date());
  }

  get amountScale(): number {
    return this.scale;
  }

  now(): Date {
    return this.clock();
  }

  /** Autocommit repositories for lock-free reads. */
  get read(): LedgerRepositories {
    return this.store.read;
  }

  /**
   * Run a multi-leg operation as one transaction. All legs commit together;
   * any thrown error rolls every leg back.
   */
  async run<T>(fn: (legs: LedgerLegs) => Promise<T>): Promise<T> {
    return this.store.transaction((repos) => fn(new LedgerLegs(repos, this.clock(), this.scale)));
  }

  async getWallets(accountId: string): Promise<Wallet[]> {
    return this.store.read.wallets.findByAccount(accountId);
  }
}
