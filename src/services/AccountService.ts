/**
 * AccountService
 *
 * Maps an external identity to exactly one account. The unique external_id
 * insert is the only gate: whoever wins it also seeds the wallets, in the same
 * transaction, so an account never exists without its full wallet set.
 */

import { ulid } from 'ulidx';
import type { GameConfig } from '../config';
import type { IdentityProvider } from '../identity/IdentityProvider';
import { AppError, InvariantViolationError } from '../lib/errors';
import { ZERO, positiveAmount } from '../lib/money';
import { identitySchema, parseInput } from '../lib/validators';
import { accountLogger } from '../logger';
import type { Account, Wallet } from '../types';
import type { LedgerService } from './LedgerService';

export interface ResolvedAccount {
  account: Account;
  created: boolean;
}

export interface AccountServiceDeps {
  ledger: LedgerService;
  game: GameConfig;
  generateId?: () => string;
}

export class AccountService {
  private readonly ledger: LedgerService;
  private readonly game: GameConfig;
  private readonly generateId: () => string;

  constructor(deps: AccountServiceDeps) {
    this.ledger = deps.ledger;
    this.game = deps.game;
    this.generateId = deps.generateId ?? ulid;
  }

  async resolveOrCreate(externalId: string, displayName: string): Promise<ResolvedAccount> {
    const identity = parseInput(identitySchema, { externalId, displayName });
    const initialBalance = positiveAmount(this.game.initialBalance, this.ledger.amountScale, 'initialBalance');

    const result = await this.ledger.run(async (legs) => {
      const { accounts, wallets } = legs.repos;

      const inserted = await accounts.insertIfAbsent({
        id: this.generateId(),
        externalId: identity.externalId,
        displayName: identity.displayName,
        now: legs.now,
      });

      if (inserted) {
        await wallets.insertMany(
          inserted.id,
          this.game.currencies.map((currency) => ({
            currency,
            balance: currency === this.game.baseCurrency ? initialBalance : ZERO,
          })),
          legs.now
        );
        await legs.house(this.game.baseCurrency, { issued: initialBalance });
        return { account: inserted, created: true };
      }

      const existing = await accounts.findByExternalId(identity.externalId);
      if (!existing) {
        throw new InvariantViolationError('Account insert conflicted but no account exists', {
          externalId: identity.externalId,
        });
      }
      const refreshed = await accounts.touchLogin(existing.id, identity.displayName, legs.now);
      return { account: refreshed ?? existing, created: false };
    });

    if (result.created) {
      accountLogger.info(
        { accountId: result.account.id, currencies: this.game.currencies.length },
        'Account created and wallets seeded'
      );
    } else {
      accountLogger.debug({ accountId: result.account.id }, 'Existing account resolved');
    }
    return result;
  }

  async signIn(identityProvider: IdentityProvider): Promise<ResolvedAccount> {
    const identity = await identityProvider.authenticate();
    return this.resolveOrCreate(identity.externalId, identity.displayName);
  }

  async getAccount(accountId: string): Promise<Account> {
    const account = await this.ledger.read.accounts.findById(accountId);
    if (!account) {
      throw AppError.notFound('Account', accountId);
    }
    return account;
  }

  async getWallets(accountId: string): Promise<Wallet[]> {
    await this.getAccount(accountId);
    return this.ledger.getWallets(accountId);
  }
}
