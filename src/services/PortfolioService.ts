/**
 * PortfolioService
 *
 * Read-only valuation and ranking. Prices come in as a table of unit prices
 * in the base currency; the base currency itself is always worth 1. Nothing
 * here takes locks, so a leaderboard is a best-effort view of the moment it
 * was read.
 */

import type Decimal from 'decimal.js';
import { ulid } from 'ulidx';
import type { GameConfig } from '../config';
import { AppError, InvalidOperationError } from '../lib/errors';
import { ZERO, roundDown, sum, toDecimal } from '../lib/money';
import { currencySchema, limitSchema, parseInput } from '../lib/validators';
import { portfolioLogger } from '../logger';
import type { PriceOracle } from '../oracle';
import type { Account, PortfolioSnapshot, PriceTable, Wallet } from '../types';
import type { LedgerService } from './LedgerService';

// ============================================================================
// TYPES
// ============================================================================

export interface HoldingValue {
  currency: string;
  balance: Decimal;
  lockedBalance: Decimal;
  price: Decimal | null;
  /** balance * price; zero when unpriced. Locked funds are not counted. */
  value: Decimal;
  priced: boolean;
}

export interface PortfolioValuation {
  accountId: string;
  baseCurrency: string;
  totalValue: Decimal;
  holdings: HoldingValue[];
}

export interface LeaderboardEntry {
  rank: number;
  accountId: string;
  displayName: string;
  totalValue: Decimal;
}

export interface RankInfo {
  rank: number;
  totalAccounts: number;
  percentile: number;
  totalValue: Decimal;
}

export interface CoinLeaderboardEntry {
  rank: number;
  accountId: string;
  displayName: string;
  currency: string;
  balance: Decimal;
}

export interface PortfolioServiceDeps {
  ledger: LedgerService;
  game: GameConfig;
  generateId?: () => string;
}

// ============================================================================
// VALUATION
// ============================================================================

export function valueWallets(wallets: Wallet[], prices: PriceTable, baseCurrency: string): HoldingValue[] {
  return wallets.map((wallet) => {
    const raw = wallet.currency === baseCurrency ? 1 : prices[wallet.currency];
    if (raw === undefined) {
      return {
        currency: wallet.currency,
        balance: wallet.balance,
        lockedBalance: wallet.lockedBalance,
        price: null,
        value: ZERO,
        priced: false,
      };
    }
    const price = toDecimal(raw, `price of ${wallet.currency}`);
    return {
      currency: wallet.currency,
      balance: wallet.balance,
      lockedBalance: wallet.lockedBalance,
      price,
      value: wallet.balance.times(price),
      priced: true,
    };
  });
}

function compareRanked(
  a: { accountId: string; totalValue: Decimal },
  b: { accountId: string; totalValue: Decimal }
): number {
  const byValue = b.totalValue.comparedTo(a.totalValue);
  if (byValue !== 0) return byValue;
  if (a.accountId < b.accountId) return -1;
  return a.accountId > b.accountId ? 1 : 0;
}

/**
 * Build a price table from the oracle. Currencies without a price are left
 * out, which values them at zero.
 */
export async function pricesFromOracle(
  oracle: PriceOracle,
  currencies: readonly string[],
  baseCurrency: string
): Promise<Record<string, Decimal>> {
  const quoted = currencies.filter((currency) => currency !== baseCurrency);
  const prices = await Promise.all(quoted.map((currency) => oracle.getPrice(`${currency}/${baseCurrency}`)));

  const table: Record<string, Decimal> = {};
  quoted.forEach((currency, i) => {
    const price = prices[i];
    if (price) {
      table[currency] = price;
    } else {
      portfolioLogger.debug({ currency, baseCurrency }, 'No oracle price, valued at zero');
    }
  });
  return table;
}

// ============================================================================
// SERVICE
// ============================================================================

export class PortfolioService {
  private readonly ledger: LedgerService;
  private readonly game: GameConfig;
  private readonly generateId: () => string;

  constructor(deps: PortfolioServiceDeps) {
    this.ledger = deps.ledger;
    this.game = deps.game;
    this.generateId = deps.generateId ?? ulid;
  }

  async portfolioValue(accountId: string, prices: PriceTable): Promise<PortfolioValuation> {
    const account = await this.ledger.read.accounts.findById(accountId);
    if (!account) {
      throw AppError.notFound('Account', accountId);
    }
    const wallets = await this.ledger.read.wallets.findByAccount(accountId);
    return this.valuation(accountId, wallets, prices);
  }

  async leaderboard(prices: PriceTable, limit: number = 100): Promise<LeaderboardEntry[]> {
    const top = parseInput(limitSchema, limit);
    const ranked = await this.rankAll(prices);
    return ranked.slice(0, top);
  }

  async rankOf(accountId: string, prices: PriceTable): Promise<RankInfo> {
    const ranked = await this.rankAll(prices);
    const entry = ranked.find((e) => e.accountId === accountId);
    if (!entry) {
      throw AppError.notFound('Account', accountId);
    }
    const totalAccounts = ranked.length;
    return {
      rank: entry.rank,
      totalAccounts,
      percentile: ((totalAccounts - entry.rank) / totalAccounts) * 100,
      totalValue: entry.totalValue,
    };
  }

  /** Holders of one currency ranked by spendable balance. */
  async coinLeaderboard(currency: string, limit: number = 100): Promise<CoinLeaderboardEntry[]> {
    const code = parseInput(currencySchema, currency);
    if (!this.game.currencies.includes(code)) {
      throw new InvalidOperationError(`Unsupported currency ${code}`, { currency: code });
    }
    const [wallets, accounts] = await Promise.all([
      this.ledger.read.wallets.listByCurrency(code, parseInput(limitSchema, limit)),
      this.ledger.read.accounts.list(),
    ]);
    const names = new Map(accounts.map((a): [string, string] => [a.id, a.displayName]));

    return wallets.map((wallet, i) => ({
      rank: i + 1,
      accountId: wallet.accountId,
      displayName: names.get(wallet.accountId) ?? '',
      currency: code,
      balance: wallet.balance,
    }));
  }

  async recordSnapshot(accountId: string, prices: PriceTable): Promise<PortfolioSnapshot> {
    const snapshot = await this.ledger.run(async (legs) => {
      const { repos } = legs;
      if (!(await repos.accounts.findById(accountId))) {
        throw AppError.notFound('Account', accountId);
      }
      const valuation = this.valuation(accountId, await repos.wallets.findByAccount(accountId), prices);
      return repos.snapshots.insert({
        id: this.generateId(),
        accountId,
        totalValue: roundDown(valuation.totalValue, this.ledger.amountScale),
        recordedAt: legs.now,
      });
    });
    portfolioLogger.debug({ accountId, totalValue: snapshot.totalValue.toFixed() }, 'Portfolio snapshot recorded');
    return snapshot;
  }

  /** Snapshots, newest first. */
  async history(accountId: string, limit: number = 30): Promise<PortfolioSnapshot[]> {
    return this.ledger.read.snapshots.listByAccount(accountId, parseInput(limitSchema, limit));
  }

  private valuation(accountId: string, wallets: Wallet[], prices: PriceTable): PortfolioValuation {
    const holdings = valueWallets(wallets, prices, this.game.baseCurrency);
    return {
      accountId,
      baseCurrency: this.game.baseCurrency,
      totalValue: sum(holdings.map((h) => h.value)),
      holdings,
    };
  }

  private async rankAll(prices: PriceTable): Promise<LeaderboardEntry[]> {
    const [accounts, wallets] = await Promise.all([
      this.ledger.read.accounts.list(),
      this.ledger.read.wallets.listAll(),
    ]);

    const byAccount = new Map<string, Wallet[]>();
    for (const wallet of wallets) {
      const list = byAccount.get(wallet.accountId);
      if (list) list.push(wallet);
      else byAccount.set(wallet.accountId, [wallet]);
    }

    return accounts
      .map((account: Account) => ({
        accountId: account.id,
        displayName: account.displayName,
        totalValue: this.valuation(account.id, byAccount.get(account.id) ?? [], prices).totalValue,
      }))
      .sort(compareRanked)
      .map((entry, i) => ({ rank: i + 1, ...entry }));
  }
}
