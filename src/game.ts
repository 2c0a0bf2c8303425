/**
 * TradingGame
 *
 * The public surface of the trading core. Wires the services over one
 * LedgerStore and exposes the game operations. Price tables are optional on
 * the read side: when omitted they are built from the configured oracle.
 *
 * Usage:
 *   const db = createDatabase(config.database);
 *   const game = createTradingGame({
 *     store: new PgLedgerStore(db, config.database),
 *     config,
 *     oracle,
 *   });
 *   const { account } = await game.createOrGetAccount('oauth|123', 'Ada');
 *   await game.placeOrder({ accountId: account.id, pair: 'BTC/USDT', side: 'buy', amount: '0.1' });
 */

import type { GameConfig, LedgerConfig } from './config';
import type { IdentityProvider } from './identity/IdentityProvider';
import { InvalidOperationError } from './lib/errors';
import type { PriceOracle } from './oracle';
import type { LedgerStore } from './repositories/types';
import { AccountService, type ResolvedAccount } from './services/AccountService';
import { BonusService, type BonusClaimResult, type BonusStatus } from './services/BonusService';
import { LedgerAuditService, type LedgerAuditReport } from './services/LedgerAuditService';
import { LedgerService } from './services/LedgerService';
import { OfferService, type AcceptOfferResult, type CreateOfferInput } from './services/OfferService';
import { OrderService, type MarketOrderInput, type PlaceOrderInput } from './services/OrderService';
import {
  PortfolioService,
  pricesFromOracle,
  type CoinLeaderboardEntry,
  type LeaderboardEntry,
  type PortfolioValuation,
  type RankInfo,
} from './services/PortfolioService';
import type {
  Clock,
  OfferStatus,
  P2PSettlement,
  PortfolioSnapshot,
  PriceTable,
  TradeOffer,
  Transaction,
  Wallet,
} from './types';

export interface TradingGameOptions {
  store: LedgerStore;
  config: { game: GameConfig; ledger: LedgerConfig };
  oracle?: PriceOracle;
  clock?: Clock;
  generateId?: () => string;
}

export class TradingGame {
  readonly ledger: LedgerService;
  readonly accounts: AccountService;
  readonly orders: OrderService;
  readonly offers: OfferService;
  readonly bonus: BonusService;
  readonly portfolio: PortfolioService;
  readonly audit: LedgerAuditService;

  private readonly game: GameConfig;
  private readonly oracle?: PriceOracle;

  constructor(options: TradingGameOptions) {
    const { store, config, oracle, clock, generateId } = options;
    this.game = config.game;
    this.oracle = oracle;

    this.ledger = new LedgerService({ store, ledger: config.ledger, clock });
    const deps = { ledger: this.ledger, game: config.game, generateId };
    this.accounts = new AccountService(deps);
    this.orders = new OrderService({ ...deps, oracle });
    this.offers = new OfferService(deps);
    this.bonus = new BonusService(deps);
    this.portfolio = new PortfolioService(deps);
    this.audit = new LedgerAuditService(this.ledger);
  }

  // Accounts

  createOrGetAccount(externalId: string, displayName: string): Promise<ResolvedAccount> {
    return this.accounts.resolveOrCreate(externalId, displayName);
  }

  signIn(identityProvider: IdentityProvider): Promise<ResolvedAccount> {
    return this.accounts.signIn(identityProvider);
  }

  getWallets(accountId: string): Promise<Wallet[]> {
    return this.accounts.getWallets(accountId);
  }

  // Market orders

  executeOrder(input: MarketOrderInput): Promise<Transaction> {
    return this.orders.executeMarketOrder(input);
  }

  placeOrder(input: PlaceOrderInput): Promise<Transaction> {
    return this.orders.placeMarketOrder(input);
  }

  listTransactions(accountId: string, options?: { pair?: string; limit?: number }): Promise<Transaction[]> {
    return this.orders.listTransactions(accountId, options);
  }

  // Offers

  createOffer(input: CreateOfferInput): Promise<TradeOffer> {
    return this.offers.createOffer(input);
  }

  listActiveOffers(excludeAccountId?: string): Promise<TradeOffer[]> {
    return this.offers.listActiveOffers(excludeAccountId);
  }

  listAccountOffers(accountId: string, status?: OfferStatus): Promise<TradeOffer[]> {
    return this.offers.listAccountOffers(accountId, status);
  }

  acceptOffer(acceptorId: string, offerId: string): Promise<AcceptOfferResult> {
    return this.offers.acceptOffer(acceptorId, offerId);
  }

  cancelOffer(accountId: string, offerId: string): Promise<TradeOffer> {
    return this.offers.cancelOffer(accountId, offerId);
  }

  listSettlements(accountId: string, limit?: number): Promise<P2PSettlement[]> {
    return this.offers.listSettlements(accountId, limit);
  }

  // Bonus

  claimBonus(accountId: string): Promise<BonusClaimResult> {
    return this.bonus.claim(accountId);
  }

  bonusStatus(accountId: string): Promise<BonusStatus> {
    return this.bonus.status(accountId);
  }

  // Portfolio & leaderboard

  async portfolioValue(accountId: string, prices?: PriceTable): Promise<PortfolioValuation> {
    return this.portfolio.portfolioValue(accountId, await this.resolvePrices(prices));
  }

  async leaderboard(prices?: PriceTable, limit?: number): Promise<LeaderboardEntry[]> {
    return this.portfolio.leaderboard(await this.resolvePrices(prices), limit);
  }

  async rankOf(accountId: string, prices?: PriceTable): Promise<RankInfo> {
    return this.portfolio.rankOf(accountId, await this.resolvePrices(prices));
  }

  coinLeaderboard(currency: string, limit?: number): Promise<CoinLeaderboardEntry[]> {
    return this.portfolio.coinLeaderboard(currency, limit);
  }

  async recordSnapshot(accountId: string, prices?: PriceTable): Promise<PortfolioSnapshot> {
    return this.portfolio.recordSnapshot(accountId, await this.resolvePrices(prices));
  }

  portfolioHistory(accountId: string, limit?: number): Promise<PortfolioSnapshot[]> {
    return this.portfolio.history(accountId, limit);
  }

  // Audit

  verifyLedger(): Promise<LedgerAuditReport> {
    return this.audit.verify();
  }

  private async resolvePrices(prices?: PriceTable): Promise<PriceTable> {
    if (prices) return prices;
    if (!this.oracle) {
      throw new InvalidOperationError('Prices are required when no oracle is configured');
    }
    return pricesFromOracle(this.oracle, this.game.currencies, this.game.baseCurrency);
  }
}

export function createTradingGame(options: TradingGameOptions): TradingGame {
  return new TradingGame(options);
}
