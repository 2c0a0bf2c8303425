/**
 * Repository contracts.
 *
 * Services only talk to storage through these interfaces. A `LedgerStore`
 * hands out a set of repositories bound either to autocommit reads or to one
 * open transaction; every write a service performs for a single operation goes
 * through the transaction-bound set.
 */

import type Decimal from 'decimal.js';
import type {
  Account,
  BonusClaim,
  CurrencyTotals,
  HouseDelta,
  HouseEntry,
  OfferStatus,
  P2PSettlement,
  PortfolioSnapshot,
  TradeOffer,
  Transaction,
  Wallet,
  WalletDelta,
  WalletKey,
} from '../types';

export interface AccountRepository {
  /** Insert unless the external identity exists. Returns null on conflict. */
  insertIfAbsent(data: {
    id: string;
    externalId: string;
    displayName: string;
    now: Date;
  }): Promise<Account | null>;
  findById(id: string): Promise<Account | null>;
  findByExternalId(externalId: string): Promise<Account | null>;
  touchLogin(id: string, displayName: string, now: Date): Promise<Account | null>;
  /**
   * Set last_bonus_claim = now only if it is null or at least `cooldownMs`
   * old. The returned row is the only proof of eligibility.
   */
  claimBonusWindow(id: string, now: Date, cooldownMs: number): Promise<Account | null>;
  list(): Promise<Account[]>;
}

export interface WalletRepository {
  insertMany(accountId: string, rows: { currency: string; balance: Decimal }[], now: Date): Promise<void>;
  find(key: WalletKey): Promise<Wallet | null>;
  findByAccount(accountId: string): Promise<Wallet[]>;
  /** Row-lock the given wallets in (accountId, currency) order. */
  lockRows(keys: WalletKey[]): Promise<Wallet[]>;
  /**
   * Apply a signed delta only if both resulting fields stay non-negative.
   * Returns null (and changes nothing) otherwise or when the row is missing.
   */
  applyDelta(key: WalletKey, delta: WalletDelta, now: Date): Promise<Wallet | null>;
  listAll(): Promise<Wallet[]>;
  listByCurrency(currency: string, limit: number): Promise<Wallet[]>;
  totalsByCurrency(): Promise<CurrencyTotals[]>;
}

export interface TransactionRepository {
  append(record: Transaction): Promise<Transaction>;
  listByAccount(accountId: string, options: { pair?: string; limit: number }): Promise<Transaction[]>;
}

export interface OfferRepository {
  insert(offer: TradeOffer): Promise<TradeOffer>;
  findById(id: string): Promise<TradeOffer | null>;
  findByIdForUpdate(id: string): Promise<TradeOffer | null>;
  /** Conditional status write; null when the offer is not in `from`. */
  transition(
    id: string,
    from: OfferStatus,
    to: OfferStatus,
    now: Date,
    acceptedBy?: string
  ): Promise<TradeOffer | null>;
  listActive(excludeAccountId?: string): Promise<TradeOffer[]>;
  listByCreator(creatorId: string, status?: OfferStatus): Promise<TradeOffer[]>;
}

export interface SettlementRepository {
  append(record: P2PSettlement): Promise<P2PSettlement>;
  listByAccount(accountId: string, limit: number): Promise<P2PSettlement[]>;
}

export interface BonusClaimRepository {
  record(claim: BonusClaim): Promise<void>;
  listByAccount(accountId: string, limit: number): Promise<BonusClaim[]>;
}

export interface HouseLedgerRepository {
  apply(currency: string, delta: HouseDelta): Promise<void>;
  list(): Promise<HouseEntry[]>;
}

export interface PortfolioSnapshotRepository {
  insert(snapshot: PortfolioSnapshot): Promise<PortfolioSnapshot>;
  listByAccount(accountId: string, limit: number): Promise<PortfolioSnapshot[]>;
}

export interface LedgerRepositories {
  accounts: AccountRepository;
  wallets: WalletRepository;
  transactions: TransactionRepository;
  offers: OfferRepository;
  settlements: SettlementRepository;
  bonusClaims: BonusClaimRepository;
  house: HouseLedgerRepository;
  snapshots: PortfolioSnapshotRepository;
}

export interface LedgerStore {
  /** Autocommit repositories for lock-free reads. */
  readonly read: LedgerRepositories;
  /**
   * Run `fn` inside one transaction. Every write commits together or not at
   * all; a thrown error rolls everything back and is rethrown.
   */
  transaction<T>(fn: (repos: LedgerRepositories) => Promise<T>): Promise<T>;
}
