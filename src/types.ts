/**
 * Trading Core domain types.
 *
 * Row shapes are the in-memory domain form: amounts are Decimals, timestamps
 * are Dates. Repositories translate to and from the database representation.
 */

import type Decimal from 'decimal.js';

// ============================================================================
// ACCOUNTS & WALLETS
// ============================================================================

export interface Account {
  id: string;
  externalId: string;
  displayName: string;
  createdAt: Date;
  lastLoginAt: Date;
  lastBonusClaim: Date | null;
}

export interface Wallet {
  accountId: string;
  currency: string;
  balance: Decimal;
  lockedBalance: Decimal;
  updatedAt: Date;
}

export interface WalletKey {
  accountId: string;
  currency: string;
}

/**
 * Signed change applied to one wallet row. Both fields may be negative;
 * the post-state of each must stay non-negative.
 */
export interface WalletDelta {
  balance: Decimal;
  locked: Decimal;
}

// ============================================================================
// MARKET ORDERS
// ============================================================================

export const ORDER_SIDES = ['buy', 'sell'] as const;
export type OrderSide = (typeof ORDER_SIDES)[number];

export interface TradingPair {
  base: string;
  quote: string;
  symbol: string;
}

export interface Transaction {
  id: string;
  accountId: string;
  pair: string;
  kind: OrderSide;
  amount: Decimal;
  price: Decimal;
  fee: Decimal;
  feeCurrency: string;
  total: Decimal;
  createdAt: Date;
}

// ============================================================================
// P2P OFFERS (ESCROW)
// ============================================================================

export const OFFER_STATUSES = ['active', 'completed', 'cancelled'] as const;
export type OfferStatus = (typeof OFFER_STATUSES)[number];

export interface TradeOffer {
  id: string;
  creatorId: string;
  offeringCurrency: string;
  offeringAmount: Decimal;
  requestingCurrency: string;
  requestingAmount: Decimal;
  status: OfferStatus;
  acceptedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface P2PSettlement {
  id: string;
  offerId: string;
  creatorId: string;
  acceptorId: string;
  offeringCurrency: string;
  offeringAmount: Decimal;
  requestingCurrency: string;
  requestingAmount: Decimal;
  createdAt: Date;
}

// ============================================================================
// BONUS
// ============================================================================

export interface BonusClaim {
  id: string;
  accountId: string;
  claimDay: string; // YYYY-MM-DD (UTC)
  amount: Decimal;
  claimedAt: Date;
}

// ============================================================================
// HOUSE LEDGER
// ============================================================================

/**
 * Per-currency counterparty record. For every currency:
 *   sum(balance + locked) + marketPosition + feesCollected = issued
 */
export interface HouseEntry {
  currency: string;
  issued: Decimal;
  feesCollected: Decimal;
  marketPosition: Decimal;
}

export interface HouseDelta {
  issued?: Decimal;
  feesCollected?: Decimal;
  marketPosition?: Decimal;
}

export interface CurrencyTotals {
  currency: string;
  balance: Decimal;
  lockedBalance: Decimal;
}

// ============================================================================
// PORTFOLIO
// ============================================================================

/** Unit price of each currency expressed in the base currency. */
export type PriceTable = Readonly<Record<string, Decimal.Value>>;

export interface PortfolioSnapshot {
  id: string;
  accountId: string;
  totalValue: Decimal;
  recordedAt: Date;
}

export type Clock = () => Date;
