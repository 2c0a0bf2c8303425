/**
 * Trading Core
 *
 * Ledger and escrow engine for a simulated crypto-trading game.
 */

export { TradingGame, createTradingGame, type TradingGameOptions } from './game';

export { config, loadConfig, validateConfig } from './config';
export type { AppConfig, GameConfig, LedgerConfig } from './config';
export { logger } from './logger';
export { createDatabase, type Database, type QueryFn } from './db';

export * from './lib/errors';
export { Decimal } from './lib/money';

export { PgLedgerStore } from './repositories/PgLedgerStore';
export type { LedgerStore, LedgerRepositories } from './repositories/types';

export { StaticPriceOracle, type PriceOracle } from './oracle';
export type { Identity, IdentityProvider } from './identity/IdentityProvider';

export { LedgerService, LedgerLegs } from './services/LedgerService';
export { AccountService, type ResolvedAccount } from './services/AccountService';
export {
  OrderService,
  parsePair,
  priceMarketOrder,
  type MarketOrderInput,
  type OrderQuote,
  type PlaceOrderInput,
} from './services/OrderService';
export {
  OfferService,
  isValidTransition,
  type AcceptOfferResult,
  type CreateOfferInput,
} from './services/OfferService';
export { BonusService, type BonusClaimResult, type BonusStatus } from './services/BonusService';
export {
  PortfolioService,
  pricesFromOracle,
  valueWallets,
  type CoinLeaderboardEntry,
  type HoldingValue,
  type LeaderboardEntry,
  type PortfolioValuation,
  type RankInfo,
} from './services/PortfolioService';
export { LedgerAuditService, type CurrencyAudit, type LedgerAuditReport } from './services/LedgerAuditService';

export * from './types';
