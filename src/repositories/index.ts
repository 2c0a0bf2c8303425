/**
 * Repository Layer
 *
 * Usage:
 *   const store = new PgLedgerStore(createDatabase({ url }));
 *
 *   // Lock-free read
 *   const wallets = await store.read.wallets.findByAccount(accountId);
 *
 *   // Within a transaction
 *   await store.transaction(async (repos) => {
 *     await repos.wallets.lockRows([{ accountId, currency: 'USDT' }]);
 *     await repos.wallets.applyDelta(key, delta, now);
 *   });
 */

export { BaseRepository } from './BaseRepository';
export { PgAccountRepository } from './AccountRepository';
export { PgWalletRepository, orderWalletKeys } from './WalletRepository';
export { PgTransactionRepository } from './TransactionRepository';
export { PgOfferRepository } from './OfferRepository';
export { PgSettlementRepository } from './SettlementRepository';
export { PgBonusClaimRepository } from './BonusClaimRepository';
export { PgHouseLedgerRepository } from './HouseLedgerRepository';
export { PgSnapshotRepository } from './SnapshotRepository';
export { PgLedgerStore, createPgRepositories } from './PgLedgerStore';
export type * from './types';
