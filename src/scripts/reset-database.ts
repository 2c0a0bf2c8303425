/**
 * Drops every trading-core table and reapplies the migrations.
 * Run with: npm run db:reset
 *
 * Refuses to run when NODE_ENV=production.
 */

import 'dotenv/config';
import { config, validateConfig } from '../config';
import { createDatabase } from '../db';
import { applyMigrations } from './migrate';

const TABLES = [
  'portfolio_snapshots',
  'house_ledger',
  'bonus_claims',
  'p2p_settlements',
  'trade_offers',
  'transactions',
  'wallets',
  'accounts',
];

async function main(): Promise<void> {
  if (config.app.isProduction) {
    console.error('❌ Refusing to reset a production database');
    process.exit(1);
  }
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    console.error('❌ Invalid configuration:', errors.join('; '));
    process.exit(1);
  }

  const db = createDatabase(config.database);
  try {
    console.log('🗑️  Dropping tables...');
    await db.query(`DROP TABLE IF EXISTS ${TABLES.join(', ')} CASCADE`);
    await db.query('DROP FUNCTION IF EXISTS prevent_audit_mutation() CASCADE');
    await db.query('DROP FUNCTION IF EXISTS prevent_offer_terminal_mutation() CASCADE');

    await applyMigrations(db);
    console.log('\n✅ Database reset');
  } finally {
    await db.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Reset failed:', error);
  process.exit(1);
});
