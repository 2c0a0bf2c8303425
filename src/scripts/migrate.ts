/**
 * Migration Runner
 * Run with: npm run migrate
 */

import 'dotenv/config';
import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { config, validateConfig } from '../config';
import { createDatabase, type Database } from '../db';

export const MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

export async function applyMigrations(db: Database, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    console.log(`🔄 Applying ${file}...`);
    await db.query(readFileSync(join(dir, file), 'utf-8'));
    console.log(`   ✅ ${file} applied`);
  }
  return files;
}

async function main(): Promise<void> {
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    console.error('❌ Invalid configuration:', errors.join('; '));
    process.exit(1);
  }

  const db = createDatabase(config.database);
  try {
    const applied = await applyMigrations(db);
    console.log(`\n✅ ${applied.length} migration(s) applied`);
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('❌ Migration failed:', error);
    process.exit(1);
  });
}
