/**
 * Database Bootstrap Script
 * Run with: npm run db:migrate
 *
 * Creates every table and seeds the starting world. Safe to run again:
 * existing rows are left alone.
 */

import 'dotenv/config';
import { env } from '../src/config/env.js';
import { getDbPath, openDatabase } from '../src/config/database.js';
import { loadWorldDefinition, seedWorld } from '../src/db/bootstrap.js';

async function main(): Promise<void> {
  const dbPath = getDbPath();
  console.log(`[Migration] Opening database at: ${dbPath}`);
  const { sqlite, db } = openDatabase(dbPath);

  try {
    const definition = loadWorldDefinition(env.WORLD_FILE);
    console.log(`[Migration] Seeding ${definition.regions.length} regions from ${env.WORLD_FILE}`);
    await seedWorld(db, definition, Date.now());

    const tables = sqlite
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`)
      .all();
    console.log(`[Migration] ${tables.length} tables ready`);
  } finally {
    sqlite.close();
  }

  console.log('[Migration] Done');
}

main().catch((err) => {
  console.error('[Migration] Failed:', err);
  process.exit(1);
});
