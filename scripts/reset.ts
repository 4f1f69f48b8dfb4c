// ──────────────────────────────────────────
// Script: Reset — drop all tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from '../src/db/connection';
import { migrateLatest } from '../src/db/migrate';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping all tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS videos CASCADE');
  await db.raw('DROP TABLE IF EXISTS creators CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  const applied = await migrateLatest(db);
  console.log(`[Reset] ✅ Done — applied ${applied.length} migration(s)`);

  if (process.argv.includes('--seed')) {
    console.log('[Reset] Running seed...');
    await import('./seed');
    return; // seed.ts closes the pool and exits
  }

  await closeDb();
  process.exit(0);
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
