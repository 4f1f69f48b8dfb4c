// ──────────────────────────────────────────
// Database migrations — run pending migrations
// ──────────────────────────────────────────

import path from 'path';
import { Knex } from 'knex';

export const MIGRATIONS_DIR = path.resolve(__dirname, 'migrations');

export async function migrateLatest(db: Knex): Promise<string[]> {
  const [, applied]: [number, string[]] = await db.migrate.latest({ directory: MIGRATIONS_DIR });
  return applied;
}
