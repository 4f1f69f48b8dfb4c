// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { types } from 'pg';

// DATE columns stay `YYYY-MM-DD` strings; parsing them into a Date would
// shift the calendar day by the server's time zone.
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | undefined;

export interface DbOptions {
  connectionString: string;
  pool?: { min: number; max: number };
}

export function getDb(options?: DbOptions): Knex {
  if (!db) {
    db = knex({
      client: 'pg',
      connection: options?.connectionString ?? process.env.DATABASE_URL,
      pool: options?.pool ?? { min: 2, max: 10 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
