// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { loadConfig } from './config';
import { getDb, closeDb } from './db/connection';
import { migrateLatest } from './db/migrate';
import { errorMessage } from './shared/errors';

// Records
import { CreatorRepo, VideoRepo, PgRecordSource } from './domains/records';

// Reporting
import { ReportService, createReportRoutes } from './domains/reporting';

async function main() {
  const config = loadConfig();
  const db = getDb({ connectionString: config.databaseUrl, pool: config.pool });

  const applied = await migrateLatest(db);
  if (applied.length > 0) {
    console.log(`[App] Applied migrations: ${applied.join(', ')}`);
  }

  // ── Records ──
  const recordSource = new PgRecordSource(new CreatorRepo(db), new VideoRepo(db));

  // ── Reporting ──
  const reportService = new ReportService(recordSource, config.reports);

  // ── Express app ──
  const app = express();
  app.use(express.json());

  app.use('/api/v1/reports', createReportRoutes(reportService));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await db.raw('select 1');
      res.json({ status: 'ok' });
    } catch (err) {
      console.error('[App] Health check failed:', errorMessage(err));
      res.status(503).json({ status: 'unhealthy', error: errorMessage(err) });
    }
  });

  const server = app.listen(config.port, () => {
    console.log(`[App] Creator Payments listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('[App] Shutting down...');
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[App] Shutdown failed:', errorMessage(err));
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
