import express from 'express';
import { config, validateConfig } from './config';
import { createContainer } from './container';
import { applySchema, checkConnection, createPool } from './db/client';
import { PgJobStore } from './db/queries';
import { JobJanitor } from './jobs/janitor';
import { createJobsRouter } from './routes/jobs';
import { createStreamRouter } from './routes/stream';

async function main(): Promise<void> {
  validateConfig();

  const pool = createPool(config.databaseUrl);
  await checkConnection(pool);
  console.log('Database connected');

  await applySchema(pool);
  console.log('Database schema applied');

  const container = createContainer(config, { store: new PgJobStore(pool) });
  const { manager, persistence } = container;

  const app = express();
  app.use(express.json({ limit: '64kb' }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await checkConnection(pool);
      res.json({ status: 'ok', queue: manager.queueStats() });
    } catch {
      res.status(503).json({ status: 'unhealthy' });
    }
  });

  app.use(createJobsRouter(manager, config.apiToken));
  app.use(createStreamRouter(manager));

  const janitor = new JobJanitor(manager, persistence, {
    intervalMs: config.janitorIntervalMs,
    retentionMs: config.finishedJobRetentionMs,
  });
  await janitor.start();

  const server = app.listen(config.port, () => {
    console.log(`Backup orchestrator listening on port ${config.port}`);
    if (config.dryRun) {
      console.log('DRY_RUN mode enabled: backup and prune run with --dry-run');
    }
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('Shutting down...');
    janitor.stop();
    server.close();
    await manager.shutdown();
    await pool.end();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
