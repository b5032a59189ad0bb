/**
 * Scheduler API — Entry Point
 *
 * Loads configuration, opens the database, starts the background worker and
 * the HTTP server, and shuts all three down on SIGINT/SIGTERM.
 */

import dotenv from 'dotenv';
// Load .env — override only empty-string env vars left over in the shell
const dotenvResult = dotenv.config();
if (dotenvResult.parsed) {
  for (const [k, v] of Object.entries(dotenvResult.parsed)) {
    if (process.env[k] === '' || process.env[k] === undefined) process.env[k] = v;
  }
}

import { join } from 'path';
import { loadConfig } from './config.js';
import { openDatabase, schedulerDbPath } from './core/storage/database.js';
import { createLogger } from './services/logger.js';
import { createScheduler } from './services/scheduler/index.js';
import { createApp, startServer } from './api/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(join(config.dataDir, 'logs'), { level: config.logLevel });
  const db = openDatabase(schedulerDbPath(config.dataDir));

  const scheduler = createScheduler({
    db,
    logger,
    tokenSecret: config.tokenSecret,
    linkedin: config.linkedin,
    workerIntervalMs: config.workerIntervalMs,
  });

  if (config.seedDefaultSlots) {
    const seeded = scheduler.slots.seedDefaults();
    if (seeded.length > 0) {
      logger.info('Seeded default time slots', { times: seeded.map(slot => slot.timeOfDay) });
    }
  }

  if (config.workerEnabled) {
    scheduler.worker.start();
  } else {
    logger.info('Scheduler worker disabled');
  }

  const server = await startServer(createApp(scheduler, logger), config.port, logger);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    scheduler.worker.stop()
      .then(() => new Promise<void>((resolve) => server.close(() => resolve())))
      .then(() => {
        db.close();
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
