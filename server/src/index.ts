import pool from '../api/db';
import { loadCalculationSettings } from './config';
import { logger } from './logger';
import { decodeWorkUnit, createPgWorkQueue } from './service/pgWorkQueue';
import { createPgCalculationStore } from './service/pgCalculationStore';
import { createPgNotifier } from './service/pgNotifier';
import { createCalculationRuntime } from './service/calculationRuntimeFactory';

logger.log('=== Calculation worker starting ===');
logger.log('Log file location:', logger.getLogFilePath() ?? '(stdout only)');

const settings = loadCalculationSettings();

const { workerPool } = createCalculationRuntime({
  settings,
  store: createPgCalculationStore(pool),
  queue: createPgWorkQueue({
    db: pool,
    name: settings.async.queueName,
    decode: decodeWorkUnit,
  }),
  notifier: createPgNotifier(pool),
});

workerPool.start();

let shuttingDown = false;
const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.log(`Received ${signal}; stopping worker`);
  workerPool
    .stop()
    .then(() => pool.end())
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Worker shutdown failed', error);
      process.exit(1);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
