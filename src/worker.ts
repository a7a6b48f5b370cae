import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { buildConfig } from './infra/config.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './container.js';

/**
 * Standalone orchestrator process for the sqlite dispatch backend
 */
dotenv.config();

const config = buildConfig(validateEnv());

const loggerInstance = createLogger(config);
setLogger(loggerInstance);

if (config.generation.backend !== 'sqlite') {
  loggerInstance.error('The standalone worker needs DISPATCH_BACKEND=sqlite', {
    backend: config.generation.backend,
  });
  process.exit(1);
}

const container = createContainer(config);
container.worker.start();

loggerInstance.info('Worker started', {
  database: config.jobStore.databasePath,
  concurrency: config.generation.workerConcurrency,
});

const shutdown = (signal: string) => {
  loggerInstance.info(`${signal} received, draining worker`);
  container.worker
    .stop()
    .catch((error: unknown) => {
      loggerInstance.error('Worker shutdown failed', { error });
    })
    .finally(() => {
      container.db.close();
      process.exit(0);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
