import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { buildConfig } from './infra/config.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './container.js';
import { createApp } from './app.js';
import { startMaintenanceScheduler } from './scheduler/MaintenanceScheduler.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast) and freeze it into one config object
const config = buildConfig(validateEnv());

const loggerInstance = createLogger(config);
setLogger(loggerInstance);

const container = createContainer(config);
const app = createApp(container);

if (config.generation.runEmbeddedWorker) {
  container.worker.start();
}

const scheduler = startMaintenanceScheduler(
  config,
  container.timeoutService,
  container.retentionService,
  container.dispatchQueue
);

const server = app.listen(config.server.port, () => {
  loggerInstance.info('Server started', {
    port: config.server.port,
    nodeEnv: config.nodeEnv,
    dispatchBackend: config.generation.backend,
    embeddedWorker: config.generation.runEmbeddedWorker,
    artifactTypes: config.generation.artifactTypes,
  });
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  scheduler.stop();
  server.close(() => {
    container.worker
      .stop()
      .catch((error: unknown) => {
        loggerInstance.error('Worker shutdown failed', { error });
      })
      .finally(() => {
        container.db.close();
        loggerInstance.info('Server closed');
        process.exit(0);
      });
  });
});

export { app };
