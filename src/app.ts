import express from 'express';
import cors from 'cors';
import type { Express, Request, Response, NextFunction } from 'express';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { logger } from './infra/logger.js';
import { describeError } from './domain/errors.js';
import type { AppContainer } from './container.js';

/**
 * Builds the Express application around an already wired container
 */
export function createApp(container: AppContainer): Express {
  const { config } = container;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    try {
      if (!container.db.ping()) {
        res.status(503).json({ status: 'not-ready' });
        return;
      }
      res.json({
        status: 'ready',
        dispatchBackend: container.queue.backend,
        pendingDispatches: container.queue.pending(),
      });
    } catch (error) {
      logger.warn('Readiness check failed', { error: describeError(error) });
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use(
    createApiRouter({
      jobService: container.jobService,
      artifactAccess: container.artifactAccess,
      blobStore: container.blobStore,
      legacyArtifactType: config.compatibility.legacyArtifactType,
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(config));

  return app;
}
