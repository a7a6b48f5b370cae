import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { AppConfig } from '../infra/config.js';

/**
 * Global error handler middleware
 * Maps domain errors to HTTP status codes and logs them with request context
 */
export function createErrorHandler(config: Pick<AppConfig, 'nodeEnv'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };
    const clientStatus = clientErrorStatus(err);

    if (isAppError(err)) {
      const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log('Application error', {
        code: err.code,
        message: err.message,
        details: redactSecrets(err.details),
        stack: config.nodeEnv === 'development' ? err.stack : undefined,
        ...context,
      });

      res.status(err.statusCode).json({
        error: err.message,
        code: err.code,
        ...(err.details ?? {}),
      });
    } else if (err.name === 'SyntaxError' && 'body' in err) {
      logger.warn('Invalid JSON in request', {
        message: err.message,
        ...context,
      });

      res.status(400).json({
        error: 'Invalid JSON in request body',
        code: 'INVALID_JSON',
      });
    } else if (clientStatus !== undefined) {
      const tooLarge = Reflect.get(err, 'type') === 'entity.too.large';
      logger.warn('Rejected request', {
        status: clientStatus,
        message: err.message,
        ...context,
      });

      res.status(clientStatus).json(
        tooLarge
          ? { error: 'Request body exceeds the size limit', code: 'PAYLOAD_TOO_LARGE' }
          : { error: err.message, code: 'BAD_REQUEST' }
      );
    } else {
      // Unknown error - log full details but return generic message
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: config.nodeEnv === 'development' ? err.message : 'An unexpected error occurred',
        code: 'INTERNAL_SERVER_ERROR',
      });
    }
  };
}

/**
 * Status of a 4xx error raised by body parsing or other middleware, if any
 */
function clientErrorStatus(err: Error): number | undefined {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'The requested resource was not found',
    code: 'NOT_FOUND',
  });
}
