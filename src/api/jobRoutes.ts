import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ReportJobService } from '../services/ReportJobService.js';
import type { ArtifactType } from '../domain/entities/ReportArtifact.js';
import { MethodNotAllowedError, ValidationError } from '../domain/errors.js';
import { mapStatusToResponse, mapSubmissionToResponse } from './jobMapper.js';

const ALLOWED_METHODS = ['GET', 'POST'] as const;

/**
 * Job submission and status polling on the service root
 */
export function createJobRouter(
  jobService: ReportJobService,
  options: { legacyArtifactType: ArtifactType | null }
): Router {
  const router = Router();

  /**
   * POST /  - body is the job input
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const submission = await jobService.submit(req.body);
      res.status(202).json(mapSubmissionToResponse(submission));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /?job_id=xxx
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const jobId = req.query.job_id;

      if (typeof jobId !== 'string' || jobId.trim().length === 0) {
        throw new ValidationError('Missing job_id parameter', { usage: 'GET /?job_id=xxx' });
      }

      const result = await jobService.getStatus(jobId.trim());
      res.status(200).json(mapStatusToResponse(result, options));
    } catch (error) {
      next(error);
    }
  });

  router.all('/', (req: Request, _res: Response, next: NextFunction) => {
    next(new MethodNotAllowedError(req.method, ALLOWED_METHODS));
  });

  return router;
}
