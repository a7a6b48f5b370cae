import { Router } from 'express';
import { createJobRouter } from './jobRoutes.js';
import { createArtifactRouter } from './artifactRoutes.js';
import type { ReportJobService } from '../services/ReportJobService.js';
import type { ArtifactAccessService } from '../services/ArtifactAccessService.js';
import { ARTIFACT_ROUTE_PREFIX } from '../services/ArtifactAccessService.js';
import type { BlobStore } from '../infra/blob/BlobStore.js';
import type { ArtifactType } from '../domain/entities/ReportArtifact.js';

/**
 * Main API router - composes the route groups
 * Dependencies injected from the composition root
 */
export function createApiRouter(deps: {
  jobService: ReportJobService;
  artifactAccess: ArtifactAccessService;
  blobStore: BlobStore;
  legacyArtifactType: ArtifactType | null;
}): Router {
  const router = Router();

  router.use(ARTIFACT_ROUTE_PREFIX, createArtifactRouter(deps.artifactAccess, deps.blobStore));
  router.use('/', createJobRouter(deps.jobService, { legacyArtifactType: deps.legacyArtifactType }));

  return router;
}
