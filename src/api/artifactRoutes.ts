import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import path from 'node:path';
import type { BlobStore } from '../infra/blob/BlobStore.js';
import type { ArtifactAccessService } from '../services/ArtifactAccessService.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';

/**
 * Artifact downloads through signed access handles
 */
export function createArtifactRouter(
  artifactAccess: ArtifactAccessService,
  blobStore: BlobStore
): Router {
  const router = Router();

  /**
   * GET /artifacts/<storage key>?expires=...&nonce=...&signature=...
   */
  router.get('/*', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const storageKey = req.params[0];
      if (!storageKey) {
        throw new ValidationError('Missing artifact key');
      }

      artifactAccess.verify(storageKey, req.query);

      const blob = await blobStore.get(storageKey);
      if (!blob) {
        throw new NotFoundError('Artifact not found', { storage_key: storageKey });
      }

      res
        .status(200)
        .set({
          'Content-Type': blob.contentType,
          'Content-Length': String(blob.body.length),
          'Content-Disposition': `attachment; filename="${path.posix.basename(storageKey)}"`,
          'Cache-Control': 'private, no-store',
        })
        .end(blob.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
