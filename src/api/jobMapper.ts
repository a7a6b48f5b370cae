import type { Job } from '../domain/entities/Job.js';
import { isTerminalStatus } from '../domain/entities/Job.js';
import type { ArtifactType } from '../domain/entities/ReportArtifact.js';
import type { IssuedArtifact, JobStatusResult, JobSubmission } from '../services/ReportJobService.js';

export const STILL_PROCESSING_MESSAGE = 'Job is still processing. Please check again in a few moments.';

export function formatEstimate(seconds: number): string {
  if (seconds < 60) {
    return `~${seconds} seconds`;
  }
  const minutes = Math.round(seconds / 60);
  return minutes === 1 ? '~1 minute' : `~${minutes} minutes`;
}

export function mapSubmissionToResponse(submission: JobSubmission) {
  const { job } = submission;
  return {
    id: job.id,
    job_id: job.id,
    status: job.status,
    message: 'Job submitted successfully',
    check_status_url: `?job_id=${encodeURIComponent(job.id)}`,
    estimated_completion: formatEstimate(submission.estimatedCompletionSeconds),
    estimated_completion_at: submission.estimatedCompletionAt.toISOString(),
  };
}

function mapArtifactToResponse({ artifact, access }: IssuedArtifact) {
  return {
    type: artifact.type,
    storage_key: artifact.storageKey,
    access_handle: access.handle,
    expires_in: access.expiresIn,
    expires_at: access.expiresAt.toISOString(),
    content_type: artifact.contentType,
    size_bytes: artifact.sizeBytes,
    metadata: artifact.metadata,
  };
}

function mapBase(job: Job) {
  return {
    id: job.id,
    job_id: job.id,
    status: job.status,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}

/**
 * Status payload; its shape depends on where the job is in its lifecycle
 */
export function mapStatusToResponse(
  result: JobStatusResult,
  options: { legacyArtifactType: ArtifactType | null }
) {
  const { job } = result;
  const base = mapBase(job);

  if (!isTerminalStatus(job.status)) {
    return { ...base, message: STILL_PROCESSING_MESSAGE };
  }

  if (job.status === 'FAILED') {
    return {
      ...base,
      error_message: job.errorMessage ?? 'Unknown error',
      failures: job.failures,
    };
  }

  const artifacts = result.artifacts.map(mapArtifactToResponse);
  const legacy = options.legacyArtifactType
    ? artifacts.find((artifact) => artifact.type === options.legacyArtifactType)
    : undefined;

  return {
    ...base,
    artifacts,
    artifact_count: artifacts.length,
    ...(result.folder
      ? {
          folder: {
            ...result.folder,
            description: `All reports for job ${job.id} are in: ${result.folder.container}/${result.folder.prefix}`,
          },
        }
      : {}),
    failures: job.failures,
    ...(legacy
      ? {
          legacy_artifact: {
            type: legacy.type,
            storage_key: legacy.storage_key,
            access_handle: legacy.access_handle,
            expires_in: legacy.expires_in,
          },
        }
      : {}),
  };
}
