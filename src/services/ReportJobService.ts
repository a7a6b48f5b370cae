import { randomUUID } from 'node:crypto';
import type { JobStore } from '../domain/JobStore.js';
import type { Job } from '../domain/entities/Job.js';
import { createJob, isTerminalStatus, jobFolderPrefix } from '../domain/entities/Job.js';
import { isJobInput } from '../domain/entities/JobInput.js';
import type { ArtifactType, ReportArtifact } from '../domain/entities/ReportArtifact.js';
import {
  AdmissionError,
  DispatchError,
  JobNotFoundError,
  StaleWriteError,
  describeError,
} from '../domain/errors.js';
import type { JobDispatcher } from '../infra/dispatch/JobDispatcher.js';
import { logger } from '../infra/logger.js';
import type { AccessGrant, ArtifactAccessService } from './ArtifactAccessService.js';

export interface ReportJobServiceOptions {
  artifactTypes: readonly ArtifactType[];
  retentionDays: number;
  estimatedCompletionSeconds: number;
  container: string;
  keyPrefix: string;
  accessTtlSeconds: number;
  now?: () => Date;
  generateId?: () => string;
}

export interface JobSubmission {
  job: Job;
  estimatedCompletionSeconds: number;
  estimatedCompletionAt: Date;
}

export interface IssuedArtifact {
  artifact: ReportArtifact;
  access: AccessGrant;
}

export interface JobFolder {
  container: string;
  prefix: string;
}

export interface JobStatusResult {
  job: Job;
  artifacts: IssuedArtifact[];
  folder: JobFolder | null;
}

/**
 * ReportJobService - ingress side of the job lifecycle: admission and status reads.
 * Never runs generation work; the orchestrator picks jobs up from the dispatcher.
 */
export class ReportJobService {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private jobStore: JobStore,
    private dispatcher: JobDispatcher,
    private artifactAccess: ArtifactAccessService,
    private options: ReportJobServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  async submit(payload: unknown): Promise<JobSubmission> {
    if (!isJobInput(payload)) {
      throw new AdmissionError('Request body must be a JSON object', 400);
    }

    const createdAt = this.now();
    const job = createJob({
      id: this.generateId(),
      input: payload,
      expectedArtifactTypes: this.options.artifactTypes,
      retentionDays: this.options.retentionDays,
      now: createdAt,
    });

    try {
      await this.jobStore.create(job);
    } catch (error) {
      const reason = describeError(error);
      logger.error('Job admission failed', { jobId: job.id, error: reason });
      throw new AdmissionError(`Failed to submit job: ${reason}`);
    }

    try {
      await this.dispatcher.dispatch(job.id);
    } catch (error) {
      const reason = `Failed to dispatch job: ${describeError(error)}`;
      logger.error('Job dispatch failed', { jobId: job.id, backend: this.dispatcher.backend, error: reason });
      const status = await this.markDispatchFailed(job.id, reason);
      throw new DispatchError(reason, { job_id: job.id, status });
    }

    logger.info('Job submitted', { jobId: job.id, backend: this.dispatcher.backend });
    const estimatedCompletionSeconds = this.options.estimatedCompletionSeconds;
    return {
      job,
      estimatedCompletionSeconds,
      estimatedCompletionAt: new Date(createdAt.getTime() + estimatedCompletionSeconds * 1000),
    };
  }

  /**
   * Reads the job and issues fresh access handles for every stored artifact
   */
  async getStatus(jobId: string): Promise<JobStatusResult> {
    const job = await this.jobStore.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    if (!isTerminalStatus(job.status) || job.status === 'FAILED') {
      return { job, artifacts: [], folder: null };
    }

    const artifacts = job.artifacts.map((artifact) => ({
      artifact,
      access: this.artifactAccess.issue(artifact.storageKey, this.options.accessTtlSeconds),
    }));

    return {
      job,
      artifacts,
      folder: {
        container: this.options.container,
        prefix: jobFolderPrefix(job, this.options.keyPrefix),
      },
    };
  }

  private async markDispatchFailed(jobId: string, reason: string): Promise<string> {
    try {
      const failed = await this.jobStore.update(jobId, {
        from: ['PENDING'],
        to: 'FAILED',
        errorMessage: reason,
      });
      return failed.status;
    } catch (error) {
      if (error instanceof StaleWriteError) {
        return error.actual;
      }
      // the timeout sweep fails the job later if this write is lost
      logger.error('Failed to record dispatch failure', { jobId, error: describeError(error) });
      return 'PENDING';
    }
  }
}
