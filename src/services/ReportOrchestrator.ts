import { logger } from '../infra/logger.js';
import { retryWithBackoff } from '../infra/retry.js';
import type { BlobStore } from '../infra/blob/BlobStore.js';
import type { JobStore } from '../domain/JobStore.js';
import type { Job, TaskFailureRecord } from '../domain/entities/Job.js';
import { jobFolderPrefix, resolveTerminalStatus } from '../domain/entities/Job.js';
import type { ArtifactType, ReportArtifact } from '../domain/entities/ReportArtifact.js';
import { buildStorageKey } from '../domain/entities/ReportArtifact.js';
import {
  DatabaseError,
  JobNotFoundError,
  StaleWriteError,
  TaskFailureError,
  describeError,
} from '../domain/errors.js';
import type { GenerationTaskRegistry } from './generation/GenerationTask.js';

export interface OrchestratorOptions {
  keyPrefix: string;
  timeoutSeconds: number;
  finalize: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

type TaskOutcome =
  | { ok: true; artifact: ReportArtifact }
  | { ok: false; failure: TaskFailureRecord };

export function summarizeFailures(failures: readonly TaskFailureRecord[]): string {
  const count = failures.length;
  const details = failures.map((failure) => `${failure.type}: ${failure.reason}`).join('; ');
  return `All ${count} generation ${count === 1 ? 'task' : 'tasks'} failed: ${details}`;
}

/**
 * ReportOrchestrator - runs every generation task of one job concurrently and
 * writes the single terminal record.
 * PENDING -> PROCESSING happens before any task starts.
 */
export class ReportOrchestrator {
  private readonly now: () => Date;

  constructor(
    private jobStore: JobStore,
    private blobStore: BlobStore,
    private tasks: GenerationTaskRegistry,
    private options: OrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Returns the terminal job, or null when this run did not own the job
   */
  async run(jobId: string): Promise<Job | null> {
    let job: Job;
    try {
      job = await this.jobStore.update(jobId, { from: ['PENDING'], to: 'PROCESSING' });
    } catch (error) {
      if (error instanceof StaleWriteError || error instanceof JobNotFoundError) {
        logger.warn('Skipping dispatched job', { jobId, reason: error.message });
        return null;
      }
      throw error;
    }

    logger.info('Job processing', { jobId, artifactTypes: job.expectedArtifactTypes });

    try {
      const outcomes = await this.fanOut(job);
      return await this.finalize(job, outcomes);
    } catch (error) {
      const reason = describeError(error);
      logger.error('Job orchestration failed', { jobId, error: reason });
      return this.failIfActive(jobId, `Orchestration failed: ${reason}`);
    }
  }

  private async fanOut(job: Job): Promise<TaskOutcome[]> {
    const controller = new AbortController();
    const { timeoutSeconds } = this.options;
    const folderPrefix = jobFolderPrefix(job, this.options.keyPrefix);

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve();
      }, timeoutSeconds * 1000);
    });

    try {
      return await Promise.all(
        job.expectedArtifactTypes.map(async (type): Promise<TaskOutcome> => {
          const outcome = await Promise.race([
            this.runTask(job, type, folderPrefix, controller.signal),
            deadline.then(() => null),
          ]);
          if (outcome) {
            return outcome;
          }
          logger.warn('Generation task timed out', { jobId: job.id, type, timeoutSeconds });
          return { ok: false, failure: { type, reason: `Timed out after ${timeoutSeconds} seconds` } };
        })
      );
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Never rejects: every failure becomes an omission
   */
  private async runTask(
    job: Job,
    type: ArtifactType,
    folderPrefix: string,
    signal: AbortSignal
  ): Promise<TaskOutcome> {
    try {
      const task = this.tasks.get(type);
      if (!task) {
        throw new TaskFailureError(type, `No generation task registered for ${type}`);
      }

      const document = await task.generate(job.input, { jobId: job.id, signal });
      if (signal.aborted) {
        throw new TaskFailureError(type, 'Result arrived after the generation deadline');
      }
      if (document.body.length === 0) {
        throw new TaskFailureError(type, 'Generated document is empty');
      }

      const storageKey = buildStorageKey({
        folderPrefix,
        type,
        generatedAt: this.now(),
        extension: document.extension,
      });
      await this.blobStore.put(storageKey, document.body, document.contentType, { signal });
      logger.info('Artifact stored', { jobId: job.id, type, storageKey });

      return {
        ok: true,
        artifact: {
          type,
          storageKey,
          contentType: document.contentType,
          sizeBytes: document.body.length,
          metadata: { ...document.metadata },
        },
      };
    } catch (error) {
      const reason = describeError(error);
      logger.warn('Generation task failed', { jobId: job.id, type, reason });
      return { ok: false, failure: { type, reason } };
    }
  }

  private async finalize(job: Job, outcomes: TaskOutcome[]): Promise<Job | null> {
    const artifacts: ReportArtifact[] = [];
    const failures: TaskFailureRecord[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        artifacts.push(outcome.artifact);
      } else {
        failures.push(outcome.failure);
      }
    }

    const status = resolveTerminalStatus(artifacts.length, job.expectedArtifactTypes.length);
    const errorMessage = status === 'FAILED' ? summarizeFailures(failures) : null;

    try {
      const finished = await retryWithBackoff(
        () =>
          this.jobStore.update(job.id, {
            from: ['PROCESSING'],
            to: status,
            artifacts,
            failures,
            errorMessage,
          }),
        {
          maxAttempts: this.options.finalize.maxAttempts,
          baseDelayMs: this.options.finalize.baseDelayMs,
          shouldRetry: (error) => error instanceof DatabaseError,
          onRetry: ({ attempt, delayMs, error }) =>
            logger.warn('Retrying terminal job write', {
              jobId: job.id,
              attempt,
              delayMs,
              error: describeError(error),
            }),
          sleep: this.options.sleep,
        }
      );

      logger.info('Job finished', {
        jobId: job.id,
        status,
        artifactCount: artifacts.length,
        failedTypes: failures.map((failure) => failure.type),
      });
      return finished;
    } catch (error) {
      if (error instanceof StaleWriteError) {
        logger.warn('Terminal write rejected, job already settled', {
          jobId: job.id,
          actual: error.actual,
        });
        return null;
      }
      throw error;
    }
  }

  private async failIfActive(jobId: string, reason: string): Promise<Job | null> {
    try {
      return await this.jobStore.update(jobId, {
        from: ['PENDING', 'PROCESSING'],
        to: 'FAILED',
        artifacts: [],
        errorMessage: reason,
      });
    } catch (error) {
      if (error instanceof StaleWriteError || error instanceof JobNotFoundError) {
        return null;
      }
      throw error;
    }
  }
}
