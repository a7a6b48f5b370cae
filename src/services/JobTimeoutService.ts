import type { JobStore } from '../domain/JobStore.js';
import { JobNotFoundError, StaleWriteError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * JobTimeoutService - fail jobs that stopped making progress, so no job stays
 * PENDING or PROCESSING forever when its worker died or its dispatch was lost.
 */
export class JobTimeoutService {
  constructor(
    private jobStore: JobStore,
    private now: () => Date = () => new Date()
  ) {}

  async failTimedOutJobs(timeoutMinutes: number): Promise<{ jobsFailed: number; skipped: number }> {
    if (timeoutMinutes <= 0) {
      return { jobsFailed: 0, skipped: 0 };
    }

    const cutoff = new Date(this.now().getTime() - timeoutMinutes * 60 * 1000);
    const reason =
      timeoutMinutes === 1
        ? 'Timed out after 1 minute'
        : `Timed out after ${timeoutMinutes} minutes`;

    let jobsFailed = 0;
    let skipped = 0;
    const staleJobs = await this.jobStore.listStale(cutoff);

    for (const job of staleJobs) {
      try {
        await this.jobStore.update(job.id, {
          from: [job.status],
          to: 'FAILED',
          artifacts: [],
          errorMessage: reason,
        });
        jobsFailed += 1;
        logger.warn('Job timed out', { jobId: job.id, previousStatus: job.status, reason });
      } catch (error) {
        if (error instanceof StaleWriteError || error instanceof JobNotFoundError) {
          skipped += 1;
          continue;
        }
        throw error;
      }
    }

    return { jobsFailed, skipped };
  }
}
