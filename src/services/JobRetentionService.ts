import type { JobStore } from '../domain/JobStore.js';
import { logger } from '../infra/logger.js';

/**
 * JobRetentionService - purge job records past their retention horizon
 */
export class JobRetentionService {
  constructor(
    private jobStore: JobStore,
    private now: () => Date = () => new Date()
  ) {}

  async purgeExpired(): Promise<number> {
    const now = this.now();
    try {
      const removed = await this.jobStore.purgeExpired(now);
      if (removed === 0) {
        logger.info('No expired jobs to cleanup', { now: now.toISOString() });
      } else {
        logger.info('Cleaned up expired jobs', { count: removed, now: now.toISOString() });
      }
      return removed;
    } catch (error) {
      logger.error('Failed to cleanup expired jobs', { error });
      throw error;
    }
  }
}
