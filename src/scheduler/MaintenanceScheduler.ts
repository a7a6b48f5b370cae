import cron, { type ScheduledTask } from 'node-cron';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { AppConfig } from '../infra/config.js';
import type { JobRetentionService } from '../services/JobRetentionService.js';
import type { JobTimeoutService } from '../services/JobTimeoutService.js';
import type { DispatchQueueRepository } from '../infra/repositories/DispatchQueueRepository.js';

type StaleClaimPurger = Pick<DispatchQueueRepository, 'purgeStaleClaims'>;

/**
 * MaintenanceScheduler - periodic stuck-job sweep, retention purge and
 * dispatch-claim cleanup using node-cron
 */
export class MaintenanceScheduler {
  private task: ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private config: Pick<AppConfig, 'maintenance'>,
    private timeoutService: JobTimeoutService,
    private retentionService: JobRetentionService,
    private dispatchQueue: StaleClaimPurger,
    private now: () => Date = () => new Date()
  ) {}

  start(): void {
    const { cronExpression, jobTimeoutMinutes } = this.config.maintenance;

    if (!cron.validate(cronExpression)) {
      logger.warn('MAINTENANCE_CRON is not a valid cron expression, skipping scheduler', {
        cronExpression,
      });
      return;
    }

    this.task = cron.schedule(cronExpression, async () => {
      await this.runOnce();
    });

    logger.info('MaintenanceScheduler started', { cronExpression, jobTimeoutMinutes });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('MaintenanceScheduler stopped');
    }
  }

  /**
   * One sweep; overlapping ticks are skipped
   */
  async runOnce(): Promise<void> {
    if (this.isRunning) {
      logger.info('Maintenance sweep skipped - previous sweep still running');
      return;
    }
    this.isRunning = true;

    try {
      const timeouts = await this.timeoutService.failTimedOutJobs(
        this.config.maintenance.jobTimeoutMinutes
      );
      if (timeouts.jobsFailed > 0) {
        logger.warn('Failed timed out jobs', timeouts);
      }
    } catch (error) {
      logger.error('Timed out job sweep failed', { error: describeError(error) });
    }

    try {
      await this.retentionService.purgeExpired();
    } catch (error) {
      logger.error('Retention purge failed', { error: describeError(error) });
    }

    try {
      // claims older than the job timeout belong to workers that died mid-run
      const cutoff = new Date(
        this.now().getTime() - this.config.maintenance.jobTimeoutMinutes * 60_000
      );
      const removed = this.dispatchQueue.purgeStaleClaims(cutoff);
      if (removed > 0) {
        logger.warn('Removed stale dispatch claims', { removed, cutoff: cutoff.toISOString() });
      }
    } catch (error) {
      logger.error('Stale dispatch claim cleanup failed', { error: describeError(error) });
    } finally {
      this.isRunning = false;
    }
  }
}

export function startMaintenanceScheduler(
  config: Pick<AppConfig, 'maintenance'>,
  timeoutService: JobTimeoutService,
  retentionService: JobRetentionService,
  dispatchQueue: StaleClaimPurger
): MaintenanceScheduler {
  const scheduler = new MaintenanceScheduler(
    config,
    timeoutService,
    retentionService,
    dispatchQueue
  );
  scheduler.start();
  return scheduler;
}
