import { randomUUID } from 'node:crypto';
import { logger } from '../logger.js';
import { describeError } from '../../domain/errors.js';
import type {
  ClaimedDispatch,
  DispatchQueueRepository,
} from '../repositories/DispatchQueueRepository.js';
import type { DispatchHandler, JobConsumer, JobDispatcher } from './JobDispatcher.js';

/**
 * Durable dispatch through the `job_dispatch` table.
 * Producers and consumers may live in different processes sharing the database file.
 */
export class SqliteJobQueue implements JobDispatcher, JobConsumer {
  readonly backend = 'sqlite' as const;
  readonly workerId = `worker-${randomUUID()}`;
  private timer: NodeJS.Timeout | null = null;
  private inFlight = new Set<Promise<void>>();
  private handler: DispatchHandler | null = null;

  constructor(
    private queueRepo: DispatchQueueRepository,
    private options: { pollIntervalMs: number; concurrency: number }
  ) {}

  async dispatch(jobId: string): Promise<void> {
    this.queueRepo.enqueue(jobId);
    logger.debug('Job enqueued', { jobId, backend: this.backend });
  }

  start(handler: DispatchHandler): void {
    if (this.timer) {
      throw new Error('SQLite queue consumer already started');
    }
    this.handler = handler;
    this.timer = setInterval(() => this.poll(), this.options.pollIntervalMs);
    logger.info('Dispatch consumer started', {
      workerId: this.workerId,
      pollIntervalMs: this.options.pollIntervalMs,
      concurrency: this.options.concurrency,
    });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.handler = null;
    await Promise.allSettled([...this.inFlight]);
    logger.info('Dispatch consumer stopped', { workerId: this.workerId });
  }

  /**
   * Claims as many entries as free slots allow. Returns the number claimed.
   */
  poll(): number {
    const handler = this.handler;
    if (!handler) {
      return 0;
    }

    let claimed = 0;
    while (this.inFlight.size < this.options.concurrency) {
      let next: ClaimedDispatch | null;
      try {
        next = this.queueRepo.claimNext(this.workerId);
      } catch (error) {
        logger.error('Failed to claim dispatched job', { error: describeError(error) });
        break;
      }
      if (!next) {
        break;
      }
      claimed += 1;

      const { id, jobId } = next;
      const task = handler(jobId)
        .catch((error: unknown) => {
          logger.error('Dispatched job handler failed', { jobId, error: describeError(error) });
        })
        .finally(() => {
          this.inFlight.delete(task);
          this.release(id, jobId);
        });
      this.inFlight.add(task);
    }
    return claimed;
  }

  pending(): number {
    return this.queueRepo.countPending();
  }

  /**
   * Resolves once every claimed job has settled
   */
  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private release(id: number, jobId: string): void {
    try {
      this.queueRepo.complete(id);
    } catch (error) {
      logger.error('Failed to remove dispatch entry', { jobId, error: describeError(error) });
    }
  }
}
