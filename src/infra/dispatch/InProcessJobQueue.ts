import { EventEmitter } from 'node:events';
import { logger } from '../logger.js';
import { describeError } from '../../domain/errors.js';
import type { DispatchHandler, JobConsumer, JobDispatcher } from './JobDispatcher.js';

/**
 * Single-process dispatch: ids are delivered on a later tick so `dispatch`
 * always returns before the orchestrator starts.
 */
export class InProcessJobQueue implements JobDispatcher, JobConsumer {
  readonly backend = 'in-process' as const;
  private emitter = new EventEmitter();
  private backlog: string[] = [];
  private scheduled = 0;
  private inFlight = new Set<Promise<void>>();
  private listener: ((jobId: string) => void) | null = null;

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  async dispatch(jobId: string): Promise<void> {
    if (!this.listener) {
      this.backlog.push(jobId);
      logger.debug('Job queued until a consumer starts', { jobId });
      return;
    }
    this.schedule(jobId);
  }

  start(handler: DispatchHandler): void {
    if (this.listener) {
      throw new Error('In-process queue already has a consumer');
    }
    this.listener = (jobId: string) => this.run(handler, jobId);
    this.emitter.on('job', this.listener);

    const waiting = this.backlog.splice(0);
    waiting.forEach((jobId) => this.schedule(jobId));
  }

  async stop(): Promise<void> {
    if (this.listener) {
      this.emitter.off('job', this.listener);
      this.listener = null;
    }
    await this.onIdle();
  }

  pending(): number {
    return this.backlog.length + this.scheduled;
  }

  /**
   * Resolves once every delivered job has settled
   */
  async onIdle(): Promise<void> {
    while (this.scheduled > 0 || this.inFlight.size > 0) {
      if (this.inFlight.size > 0) {
        await Promise.allSettled([...this.inFlight]);
      } else {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
  }

  private schedule(jobId: string): void {
    this.scheduled += 1;
    setImmediate(() => {
      this.scheduled -= 1;
      if (this.emitter.listenerCount('job') === 0) {
        this.backlog.push(jobId);
        return;
      }
      this.emitter.emit('job', jobId);
    });
  }

  private run(handler: DispatchHandler, jobId: string): void {
    const task = handler(jobId)
      .catch((error: unknown) => {
        logger.error('Dispatched job handler failed', { jobId, error: describeError(error) });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}
