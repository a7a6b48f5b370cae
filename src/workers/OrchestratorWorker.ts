import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobConsumer } from '../infra/dispatch/JobDispatcher.js';
import type { ReportOrchestrator } from '../services/ReportOrchestrator.js';

/**
 * Consumer loop: every dispatched job id is handed to the orchestrator exactly as received
 */
export class OrchestratorWorker {
  private running = false;

  constructor(
    private consumer: JobConsumer,
    private orchestrator: ReportOrchestrator
  ) {}

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.consumer.start((jobId) => this.handle(jobId));
    logger.info('Orchestrator worker started');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    await this.consumer.stop();
    logger.info('Orchestrator worker stopped');
  }

  private async handle(jobId: string): Promise<void> {
    try {
      const job = await this.orchestrator.run(jobId);
      if (job) {
        logger.debug('Dispatched job settled', { jobId, status: job.status });
      }
    } catch (error) {
      logger.error('Orchestrator run crashed', { jobId, error: describeError(error) });
    }
  }
}
