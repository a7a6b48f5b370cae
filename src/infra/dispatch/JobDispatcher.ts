import type { DispatchBackend } from '../config.js';

export type DispatchHandler = (jobId: string) => Promise<void>;

/**
 * Producer side: hands a job id to whichever orchestrator consumes the backend.
 * Resolves once the hand-off is recorded, never after the work itself.
 */
export interface JobDispatcher {
  readonly backend: DispatchBackend;
  dispatch(jobId: string): Promise<void>;
}

/**
 * Consumer side: delivers dispatched job ids to a handler
 */
export interface JobConsumer {
  start(handler: DispatchHandler): void;
  stop(): Promise<void>;
  /** Dispatched ids not yet handed to a handler */
  pending(): number;
}
