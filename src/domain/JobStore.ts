import type { Job, JobStatus, TaskFailureRecord } from './entities/Job.js';
import type { ReportArtifact } from './entities/ReportArtifact.js';

/**
 * Conditional mutation applied by `JobStore.update`.
 * The write only happens while the record's status is one of `from`.
 */
export interface JobMutation {
  from: readonly JobStatus[];
  to: JobStatus;
  artifacts?: ReportArtifact[];
  failures?: TaskFailureRecord[];
  errorMessage?: string | null;
}

/**
 * Durable keyed job record shared by ingress and orchestrator.
 * Any engine with atomic conditional writes on a key satisfies it.
 */
export interface JobStore {
  /** Rejects with AlreadyExistsError when the id is taken */
  create(job: Job): Promise<void>;
  get(jobId: string): Promise<Job | null>;
  /**
   * Atomic compare-and-swap on status.
   * Rejects with JobNotFoundError or StaleWriteError when nothing was written.
   */
  update(jobId: string, mutation: JobMutation): Promise<Job>;
  /** Non-terminal jobs whose last write is older than `cutoff` */
  listStale(cutoff: Date): Promise<Job[]>;
  /** Removes records whose retention horizon has passed; returns the count */
  purgeExpired(now: Date): Promise<number>;
}
