import type { ArtifactType, ReportArtifact } from './ReportArtifact.js';
import { buildJobFolderPrefix } from './ReportArtifact.js';
import { extractCompanyName } from './JobInput.js';
import type { JobInput } from './JobInput.js';

/**
 * Job entity - one submitted report bundle tracked from admission to a terminal outcome
 */
export type JobStatus = 'PENDING' | 'PROCESSING' | 'COMPLETED' | 'PARTIAL' | 'FAILED';

export type TerminalJobStatus = Extract<JobStatus, 'COMPLETED' | 'PARTIAL' | 'FAILED'>;

export const ACTIVE_STATUSES: readonly JobStatus[] = ['PENDING', 'PROCESSING'];

export interface TaskFailureRecord {
  type: ArtifactType;
  reason: string;
}

export interface Job {
  id: string;
  status: JobStatus;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  input: JobInput;
  expectedArtifactTypes: ArtifactType[];
  artifacts: ReportArtifact[];
  failures: TaskFailureRecord[];
  errorMessage: string | null;
}

const jobTransitions: Record<JobStatus, JobStatus[]> = {
  PENDING: ['PROCESSING', 'FAILED'],
  PROCESSING: ['COMPLETED', 'PARTIAL', 'FAILED'],
  COMPLETED: [],
  PARTIAL: [],
  FAILED: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return jobTransitions[status].length === 0;
}

/**
 * Completeness law: every expected artifact -> COMPLETED, some -> PARTIAL, none -> FAILED
 */
export function resolveTerminalStatus(succeeded: number, expected: number): TerminalJobStatus {
  if (succeeded > 0 && succeeded >= expected) {
    return 'COMPLETED';
  }
  return succeeded > 0 ? 'PARTIAL' : 'FAILED';
}

/**
 * Factory function to create a new Job in PENDING state
 */
export function createJob(params: {
  id: string;
  input: JobInput;
  expectedArtifactTypes: readonly ArtifactType[];
  retentionDays: number;
  now?: Date;
}): Job {
  const now = params.now ?? new Date();
  return {
    id: params.id,
    status: 'PENDING',
    createdAt: now,
    updatedAt: now,
    expiresAt: new Date(now.getTime() + params.retentionDays * 24 * 60 * 60 * 1000),
    input: params.input,
    expectedArtifactTypes: [...params.expectedArtifactTypes],
    artifacts: [],
    failures: [],
    errorMessage: null,
  };
}

/**
 * Blob folder grouping every artifact of the job
 */
export function jobFolderPrefix(job: Pick<Job, 'id' | 'input'>, keyPrefix: string): string {
  return buildJobFolderPrefix({
    keyPrefix,
    companyName: extractCompanyName(job.input),
    jobId: job.id,
  });
}
