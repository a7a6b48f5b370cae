import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Job, JobStatus, TaskFailureRecord } from '../../domain/entities/Job.js';
import { ACTIVE_STATUSES, canTransition } from '../../domain/entities/Job.js';
import type { ArtifactType, ReportArtifact } from '../../domain/entities/ReportArtifact.js';
import type { JobMutation, JobStore } from '../../domain/JobStore.js';
import { AlreadyExistsError, JobNotFoundError, StaleWriteError, ValidationError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  expires_at: string;
  input: string;
  expected_artifact_types: string;
  artifacts: string;
  failures: string;
  error_message: string | null;
};

/**
 * SQLite-backed JobStore. Every status change is a single conditional UPDATE.
 */
export class JobRepository implements JobStore {
  constructor(
    private db: DatabaseAdapter,
    private table: string
  ) {}

  async create(job: Job): Promise<void> {
    const sql = `
      INSERT INTO ${this.table} (
        id, status, created_at, updated_at, expires_at, input, expected_artifact_types,
        artifacts, failures, error_message
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO NOTHING
    `;

    const changes = this.db.execute(sql, [
      job.id,
      job.status,
      job.createdAt.toISOString(),
      job.updatedAt.toISOString(),
      job.expiresAt.toISOString(),
      JSON.stringify(job.input),
      JSON.stringify(job.expectedArtifactTypes),
      JSON.stringify(job.artifacts),
      JSON.stringify(job.failures),
      job.errorMessage,
    ]);

    if (changes === 0) {
      throw new AlreadyExistsError('Job', job.id);
    }

    logger.debug('Job created', { jobId: job.id, status: job.status });
  }

  async get(jobId: string): Promise<Job | null> {
    const row = this.db.queryOne<JobRow>(`SELECT * FROM ${this.table} WHERE id = ?`, [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  async update(jobId: string, mutation: JobMutation): Promise<Job> {
    if (mutation.from.length === 0) {
      throw new ValidationError('Job mutation needs at least one expected status');
    }
    const illegal = mutation.from.find((from) => !canTransition(from, mutation.to));
    if (illegal) {
      throw new ValidationError(`Illegal job transition: ${illegal} -> ${mutation.to}`);
    }
    assertUniqueArtifactTypes(mutation.artifacts ?? []);

    const assignments = ['status = ?', 'updated_at = MAX(updated_at, ?)'];
    const values: unknown[] = [mutation.to, new Date().toISOString()];

    if (mutation.artifacts !== undefined) {
      assignments.push('artifacts = ?');
      values.push(JSON.stringify(mutation.artifacts));
    }
    if (mutation.failures !== undefined) {
      assignments.push('failures = ?');
      values.push(JSON.stringify(mutation.failures));
    }
    if (mutation.errorMessage !== undefined) {
      assignments.push('error_message = ?');
      values.push(mutation.errorMessage);
    }

    const placeholders = mutation.from.map(() => '?').join(', ');
    const row = this.db.queryOne<JobRow>(
      `
        UPDATE ${this.table}
        SET ${assignments.join(', ')}
        WHERE id = ? AND status IN (${placeholders})
        RETURNING *
      `,
      [...values, jobId, ...mutation.from]
    );

    if (!row) {
      const current = await this.get(jobId);
      if (!current) {
        throw new JobNotFoundError(jobId);
      }
      throw new StaleWriteError(jobId, mutation.from, current.status);
    }

    logger.debug('Job status updated', { jobId, status: row.status });
    return this.mapRowToJob(row);
  }

  async listStale(cutoff: Date): Promise<Job[]> {
    const placeholders = ACTIVE_STATUSES.map(() => '?').join(', ');
    const rows = this.db.query<JobRow>(
      `
        SELECT * FROM ${this.table}
        WHERE status IN (${placeholders}) AND updated_at < ?
        ORDER BY created_at ASC
      `,
      [...ACTIVE_STATUSES, cutoff.toISOString()]
    );
    return rows.map((row) => this.mapRowToJob(row));
  }

  async purgeExpired(now: Date): Promise<number> {
    return this.db.execute(`DELETE FROM ${this.table} WHERE expires_at <= ?`, [now.toISOString()]);
  }

  private mapRowToJob(row: JobRow): Job {
    return {
      id: row.id,
      status: row.status,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      expiresAt: new Date(row.expires_at),
      input: JSON.parse(row.input) as Record<string, unknown>,
      expectedArtifactTypes: JSON.parse(row.expected_artifact_types) as ArtifactType[],
      artifacts: JSON.parse(row.artifacts) as ReportArtifact[],
      failures: JSON.parse(row.failures) as TaskFailureRecord[],
      errorMessage: row.error_message,
    };
  }
}

function assertUniqueArtifactTypes(artifacts: readonly ReportArtifact[]): void {
  const seen = new Set<ArtifactType>();
  for (const artifact of artifacts) {
    if (seen.has(artifact.type)) {
      throw new ValidationError(`Duplicate artifact type: ${artifact.type}`);
    }
    seen.add(artifact.type);
  }
}
