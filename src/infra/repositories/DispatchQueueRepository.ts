import type { DatabaseAdapter } from '../DatabaseAdapter.js';

type DispatchRow = {
  id: number;
  job_id: string;
};

export interface ClaimedDispatch {
  id: number;
  jobId: string;
}

/**
 * Durable FIFO of job ids waiting for an orchestrator
 */
export class DispatchQueueRepository {
  constructor(private db: DatabaseAdapter) {}

  enqueue(jobId: string): void {
    this.db.execute('INSERT INTO job_dispatch (job_id, enqueued_at) VALUES (?, ?)', [
      jobId,
      new Date().toISOString(),
    ]);
  }

  /**
   * Atomically marks the oldest unclaimed entry as taken by `workerId`
   */
  claimNext(workerId: string): ClaimedDispatch | null {
    const row = this.db.queryOne<DispatchRow>(
      `
        UPDATE job_dispatch
        SET claimed_at = ?, claimed_by = ?
        WHERE id = (
          SELECT id FROM job_dispatch
          WHERE claimed_at IS NULL
          ORDER BY id ASC
          LIMIT 1
        )
        RETURNING id, job_id
      `,
      [new Date().toISOString(), workerId]
    );
    return row ? { id: row.id, jobId: row.job_id } : null;
  }

  complete(id: number): void {
    this.db.execute('DELETE FROM job_dispatch WHERE id = ?', [id]);
  }

  /**
   * Drops entries claimed before `cutoff` whose worker never released them.
   * Returns the number removed.
   */
  purgeStaleClaims(cutoff: Date): number {
    return this.db.execute(
      'DELETE FROM job_dispatch WHERE claimed_at IS NOT NULL AND claimed_at < ?',
      [cutoff.toISOString()]
    );
  }

  countPending(): number {
    const row = this.db.queryOne<{ count: number }>(
      'SELECT COUNT(*) AS count FROM job_dispatch WHERE claimed_at IS NULL'
    );
    return row?.count ?? 0;
  }
}
