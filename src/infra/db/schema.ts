/**
 * DDL for the job table and the durable dispatch queue.
 * The job table name comes from configuration and is validated as a plain identifier.
 */
export function buildSchema(jobTable: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${jobTable} (
      id TEXT PRIMARY KEY,
      status TEXT NOT NULL CHECK (status IN ('PENDING', 'PROCESSING', 'COMPLETED', 'PARTIAL', 'FAILED')),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      input TEXT NOT NULL,
      expected_artifact_types TEXT NOT NULL,
      artifacts TEXT NOT NULL DEFAULT '[]',
      failures TEXT NOT NULL DEFAULT '[]',
      error_message TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_${jobTable}_status_updated ON ${jobTable} (status, updated_at);
    CREATE INDEX IF NOT EXISTS idx_${jobTable}_expires ON ${jobTable} (expires_at);

    CREATE TABLE IF NOT EXISTS job_dispatch (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id TEXT NOT NULL,
      enqueued_at TEXT NOT NULL,
      claimed_at TEXT,
      claimed_by TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_job_dispatch_unclaimed ON job_dispatch (claimed_at, id);
  `;
}
