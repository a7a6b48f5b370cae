import { parseEnv } from '../../src/infra/env.js';
import { buildConfig } from '../../src/infra/config.js';
import type { AppConfig } from '../../src/infra/config.js';
import { DatabaseAdapter } from '../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../src/infra/repositories/JobRepository.js';
import type { BlobStore, BlobWriteOptions, StoredBlob } from '../../src/infra/blob/BlobStore.js';
import { BlobExistsError, StorageError } from '../../src/domain/errors.js';
import type { ArtifactType } from '../../src/domain/entities/ReportArtifact.js';
import type { JobInput } from '../../src/domain/entities/JobInput.js';
import type {
  GeneratedDocument,
  GenerationContext,
  GenerationTask,
} from '../../src/services/generation/GenerationTask.js';

export const TEST_TABLE = 'report_jobs';

export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  return buildConfig(
    parseEnv({
      NODE_ENV: 'test',
      SQLITE_DB_PATH: ':memory:',
      ACCESS_HANDLE_SECRET: 'test-secret-0123456789',
      PUBLIC_BASE_URL: 'http://localhost:3000',
      BLOB_CONTAINER: 'test-container',
      ...overrides,
    })
  );
}

export function createTestStore(): { db: DatabaseAdapter; store: JobRepository } {
  const db = new DatabaseAdapter({
    jobStore: { databasePath: ':memory:', tableName: TEST_TABLE, retentionDays: 7 },
  });
  return { db, store: new JobRepository(db, TEST_TABLE) };
}

/**
 * Write-once blob store kept in a Map. `writeDelayMs` simulates a slow backend;
 * the write is dropped when the signal aborts before it commits.
 */
export class MemoryBlobStore implements BlobStore {
  readonly container = 'test-container';
  readonly blobs = new Map<string, StoredBlob>();

  constructor(private writeDelayMs = 0) {}

  async put(key: string, body: Buffer, contentType: string, options: BlobWriteOptions = {}): Promise<void> {
    if (this.writeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    }
    if (options.signal?.aborted) {
      throw new StorageError('Blob write cancelled', { key });
    }
    if (this.blobs.has(key)) {
      throw new BlobExistsError(key);
    }
    this.blobs.set(key, { body, contentType });
  }

  async get(key: string): Promise<StoredBlob | null> {
    return this.blobs.get(key) ?? null;
  }
}

type TaskBehaviour = (input: JobInput, context: GenerationContext) => Promise<GeneratedDocument>;

export class StubTask implements GenerationTask {
  calls = 0;

  constructor(
    readonly type: ArtifactType,
    private behaviour: TaskBehaviour
  ) {}

  async generate(input: JobInput, context: GenerationContext): Promise<GeneratedDocument> {
    this.calls += 1;
    return this.behaviour(input, context);
  }
}

export function succeedingTask(type: ArtifactType, metadata: Record<string, unknown> = {}): StubTask {
  return new StubTask(type, async () => ({
    body: Buffer.from(`${type} report`),
    contentType: 'text/plain',
    extension: 'txt',
    metadata: { companyName: 'Acme', ...metadata },
  }));
}

export function failingTask(type: ArtifactType, message: string): StubTask {
  return new StubTask(type, async () => {
    throw new Error(message);
  });
}

/**
 * Never settles on its own
 */
export function hangingTask(type: ArtifactType): StubTask {
  return new StubTask(type, () => new Promise<GeneratedDocument>(() => undefined));
}

export const SAMPLE_INPUT: JobInput = {
  company_name: 'Acme Corp',
  industry: 'Logistics',
  responses: {
    infrastructure: { cloud: 'hybrid', regions: 2 },
    security_posture: 'mature',
  },
};
