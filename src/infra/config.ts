import type { Env } from './env.js';
import type { ArtifactType } from '../domain/entities/ReportArtifact.js';
import { ConfigError } from '../domain/errors.js';

export type DispatchBackend = 'in-process' | 'sqlite';

/**
 * Immutable configuration built once at process start and handed to each component
 */
export interface AppConfig {
  readonly nodeEnv: Env['NODE_ENV'];
  readonly server: {
    readonly port: number;
    readonly publicBaseUrl: string;
  };
  readonly jobStore: {
    readonly databasePath: string;
    readonly tableName: string;
    readonly retentionDays: number;
  };
  readonly blobStore: {
    readonly rootDir: string;
    readonly container: string;
    readonly keyPrefix: string;
  };
  readonly access: {
    readonly ttlSeconds: number;
    readonly signingSecret: string;
  };
  readonly generation: {
    readonly artifactTypes: readonly ArtifactType[];
    readonly backend: DispatchBackend;
    readonly runEmbeddedWorker: boolean;
    readonly pollIntervalMs: number;
    readonly workerConcurrency: number;
    readonly timeoutSeconds: number;
    readonly estimatedCompletionSeconds: number;
  };
  readonly finalize: {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
  };
  readonly maintenance: {
    readonly jobTimeoutMinutes: number;
    readonly cronExpression: string;
  };
  readonly compatibility: {
    readonly legacyArtifactType: ArtifactType | null;
  };
  readonly logging: {
    readonly level: Env['LOG_LEVEL'];
    readonly file: string | null;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Total sleep between finalize attempts: base + 2x base + ... for maxAttempts - 1 retries
 */
export function finalizeBackoffBudgetMs(maxAttempts: number, baseDelayMs: number): number {
  return baseDelayMs * (2 ** (maxAttempts - 1) - 1);
}

export function buildConfig(env: Env): AppConfig {
  // in-process dispatch only reaches a worker running inside the server
  if (env.DISPATCH_BACKEND === 'in-process' && !env.RUN_EMBEDDED_WORKER) {
    throw new ConfigError('RUN_EMBEDDED_WORKER=false requires DISPATCH_BACKEND=sqlite', {
      backend: env.DISPATCH_BACKEND,
    });
  }

  // the sweep must not fail a job that can still finish on its own
  const backoffMs = finalizeBackoffBudgetMs(env.FINALIZE_MAX_ATTEMPTS, env.FINALIZE_BACKOFF_MS);
  const runBudgetSeconds = env.GENERATION_TIMEOUT_SECONDS + backoffMs / 1000;
  if (env.JOB_TIMEOUT_MINUTES * 60 <= runBudgetSeconds) {
    throw new ConfigError(
      'JOB_TIMEOUT_MINUTES must exceed GENERATION_TIMEOUT_SECONDS plus the finalize backoff',
      {
        jobTimeoutSeconds: env.JOB_TIMEOUT_MINUTES * 60,
        runBudgetSeconds,
      }
    );
  }

  return deepFreeze({
    nodeEnv: env.NODE_ENV,
    server: {
      port: env.PORT,
      publicBaseUrl: env.PUBLIC_BASE_URL.replace(/\/+$/, ''),
    },
    jobStore: {
      databasePath: env.SQLITE_DB_PATH,
      tableName: env.JOB_TABLE,
      retentionDays: env.JOB_RETENTION_DAYS,
    },
    blobStore: {
      rootDir: env.BLOB_ROOT,
      container: env.BLOB_CONTAINER,
      keyPrefix: env.BLOB_PREFIX,
    },
    access: {
      ttlSeconds: env.ACCESS_HANDLE_TTL_SECONDS,
      signingSecret: env.ACCESS_HANDLE_SECRET,
    },
    generation: {
      artifactTypes: [...env.ARTIFACT_TYPES],
      backend: env.DISPATCH_BACKEND,
      runEmbeddedWorker: env.RUN_EMBEDDED_WORKER,
      pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
      workerConcurrency: env.WORKER_CONCURRENCY,
      timeoutSeconds: env.GENERATION_TIMEOUT_SECONDS,
      estimatedCompletionSeconds: env.ESTIMATED_COMPLETION_SECONDS,
    },
    finalize: {
      maxAttempts: env.FINALIZE_MAX_ATTEMPTS,
      baseDelayMs: env.FINALIZE_BACKOFF_MS,
    },
    maintenance: {
      jobTimeoutMinutes: env.JOB_TIMEOUT_MINUTES,
      cronExpression: env.MAINTENANCE_CRON,
    },
    compatibility: {
      legacyArtifactType: env.LEGACY_ARTIFACT_TYPE ?? null,
    },
    logging: {
      level: env.LOG_LEVEL,
      file: env.LOG_FILE ?? null,
    },
  });
}
