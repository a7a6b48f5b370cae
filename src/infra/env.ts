import { z, ZodError } from 'zod';
import { ARTIFACT_TYPES } from '../domain/entities/ReportArtifact.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

/**
 * Environment variable schema with strict validation
 * Read once at process start; components receive the derived AppConfig instead
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).default(3000),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),

  // Durable job store
  SQLITE_DB_PATH: z.string().min(1).default('./data/jobs.db'),
  JOB_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'JOB_TABLE must be a plain SQL identifier' })
    .default('report_jobs'),
  JOB_RETENTION_DAYS: z.coerce.number().int().min(1).default(7),

  // Blob store
  BLOB_ROOT: z.string().min(1).default('./data/blobs'),
  BLOB_CONTAINER: z.string().min(1).default('report-artifacts'),
  BLOB_PREFIX: z.string().default('reports/'),

  // Artifact access handles
  ACCESS_HANDLE_TTL_SECONDS: z.coerce.number().int().min(1).default(3600),
  ACCESS_HANDLE_SECRET: z.string().min(16, {
    message: 'ACCESS_HANDLE_SECRET must be at least 16 characters',
  }),

  // Generation
  ARTIFACT_TYPES: z
    .string()
    .default(ARTIFACT_TYPES.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .pipe(
      z
        .array(z.enum(ARTIFACT_TYPES))
        .min(1, { message: 'ARTIFACT_TYPES must name at least one artifact type' })
        .refine((types) => new Set(types).size === types.length, {
          message: 'ARTIFACT_TYPES must not repeat a type',
        })
    ),
  DISPATCH_BACKEND: z.enum(['in-process', 'sqlite']).default('in-process'),
  RUN_EMBEDDED_WORKER: booleanFlag,
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(50).default(1000),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  GENERATION_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(600),
  ESTIMATED_COMPLETION_SECONDS: z.coerce.number().int().min(1).default(180),

  // Finalization retries
  FINALIZE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  FINALIZE_BACKOFF_MS: z.coerce.number().int().min(0).default(200),

  // Maintenance
  JOB_TIMEOUT_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'JOB_TIMEOUT_MINUTES must be at least 1' })
    .default(30),
  MAINTENANCE_CRON: z.string().min(1).default('*/5 * * * *'),

  // Older clients read a single top-level artifact
  LEGACY_ARTIFACT_TYPE: z.preprocess(emptyAsUndefined, z.enum(ARTIFACT_TYPES).optional()),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
