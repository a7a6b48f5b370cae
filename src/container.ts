import type { AppConfig } from './infra/config.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { JobRepository } from './infra/repositories/JobRepository.js';
import { DispatchQueueRepository } from './infra/repositories/DispatchQueueRepository.js';
import { FileSystemBlobStore } from './infra/blob/FileSystemBlobStore.js';
import type { BlobStore } from './infra/blob/BlobStore.js';
import { InProcessJobQueue } from './infra/dispatch/InProcessJobQueue.js';
import { SqliteJobQueue } from './infra/dispatch/SqliteJobQueue.js';
import type { JobConsumer, JobDispatcher } from './infra/dispatch/JobDispatcher.js';
import type { JobStore } from './domain/JobStore.js';
import { ArtifactAccessService } from './services/ArtifactAccessService.js';
import { ReportJobService } from './services/ReportJobService.js';
import { ReportOrchestrator } from './services/ReportOrchestrator.js';
import { JobTimeoutService } from './services/JobTimeoutService.js';
import { JobRetentionService } from './services/JobRetentionService.js';
import { createTaskRegistry } from './services/generation/GenerationTask.js';
import type { GenerationTask } from './services/generation/GenerationTask.js';
import { createDefaultGenerationTasks } from './services/generation/MarkdownReportTask.js';
import { OrchestratorWorker } from './workers/OrchestratorWorker.js';

export type JobQueue = JobDispatcher & JobConsumer;

export interface AppContainer {
  config: AppConfig;
  db: DatabaseAdapter;
  jobStore: JobStore;
  blobStore: BlobStore;
  queue: JobQueue;
  dispatchQueue: DispatchQueueRepository;
  artifactAccess: ArtifactAccessService;
  jobService: ReportJobService;
  orchestrator: ReportOrchestrator;
  worker: OrchestratorWorker;
  timeoutService: JobTimeoutService;
  retentionService: JobRetentionService;
}

export interface ContainerOverrides {
  tasks?: readonly GenerationTask[];
  blobStore?: BlobStore;
  /** Producer used by ingress; defaults to the configured queue */
  dispatcher?: JobDispatcher;
}

function createQueue(config: AppConfig, dispatchQueue: DispatchQueueRepository): JobQueue {
  if (config.generation.backend === 'sqlite') {
    return new SqliteJobQueue(dispatchQueue, {
      pollIntervalMs: config.generation.pollIntervalMs,
      concurrency: config.generation.workerConcurrency,
    });
  }
  return new InProcessJobQueue();
}

/**
 * Composition root shared by the HTTP server and the standalone worker
 */
export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): AppContainer {
  const db = new DatabaseAdapter(config);
  const jobStore = new JobRepository(db, config.jobStore.tableName);
  const blobStore =
    overrides.blobStore ?? new FileSystemBlobStore(config.blobStore.rootDir, config.blobStore.container);
  const dispatchQueue = new DispatchQueueRepository(db);
  const queue = createQueue(config, dispatchQueue);

  const artifactAccess = new ArtifactAccessService({
    baseUrl: config.server.publicBaseUrl,
    container: config.blobStore.container,
    signingSecret: config.access.signingSecret,
    defaultTtlSeconds: config.access.ttlSeconds,
  });

  const jobService = new ReportJobService(jobStore, overrides.dispatcher ?? queue, artifactAccess, {
    artifactTypes: config.generation.artifactTypes,
    retentionDays: config.jobStore.retentionDays,
    estimatedCompletionSeconds: config.generation.estimatedCompletionSeconds,
    container: config.blobStore.container,
    keyPrefix: config.blobStore.keyPrefix,
    accessTtlSeconds: config.access.ttlSeconds,
  });

  const orchestrator = new ReportOrchestrator(
    jobStore,
    blobStore,
    createTaskRegistry(overrides.tasks ?? createDefaultGenerationTasks()),
    {
      keyPrefix: config.blobStore.keyPrefix,
      timeoutSeconds: config.generation.timeoutSeconds,
      finalize: config.finalize,
    }
  );

  return {
    config,
    db,
    jobStore,
    blobStore,
    queue,
    dispatchQueue,
    artifactAccess,
    jobService,
    orchestrator,
    worker: new OrchestratorWorker(queue, orchestrator),
    timeoutService: new JobTimeoutService(jobStore),
    retentionService: new JobRetentionService(jobStore),
  };
}
