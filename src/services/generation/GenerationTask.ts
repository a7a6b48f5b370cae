import type { JobInput } from '../../domain/entities/JobInput.js';
import type { ArtifactType } from '../../domain/entities/ReportArtifact.js';

export interface GeneratedDocument {
  body: Buffer;
  contentType: string;
  extension: string;
  /** Descriptive fields kept on the artifact (companyName, generatedAt, ...) */
  metadata: Record<string, unknown>;
}

export interface GenerationContext {
  jobId: string;
  /** Fired when the orchestrator stops waiting for this task */
  signal: AbortSignal;
}

/**
 * One document kind. Implementations bound their own runtime and throw on failure.
 */
export interface GenerationTask {
  readonly type: ArtifactType;
  generate(input: JobInput, context: GenerationContext): Promise<GeneratedDocument>;
}

export type GenerationTaskRegistry = ReadonlyMap<ArtifactType, GenerationTask>;

export function createTaskRegistry(tasks: readonly GenerationTask[]): GenerationTaskRegistry {
  const registry = new Map<ArtifactType, GenerationTask>();
  for (const task of tasks) {
    if (registry.has(task.type)) {
      throw new Error(`Duplicate generation task for ${task.type}`);
    }
    registry.set(task.type, task);
  }
  return registry;
}
