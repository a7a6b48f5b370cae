import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../../../src/infra/env.js';
import { buildConfig, finalizeBackoffBudgetMs } from '../../../src/infra/config.js';
import { ConfigError } from '../../../src/domain/errors.js';

const required = { ACCESS_HANDLE_SECRET: 'test-secret-0123456789' };

describe('parseEnv', () => {
  it('should apply defaults', () => {
    const env = parseEnv(required);

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(3000);
    expect(env.JOB_TABLE).toBe('report_jobs');
    expect(env.ARTIFACT_TYPES).toEqual(['executive', 'technical', 'compliance']);
    expect(env.DISPATCH_BACKEND).toBe('in-process');
    expect(env.RUN_EMBEDDED_WORKER).toBe(true);
    expect(env.ACCESS_HANDLE_TTL_SECONDS).toBe(3600);
    expect(env.LEGACY_ARTIFACT_TYPE).toBeUndefined();
  });

  it('should parse comma separated artifact types', () => {
    const env = parseEnv({ ...required, ARTIFACT_TYPES: ' technical , executive ' });
    expect(env.ARTIFACT_TYPES).toEqual(['technical', 'executive']);
  });

  it('should reject unknown or repeated artifact types', () => {
    expect(() => parseEnv({ ...required, ARTIFACT_TYPES: 'executive,summary' })).toThrow(ZodError);
    expect(() => parseEnv({ ...required, ARTIFACT_TYPES: 'executive,executive' })).toThrow(ZodError);
    expect(() => parseEnv({ ...required, ARTIFACT_TYPES: ' , ' })).toThrow(ZodError);
  });

  it('should reject table names that are not plain identifiers', () => {
    expect(() => parseEnv({ ...required, JOB_TABLE: 'jobs; DROP TABLE x' })).toThrow(ZodError);
  });

  it('should require a signing secret', () => {
    expect(() => parseEnv({})).toThrow(ZodError);
    expect(() => parseEnv({ ACCESS_HANDLE_SECRET: 'short' })).toThrow(ZodError);
  });

  it('should treat an empty legacy artifact type as unset', () => {
    expect(parseEnv({ ...required, LEGACY_ARTIFACT_TYPE: '' }).LEGACY_ARTIFACT_TYPE).toBeUndefined();
    expect(parseEnv({ ...required, LEGACY_ARTIFACT_TYPE: 'executive' }).LEGACY_ARTIFACT_TYPE).toBe(
      'executive'
    );
  });
});

describe('buildConfig', () => {
  it('should produce a frozen configuration', () => {
    const config = buildConfig(
      parseEnv({
        ...required,
        PUBLIC_BASE_URL: 'https://reports.example.com/',
        DISPATCH_BACKEND: 'sqlite',
        RUN_EMBEDDED_WORKER: 'false',
        LEGACY_ARTIFACT_TYPE: 'executive',
      })
    );

    expect(config.server.publicBaseUrl).toBe('https://reports.example.com');
    expect(config.generation.runEmbeddedWorker).toBe(false);
    expect(config.compatibility.legacyArtifactType).toBe('executive');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.generation)).toBe(true);
    expect(Object.isFrozen(config.generation.artifactTypes)).toBe(true);
  });

  it('should refuse in-process dispatch without an embedded worker', () => {
    expect(() => buildConfig(parseEnv({ ...required, RUN_EMBEDDED_WORKER: 'false' }))).toThrow(ConfigError);
  });

  it('should refuse a sweep timeout shorter than a generation run', () => {
    expect(() =>
      buildConfig(parseEnv({ ...required, JOB_TIMEOUT_MINUTES: '1', GENERATION_TIMEOUT_SECONDS: '600' }))
    ).toThrow('JOB_TIMEOUT_MINUTES must exceed GENERATION_TIMEOUT_SECONDS plus the finalize backoff');
  });

  it('should count the finalize backoff in the run budget', () => {
    // 10 minutes = 600 s, generation 590 s + backoff 200 * (1 + 2 + 4 + 8) ms = 593 s
    expect(() =>
      buildConfig(parseEnv({ ...required, JOB_TIMEOUT_MINUTES: '10', GENERATION_TIMEOUT_SECONDS: '590' }))
    ).not.toThrow();
    // 598 s + 3 s = 601 s
    expect(() =>
      buildConfig(parseEnv({ ...required, JOB_TIMEOUT_MINUTES: '10', GENERATION_TIMEOUT_SECONDS: '598' }))
    ).toThrow(ConfigError);
  });

  it('should sum the finalize retry delays', () => {
    expect(finalizeBackoffBudgetMs(5, 200)).toBe(3000);
    expect(finalizeBackoffBudgetMs(1, 200)).toBe(0);
  });
});
