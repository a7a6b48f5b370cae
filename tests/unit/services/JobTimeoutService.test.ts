import { describe, it, expect, beforeEach } from 'vitest';
import { JobTimeoutService } from '../../../src/services/JobTimeoutService.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import type { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { SAMPLE_INPUT, createTestStore } from '../../helpers/fixtures.js';

describe('JobTimeoutService', () => {
  let store: JobRepository;

  const seed = (id: string, createdAt: Date) =>
    store.create(
      createJob({ id, input: SAMPLE_INPUT, expectedArtifactTypes: ['executive'], retentionDays: 7, now: createdAt })
    );

  beforeEach(() => {
    store = createTestStore().store;
  });

  it('should fail pending and processing jobs past the cutoff', async () => {
    await seed('stale-pending', new Date('2024-01-01T00:00:00Z'));
    await seed('stale-processing', new Date('2024-01-01T00:00:00Z'));
    await store.update('stale-processing', { from: ['PENDING'], to: 'PROCESSING' });
    await seed('fresh', new Date());

    const service = new JobTimeoutService(store);
    const result = await service.failTimedOutJobs(30);

    expect(result).toEqual({ jobsFailed: 1, skipped: 0 });
    const pending = await store.get('stale-pending');
    expect(pending?.status).toBe('FAILED');
    expect(pending?.errorMessage).toBe('Timed out after 30 minutes');
    // the PROCESSING write above refreshed updated_at
    expect((await store.get('stale-processing'))?.status).toBe('PROCESSING');
    expect((await store.get('fresh'))?.status).toBe('PENDING');
  });

  it('should use the clock it is given for the cutoff', async () => {
    await seed('job-1', new Date());
    await store.update('job-1', { from: ['PENDING'], to: 'PROCESSING' });

    const later = new Date(Date.now() + 2 * 60 * 1000);
    const result = await new JobTimeoutService(store, () => later).failTimedOutJobs(1);

    expect(result).toEqual({ jobsFailed: 1, skipped: 0 });
    const job = await store.get('job-1');
    expect(job?.status).toBe('FAILED');
    expect(job?.errorMessage).toBe('Timed out after 1 minute');
    expect(job?.artifacts).toEqual([]);
  });

  it('should leave terminal jobs alone', async () => {
    await seed('done', new Date('2024-01-01T00:00:00Z'));
    await store.update('done', { from: ['PENDING'], to: 'PROCESSING' });
    await store.update('done', { from: ['PROCESSING'], to: 'COMPLETED' });

    const later = new Date(Date.now() + 24 * 60 * 60 * 1000);
    const result = await new JobTimeoutService(store, () => later).failTimedOutJobs(30);

    expect(result).toEqual({ jobsFailed: 0, skipped: 0 });
    expect((await store.get('done'))?.status).toBe('COMPLETED');
  });

  it('should do nothing when the timeout is disabled', async () => {
    await seed('stale', new Date('2024-01-01T00:00:00Z'));

    const result = await new JobTimeoutService(store).failTimedOutJobs(0);

    expect(result).toEqual({ jobsFailed: 0, skipped: 0 });
    expect((await store.get('stale'))?.status).toBe('PENDING');
  });
});
