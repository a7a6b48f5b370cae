import { describe, it, expect } from 'vitest';
import { formatEstimate, mapStatusToResponse } from '../../../src/api/jobMapper.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import type { Job } from '../../../src/domain/entities/Job.js';

const CREATED_AT = new Date('2024-01-01T00:00:00Z');

function job(overrides: Partial<Job>): Job {
  return {
    ...createJob({
      id: 'job-1',
      input: { company_name: 'Acme Corp' },
      expectedArtifactTypes: ['executive', 'technical'],
      retentionDays: 7,
      now: CREATED_AT,
    }),
    ...overrides,
  };
}

describe('formatEstimate', () => {
  it('should format seconds and minutes', () => {
    expect(formatEstimate(45)).toBe('~45 seconds');
    expect(formatEstimate(60)).toBe('~1 minute');
    expect(formatEstimate(180)).toBe('~3 minutes');
  });
});

describe('mapStatusToResponse', () => {
  it('should fall back to a generic error message for failed jobs', () => {
    const response = mapStatusToResponse(
      { job: job({ status: 'FAILED' }), artifacts: [], folder: null },
      { legacyArtifactType: null }
    );

    expect(response).toEqual({
      id: 'job-1',
      job_id: 'job-1',
      status: 'FAILED',
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
      error_message: 'Unknown error',
      failures: [],
    });
  });

  it('should map artifacts and omit the legacy field when its type is missing', () => {
    const artifact = {
      type: 'technical' as const,
      storageKey: 'reports/acme_corp/job-1/technical_report_20240101_000001.md',
      contentType: 'text/markdown; charset=utf-8',
      sizeBytes: 12,
      metadata: { sectionCount: 2 },
    };
    const response = mapStatusToResponse(
      {
        job: job({ status: 'PARTIAL', artifacts: [artifact] }),
        artifacts: [
          {
            artifact,
            access: {
              handle: 'http://localhost:3000/artifacts/x?expires=1&nonce=n&signature=s',
              expiresIn: 60,
              expiresAt: new Date('2024-01-01T00:01:00Z'),
            },
          },
        ],
        folder: { container: 'test-container', prefix: 'reports/acme_corp/job-1/' },
      },
      { legacyArtifactType: 'executive' }
    );

    expect(response).toMatchObject({
      artifact_count: 1,
      artifacts: [
        {
          type: 'technical',
          storage_key: artifact.storageKey,
          access_handle: 'http://localhost:3000/artifacts/x?expires=1&nonce=n&signature=s',
          expires_in: 60,
          expires_at: '2024-01-01T00:01:00.000Z',
          content_type: 'text/markdown; charset=utf-8',
          size_bytes: 12,
          metadata: { sectionCount: 2 },
        },
      ],
    });
    expect(response).not.toHaveProperty('legacy_artifact');
  });
});
