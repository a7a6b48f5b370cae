import { describe, it, expect } from 'vitest';
import { ArtifactAccessService, encodeStorageKey } from '../../../src/services/ArtifactAccessService.js';
import { AccessDeniedError, ValidationError } from '../../../src/domain/errors.js';

const ISSUED_AT = new Date('2024-01-01T00:00:00Z');
const KEY = 'reports/acme_corp/job-1/executive_report_20240101_000000.md';

function createService(clock: { now: Date }): ArtifactAccessService {
  return new ArtifactAccessService(
    {
      baseUrl: 'http://localhost:3000',
      container: 'test-container',
      signingSecret: 'test-secret-0123456789',
      defaultTtlSeconds: 3600,
    },
    () => clock.now
  );
}

function paramsOf(handle: string): Record<string, string> {
  return Object.fromEntries(new URL(handle).searchParams.entries());
}

describe('ArtifactAccessService', () => {
  it('should issue a handle that embeds key and expiry', () => {
    const service = createService({ now: ISSUED_AT });

    const grant = service.issue(KEY, 60);
    const url = new URL(grant.handle);

    expect(url.origin).toBe('http://localhost:3000');
    expect(url.pathname).toBe(`/artifacts/${KEY}`);
    expect(url.searchParams.get('expires')).toBe('1704067260');
    expect(grant.expiresIn).toBe(60);
    expect(grant.expiresAt.toISOString()).toBe('2024-01-01T00:01:00.000Z');
  });

  it('should fall back to the default TTL', () => {
    const service = createService({ now: ISSUED_AT });
    expect(service.issue(KEY).expiresIn).toBe(3600);
  });

  it('should issue a distinct handle on every call', () => {
    const service = createService({ now: ISSUED_AT });
    const first = service.issue(KEY, 60);
    const second = service.issue(KEY, 60);

    expect(first.handle).not.toBe(second.handle);
    expect(first.expiresAt).toEqual(second.expiresAt);
  });

  it('should reject a non-positive TTL', () => {
    const service = createService({ now: ISSUED_AT });
    expect(() => service.issue(KEY, 0)).toThrow(ValidationError);
    expect(() => service.issue(KEY, 1.5)).toThrow(ValidationError);
  });

  it('should percent-encode each key segment', () => {
    expect(encodeStorageKey('reports/acme corp/a&b.md')).toBe('reports/acme%20corp/a%26b.md');
  });

  it('should accept a handle it issued', () => {
    const service = createService({ now: ISSUED_AT });
    const params = paramsOf(service.issue(KEY, 60).handle);

    expect(() => service.verify(KEY, params)).not.toThrow();
  });

  it('should deny a handle presented for another key', () => {
    const service = createService({ now: ISSUED_AT });
    const params = paramsOf(service.issue(KEY, 60).handle);

    expect(() => service.verify(`${KEY}.bak`, params)).toThrow('Invalid access handle signature');
  });

  it('should deny a handle with an altered expiry', () => {
    const service = createService({ now: ISSUED_AT });
    const params = paramsOf(service.issue(KEY, 60).handle);

    expect(() => service.verify(KEY, { ...params, expires: '1704070800' })).toThrow(
      'Invalid access handle signature'
    );
  });

  it('should deny a handle signed with another secret', () => {
    const clock = { now: ISSUED_AT };
    const other = new ArtifactAccessService(
      {
        baseUrl: 'http://localhost:3000',
        container: 'test-container',
        signingSecret: 'other-test-secret-0000',
        defaultTtlSeconds: 3600,
      },
      () => clock.now
    );
    const params = paramsOf(other.issue(KEY, 60).handle);

    expect(() => createService(clock).verify(KEY, params)).toThrow(AccessDeniedError);
  });

  it('should deny an expired handle', () => {
    const clock = { now: ISSUED_AT };
    const service = createService(clock);
    const params = paramsOf(service.issue(KEY, 60).handle);

    clock.now = new Date('2024-01-01T00:01:00Z');
    expect(() => service.verify(KEY, params)).not.toThrow();

    clock.now = new Date('2024-01-01T00:01:01Z');
    expect(() => service.verify(KEY, params)).toThrow('Access handle expired');
  });

  it('should deny missing or malformed parameters', () => {
    const service = createService({ now: ISSUED_AT });

    expect(() => service.verify(KEY, {})).toThrow('Missing access handle parameters');
    expect(() => service.verify(KEY, { expires: ['1'], nonce: 'n', signature: 's' })).toThrow(
      'Missing access handle parameters'
    );
    expect(() => service.verify(KEY, { expires: '-5', nonce: 'n', signature: 's' })).toThrow(
      'Malformed access handle'
    );
  });
});
