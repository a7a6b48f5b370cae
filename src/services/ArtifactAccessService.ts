import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { AccessDeniedError, ValidationError } from '../domain/errors.js';

export interface AccessGrant {
  handle: string;
  expiresIn: number;
  expiresAt: Date;
}

export interface AccessHandleParams {
  expires?: unknown;
  nonce?: unknown;
  signature?: unknown;
}

export interface ArtifactAccessOptions {
  baseUrl: string;
  container: string;
  signingSecret: string;
  defaultTtlSeconds: number;
}

export const ARTIFACT_ROUTE_PREFIX = '/artifacts';

export function encodeStorageKey(storageKey: string): string {
  return storageKey.split('/').map(encodeURIComponent).join('/');
}

/**
 * ArtifactAccessService - issues and checks signed, time-limited download handles.
 * Nothing is stored: each handle carries its own expiry, nonce and HMAC.
 */
export class ArtifactAccessService {
  constructor(
    private options: ArtifactAccessOptions,
    private now: () => Date = () => new Date()
  ) {}

  issue(storageKey: string, ttlSeconds: number = this.options.defaultTtlSeconds): AccessGrant {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new ValidationError('Access handle TTL must be a positive number of seconds', {
        ttlSeconds,
      });
    }

    const expires = Math.floor(this.now().getTime() / 1000) + ttlSeconds;
    const nonce = randomBytes(12).toString('base64url');
    const signature = this.sign(storageKey, expires, nonce);
    const query = new URLSearchParams({ expires: String(expires), nonce, signature });

    return {
      handle: `${this.options.baseUrl}${ARTIFACT_ROUTE_PREFIX}/${encodeStorageKey(storageKey)}?${query.toString()}`,
      expiresIn: ttlSeconds,
      expiresAt: new Date(expires * 1000),
    };
  }

  /**
   * Throws AccessDeniedError unless the parameters were issued for `storageKey` and are unexpired
   */
  verify(storageKey: string, params: AccessHandleParams): void {
    const { expires, nonce, signature } = params;
    if (typeof expires !== 'string' || typeof nonce !== 'string' || typeof signature !== 'string') {
      throw new AccessDeniedError('Missing access handle parameters');
    }

    const expiresAt = Number(expires);
    if (!/^\d+$/.test(expires) || !Number.isSafeInteger(expiresAt)) {
      throw new AccessDeniedError('Malformed access handle');
    }

    const expected = Buffer.from(this.sign(storageKey, expiresAt, nonce), 'base64url');
    const provided = Buffer.from(signature, 'base64url');
    if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
      throw new AccessDeniedError('Invalid access handle signature');
    }

    if (Math.floor(this.now().getTime() / 1000) > expiresAt) {
      throw new AccessDeniedError('Access handle expired');
    }
  }

  private sign(storageKey: string, expires: number, nonce: string): string {
    return createHmac('sha256', this.options.signingSecret)
      .update(`${this.options.container}\n${storageKey}\n${expires}\n${nonce}`)
      .digest('base64url');
  }
}
