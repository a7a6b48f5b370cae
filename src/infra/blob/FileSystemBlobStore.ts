import { randomUUID } from 'node:crypto';
import { link, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { BlobExistsError, StorageError, ValidationError, describeError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { BlobStore, BlobWriteOptions, StoredBlob } from './BlobStore.js';

const META_SUFFIX = '.meta.json';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Blob store on the local filesystem: <rootDir>/<container>/<key>.
 * Content type lives in a sidecar file next to the blob.
 */
export class FileSystemBlobStore implements BlobStore {
  private readonly baseDir: string;

  constructor(
    rootDir: string,
    readonly container: string
  ) {
    this.baseDir = path.resolve(rootDir, container);
  }

  /**
   * The body is staged in a temporary file and linked into place, so the key
   * either holds the whole body or does not exist. Linking is the commit point.
   */
  async put(key: string, body: Buffer, contentType: string, options: BlobWriteOptions = {}): Promise<void> {
    const { signal } = options;
    const target = this.resolveKey(key);
    const staging = `${target}.${randomUUID()}.tmp`;
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(staging, body, { flag: 'wx', signal });
      if (signal?.aborted) {
        throw new StorageError('Blob write cancelled', { key });
      }
      await link(staging, target);
      await writeFile(`${target}${META_SUFFIX}`, JSON.stringify({ contentType }), { flag: 'wx' });
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new BlobExistsError(key);
      }
      if (signal?.aborted) {
        throw new StorageError('Blob write cancelled', { key });
      }
      throw new StorageError('Failed to write blob', { key, error: describeError(error) });
    } finally {
      await rm(staging, { force: true }).catch((error: unknown) => {
        logger.warn('Failed to remove staged blob', { staging, error: describeError(error) });
      });
    }
    logger.debug('Blob stored', { container: this.container, key, bytes: body.length });
  }

  async get(key: string): Promise<StoredBlob | null> {
    const target = this.resolveKey(key);
    let body: Buffer;
    try {
      body = await readFile(target);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new StorageError('Failed to read blob', { key, error: describeError(error) });
    }

    return { body, contentType: await this.readContentType(target) };
  }

  private async readContentType(target: string): Promise<string> {
    try {
      const raw = await readFile(`${target}${META_SUFFIX}`, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && 'contentType' in parsed) {
        const { contentType } = parsed;
        if (typeof contentType === 'string') {
          return contentType;
        }
      }
    } catch (error) {
      logger.warn('Blob metadata unreadable', { target, error: describeError(error) });
    }
    return 'application/octet-stream';
  }

  private resolveKey(key: string): string {
    const segments = key.split('/');
    if (
      key.length === 0 ||
      key.startsWith('/') ||
      key.endsWith(META_SUFFIX) ||
      segments.some((segment) => segment === '' || segment === '.' || segment === '..')
    ) {
      throw new ValidationError(`Invalid blob key: ${key}`);
    }
    return path.join(this.baseDir, ...segments);
  }
}
