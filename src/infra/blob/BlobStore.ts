export interface StoredBlob {
  body: Buffer;
  contentType: string;
}

export interface BlobWriteOptions {
  /** Once aborted, the write is abandoned and the key stays absent */
  signal?: AbortSignal;
}

/**
 * Write-once object storage for produced artifacts
 */
export interface BlobStore {
  readonly container: string;
  /** Rejects with BlobExistsError when the key was already written */
  put(key: string, body: Buffer, contentType: string, options?: BlobWriteOptions): Promise<void>;
  get(key: string): Promise<StoredBlob | null>;
}
