/**
 * ReportArtifact entity - one produced output document, stored in the blob store
 */
export const ARTIFACT_TYPES = ['executive', 'technical', 'compliance'] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export interface ReportArtifact {
  type: ArtifactType;
  storageKey: string;
  contentType: string;
  sizeBytes: number;
  metadata: Record<string, unknown>;
}

/**
 * Lowercased company label safe for use as a key segment
 */
export function toSafeKeySegment(label: string | null | undefined): string {
  const source = (label ?? '').trim().toLowerCase() || 'customer';
  return source.replace(/[^a-z0-9_-]/g, '_');
}

/**
 * Compact UTC timestamp used in storage keys, e.g. 20240131_094500
 */
export function formatKeyTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Folder that groups every artifact of one job: <prefix><company>/<jobId>/
 */
export function buildJobFolderPrefix(params: {
  keyPrefix: string;
  companyName: string | null;
  jobId: string;
}): string {
  return `${params.keyPrefix}${toSafeKeySegment(params.companyName)}/${params.jobId}/`;
}

export function buildStorageKey(params: {
  folderPrefix: string;
  type: ArtifactType;
  generatedAt: Date;
  extension: string;
}): string {
  const extension = params.extension.replace(/^\.+/, '') || 'bin';
  return `${params.folderPrefix}${params.type}_report_${formatKeyTimestamp(params.generatedAt)}.${extension}`;
}
