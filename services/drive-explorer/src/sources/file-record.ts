import { createHash } from 'node:crypto';

export interface Breadcrumb {
  entityId: string;
  name: string;
  entityType: 'site' | 'drive';
}

/** A transferable file, built from source metadata and later enriched with its local copy. */
export interface FileRecord {
  id: string;
  sourceItemId: string;
  name: string;
  mimeType: string;
  size: number;
  modifiedAt?: string;
  webUrl?: string;
  downloadUrl: string;
  driveId: string;
  siteId?: string;
  folderPath: string;
  breadcrumbs: Breadcrumb[];
  localPath?: string;
}

/** Stable across runs so repeated transfers of one item overwrite the same destination key. */
export function fileRecordId(driveId: string, itemId: string): string {
  return createHash('sha256').update(`${driveId}:${itemId}`).digest('hex');
}
