import { Logger } from '@nestjs/common';
import { DEFAULT_MIME_TYPE, FOLDER_PAGE_SIZE } from '../constants/defaults.constants';
import type { ProviderKind } from '../constants/provider-kind.enum';
import type { GraphRequester } from '../microsoft-apis/graph/graph-requester';
import {
  GraphDriveItemSchema,
  type GraphDriveItem,
  GraphDriveSchema,
  type GraphPage,
  GraphSiteSchema,
} from '../microsoft-apis/graph/types/graph.schemas';
import type { Concealer } from '../utils/logging.util';
import type { ContentDownloader } from './content-downloader.service';
import { type Breadcrumb, type FileRecord, fileRecordId } from './file-record';
import type { DriveSource } from './remote-source.interface';

const ITEM_FIELDS = [
  'id',
  'name',
  'size',
  'lastModifiedDateTime',
  'webUrl',
  'file',
  'folder',
  'root',
  'parentReference',
];

export interface GraphDriveSourceDependencies {
  connectionId: string;
  requester: GraphRequester;
  downloader: ContentDownloader;
  conceal: Concealer;
}

/** Drive operations common to every Graph backed provider. */
export abstract class GraphDriveSource implements DriveSource {
  public abstract readonly provider: ProviderKind;
  public readonly connectionId: string;

  protected readonly logger = new Logger(this.constructor.name);
  protected readonly requester: GraphRequester;
  protected readonly conceal: Concealer;
  private readonly downloader: ContentDownloader;

  protected constructor({ connectionId, requester, downloader, conceal }: GraphDriveSourceDependencies) {
    this.connectionId = connectionId;
    this.requester = requester;
    this.downloader = downloader;
    this.conceal = conceal;
  }

  public listFolderItems(
    driveId: string,
    folderId?: string,
    cursor?: string,
  ): AsyncGenerator<GraphPage<GraphDriveItem>> {
    const childrenPath = folderId
      ? `/drives/${driveId}/items/${folderId}/children`
      : `/drives/${driveId}/root/children`;

    return this.requester.paginate(
      'list folder items',
      GraphDriveItemSchema,
      (client) => client.api(childrenPath).select(ITEM_FIELDS).top(FOLDER_PAGE_SIZE),
      cursor,
    );
  }

  public async getItemMetadata(driveId: string, itemId: string): Promise<GraphDriveItem> {
    return this.requester.get('get item metadata', GraphDriveItemSchema, (client) =>
      client.api(`/drives/${driveId}/items/${itemId}`).select(ITEM_FIELDS),
    );
  }

  public async getDownloadUrl(driveId: string, itemId: string): Promise<string | undefined> {
    const item = await this.requester.get('get download url', GraphDriveItemSchema, (client) =>
      client.api(`/drives/${driveId}/items/${itemId}`).select(['id', '@microsoft.graph.downloadUrl']),
    );
    return item['@microsoft.graph.downloadUrl'] ?? undefined;
  }

  /**
   * Resolves display names for the record breadcrumbs. A lookup that fails
   * falls back to the raw id so a transfer never fails on naming alone.
   */
  public async resolveLineage(driveId: string, siteId?: string): Promise<Breadcrumb[]> {
    const breadcrumbs: Breadcrumb[] = [];

    if (siteId) {
      const siteName = await this.requester
        .get('get site', GraphSiteSchema, (client) =>
          client.api(`/sites/${siteId}`).select(['id', 'displayName', 'name']),
        )
        .then((site) => site.displayName ?? site.name ?? siteId)
        .catch((error: unknown) => this.lineageFallback('site', siteId, error));
      breadcrumbs.push({ entityId: siteId, name: siteName, entityType: 'site' });
    }

    const driveName = await this.requester
      .get('get drive', GraphDriveSchema, (client) =>
        client.api(`/drives/${driveId}`).select(['id', 'name']),
      )
      .then((drive) => drive.name ?? driveId)
      .catch((error: unknown) => this.lineageFallback('drive', driveId, error));
    breadcrumbs.push({ entityId: driveId, name: driveName, entityType: 'drive' });

    return breadcrumbs;
  }

  public buildFileRecord(
    item: GraphDriveItem,
    lineage: Breadcrumb[],
    downloadUrl: string,
  ): FileRecord | undefined {
    const driveId = item.parentReference?.driveId;
    if (!item.file || !item.name || !driveId) return undefined;

    const siteId =
      item.parentReference?.siteId ??
      lineage.find((crumb) => crumb.entityType === 'site')?.entityId;

    return {
      id: fileRecordId(driveId, item.id),
      sourceItemId: item.id,
      name: item.name,
      mimeType: item.file.mimeType ?? DEFAULT_MIME_TYPE,
      size: item.size ?? 0,
      modifiedAt: item.lastModifiedDateTime ?? undefined,
      webUrl: item.webUrl ?? undefined,
      downloadUrl,
      driveId,
      siteId,
      folderPath: toFolderPath(item.parentReference?.path),
      breadcrumbs: lineage,
    };
  }

  public async downloadContent(record: FileRecord, signal?: AbortSignal): Promise<FileRecord> {
    const localPath = await this.downloader.download(record.downloadUrl, record.id, signal);
    return { ...record, localPath };
  }

  public async releaseContent(record: FileRecord): Promise<void> {
    if (record.localPath) await this.downloader.release(record.localPath);
  }

  private lineageFallback(entityType: Breadcrumb['entityType'], entityId: string, error: unknown): string {
    this.logger.warn({
      msg: `Could not resolve ${entityType} name, using its id instead`,
      entityId: this.conceal(entityId),
      error: error instanceof Error ? error.message : String(error),
    });
    return entityId;
  }
}

/**
 * Turns a Graph parent path (`/drives/{id}/root:/Shared/Reports` or
 * `/drive/root:`) into the folder path inside the drive.
 */
export function toFolderPath(parentPath: string | null | undefined): string {
  if (!parentPath) return '/';
  const [, inDrive = ''] = parentPath.split('root:');
  const decoded = safeDecode(inDrive);
  return decoded.startsWith('/') ? decoded : `/${decoded}`;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
