import type { ProviderKind } from '../constants/provider-kind.enum';
import type {
  GraphDrive,
  GraphDriveItem,
  GraphGroup,
  GraphPage,
  GraphSite,
} from '../microsoft-apis/graph/types/graph.schemas';
import type { Breadcrumb, FileRecord } from './file-record';

/** Drive-level capabilities shared by every provider. */
export interface DriveSource {
  readonly provider: ProviderKind;
  readonly connectionId: string;

  /**
   * Children of a folder (the drive root when `folderId` is absent), one Graph
   * page per iteration. `cursor` resumes a listing at a previously returned
   * next link.
   */
  listFolderItems(
    driveId: string,
    folderId?: string,
    cursor?: string,
  ): AsyncGenerator<GraphPage<GraphDriveItem>>;
  getItemMetadata(driveId: string, itemId: string): Promise<GraphDriveItem>;
  getDownloadUrl(driveId: string, itemId: string): Promise<string | undefined>;
  resolveLineage(driveId: string, siteId?: string): Promise<Breadcrumb[]>;
  buildFileRecord(
    item: GraphDriveItem,
    lineage: Breadcrumb[],
    downloadUrl: string,
  ): FileRecord | undefined;
  downloadContent(record: FileRecord, signal?: AbortSignal): Promise<FileRecord>;
  releaseContent(record: FileRecord): Promise<void>;
}

/** Site discovery for providers organised as sites containing drives. */
export interface SiteDirectory {
  getRootSite(): Promise<GraphSite>;
  searchSites(pageSize: number): AsyncGenerator<GraphPage<GraphSite>>;
  listSites(pageSize: number): AsyncGenerator<GraphPage<GraphSite>>;
  listFollowedSites(): Promise<GraphSite[]>;
  listUnifiedGroups(limit: number): Promise<GraphGroup[]>;
  getGroupRootSite(groupId: string): Promise<GraphSite>;
}

export interface SiteHierarchySource extends DriveSource {
  readonly hierarchy: 'sites';
  readonly sites: SiteDirectory;
  listDrives(siteId: string): Promise<GraphDrive[]>;
}

export interface FlatDriveSource extends DriveSource {
  readonly hierarchy: 'flat';
  listDrives(): Promise<GraphDrive[]>;
}

export type RemoteSource = SiteHierarchySource | FlatDriveSource;
