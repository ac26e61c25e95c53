import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { NotFoundError, ValidationError } from '../errors/drive-explorer.error';
import type {
  GraphDrive,
  GraphDriveItem,
  GraphSite,
} from '../microsoft-apis/graph/types/graph.schemas';
import type { RemoteSource } from '../sources/remote-source.interface';
import { type Concealer, getConcealer } from '../utils/logging.util';
import type { NavigationContext, RemoteNode, RemotePage } from './browser.types';
import {
  driveItemPath,
  drivePath,
  FLAT_DRIVES_PATH,
  folderPath,
  SITES_PATH,
  siteDrivesPath,
} from './navigation-paths';
import { decodePageCursor, encodePageCursor } from './page-cursor';
import { SiteAggregator } from './site-aggregator.service';

export type BrowseLevel = 'sites' | 'drives' | 'folder';

/** Resolves one level of a connection's site / drive / folder hierarchy into a page of nodes. */
@Injectable()
export class TreeBrowser {
  private readonly logger = new Logger(this.constructor.name);
  private readonly conceal: Concealer;

  public constructor(
    private readonly siteAggregator: SiteAggregator,
    private readonly configService: ConfigService<Config, true>,
  ) {
    this.conceal = getConcealer(configService);
  }

  /** Levels resolve in order site, drive, folder: a `driveId` without its site is ignored. */
  public levelOf(source: RemoteSource, navigation: NavigationContext): BrowseLevel {
    if (source.hierarchy === 'sites' && !navigation.siteId) return 'sites';
    if (navigation.driveId) return 'folder';
    return 'drives';
  }

  public async browse(source: RemoteSource, navigation: NavigationContext): Promise<RemotePage> {
    const level = this.levelOf(source, navigation);
    this.assertNavigation(source, navigation, level);
    const logPrefix = this.logPrefix(navigation);

    const { driveId, siteId } = navigation;
    if (level === 'folder' && driveId) {
      const rootParentPath = siteId ? siteDrivesPath(siteId) : FLAT_DRIVES_PATH;
      return this.listFolder(source, navigation, driveId, rootParentPath, logPrefix);
    }

    if (source.hierarchy === 'flat') {
      const drives = await source.listDrives();
      if (drives.length === 0) throw new NotFoundError('No drive found for this account');
      return {
        files: [],
        folders: drives.map((drive) => toDriveNode(drive, drivePath(drive.id))),
        currentPath: FLAT_DRIVES_PATH,
      };
    }

    if (!siteId) {
      const sites = await this.siteAggregator.aggregateSites(source.sites, logPrefix);
      return { files: [], folders: sites.map(toSiteNode), currentPath: SITES_PATH };
    }

    const drives = await source.listDrives(siteId);
    if (drives.length === 0) {
      throw new NotFoundError('No document libraries found in this site', { siteId });
    }
    return {
      files: [],
      folders: drives.map((drive) =>
        toDriveNode(drive, `${siteDrivesPath(siteId)}/${drive.id}`, siteId),
      ),
      currentPath: siteDrivesPath(siteId),
      parentPath: SITES_PATH,
    };
  }

  private async listFolder(
    source: RemoteSource,
    navigation: NavigationContext,
    driveId: string,
    rootParentPath: string,
    logPrefix: string,
  ): Promise<RemotePage> {
    const { folderId, siteId, pageCursor } = navigation;
    const { baseUrl } = this.configService.get('graph', { infer: true });
    const maxFolderItems = this.configService.get('browse.maxFolderItems', { infer: true });

    const parentPath = folderId
      ? await this.resolveFolderParentPath(source, driveId, folderId)
      : rootParentPath;
    const resumeFrom = pageCursor ? decodePageCursor(pageCursor, baseUrl, driveId) : undefined;

    const page: RemotePage = {
      files: [],
      folders: [],
      currentPath: folderPath(driveId, folderId),
      parentPath,
    };

    let seen = 0;
    for await (const { items, nextLink } of source.listFolderItems(driveId, folderId, resumeFrom)) {
      for (const item of items) {
        const node = toItemNode(item, driveId, siteId);
        if (!node) {
          this.logger.debug(`${logPrefix} Dropping item without file or folder facet`);
          continue;
        }
        (node.kind === 'file' ? page.files : page.folders).push(node);
      }

      seen += items.length;
      if (seen >= maxFolderItems && nextLink) {
        this.logger.log(`${logPrefix} Folder listing cut after ${seen} items`);
        page.nextPageCursor = encodePageCursor(nextLink);
        break;
      }
    }

    return page;
  }

  private async resolveFolderParentPath(
    source: RemoteSource,
    driveId: string,
    folderId: string,
  ): Promise<string> {
    const folder = await source.getItemMetadata(driveId, folderId);
    if (!folder.folder) {
      throw new ValidationError('folderId does not reference a folder', { driveId, folderId });
    }

    const parentId = folder.parentReference?.id;
    if (!parentId || folder.parentReference?.path?.endsWith('root:')) return drivePath(driveId);
    return driveItemPath(driveId, parentId);
  }

  private assertNavigation(
    source: RemoteSource,
    navigation: NavigationContext,
    level: BrowseLevel,
  ): void {
    if (navigation.pageCursor && level !== 'folder') {
      throw new ValidationError('pageCursor is only valid when listing a folder');
    }
    if (source.hierarchy === 'flat' && navigation.siteId) {
      throw new ValidationError(`siteId is not supported for ${source.provider} connections`);
    }
  }

  private logPrefix({ organizationScope, siteId, driveId }: NavigationContext): string {
    return [
      `[Connection: ${this.conceal(organizationScope)}]`,
      siteId ? `[Site: ${this.conceal(siteId)}]` : '',
      driveId ? `[Drive: ${this.conceal(driveId)}]` : '',
    ].join('');
  }
}

function toSiteNode(site: GraphSite): RemoteNode {
  return {
    id: site.id,
    name: site.displayName ?? site.name ?? site.id,
    kind: 'folder',
    container: 'site',
    path: `${SITES_PATH}/${site.id}`,
    navigation: { siteId: site.id },
  };
}

function toDriveNode(drive: GraphDrive, path: string, siteId?: string): RemoteNode {
  return {
    id: drive.id,
    name: drive.name ?? drive.id,
    kind: 'folder',
    container: 'drive',
    path,
    navigation: { siteId, driveId: drive.id },
  };
}

function toItemNode(item: GraphDriveItem, driveId: string, siteId?: string): RemoteNode | undefined {
  const base = {
    id: item.id,
    name: item.name ?? item.id,
    path: driveItemPath(driveId, item.id),
    modifiedAt: item.lastModifiedDateTime ?? undefined,
  };

  if (item.file) {
    return {
      ...base,
      kind: 'file',
      container: 'file',
      navigation: { siteId, driveId },
      size: item.size ?? undefined,
      mimeType: item.file.mimeType ?? undefined,
    };
  }
  if (item.folder) {
    return {
      ...base,
      kind: 'folder',
      container: 'folder',
      navigation: { siteId, driveId, folderId: item.id },
    };
  }
  return undefined;
}
