import { GraphError } from '@microsoft/microsoft-graph-client';
import { describe, expect, it, vi } from 'vitest';
import { NotFoundError } from '../errors/drive-explorer.error';
import type { GraphDriveItem } from '../microsoft-apis/graph/types/graph.schemas';
import { createFakeRequester } from '../test-utils/fake-graph-client';
import type { ContentDownloader } from './content-downloader.service';
import { fileRecordId } from './file-record';
import { toFolderPath } from './graph-drive.source';
import { OneDriveSource } from './onedrive.source';
import { SharepointSource } from './sharepoint.source';

const identity = (value: string | null | undefined) => value ?? '__erroneous__';

function createDownloader() {
  return {
    download: vi.fn().mockResolvedValue('/tmp/staging/record'),
    release: vi.fn().mockResolvedValue(undefined),
  };
}

function createSharepointSource(routes: Record<string, unknown>) {
  const fake = createFakeRequester(routes);
  const downloader = createDownloader();
  const contentDownloader: ContentDownloader = downloader as never;
  const source = new SharepointSource({
    connectionId: 'conn-1',
    requester: fake.requester,
    downloader: contentDownloader,
    conceal: identity,
  });
  return { ...fake, source, downloader };
}

const fileItem: GraphDriveItem = {
  id: 'item-1',
  name: 'report.pdf',
  size: 2048,
  lastModifiedDateTime: '2026-03-01T10:00:00Z',
  webUrl: 'https://contoso.example.test/sites/finance/report.pdf',
  file: { mimeType: 'application/pdf' },
  parentReference: {
    driveId: 'drive-1',
    siteId: 'site-1',
    id: 'folder-1',
    path: '/drives/drive-1/root:/Reports/2026%20Q1',
  },
};

describe('toFolderPath', () => {
  it('strips the drive prefix and decodes the remainder', () => {
    expect(toFolderPath('/drives/drive-1/root:/Reports/2026%20Q1')).toBe('/Reports/2026 Q1');
  });

  it('maps the drive root to a slash', () => {
    expect(toFolderPath('/drive/root:')).toBe('/');
    expect(toFolderPath(undefined)).toBe('/');
  });
});

describe('GraphDriveSource', () => {
  describe('listFolderItems', () => {
    it('lists the drive root when no folder is given', async () => {
      const { source, requests } = createSharepointSource({
        '/drives/drive-1/root/children': { value: [fileItem] },
      });

      const pages = [];
      for await (const page of source.listFolderItems('drive-1')) pages.push(page);

      expect(pages).toEqual([{ items: [fileItem], nextLink: undefined }]);
      expect(requests[0]).toMatchObject({ path: '/drives/drive-1/root/children', top: 200 });
    });

    it('lists a folder and resumes from a cursor', async () => {
      const nextLink = 'https://graph.microsoft.com/v1.0/drives/drive-1/items/folder-1/children?$skiptoken=x';
      const { source, requests } = createSharepointSource({
        [nextLink]: { value: [] },
      });

      for await (const _page of source.listFolderItems('drive-1', 'folder-1', nextLink)) {
        // drain
      }

      expect(requests.map((r) => r.path)).toEqual([nextLink]);
    });
  });

  it('returns item metadata', async () => {
    const { source, requests } = createSharepointSource({ '/drives/drive-1/items/item-1': fileItem });

    await expect(source.getItemMetadata('drive-1', 'item-1')).resolves.toEqual(fileItem);
    expect(requests[0]?.select).toContain('parentReference');
  });

  it('classifies a missing item as not found', async () => {
    const { source } = createSharepointSource({
      '/drives/drive-1/items/gone': new GraphError(404, 'itemNotFound'),
    });

    await expect(source.getItemMetadata('drive-1', 'gone')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reads the pre-authenticated download url', async () => {
    const { source } = createSharepointSource({
      '/drives/drive-1/items/item-1': {
        id: 'item-1',
        '@microsoft.graph.downloadUrl': 'https://download.example.test/item-1?sig=abc',
      },
      '/drives/drive-1/items/item-2': { id: 'item-2' },
    });

    await expect(source.getDownloadUrl('drive-1', 'item-1')).resolves.toBe(
      'https://download.example.test/item-1?sig=abc',
    );
    await expect(source.getDownloadUrl('drive-1', 'item-2')).resolves.toBeUndefined();
  });

  describe('resolveLineage', () => {
    it('names the site and the drive', async () => {
      const { source } = createSharepointSource({
        '/sites/site-1': { id: 'site-1', displayName: 'Finance' },
        '/drives/drive-1': { id: 'drive-1', name: 'Documents' },
      });

      await expect(source.resolveLineage('drive-1', 'site-1')).resolves.toEqual([
        { entityId: 'site-1', name: 'Finance', entityType: 'site' },
        { entityId: 'drive-1', name: 'Documents', entityType: 'drive' },
      ]);
    });

    it('falls back to ids when lookups fail', async () => {
      const { source } = createSharepointSource({
        '/sites/site-1': new GraphError(503, 'unavailable'),
        '/drives/drive-1': new GraphError(403, 'denied'),
      });

      await expect(source.resolveLineage('drive-1', 'site-1')).resolves.toEqual([
        { entityId: 'site-1', name: 'site-1', entityType: 'site' },
        { entityId: 'drive-1', name: 'drive-1', entityType: 'drive' },
      ]);
    });

    it('omits the site without a site id', async () => {
      const { source } = createSharepointSource({ '/drives/drive-1': { id: 'drive-1', name: 'OneDrive' } });

      await expect(source.resolveLineage('drive-1')).resolves.toEqual([
        { entityId: 'drive-1', name: 'OneDrive', entityType: 'drive' },
      ]);
    });
  });

  describe('buildFileRecord', () => {
    const lineage = [
      { entityId: 'site-1', name: 'Finance', entityType: 'site' as const },
      { entityId: 'drive-1', name: 'Documents', entityType: 'drive' as const },
    ];

    it('builds a record with a deterministic id', () => {
      const { source } = createSharepointSource({});

      const record = source.buildFileRecord(fileItem, lineage, 'https://download.example.test/1');

      expect(record).toEqual({
        id: fileRecordId('drive-1', 'item-1'),
        sourceItemId: 'item-1',
        name: 'report.pdf',
        mimeType: 'application/pdf',
        size: 2048,
        modifiedAt: '2026-03-01T10:00:00Z',
        webUrl: 'https://contoso.example.test/sites/finance/report.pdf',
        downloadUrl: 'https://download.example.test/1',
        driveId: 'drive-1',
        siteId: 'site-1',
        folderPath: '/Reports/2026 Q1',
        breadcrumbs: lineage,
      });
      expect(record?.id).toMatch(/^[0-9a-f]{64}$/);
    });

    it('defaults the mime type and takes the site from the lineage', () => {
      const { source } = createSharepointSource({});
      const item: GraphDriveItem = {
        ...fileItem,
        file: {},
        parentReference: { driveId: 'drive-1', path: '/drive/root:' },
      };

      const record = source.buildFileRecord(item, lineage, 'https://download.example.test/1');

      expect(record?.mimeType).toBe('application/octet-stream');
      expect(record?.siteId).toBe('site-1');
      expect(record?.folderPath).toBe('/');
    });

    it('returns undefined for folders and items without a drive', () => {
      const { source } = createSharepointSource({});

      expect(
        source.buildFileRecord({ id: 'f', name: 'Folder', folder: { childCount: 1 } }, lineage, 'u'),
      ).toBeUndefined();
      expect(
        source.buildFileRecord({ ...fileItem, parentReference: undefined }, lineage, 'u'),
      ).toBeUndefined();
    });
  });

  it('downloads and releases content through the downloader', async () => {
    const { source, downloader } = createSharepointSource({});
    const record = source.buildFileRecord(fileItem, [], 'https://download.example.test/1');
    if (!record) throw new Error('expected a record');

    const downloaded = await source.downloadContent(record);
    await source.releaseContent(downloaded);

    expect(downloader.download).toHaveBeenCalledWith(
      'https://download.example.test/1',
      record.id,
      undefined,
    );
    expect(downloaded.localPath).toBe('/tmp/staging/record');
    expect(downloader.release).toHaveBeenCalledWith('/tmp/staging/record');
  });

  it('skips release when nothing was downloaded', async () => {
    const { source, downloader } = createSharepointSource({});
    const record = source.buildFileRecord(fileItem, [], 'https://download.example.test/1');
    if (!record) throw new Error('expected a record');

    await source.releaseContent(record);

    expect(downloader.release).not.toHaveBeenCalled();
  });
});

describe('SharepointSource', () => {
  it('lists the drives of a site across pages', async () => {
    const { source } = createSharepointSource({
      '/sites/site-1/drives': {
        value: [{ id: 'drive-1', name: 'Documents' }],
        '@odata.nextLink': 'https://graph.microsoft.com/v1.0/sites/site-1/drives?$skiptoken=2',
      },
      'https://graph.microsoft.com/v1.0/sites/site-1/drives?$skiptoken=2': {
        value: [{ id: 'drive-2', name: 'Archive' }],
      },
    });

    const drives = await source.listDrives('site-1');

    expect(drives.map((d) => d.id)).toEqual(['drive-1', 'drive-2']);
    expect(source.hierarchy).toBe('sites');
  });
});

describe('OneDriveSource', () => {
  it('lists the drives of the signed-in user', async () => {
    const fake = createFakeRequester({ '/me/drives': { value: [{ id: 'drive-me', name: 'OneDrive' }] } });
    const source = new OneDriveSource({
      connectionId: 'conn-2',
      requester: fake.requester,
      downloader: createDownloader() as never,
      conceal: identity,
    });

    await expect(source.listDrives()).resolves.toEqual([{ id: 'drive-me', name: 'OneDrive' }]);
    expect(source.hierarchy).toBe('flat');
    expect(source.provider).toBe('onedrive');
  });
});
