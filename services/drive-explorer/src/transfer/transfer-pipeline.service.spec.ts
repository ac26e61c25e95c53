import { ConfigService } from '@nestjs/config';
import { TestBed } from '@suites/unit';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProviderKind } from '../constants/provider-kind.enum';
import type { DestinationSink } from '../destination/destination-sink.interface';
import { AuthExpiredError, NotFoundError } from '../errors/drive-explorer.error';
import type { GraphDriveItem } from '../microsoft-apis/graph/types/graph.schemas';
import { DEX_TRANSFER_ITEM_PROCESSED_TOTAL } from '../metrics';
import type { Breadcrumb, FileRecord } from '../sources/file-record';
import type { FlatDriveSource } from '../sources/remote-source.interface';
import { ContentDownloadStep } from './steps/content-download.step';
import { DestinationUploadStep } from './steps/destination-upload.step';
import { DownloadUrlResolutionStep } from './steps/download-url-resolution.step';
import { FileCheckStep } from './steps/file-check.step';
import { MetadataResolutionStep } from './steps/metadata-resolution.step';
import { RecordBuildingStep } from './steps/record-building.step';
import { TransferPipeline } from './transfer-pipeline.service';

const lineage: Breadcrumb[] = [{ entityId: 'drive-1', name: 'Documents', entityType: 'drive' }];

const fileItem = (id: string): GraphDriveItem => ({
  id,
  name: `${id}.pdf`,
  size: 10,
  file: { mimeType: 'application/pdf' },
  parentReference: { driveId: 'drive-1', path: '/drives/drive-1/root:' },
});

const recordFor = (item: GraphDriveItem, downloadUrl: string): FileRecord => ({
  id: `rec-${item.id}`,
  sourceItemId: item.id,
  name: item.name ?? item.id,
  mimeType: 'application/pdf',
  size: item.size ?? 0,
  downloadUrl,
  driveId: 'drive-1',
  folderPath: '/',
  breadcrumbs: lineage,
});

function createSource() {
  return {
    provider: ProviderKind.ONEDRIVE,
    hierarchy: 'flat' as const,
    connectionId: 'conn-2',
    listDrives: vi.fn(),
    listFolderItems: vi.fn(),
    getItemMetadata: vi.fn(async (_driveId: string, itemId: string) => fileItem(itemId)),
    getDownloadUrl: vi.fn(
      async (_driveId: string, itemId: string): Promise<string | undefined> =>
        `https://download.test/${itemId}`,
    ),
    resolveLineage: vi.fn(async () => lineage),
    buildFileRecord: vi.fn(
      (item: GraphDriveItem, _lineage: Breadcrumb[], url: string): FileRecord | undefined =>
        recordFor(item, url),
    ),
    downloadContent: vi.fn(
      async (record: FileRecord): Promise<FileRecord> => ({
        ...record,
        localPath: `/tmp/${record.id}`,
      }),
    ),
    releaseContent: vi.fn(async () => undefined),
  } satisfies FlatDriveSource;
}

function createSink() {
  return {
    bulkInsert: vi.fn(async (_records: FileRecord[]) => undefined),
    destinationPathFor: vi.fn((record: FileRecord) => `s3://test-bucket/blobs/${record.id}`),
    describe: vi.fn(() => 's3://test-bucket/'),
  } satisfies DestinationSink;
}

describe('TransferPipeline', () => {
  let pipeline: TransferPipeline;
  let source: ReturnType<typeof createSource>;
  let sink: ReturnType<typeof createSink>;
  let counterAdd: ReturnType<typeof vi.fn>;
  let concurrency: number;

  const run = (fileIds: string[]) =>
    pipeline.run(source, sink, { fileIds, collectionId: 'col-1', driveId: 'drive-1' });

  beforeEach(async () => {
    source = createSource();
    sink = createSink();
    counterAdd = vi.fn();
    concurrency = 1;

    const { unit } = await TestBed.solitary(TransferPipeline)
      .mock(ConfigService)
      .impl((stub) => ({
        ...stub(),
        get: vi.fn((key: string) => {
          if (key === 'app.logsDiagnosticsDataPolicy') return 'disclose';
          if (key === 'transfer.concurrency') return concurrency;
          if (key === 'transfer.stepTimeoutSeconds') return 5;
          return undefined;
        }),
      }))
      .mock(MetadataResolutionStep)
      .impl(() => new MetadataResolutionStep())
      .mock(FileCheckStep)
      .impl(() => new FileCheckStep())
      .mock(DownloadUrlResolutionStep)
      .impl(() => new DownloadUrlResolutionStep())
      .mock(RecordBuildingStep)
      .impl(() => new RecordBuildingStep())
      .mock(ContentDownloadStep)
      .impl(() => new ContentDownloadStep())
      .mock(DestinationUploadStep)
      .impl(() => new DestinationUploadStep())
      .mock(DEX_TRANSFER_ITEM_PROCESSED_TOTAL)
      .impl(() => ({ add: counterAdd }))
      .compile();

    pipeline = unit;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('transfers a file and reports its destination', async () => {
    const report = await run(['a']);

    expect(report).toEqual({
      totalFiles: 1,
      successful: 1,
      failed: 0,
      skipped: 0,
      outcomes: [
        {
          fileId: 'a',
          fileName: 'a.pdf',
          status: 'success',
          destinationPath: 's3://test-bucket/blobs/rec-a',
        },
      ],
    });
    expect(sink.bulkInsert).toHaveBeenCalledWith([
      { ...recordFor(fileItem('a'), 'https://download.test/a'), localPath: '/tmp/rec-a' },
    ]);
    expect(counterAdd).toHaveBeenCalledWith(1, { status: 'success' });
  });

  it('returns an empty report for an empty selection', async () => {
    const report = await run([]);

    expect(report).toEqual({ totalFiles: 0, successful: 0, failed: 0, skipped: 0, outcomes: [] });
    expect(sink.bulkInsert).not.toHaveBeenCalled();
  });

  it('resolves the lineage once per batch', async () => {
    await pipeline.run(source, sink, {
      fileIds: ['a', 'b', 'c'],
      collectionId: 'col-1',
      driveId: 'drive-1',
      siteId: 'site-1',
    });

    expect(source.resolveLineage).toHaveBeenCalledTimes(1);
    expect(source.resolveLineage).toHaveBeenCalledWith('drive-1', 'site-1');
    expect(source.buildFileRecord).toHaveBeenCalledWith(
      fileItem('b'),
      lineage,
      'https://download.test/b',
    );
  });

  it('fails an item whose metadata cannot be resolved', async () => {
    source.getItemMetadata.mockRejectedValueOnce(
      new NotFoundError('Not found while trying to get item metadata'),
    );

    const report = await run(['gone']);

    expect(report.outcomes).toEqual([
      {
        fileId: 'gone',
        fileName: 'gone',
        status: 'failed',
        error: 'Not found while trying to get item metadata',
        errorCode: 'not_found',
      },
    ]);
    expect(source.getDownloadUrl).not.toHaveBeenCalled();
  });

  it('marks auth expiry per item', async () => {
    source.getItemMetadata.mockRejectedValueOnce(
      new AuthExpiredError('Authentication expired while trying to get item metadata'),
    );

    const report = await run(['a', 'b']);

    expect(report.outcomes.map((o) => [o.status, o.errorCode])).toEqual([
      ['failed', 'auth_expired'],
      ['success', undefined],
    ]);
  });

  it('skips folders', async () => {
    source.getItemMetadata.mockResolvedValueOnce({
      id: 'dir',
      name: 'Reports',
      folder: { childCount: 2 },
    });

    const report = await run(['dir']);

    expect(report.outcomes).toEqual([
      {
        fileId: 'dir',
        fileName: 'Reports',
        status: 'skipped',
        error: 'not a file (may be a folder)',
        errorCode: 'item_skipped',
      },
    ]);
    expect(report.skipped).toBe(1);
  });

  it('fails an item without a download URL', async () => {
    source.getDownloadUrl.mockResolvedValueOnce(undefined);

    const [outcome] = (await run(['a'])).outcomes;

    expect(outcome).toMatchObject({ status: 'failed', error: 'could not get download URL' });
    expect(source.buildFileRecord).not.toHaveBeenCalled();
  });

  it('skips an item no file record can be built for', async () => {
    source.buildFileRecord.mockReturnValueOnce(undefined);

    const [outcome] = (await run(['a'])).outcomes;

    expect(outcome).toMatchObject({ status: 'skipped', error: 'could not create file record' });
    expect(source.downloadContent).not.toHaveBeenCalled();
  });

  it('fails an item whose content was not materialized', async () => {
    source.downloadContent.mockImplementationOnce(async (record) => record);

    const [outcome] = (await run(['a'])).outcomes;

    expect(outcome).toMatchObject({ status: 'failed', error: 'download failed' });
    expect(sink.bulkInsert).not.toHaveBeenCalled();
    expect(source.releaseContent).not.toHaveBeenCalled();
  });

  it('fails an item the destination rejects and still releases its content', async () => {
    sink.bulkInsert.mockRejectedValueOnce(new Error('Access Denied'));

    const [outcome] = (await run(['a'])).outcomes;

    expect(outcome).toEqual({
      fileId: 'a',
      fileName: 'a.pdf',
      status: 'failed',
      error: 'Access Denied',
      errorCode: undefined,
    });
    expect(source.releaseContent).toHaveBeenCalledWith(
      expect.objectContaining({ localPath: '/tmp/rec-a' }),
    );
    expect(counterAdd).toHaveBeenCalledWith(1, { status: 'failed' });
  });

  it('releases content after every successful item', async () => {
    await run(['a', 'b']);

    expect(source.releaseContent).toHaveBeenCalledTimes(2);
  });

  it('keeps the outcome when releasing content fails', async () => {
    source.releaseContent.mockRejectedValueOnce(new Error('EBUSY'));

    const [outcome] = (await run(['a'])).outcomes;

    expect(outcome?.status).toBe('success');
  });

  it('fails a step that exceeds the step timeout', async () => {
    vi.useFakeTimers();
    source.getDownloadUrl.mockImplementationOnce(
      () => new Promise((resolve) => setTimeout(() => resolve('https://download.test/late'), 10_000)),
    );

    const reportPromise = run(['slow', 'b']);
    await vi.advanceTimersByTimeAsync(6_000);
    const report = await reportPromise;

    expect(report.outcomes[0]).toMatchObject({
      fileId: 'slow',
      status: 'failed',
      error: 'Step DownloadUrlResolution timed out after 5000ms',
      errorCode: 'upstream_unavailable',
    });
    expect(report.outcomes[1]?.status).toBe('success');
  });

  it('aborts a timed-out download and releases content that arrives late', async () => {
    vi.useFakeTimers();
    let downloadSignal: AbortSignal | undefined;
    source.downloadContent.mockImplementationOnce(
      (record: FileRecord, signal?: AbortSignal) =>
        new Promise((resolve) => {
          downloadSignal = signal;
          setTimeout(() => resolve({ ...record, localPath: '/tmp/rec-slow' }), 10_000);
        }),
    );

    const reportPromise = run(['slow']);
    await vi.advanceTimersByTimeAsync(6_000);
    const report = await reportPromise;

    expect(report.outcomes[0]).toMatchObject({
      fileId: 'slow',
      status: 'failed',
      error: 'Step ContentDownload timed out after 5000ms',
    });
    expect(downloadSignal?.aborted).toBe(true);
    expect(source.releaseContent).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(5_000);
    vi.useRealTimers();

    await vi.waitFor(() =>
      expect(source.releaseContent).toHaveBeenCalledWith(
        expect.objectContaining({ localPath: '/tmp/rec-slow' }),
      ),
    );
    expect(sink.bulkInsert).not.toHaveBeenCalled();
  });

  it('keeps input order and counts every item once with concurrency', async () => {
    concurrency = 3;
    source.getItemMetadata.mockImplementation(async (_driveId: string, itemId: string) => {
      if (itemId === 'dir') return { id: 'dir', name: 'dir', folder: {} };
      if (itemId === 'gone') throw new NotFoundError('Not found while trying to get item metadata');
      return fileItem(itemId);
    });
    source.downloadContent.mockImplementation(async (record: FileRecord) => {
      await new Promise((resolve) => setTimeout(resolve, record.sourceItemId === 'a' ? 20 : 0));
      return { ...record, localPath: `/tmp/${record.id}` };
    });

    const fileIds = ['a', 'dir', 'gone', 'b', 'c'];
    const report = await run(fileIds);

    expect(report.outcomes.map((o) => o.fileId)).toEqual(fileIds);
    expect(report.outcomes.map((o) => o.status)).toEqual([
      'success',
      'skipped',
      'failed',
      'success',
      'success',
    ]);
    expect(report.totalFiles).toBe(5);
    expect(report.successful + report.failed + report.skipped).toBe(report.totalFiles);
    expect(counterAdd).toHaveBeenCalledTimes(5);
  });
});
