import { TestBed } from '@suites/unit';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TreeBrowser } from '../browser/tree-browser.service';
import { DestinationSinkFactory } from '../destination/destination-sink.factory';
import { NotFoundError, UnsupportedProviderError } from '../errors/drive-explorer.error';
import { DEX_BROWSE_REQUESTS_TOTAL } from '../metrics';
import { RemoteSourceFactory } from '../sources/remote-source.factory';
import { TransferPipeline } from '../transfer/transfer-pipeline.service';
import { FileExplorerService } from './file-explorer.service';

describe('FileExplorerService', () => {
  let service: FileExplorerService;
  const source = { connectionId: 'conn-1', hierarchy: 'sites' };
  const sink = { describe: () => 's3://test-bucket/' };
  const page = { files: [], folders: [], currentPath: '/sites' };
  const report = { totalFiles: 0, successful: 0, failed: 0, skipped: 0, outcomes: [] };
  let createSource: ReturnType<typeof vi.fn>;
  let createSink: ReturnType<typeof vi.fn>;
  let browse: ReturnType<typeof vi.fn>;
  let run: ReturnType<typeof vi.fn>;
  let counterAdd: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    createSource = vi.fn(() => source);
    createSink = vi.fn(() => sink);
    browse = vi.fn(async () => page);
    run = vi.fn(async () => report);
    counterAdd = vi.fn();

    const { unit } = await TestBed.solitary(FileExplorerService)
      .mock(RemoteSourceFactory)
      .impl((stub) => ({ ...stub(), createSource }))
      .mock(DestinationSinkFactory)
      .impl((stub) => ({ ...stub(), createSink }))
      .mock(TreeBrowser)
      .impl((stub) => ({ ...stub(), browse, levelOf: vi.fn(() => 'sites') }))
      .mock(TransferPipeline)
      .impl((stub) => ({ ...stub(), run }))
      .mock(DEX_BROWSE_REQUESTS_TOTAL)
      .impl(() => ({ add: counterAdd }))
      .compile();
    service = unit;
  });

  describe('browse', () => {
    it('browses the connection with the query as navigation', async () => {
      const result = await service.browse('conn-1', { siteId: 'site-1' });

      expect(result).toBe(page);
      expect(browse).toHaveBeenCalledWith(source, {
        organizationScope: 'conn-1',
        siteId: 'site-1',
      });
      expect(counterAdd).toHaveBeenCalledWith(1, { level: 'sites', result: 'success' });
    });

    it('counts failures by error code and rethrows', async () => {
      const error = new NotFoundError('No document libraries found in this site');
      browse.mockRejectedValue(error);

      await expect(service.browse('conn-1', {})).rejects.toBe(error);
      expect(counterAdd).toHaveBeenCalledWith(1, { level: 'sites', result: 'not_found' });
    });

    it('counts failures before the level is known', async () => {
      createSource.mockImplementation(() => {
        throw new UnsupportedProviderError('dropbox');
      });

      await expect(service.browse('conn-3', {})).rejects.toThrow('Unsupported provider: dropbox');
      expect(counterAdd).toHaveBeenCalledWith(1, {
        level: 'unknown',
        result: 'unsupported_provider',
      });
    });
  });

  describe('transfer', () => {
    const request = { fileIds: ['a'], collectionId: 'col-1', driveId: 'drive-1' };

    it('runs the pipeline with the connection source and collection sink', async () => {
      const result = await service.transfer('conn-1', request);

      expect(result).toBe(report);
      expect(createSink).toHaveBeenCalledWith('col-1');
      expect(run).toHaveBeenCalledWith(source, sink, request);
    });

    it('fails the whole request when the collection cannot be resolved', async () => {
      createSink.mockImplementation(() => {
        throw new NotFoundError('Collection col-9 not found');
      });

      await expect(
        service.transfer('conn-1', { ...request, collectionId: 'col-9' }),
      ).rejects.toThrow('Collection col-9 not found');
      expect(run).not.toHaveBeenCalled();
    });
  });
});
