import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Counter } from '@opentelemetry/api';
import type { RemotePage } from '../browser/browser.types';
import { type BrowseLevel, TreeBrowser } from '../browser/tree-browser.service';
import { DestinationSinkFactory } from '../destination/destination-sink.factory';
import { DriveExplorerError } from '../errors/drive-explorer.error';
import { DEX_BROWSE_REQUESTS_TOTAL } from '../metrics';
import { RemoteSourceFactory } from '../sources/remote-source.factory';
import { TransferPipeline } from '../transfer/transfer-pipeline.service';
import type { BatchReport, TransferRequest } from '../transfer/types/transfer-context';
import type { BrowseQueryDto } from './file-explorer.dtos';

@Injectable()
export class FileExplorerService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly remoteSourceFactory: RemoteSourceFactory,
    private readonly destinationSinkFactory: DestinationSinkFactory,
    private readonly treeBrowser: TreeBrowser,
    private readonly transferPipeline: TransferPipeline,
    @Inject(DEX_BROWSE_REQUESTS_TOTAL) private readonly dexBrowseRequestsTotal: Counter,
  ) {}

  public async browse(connectionId: string, query: BrowseQueryDto): Promise<RemotePage> {
    let level: BrowseLevel | 'unknown' = 'unknown';
    try {
      const source = this.remoteSourceFactory.createSource(connectionId);
      const navigation = { organizationScope: connectionId, ...query };
      level = this.treeBrowser.levelOf(source, navigation);

      const page = await this.treeBrowser.browse(source, navigation);
      this.dexBrowseRequestsTotal.add(1, { level, result: 'success' });
      return page;
    } catch (error) {
      const result = error instanceof DriveExplorerError ? error.code : 'error';
      this.dexBrowseRequestsTotal.add(1, { level, result });
      throw error;
    }
  }

  /** Whole-request failures (connection, provider, collection, storage) are raised before any item runs. */
  public async transfer(connectionId: string, request: TransferRequest): Promise<BatchReport> {
    const source = this.remoteSourceFactory.createSource(connectionId);
    const sink = this.destinationSinkFactory.createSink(request.collectionId);

    this.logger.log(
      `Transfer of ${request.fileIds.length} items requested for collection ${request.collectionId}`,
    );
    return this.transferPipeline.run(source, sink, request);
  }
}
