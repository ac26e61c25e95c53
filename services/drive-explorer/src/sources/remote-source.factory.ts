import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { isProviderKind, ProviderKind } from '../constants/provider-kind.enum';
import { NotFoundError, UnsupportedProviderError } from '../errors/drive-explorer.error';
import { createTokenProvider } from '../microsoft-apis/graph/auth/create-token-provider';
import { GraphClientFactory } from '../microsoft-apis/graph/graph-client.factory';
import { GraphRequester } from '../microsoft-apis/graph/graph-requester';
import { CONNECTION_REGISTRY, type ConnectionRegistry } from '../registry/registry.service';
import { BottleneckFactory } from '../utils/bottleneck.factory';
import { type Concealer, getConcealer } from '../utils/logging.util';
import { ContentDownloader } from './content-downloader.service';
import { OneDriveSource } from './onedrive.source';
import type { RemoteSource } from './remote-source.interface';
import { SharepointSource } from './sharepoint.source';

/**
 * Builds the source for a connection. Sources are kept per connection so the
 * token cache and the rate limiter are shared by every request on it.
 */
@Injectable()
export class RemoteSourceFactory {
  private readonly logger = new Logger(this.constructor.name);
  private readonly sources = new Map<string, RemoteSource>();
  private readonly conceal: Concealer;

  public constructor(
    @Inject(CONNECTION_REGISTRY) private readonly connectionRegistry: ConnectionRegistry,
    private readonly graphClientFactory: GraphClientFactory,
    private readonly bottleneckFactory: BottleneckFactory,
    private readonly contentDownloader: ContentDownloader,
    private readonly configService: ConfigService<Config, true>,
  ) {
    this.conceal = getConcealer(configService);
  }

  public createSource(connectionId: string): RemoteSource {
    const cached = this.sources.get(connectionId);
    if (cached) return cached;

    const connection = this.connectionRegistry.findConnection(connectionId);
    if (!connection) {
      throw new NotFoundError(`Connection ${connectionId} not found`, { connectionId });
    }
    if (!isProviderKind(connection.provider)) {
      throw new UnsupportedProviderError(connection.provider);
    }

    const rateLimitPerMinute = this.configService.get('graph.rateLimitPerMinute', { infer: true });
    const requester = new GraphRequester(
      this.graphClientFactory.createClient(createTokenProvider(connection.auth)),
      this.bottleneckFactory.createPerMinuteLimiter(
        rateLimitPerMinute,
        `[Connection: ${this.conceal(connectionId)}]`,
      ),
    );
    const dependencies = {
      connectionId,
      requester,
      downloader: this.contentDownloader,
      conceal: this.conceal,
    };

    const source =
      connection.provider === ProviderKind.SHAREPOINT
        ? new SharepointSource(dependencies)
        : new OneDriveSource(dependencies);

    this.logger.log(
      `[Connection: ${this.conceal(connectionId)}] Created ${connection.provider} source`,
    );
    this.sources.set(connectionId, source);
    return source;
  }
}
