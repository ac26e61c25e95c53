import {
  AuthenticationHandler,
  Client,
  type ClientOptions,
  HTTPMessageHandler,
  type Middleware,
  RedirectHandler,
  RedirectHandlerOptions,
  RetryHandler,
  RetryHandlerOptions,
  TelemetryHandler,
} from '@microsoft/microsoft-graph-client';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../../config';
import type { GraphTokenProvider } from './auth/graph-token.provider';
import { toSdkAuthenticationProvider } from './auth/sdk-authentication.provider';
import { RequestTimeoutMiddleware } from './middlewares/request-timeout.middleware';
import { TokenRefreshMiddleware } from './middlewares/token-refresh.middleware';

@Injectable()
export class GraphClientFactory {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(private readonly configService: ConfigService<Config, true>) {}

  public createClient(tokenProvider: GraphTokenProvider): Client {
    const graphConfig = this.configService.get('graph', { infer: true });

    // httpMessageHandler must stay last
    const middlewares: Middleware[] = [
      new AuthenticationHandler(toSdkAuthenticationProvider(tokenProvider)),
      new TokenRefreshMiddleware(tokenProvider),
      new RetryHandler(new RetryHandlerOptions()),
      new RedirectHandler(new RedirectHandlerOptions()),
      new TelemetryHandler(),
      new RequestTimeoutMiddleware(graphConfig.requestTimeoutSeconds * 1000),
      new HTTPMessageHandler(),
    ];

    for (let i = 0; i < middlewares.length - 1; i++) {
      const currentMiddleware = middlewares[i];
      const nextMiddleware = middlewares[i + 1];

      if (currentMiddleware?.setNext && nextMiddleware) {
        currentMiddleware.setNext(nextMiddleware);
      }
    }

    const clientOptions: ClientOptions = {
      middleware: middlewares[0],
      baseUrl: `${graphConfig.baseUrl}/`,
      defaultVersion: graphConfig.apiVersion,
      customHosts: new Set([new URL(graphConfig.baseUrl).host]),
      debugLogging: this.configService.get('app.logLevel', { infer: true }) === 'debug',
    };

    this.logger.debug({
      msg: 'Microsoft Graph client created',
      middlewareCount: middlewares.length,
      baseUrl: clientOptions.baseUrl,
    });

    return Client.initWithMiddleware(clientOptions);
  }
}
