import assert from 'node:assert';
import { ConfidentialClientApplication } from '@azure/msal-node';
import { Logger } from '@nestjs/common';
import { type Redacted, sanitizeError } from '@drive-explorer/utils';
import { GRAPH_DEFAULT_SCOPE } from '../../../constants/defaults.constants';
import { AuthExpiredError } from '../../../errors/drive-explorer.error';
import type { GraphTokenProvider } from './graph-token.provider';
import { type TokenAcquisitionOptions, type TokenAcquisitionResult, TokenCache } from './token-cache';

export interface ClientSecretCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: Redacted<string>;
}

/** App-only tokens from the client credentials flow. */
export class ClientSecretTokenProvider implements GraphTokenProvider {
  public readonly canRefresh = true;

  private readonly logger = new Logger(this.constructor.name);
  private readonly msalClient: ConfidentialClientApplication;
  private readonly tokenCache = new TokenCache((options) => this.acquireNewToken(options));

  public constructor(credentials: ClientSecretCredentials) {
    this.msalClient = new ConfidentialClientApplication({
      auth: {
        clientId: credentials.clientId,
        authority: `https://login.microsoftonline.com/${credentials.tenantId}`,
        clientSecret: credentials.clientSecret.value,
      },
    });
  }

  public async getAccessToken(): Promise<string> {
    return this.tokenCache.getToken();
  }

  public invalidate(): void {
    this.tokenCache.invalidate();
  }

  private async acquireNewToken({
    forceRefresh,
  }: TokenAcquisitionOptions): Promise<TokenAcquisitionResult> {
    this.logger.log('Acquiring new Graph API token using client secret');

    try {
      const response = await this.msalClient.acquireTokenByClientCredential({
        scopes: [GRAPH_DEFAULT_SCOPE],
        skipCache: forceRefresh,
      });

      assert.ok(
        response?.accessToken,
        'Failed to acquire Graph API token: no access token in response',
      );
      assert.ok(
        response.expiresOn,
        'Failed to acquire Graph API token: no expiration time in response',
      );

      return { token: response.accessToken, expiresAt: response.expiresOn.getTime() };
    } catch (error) {
      this.logger.error({
        msg: 'Failed to acquire Graph API token using client secret',
        error: sanitizeError(error),
      });
      throw new AuthExpiredError('Failed to acquire Graph API token', {}, { cause: error });
    }
  }
}
