import type { Redacted } from '@drive-explorer/utils';
import type { GraphTokenProvider } from './graph-token.provider';

/** Pre-issued delegated token. Once Graph rejects it the connection has to be re-authorized. */
export class StaticTokenProvider implements GraphTokenProvider {
  public readonly canRefresh = false;

  public constructor(private readonly accessToken: Redacted<string>) {}

  public async getAccessToken(): Promise<string> {
    return this.accessToken.value;
  }

  public invalidate(): void {}
}
