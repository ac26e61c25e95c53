import type { AuthenticationProvider } from '@microsoft/microsoft-graph-client';

/**
 * Access token source for one connection. `invalidate` is called after Graph
 * rejected the current token; providers that cannot obtain a new token report
 * `canRefresh: false` and requests are not retried.
 */
export interface GraphTokenProvider extends AuthenticationProvider {
  readonly canRefresh: boolean;
  getAccessToken(): Promise<string>;
  invalidate(): void;
}
