import type { ConnectionAuthConfig } from '../../../registry/registry.schema';
import { ClientSecretTokenProvider } from './client-secret-token.provider';
import type { GraphTokenProvider } from './graph-token.provider';
import { StaticTokenProvider } from './static-token.provider';

export function createTokenProvider(auth: ConnectionAuthConfig): GraphTokenProvider {
  switch (auth.mode) {
    case 'client-secret':
      return new ClientSecretTokenProvider(auth);
    case 'access-token':
      return new StaticTokenProvider(auth.accessToken);
  }
}
