import {
  type AuthenticationProvider,
  CustomAuthenticationProviderError,
} from '@microsoft/microsoft-graph-client';
import { normalizeError } from '@drive-explorer/utils';
import type { GraphTokenProvider } from './graph-token.provider';

/**
 * Hands a connection's token provider to the SDK's `AuthenticationHandler`.
 * Failures surface as `CustomAuthenticationProviderError`, the one error type
 * the SDK rethrows without wrapping; the original failure is kept as `cause`.
 */
export function toSdkAuthenticationProvider(
  tokenProvider: GraphTokenProvider,
): AuthenticationProvider {
  return {
    getAccessToken: async () => {
      try {
        return await tokenProvider.getAccessToken();
      } catch (error) {
        const wrapped = new CustomAuthenticationProviderError(normalizeError(error).message);
        wrapped.cause = error;
        throw wrapped;
      }
    },
  };
}
