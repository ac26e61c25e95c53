import { CustomAuthenticationProviderError, GraphError } from '@microsoft/microsoft-graph-client';
import { normalizeError } from '@drive-explorer/utils';
import {
  AuthExpiredError,
  DriveExplorerError,
  NotFoundError,
  UpstreamUnavailableError,
} from './drive-explorer.error';

function readStatusCode(error: unknown): number | undefined {
  if (error instanceof GraphError) return error.statusCode;
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

function isTokenAcquisitionFailure(error: unknown): boolean {
  if (error instanceof CustomAuthenticationProviderError) return true;
  // the SDK wraps other auth provider failures into a GraphError named after the original
  return error instanceof GraphError && error.code === AuthExpiredError.name;
}

/**
 * Maps a failed Graph call onto the error taxonomy: 401 means the connection's
 * credentials have to be renewed, 404 that the requested entity is gone, and
 * anything else (throttling, 5xx, aborted or failed fetch) that the upstream is
 * currently unavailable. Errors that are already classified pass through, and
 * a token that could not be acquired is an expired authentication.
 */
export function classifyGraphError(error: unknown, operation: string): DriveExplorerError {
  if (error instanceof DriveExplorerError) return error;
  if (
    error instanceof CustomAuthenticationProviderError &&
    error.cause instanceof DriveExplorerError
  ) {
    return error.cause;
  }

  const statusCode = readStatusCode(error);
  const normalized = normalizeError(error);
  const details = {
    operation,
    statusCode,
    ...(error instanceof GraphError ? { graphCode: error.code, requestId: error.requestId } : {}),
  };

  if (statusCode === 401 || isTokenAcquisitionFailure(error)) {
    return new AuthExpiredError(
      `Authentication expired while trying to ${operation}`,
      details,
      { cause: normalized },
    );
  }
  if (statusCode === 404) {
    return new NotFoundError(`Not found while trying to ${operation}`, details, {
      cause: normalized,
    });
  }
  return new UpstreamUnavailableError(
    `Failed to ${operation}: ${normalized.message}`,
    details,
    { cause: normalized },
  );
}
