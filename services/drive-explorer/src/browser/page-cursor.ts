import { ValidationError } from '../errors/drive-explorer.error';

const CHILDREN_PATH = /^\/(?:v1\.0|beta)\/drives\/([^/]+)\/(?:root|items\/[^/]+)\/children$/;

/** Wraps a Graph continuation link into an opaque cursor for clients. */
export function encodePageCursor(nextLink: string): string {
  return Buffer.from(nextLink, 'utf-8').toString('base64url');
}

/**
 * Turns a client cursor back into a continuation link, accepting only
 * children listings of `driveId` on the configured Graph host.
 */
export function decodePageCursor(cursor: string, graphBaseUrl: string, driveId: string): string {
  const invalid = () => new ValidationError('Invalid page cursor', { driveId });

  let url: URL;
  try {
    url = new URL(Buffer.from(cursor, 'base64url').toString('utf-8'));
  } catch {
    throw invalid();
  }

  if (url.origin !== new URL(graphBaseUrl).origin) throw invalid();

  const match = CHILDREN_PATH.exec(decodeURIComponentSafe(url.pathname));
  if (!match || match[1] !== driveId) throw invalid();

  return url.toString();
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
