/**
 * Turns any thrown value into an `Error`. Error instances (and subclasses) are
 * returned as they are; anything else is wrapped with a readable message.
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) return error;

  if (error === null || error === undefined) return new Error(String(error));

  switch (typeof error) {
    case 'string':
      return new Error(error);
    case 'symbol':
      return new Error(error.toString());
    case 'function':
      return new Error(error.toString());
    case 'object':
      return new Error(stringifyObject(error));
    default:
      return new Error(String(error));
  }
}

function stringifyObject(value: object): string {
  try {
    return JSON.stringify(value);
  } catch {
    // circular structures
    return Object.prototype.toString.call(value);
  }
}

export interface SanitizedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  statusCode?: number;
  cause?: SanitizedError;
}

/**
 * Plain, JSON-safe view of an error for structured logs. Only whitelisted
 * fields are copied so request objects or headers hanging off SDK errors never
 * end up in a log line.
 */
export function sanitizeError(error: unknown, depth = 0): SanitizedError {
  const normalized = normalizeError(error);
  const sanitized: SanitizedError = {
    name: normalized.name,
    message: normalized.message,
    stack: normalized.stack,
  };

  const code = readProperty(normalized, 'code');
  if (typeof code === 'string') sanitized.code = code;

  const statusCode = readProperty(normalized, 'statusCode');
  if (typeof statusCode === 'number') sanitized.statusCode = statusCode;

  if (normalized.cause !== undefined && depth < 3) {
    sanitized.cause = sanitizeError(normalized.cause, depth + 1);
  }

  return sanitized;
}

function readProperty(target: object, key: string): unknown {
  return key in target ? Reflect.get(target, key) : undefined;
}
