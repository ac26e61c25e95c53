/**
 * Holder for secrets (client secrets, S3 keys, access tokens). The raw value
 * is only reachable through `.value`; string conversion and JSON serialization
 * always print `[Redacted]`.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public toString(): string {
    return '[Redacted]';
  }

  public toJSON(): string {
    return this.toString();
  }
}

export function isRedacted(value: unknown): value is Redacted<unknown> {
  return value instanceof Redacted;
}
