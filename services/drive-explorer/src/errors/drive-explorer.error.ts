export const DriveExplorerErrorCode = {
  NOT_FOUND: 'not_found',
  AUTH_EXPIRED: 'auth_expired',
  UPSTREAM_UNAVAILABLE: 'upstream_unavailable',
  UNSUPPORTED_PROVIDER: 'unsupported_provider',
  VALIDATION: 'validation',
  ITEM_SKIPPED: 'item_skipped',
} as const;

export type DriveExplorerErrorCode =
  (typeof DriveExplorerErrorCode)[keyof typeof DriveExplorerErrorCode];

export class DriveExplorerError extends Error {
  public constructor(
    public readonly code: DriveExplorerErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class NotFoundError extends DriveExplorerError {
  public constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(DriveExplorerErrorCode.NOT_FOUND, message, details, options);
  }
}

export class AuthExpiredError extends DriveExplorerError {
  public constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(DriveExplorerErrorCode.AUTH_EXPIRED, message, details, options);
  }
}

export class UpstreamUnavailableError extends DriveExplorerError {
  public constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(DriveExplorerErrorCode.UPSTREAM_UNAVAILABLE, message, details, options);
  }
}

export class UnsupportedProviderError extends DriveExplorerError {
  public constructor(provider: string) {
    super(DriveExplorerErrorCode.UNSUPPORTED_PROVIDER, `Unsupported provider: ${provider}`, {
      provider,
    });
  }
}

export class ValidationError extends DriveExplorerError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super(DriveExplorerErrorCode.VALIDATION, message, details);
  }
}

/** Raised inside the transfer pipeline when an item is intentionally not transferred. */
export class ItemSkippedError extends DriveExplorerError {
  public constructor(reason: string, details?: Record<string, unknown>) {
    super(DriveExplorerErrorCode.ITEM_SKIPPED, reason, details);
  }
}
