export interface TokenAcquisitionResult {
  token: string;
  expiresAt: number;
}

export interface TokenAcquisitionOptions {
  /** Set after {@link TokenCache.invalidate}: the acquirer must not serve a token from its own cache. */
  forceRefresh: boolean;
}

export type TokenAcquirer = (options: TokenAcquisitionOptions) => Promise<TokenAcquisitionResult>;

interface PendingAcquisition {
  generation: number;
  token: Promise<string>;
}

const DEFAULT_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/**
 * Holds one access token per connection. Concurrent callers share a single
 * acquisition. `invalidate` starts a new generation: an acquisition that was
 * already running is not stored or handed to later callers, and the next one
 * is forced past the acquirer's cache.
 */
export class TokenCache {
  private current: TokenAcquisitionResult | undefined;
  private pending: PendingAcquisition | undefined;
  private generation = 0;
  private forceRefresh = false;

  public constructor(
    private readonly acquire: TokenAcquirer,
    private readonly expiryBufferMs = DEFAULT_EXPIRY_BUFFER_MS,
  ) {}

  public async getToken(): Promise<string> {
    if (this.current && this.current.expiresAt > Date.now() + this.expiryBufferMs) {
      return this.current.token;
    }
    let pending = this.pending;
    if (!pending || pending.generation !== this.generation) {
      pending = { generation: this.generation, token: this.startAcquisition(this.generation) };
      this.pending = pending;
    }
    return pending.token;
  }

  public invalidate(): void {
    this.current = undefined;
    this.generation++;
    this.forceRefresh = true;
  }

  private async startAcquisition(generation: number): Promise<string> {
    const forceRefresh = this.forceRefresh;
    try {
      const result = await this.acquire({ forceRefresh });
      if (generation === this.generation) {
        this.current = result;
        this.forceRefresh = false;
      }
      return result.token;
    } finally {
      if (this.pending?.generation === generation) this.pending = undefined;
    }
  }
}
