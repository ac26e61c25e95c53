import type { Context, Middleware } from '@microsoft/microsoft-graph-client';

/**
 * Bounds every request attempt that passes through it. Placed after the retry
 * handler so each retry gets its own budget.
 */
export class RequestTimeoutMiddleware implements Middleware {
  private nextMiddleware: Middleware | undefined;

  public constructor(private readonly timeoutMs: number) {}

  public async execute(context: Context): Promise<void> {
    if (!this.nextMiddleware) throw new Error('Next middleware not set');

    context.options = { ...context.options, signal: AbortSignal.timeout(this.timeoutMs) };
    await this.nextMiddleware.execute(context);
  }

  public setNext(next: Middleware): void {
    this.nextMiddleware = next;
  }
}
