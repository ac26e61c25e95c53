import type { Context, Middleware } from '@microsoft/microsoft-graph-client';
import { Logger } from '@nestjs/common';
import { normalizeError } from '@drive-explorer/utils';
import { z } from 'zod';
import type { GraphTokenProvider } from '../auth/graph-token.provider';

const GraphErrorBodySchema = z.object({
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

const EXPIRED_TOKEN_MESSAGES = [
  'Lifetime validation failed',
  'token is expired',
  'Access token has expired',
];

/**
 * Retries a request once with a freshly acquired token when Graph answers 401
 * because the token expired. A second 401 is left in the response.
 */
export class TokenRefreshMiddleware implements Middleware {
  private readonly logger = new Logger(this.constructor.name);
  private nextMiddleware: Middleware | undefined;

  public constructor(private readonly tokenProvider: GraphTokenProvider) {}

  public async execute(context: Context): Promise<void> {
    if (!this.nextMiddleware) throw new Error('Next middleware not set');

    await this.nextMiddleware.execute(context);

    if (!this.tokenProvider.canRefresh) return;
    if (!(await this.isTokenExpiredError(context.response))) return;

    this.logger.debug('Graph token expired, attempting to refresh');

    try {
      this.tokenProvider.invalidate();
      const newAccessToken = await this.tokenProvider.getAccessToken();

      const retryContext: Context = {
        request: typeof context.request === 'string' ? context.request : context.request.clone(),
        options: {
          ...context.options,
          headers: { ...context.options?.headers, Authorization: `Bearer ${newAccessToken}` },
        },
        middlewareControl: context.middlewareControl,
        customHosts: context.customHosts,
      };

      await this.nextMiddleware.execute(retryContext);
      context.response = retryContext.response;

      if (!context.response?.ok) {
        this.logger.warn({
          msg: 'Graph request still failed after token refresh',
          status: context.response?.status,
        });
      }
    } catch (error) {
      this.logger.error({
        msg: 'Failed to refresh Graph token or retry request',
        error: normalizeError(error).message,
      });
    }
  }

  public setNext(next: Middleware): void {
    this.nextMiddleware = next;
  }

  private async isTokenExpiredError(response: Response | undefined): Promise<boolean> {
    if (response?.status !== 401) return false;

    try {
      const body = GraphErrorBodySchema.parse(await response.clone().json());
      const code = body.error?.code;
      const message = body.error?.message ?? '';
      return (
        code === 'InvalidAuthenticationToken' ||
        EXPIRED_TOKEN_MESSAGES.some((fragment) => message.includes(fragment))
      );
    } catch {
      // unparseable body; the status alone decides
      return true;
    }
  }
}
