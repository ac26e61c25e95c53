import type { Context, Middleware } from '@microsoft/microsoft-graph-client';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { GraphTokenProvider } from '../auth/graph-token.provider';
import { RequestTimeoutMiddleware } from './request-timeout.middleware';
import { TokenRefreshMiddleware } from './token-refresh.middleware';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const expiredBody = {
  error: { code: 'InvalidAuthenticationToken', message: 'Access token has expired.' },
};

describe('TokenRefreshMiddleware', () => {
  let tokenProvider: GraphTokenProvider & {
    getAccessToken: ReturnType<typeof vi.fn>;
    invalidate: ReturnType<typeof vi.fn>;
  };
  let next: Middleware & { execute: ReturnType<typeof vi.fn> };
  let middleware: TokenRefreshMiddleware;

  beforeEach(() => {
    tokenProvider = {
      canRefresh: true,
      getAccessToken: vi.fn().mockResolvedValue('fresh-token'),
      invalidate: vi.fn(),
    };
    next = { execute: vi.fn() };
    middleware = new TokenRefreshMiddleware(tokenProvider);
    middleware.setNext(next);
  });

  it('throws when no next middleware is set', async () => {
    const lonely = new TokenRefreshMiddleware(tokenProvider);

    await expect(lonely.execute({ request: '/me' })).rejects.toThrow('Next middleware not set');
  });

  it('passes successful responses through untouched', async () => {
    next.execute.mockImplementation(async (ctx: Context) => {
      ctx.response = jsonResponse(200, { value: [] });
    });
    const context: Context = { request: '/sites/root' };

    await middleware.execute(context);

    expect(next.execute).toHaveBeenCalledTimes(1);
    expect(context.response?.status).toBe(200);
    expect(tokenProvider.invalidate).not.toHaveBeenCalled();
  });

  it('refreshes the token and retries once on an expired token', async () => {
    next.execute
      .mockImplementationOnce(async (ctx: Context) => {
        ctx.response = jsonResponse(401, expiredBody);
      })
      .mockImplementationOnce(async (ctx: Context) => {
        ctx.response = jsonResponse(200, { id: 'site-1' });
      });
    const context: Context = { request: '/sites/root', options: { method: 'GET' } };

    await middleware.execute(context);

    expect(tokenProvider.invalidate).toHaveBeenCalledTimes(1);
    expect(next.execute).toHaveBeenCalledTimes(2);
    const retryContext: Context = next.execute.mock.calls[1]?.[0];
    expect(retryContext.options?.headers).toEqual({ Authorization: 'Bearer fresh-token' });
    expect(context.response?.status).toBe(200);
  });

  it('keeps the second 401 when the retry fails too', async () => {
    next.execute.mockImplementation(async (ctx: Context) => {
      ctx.response = jsonResponse(401, expiredBody);
    });
    const context: Context = { request: '/sites/root' };

    await middleware.execute(context);

    expect(next.execute).toHaveBeenCalledTimes(2);
    expect(context.response?.status).toBe(401);
  });

  it('does not retry 401s unrelated to token expiry', async () => {
    next.execute.mockImplementation(async (ctx: Context) => {
      ctx.response = jsonResponse(401, { error: { code: 'accessDenied', message: 'Nope' } });
    });

    await middleware.execute({ request: '/sites/root' });

    expect(next.execute).toHaveBeenCalledTimes(1);
  });

  it('does not retry when the provider cannot refresh', async () => {
    const staticProvider = { ...tokenProvider, canRefresh: false };
    const staticMiddleware = new TokenRefreshMiddleware(staticProvider);
    staticMiddleware.setNext(next);
    next.execute.mockImplementation(async (ctx: Context) => {
      ctx.response = jsonResponse(401, expiredBody);
    });

    await staticMiddleware.execute({ request: '/me/drives' });

    expect(next.execute).toHaveBeenCalledTimes(1);
    expect(tokenProvider.getAccessToken).not.toHaveBeenCalled();
  });
});

describe('RequestTimeoutMiddleware', () => {
  it('attaches an abort signal to each attempt', async () => {
    const next = { execute: vi.fn().mockResolvedValue(undefined) };
    const middleware = new RequestTimeoutMiddleware(1000);
    middleware.setNext(next);
    const context: Context = { request: '/sites/root', options: { method: 'GET' } };

    await middleware.execute(context);

    expect(context.options?.method).toBe('GET');
    expect(context.options?.signal).toBeInstanceOf(AbortSignal);
  });
});
