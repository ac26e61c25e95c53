import type { Client } from '@microsoft/microsoft-graph-client';
import Bottleneck from 'bottleneck';
import { vi } from 'vitest';
import { GraphRequester } from '../microsoft-apis/graph/graph-requester';

export interface RecordedGraphRequest {
  path: string;
  select?: string | string[];
  top?: number;
  query?: Record<string, string>;
  filter?: string;
}

/**
 * In-memory stand-in for the Graph client. Responses are keyed by the path
 * passed to `api()`; an `Error` value is thrown instead of returned.
 */
export function createFakeGraphClient(routes: Record<string, unknown>) {
  const requests: RecordedGraphRequest[] = [];

  const api = vi.fn((path: string) => {
    const recorded: RecordedGraphRequest = { path };
    requests.push(recorded);
    const request = {
      select: (fields: string | string[]) => {
        recorded.select = fields;
        return request;
      },
      top: (count: number) => {
        recorded.top = count;
        return request;
      },
      query: (query: Record<string, string>) => {
        recorded.query = query;
        return request;
      },
      filter: (filter: string) => {
        recorded.filter = filter;
        return request;
      },
      get: async () => {
        if (!(path in routes)) throw Object.assign(new Error(`No route for ${path}`), { statusCode: 404 });
        const response = routes[path];
        if (response instanceof Error) throw response;
        return response;
      },
    };
    return request;
  });

  const client: Client = { api } as never;
  return { client, api, requests };
}

export function createFakeRequester(routes: Record<string, unknown>) {
  const fake = createFakeGraphClient(routes);
  return { ...fake, requester: new GraphRequester(fake.client, new Bottleneck()) };
}
