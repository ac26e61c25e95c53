import type { Client, GraphRequest } from '@microsoft/microsoft-graph-client';
import type Bottleneck from 'bottleneck';
import type { z } from 'zod';
import { classifyGraphError } from '../../errors/graph-error.util';
import { parseGraphPage } from './graph-pagination';
import type { GraphPage } from './types/graph.schemas';

type RequestBuilder = (client: Client) => GraphRequest;

/**
 * Rate-limited, schema-checked GET access to Graph for one connection. Every
 * failure, including a response that does not match its schema, leaves here as
 * a classified error.
 */
export class GraphRequester {
  public constructor(
    private readonly client: Client,
    private readonly limiter: Bottleneck,
  ) {}

  public async get<S extends z.ZodType>(
    operation: string,
    schema: S,
    build: RequestBuilder,
  ): Promise<z.output<S>> {
    try {
      const response: unknown = await this.limiter.schedule(() => build(this.client).get());
      return schema.parse(response);
    } catch (error) {
      throw classifyGraphError(error, operation);
    }
  }

  public async getPage<S extends z.ZodType>(
    operation: string,
    itemSchema: S,
    build: RequestBuilder,
  ): Promise<GraphPage<z.output<S>>> {
    try {
      const response: unknown = await this.limiter.schedule(() => build(this.client).get());
      return parseGraphPage(response, itemSchema);
    } catch (error) {
      throw classifyGraphError(error, operation);
    }
  }

  /**
   * Yields pages lazily, following `@odata.nextLink`. With `resumeFrom` the
   * sequence starts at that next link instead of `first`.
   */
  public async *paginate<S extends z.ZodType>(
    operation: string,
    itemSchema: S,
    first: RequestBuilder,
    resumeFrom?: string,
  ): AsyncGenerator<GraphPage<z.output<S>>> {
    let build: RequestBuilder | undefined = resumeFrom
      ? (client) => client.api(resumeFrom)
      : first;

    while (build) {
      const page: GraphPage<z.output<S>> = await this.getPage(operation, itemSchema, build);
      yield page;
      const { nextLink } = page;
      build = nextLink ? (client) => client.api(nextLink) : undefined;
    }
  }
}
