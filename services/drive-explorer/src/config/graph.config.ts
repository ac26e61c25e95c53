import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_GRAPH_API_VERSION,
  DEFAULT_GRAPH_BASE_URL,
  DEFAULT_GRAPH_RATE_LIMIT_PER_MINUTE,
  DEFAULT_GRAPH_REQUEST_TIMEOUT_SECONDS,
} from '../constants/defaults.constants';

export const GraphConfigSchema = z.object({
  baseUrl: z
    .url()
    .prefault(DEFAULT_GRAPH_BASE_URL)
    .transform((url) => url.replace(/\/+$/, ''))
    .describe('Microsoft Graph host, without the API version'),
  apiVersion: z
    .enum(['v1.0', 'beta'])
    .prefault(DEFAULT_GRAPH_API_VERSION)
    .describe('Microsoft Graph API version'),
  rateLimitPerMinute: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_GRAPH_RATE_LIMIT_PER_MINUTE)
    .describe('Number of Graph requests allowed per minute and connection'),
  requestTimeoutSeconds: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_GRAPH_REQUEST_TIMEOUT_SECONDS)
    .describe('Timeout of a single Graph request attempt'),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type GraphConfigNamespaced = { graph: GraphConfig };

export function parseGraphConfig(env: NodeJS.ProcessEnv): GraphConfig {
  return GraphConfigSchema.parse({
    baseUrl: env.GRAPH_BASE_URL,
    apiVersion: env.GRAPH_API_VERSION,
    rateLimitPerMinute: env.GRAPH_RATE_LIMIT_PER_MINUTE,
    requestTimeoutSeconds: env.GRAPH_REQUEST_TIMEOUT_SECONDS,
  });
}

export const graphConfig = registerAs('graph', (): GraphConfig => parseGraphConfig(process.env));
