import { Redacted } from '@drive-explorer/utils';
import { z } from 'zod';

const secret = (description: string) =>
  z
    .string()
    .nonempty()
    .transform((value) => new Redacted(value))
    .describe(description);

const clientSecretAuthConfig = z.object({
  mode: z.literal('client-secret').describe('App-only access through the client credentials flow'),
  tenantId: z.string().nonempty().describe('Entra ID tenant ID'),
  clientId: z.string().nonempty().describe('Entra ID application client ID'),
  clientSecret: secret('Entra ID application client secret'),
});

const accessTokenAuthConfig = z.object({
  mode: z.literal('access-token').describe('Delegated access through a pre-issued bearer token'),
  accessToken: secret('Bearer token for Microsoft Graph'),
});

export const ConnectionAuthConfigSchema = z.discriminatedUnion('mode', [
  clientSecretAuthConfig,
  accessTokenAuthConfig,
]);

export const ConnectionConfigSchema = z.object({
  id: z.string().nonempty().describe('Identifier callers use to address the connection'),
  provider: z
    .string()
    .nonempty()
    .describe('Source provider, e.g. sharepoint or onedrive; unknown providers are rejected on use'),
  displayName: z.string().optional(),
  auth: ConnectionAuthConfigSchema,
});

export const S3StorageConfigSchema = z.object({
  kind: z.literal('s3'),
  bucket: z.string().nonempty(),
  prefix: z
    .string()
    .prefault('')
    .transform((prefix) => {
      const trimmed = prefix.replace(/^\/+|\/+$/g, '');
      return trimmed ? `${trimmed}/` : '';
    })
    .describe('Key prefix prepended to everything written for the collection'),
  region: z.string().nonempty().prefault('us-east-1'),
  endpoint: z.url().optional().describe('Custom endpoint for S3 compatible storage'),
  forcePathStyle: z.boolean().prefault(false),
  accessKeyId: z.string().nonempty().optional(),
  secretAccessKey: secret('S3 secret access key').optional(),
});

export const CollectionConfigSchema = z.object({
  id: z.string().nonempty(),
  readableId: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'readableId must be lowercase alphanumeric with dashes')
    .describe('Stable, path-safe identifier used in destination keys'),
  name: z.string().optional(),
  storage: S3StorageConfigSchema.optional(),
});

export const RegistryConfigSchema = z
  .object({
    connections: z.array(ConnectionConfigSchema).prefault([]),
    collections: z.array(CollectionConfigSchema).prefault([]),
  })
  .superRefine((registry, ctx) => {
    const sections = {
      connections: registry.connections.map((c) => c.id),
      collections: registry.collections.map((c) => c.id),
    };
    for (const [section, ids] of Object.entries(sections)) {
      const seen = new Set<string>();
      for (const [index, id] of ids.entries()) {
        if (seen.has(id)) {
          ctx.addIssue({ code: 'custom', path: [section, index, 'id'], message: `Duplicate id ${id}` });
        }
        seen.add(id);
      }
    }
  });

export type ConnectionAuthConfig = z.infer<typeof ConnectionAuthConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type S3StorageConfig = z.infer<typeof S3StorageConfigSchema>;
export type CollectionConfig = z.infer<typeof CollectionConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
