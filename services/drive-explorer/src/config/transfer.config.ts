import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_STEP_TIMEOUT_SECONDS,
  DEFAULT_TRANSFER_CONCURRENCY,
} from '../constants/defaults.constants';

export const TransferConfigSchema = z.object({
  concurrency: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_TRANSFER_CONCURRENCY)
    .describe('Number of items of one batch processed at the same time'),
  stepTimeoutSeconds: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_STEP_TIMEOUT_SECONDS)
    .describe('Time limit of a single pipeline step'),
  maxFileSizeBytes: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_MAX_FILE_SIZE_BYTES)
    .describe('Files larger than this are not downloaded'),
  downloadDirectory: z
    .string()
    .nonempty()
    .prefault(join(tmpdir(), 'drive-explorer'))
    .describe('Directory where file content is staged before upload'),
});

export type TransferConfig = z.infer<typeof TransferConfigSchema>;
export type TransferConfigNamespaced = { transfer: TransferConfig };

export function parseTransferConfig(env: NodeJS.ProcessEnv): TransferConfig {
  return TransferConfigSchema.parse({
    concurrency: env.TRANSFER_CONCURRENCY,
    stepTimeoutSeconds: env.TRANSFER_STEP_TIMEOUT_SECONDS,
    maxFileSizeBytes: env.TRANSFER_MAX_FILE_SIZE_BYTES,
    downloadDirectory: env.TRANSFER_DOWNLOAD_DIRECTORY,
  });
}

export const transferConfig = registerAs(
  'transfer',
  (): TransferConfig => parseTransferConfig(process.env),
);
