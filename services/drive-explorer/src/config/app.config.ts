import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { DEFAULT_PORT } from '../constants/defaults.constants';

export const AppConfigSchema = z
  .object({
    nodeEnv: z
      .enum(['development', 'production', 'test'])
      .prefault('production')
      .describe('Specifies the environment in which the application is running'),
    port: z.coerce
      .number()
      .int()
      .min(0)
      .max(65535)
      .prefault(DEFAULT_PORT)
      .describe('The local HTTP port to bind the server to'),
    logLevel: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .prefault('info')
      .describe('The log level at which the services outputs (pino)'),
    logsDiagnosticsDataPolicy: z
      .enum(['conceal', 'disclose'])
      .prefault('conceal')
      .describe('Controls whether site ids, drive ids and file names are logged in full or smeared'),
    registryFile: z
      .string()
      .nonempty()
      .describe('Path to the YAML file listing source connections and destination collections'),
  })
  .transform((c) => ({
    ...c,
    isDev: c.nodeEnv === 'development',
  }));

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigNamespaced = { app: AppConfig };

export function parseAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  return AppConfigSchema.parse({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    logsDiagnosticsDataPolicy: env.LOGS_DIAGNOSTICS_DATA_POLICY,
    registryFile: env.REGISTRY_FILE,
  });
}

export const appConfig = registerAs('app', (): AppConfig => parseAppConfig(process.env));
