import { RequestMethod } from '@nestjs/common';
import type { Params } from 'nestjs-pino';

export const productionTarget = {
  target: 'pino/file',
};

export const developmentTarget = {
  target: 'pino-pretty',
  options: {
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
    ignore: 'trace_flags,hostname,pid',
  },
};

export const REDACTED_LOG_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'req.query.pageCursor',
];

export function createLoggerOptions(nodeEnv = process.env.NODE_ENV): Params {
  const isProduction = nodeEnv === 'production';

  return {
    renameContext: isProduction ? undefined : 'caller',
    pinoHttp: {
      enabled: true,
      level: 'info',
      redact: {
        paths: REDACTED_LOG_PATHS,
        censor: () => '[Redacted]',
      },
      transport: isProduction ? productionTarget : developmentTarget,
    },
    exclude: [
      { method: RequestMethod.GET, path: 'probe' },
    ],
  };
}
