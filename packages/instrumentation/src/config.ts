import { z } from 'zod';

const exporterKindSchema = z.enum(['otlp', 'console', 'none']);

export type ExporterKind = z.infer<typeof exporterKindSchema>;

export const otelConfigSchema = z.object({
  OTEL_SPAN_PROCESSOR: exporterKindSchema.prefault('otlp'),
  OTEL_METRICS_READER: exporterKindSchema.prefault('otlp'),
  OTEL_METRICS_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().prefault(60_000),
  OTEL_SERVICE_NAME: z.string().optional(),
});

export type OtelConfig = z.infer<typeof otelConfigSchema>;

export function parseOtelConfig(env: NodeJS.ProcessEnv = process.env): OtelConfig {
  return otelConfigSchema.parse(env);
}
