import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import {
  ConsoleMetricExporter,
  type MetricReader,
  PeriodicExportingMetricReader,
  type PushMetricExporter,
} from '@opentelemetry/sdk-metrics';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { ExporterKind, OtelConfig } from './config';

const DEFAULT_EXPORT_TIMEOUT_MS = 30_000;

const traceExporters: Record<Exclude<ExporterKind, 'none'>, () => SpanExporter> = {
  otlp: () => new OTLPTraceExporter(),
  console: () => new ConsoleSpanExporter(),
};

const metricExporters: Record<Exclude<ExporterKind, 'none'>, () => PushMetricExporter> = {
  otlp: () => new OTLPMetricExporter(),
  console: () => new ConsoleMetricExporter(),
};

export function createSpanProcessor(config: OtelConfig): SpanProcessor | undefined {
  const kind = config.OTEL_SPAN_PROCESSOR;
  console.log(`  Traces: ${kind}`);
  if (kind === 'none') return undefined;
  return new BatchSpanProcessor(traceExporters[kind]());
}

export function createMetricReader(config: OtelConfig): MetricReader | undefined {
  const kind = config.OTEL_METRICS_READER;
  console.log(`  Metrics: ${kind} every ${config.OTEL_METRICS_EXPORT_INTERVAL_MS}ms`);
  if (kind === 'none') return undefined;
  return new PeriodicExportingMetricReader({
    exporter: metricExporters[kind](),
    exportIntervalMillis: config.OTEL_METRICS_EXPORT_INTERVAL_MS,
    // the reader rejects a timeout longer than the interval
    exportTimeoutMillis: Math.min(config.OTEL_METRICS_EXPORT_INTERVAL_MS, DEFAULT_EXPORT_TIMEOUT_MS),
  });
}
