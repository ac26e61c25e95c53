import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { addCleanupListener, exitAfterCleanup } from 'async-cleanup';
import { parseOtelConfig } from './config';
import { createMetricReader, createSpanProcessor } from './exporters';

export interface InstrumentationOptions {
  serviceName: string;
}

/**
 * Must run before the application module graph is loaded so the auto
 * instrumentations can patch http, express and undici.
 */
export function startInstrumentation({ serviceName }: InstrumentationOptions): void {
  console.log('OpenTelemetry Configuration:');

  const config = parseOtelConfig();
  const spanProcessor = createSpanProcessor(config);
  const metricReader = createMetricReader(config);

  const otelSDK = new NodeSDK({
    serviceName: config.OTEL_SERVICE_NAME ?? serviceName,
    spanProcessors: spanProcessor ? [spanProcessor] : undefined,
    metricReader,
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false },
      }),
    ],
  });

  addCleanupListener(async () => {
    console.log('Shutting down OpenTelemetry SDK...');
    if (spanProcessor) {
      try {
        await spanProcessor.forceFlush();
      } catch (err) {
        console.error('Error flushing span processor:', err);
      }
    }

    await otelSDK
      .shutdown()
      .then(
        () => console.log('OpenTelemetry SDK shut down successfully'),
        (err) => console.log('Error shutting down OpenTelemetry SDK', err),
      )
      .finally(() => exitAfterCleanup(0));
  });

  otelSDK.start();
  console.log('OpenTelemetry SDK initialized successfully');
}
