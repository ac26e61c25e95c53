export { type OtelConfig, otelConfigSchema, parseOtelConfig } from './config';
export { type InstrumentationOptions, startInstrumentation } from './instrumentation';
