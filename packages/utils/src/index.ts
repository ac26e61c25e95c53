export { type ChunkedMapOptions, mapInChunks } from './map-in-chunks';
export { normalizeError, type SanitizedError, sanitizeError } from './normalize-error';
export { isRedacted, Redacted } from './redacted';
export { createConcealer, LogsDiagnosticDataPolicy, smear } from './smear';
export { elapsedMilliseconds, elapsedSecondsLog } from './timing';
