/**
 * Structured service event source.
 *
 * Typed emission operations over a fixed event catalog, gated on sink
 * enablement, enriched with caller and service identity, and handed to a
 * pluggable sink. Use `getServiceEventSource()` for the process-wide
 * instance, or construct a `ServiceEventSource` and pass it where needed.
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export * from './interfaces/http/index.js';
