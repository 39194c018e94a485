export { loadEventSourceConfig, parseKeywords, ConfigError } from './config.js';
export type { EventSourceConfig, SinkKind, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export {
  createEventSink,
  createServiceEventSource,
  getServiceEventSource,
  peekServiceEventSource,
  shutdownServiceEventSource,
} from './event-source-factory.js';
export * from './sink/index.js';
