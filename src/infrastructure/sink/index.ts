export type { EventSink, EventSubscription } from './types.js';
export { DEFAULT_SUBSCRIPTION, matchesSubscription } from './subscription.js';
export {
  EventEncodingError,
  EventPayloadWriter,
  checkRecord,
  decodeEventPayload,
  encodeEventPayload,
  encodedSize,
  writeEventPayload,
} from './encoding.js';
export type { CheckedField } from './encoding.js';
export { InMemoryEventSink } from './memory-sink.js';
export type { CapturedEvent } from './memory-sink.js';
export { LogEventSink } from './log-sink.js';
export type { LogEventSinkOptions } from './log-sink.js';
export { RedisStreamEventSink } from './redis-stream-sink.js';
export type { RedisStreamSinkOptions } from './redis-stream-sink.js';
