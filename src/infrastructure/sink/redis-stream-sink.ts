import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { EventDefinition, EventLevel, EventRecord } from '../../domain/index.js';
import { encodeEventPayload } from './encoding.js';
import { matchesSubscription } from './subscription.js';
import type { EventSink, EventSubscription } from './types.js';

export interface RedisStreamSinkOptions {
  provider: string;
  streamKey: string;
  /** Approximate cap passed as `MAXLEN ~`. */
  maxLen: number;
  subscription: EventSubscription;
}

/**
 * Appends each record to a Redis Stream for the collector to consume.
 *
 * Entries are flat field/value lists; the payload travels base64-encoded
 * in `data`. Appends are fire-and-forget: failures are logged, never
 * surfaced to the emitting call.
 */
export class RedisStreamEventSink implements EventSink {
  readonly name = 'redis';
  private readonly redis: Redis;
  private readonly log: Logger;
  private readonly options: RedisStreamSinkOptions;

  constructor(redis: Redis, log: Logger, options: RedisStreamSinkOptions) {
    this.redis = redis;
    this.log = log;
    this.options = options;
  }

  isEnabled(level?: EventLevel, keywords?: number): boolean {
    return matchesSubscription(this.options.subscription, level, keywords);
  }

  emit(record: EventRecord): void {
    this.append(record.definition, encodeEventPayload(record.definition, record.values));
  }

  emitEncoded(definition: EventDefinition, payload: Uint8Array): void {
    this.append(definition, payload);
  }

  async close(): Promise<void> {
    await this.redis.quit();
    this.log.info('Redis disconnected');
  }

  private append(definition: EventDefinition, payload: Uint8Array): void {
    // Serialise before returning: the buffer path reuses `payload`.
    const data = Buffer.from(payload).toString('base64');

    void this.redis
      .xadd(
        this.options.streamKey,
        'MAXLEN', '~', this.options.maxLen,
        '*',
        'provider', this.options.provider,
        'event_id', definition.id,
        'event_name', definition.name,
        'level', definition.level,
        'keywords', definition.keywords,
        'timestamp', new Date().toISOString(),
        'data', data,
      )
      .catch((err: unknown) => {
        this.log.warn({ err, event_id: definition.id }, 'Failed to append service event to stream');
      });
  }
}
