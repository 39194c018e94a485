import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { ServiceEventSource } from '../application/event-source.js';
import { hostNodeContext } from '../application/service-identity.js';
import { SingletonCell } from '../application/singleton.js';
import { loadEventSourceConfig } from './config.js';
import type { EventSourceConfig } from './config.js';
import { createLogger } from './logger.js';
import { InMemoryEventSink, LogEventSink, RedisStreamEventSink } from './sink/index.js';
import type { EventSink } from './sink/index.js';

/** Builds the configured sink. The Redis sink connects before it is returned. */
export async function createEventSink(config: EventSourceConfig, log: Logger): Promise<EventSink> {
  switch (config.sink) {
    case 'memory':
      return new InMemoryEventSink(config.subscription);

    case 'redis': {
      // Appends fail fast while disconnected: no offline queue, no per-command retry.
      const redis = new Redis(config.redisUrl, {
        enableOfflineQueue: false,
        maxRetriesPerRequest: 0,
        enableReadyCheck: true,
        lazyConnect: true,
      });
      await redis.connect();
      log.info({ streamKey: config.streamKey }, 'Redis connected');

      return new RedisStreamEventSink(redis, log, {
        provider: config.sourceName,
        streamKey: config.streamKey,
        maxLen: config.streamMaxLen,
        subscription: config.subscription,
      });
    }

    case 'log':
      // Level filtering is the subscription's job; let every record through pino.
      return new LogEventSink(log.child({ sink: 'log' }, { level: 'trace' }), {
        provider: config.sourceName,
        subscription: config.subscription,
      });
  }
}

export async function createServiceEventSource(
  config: EventSourceConfig = loadEventSourceConfig(),
): Promise<ServiceEventSource> {
  const log = createLogger(config.sourceName, config.logLevel);
  const sink = await createEventSink(config, log);

  const source = new ServiceEventSource(sink, {
    logger: log,
    nodeContext: hostNodeContext(config.nodeName),
    preferEncoded: config.preferEncoded,
  });

  log.info(
    { sink: sink.name, level: config.subscription.level, keywords: config.subscription.keywords },
    'Service event source ready',
  );
  return source;
}

const current = new SingletonCell(() => createServiceEventSource());

/**
 * The process-wide event source, built from the environment on first use.
 * Components that can take an injected ServiceEventSource should.
 */
export function getServiceEventSource(): Promise<ServiceEventSource> {
  return current.get();
}

/** The process-wide event source if it has already been built. */
export function peekServiceEventSource(): ServiceEventSource | undefined {
  return current.peek();
}

/** Closes and forgets the process-wide event source. */
export async function shutdownServiceEventSource(): Promise<void> {
  const source = current.peek();
  current.reset();
  if (source !== undefined) await source.close();
}
