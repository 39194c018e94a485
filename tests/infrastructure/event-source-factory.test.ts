import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import {
  createEventSink,
  createServiceEventSource,
  getServiceEventSource,
  peekServiceEventSource,
  shutdownServiceEventSource,
} from '../../src/infrastructure/event-source-factory.js';
import { loadEventSourceConfig } from '../../src/infrastructure/config.js';
import { InMemoryEventSink } from '../../src/infrastructure/sink/memory-sink.js';
import { EventLevel } from '../../src/domain/index.js';
import { createRecord, EVENTS } from '../../src/application/event-catalog.js';
import { fakeLogger } from '../helpers.js';

interface FakeRedisClient {
  url: string;
  options: Record<string, unknown>;
  xadd: Mock;
}

const redisClients = vi.hoisted((): FakeRedisClient[] => []);

// Behaves like a client with no connection and no offline queue.
vi.mock('ioredis', () => ({
  Redis: class {
    readonly xadd = vi.fn().mockRejectedValue(new Error("Stream isn't writeable and enableOfflineQueue options is false"));
    readonly quit = vi.fn().mockResolvedValue('OK');
    readonly connect = vi.fn().mockResolvedValue(undefined);

    constructor(
      readonly url: string,
      readonly options: Record<string, unknown>,
    ) {
      redisClients.push(this);
    }
  },
}));

describe('createEventSink', () => {
  it('builds the in-memory sink', async () => {
    const sink = await createEventSink(loadEventSourceConfig({ EVENT_SINK: 'memory' }), fakeLogger());
    expect(sink).toBeInstanceOf(InMemoryEventSink);
  });

  it('builds the log sink with the configured subscription', async () => {
    const log = fakeLogger();
    const child = fakeLogger();
    (log as unknown as { child: unknown }).child = vi.fn(() => child);

    const sink = await createEventSink(loadEventSourceConfig({ EVENT_LEVEL: 'error' }), log);

    expect(sink.name).toBe('log');
    expect(sink.isEnabled(EventLevel.Error)).toBe(true);
    expect(sink.isEnabled(EventLevel.Informational)).toBe(false);
    expect(log.child).toHaveBeenCalledWith({ sink: 'log' }, { level: 'trace' });
  });
});

describe('createEventSink with redis', () => {
  it('builds a client that rejects appends while disconnected', async () => {
    const log = fakeLogger();
    const sink = await createEventSink(
      loadEventSourceConfig({ EVENT_SINK: 'redis', REDIS_URL: 'redis://cache:6379' }),
      log,
    );

    const client = redisClients[0];
    expect(client?.url).toBe('redis://cache:6379');
    expect(client?.options).toEqual(
      expect.objectContaining({ enableOfflineQueue: false, maxRetriesPerRequest: 0 }),
    );

    sink.emit(createRecord(EVENTS.ServiceRequestStart, ['Ping']));

    await vi.waitFor(() => {
      expect(log.warn).toHaveBeenCalledWith(
        { err: expect.any(Error), event_id: 5 },
        'Failed to append service event to stream',
      );
    });
    expect(client?.xadd).toHaveBeenCalledTimes(1);
  });
});

describe('createServiceEventSource', () => {
  it('wires the configured sink', async () => {
    const source = await createServiceEventSource(
      loadEventSourceConfig({ EVENT_SINK: 'memory', LOG_LEVEL: 'silent' }),
    );
    expect(source.sinkName).toBe('memory');
  });
});

describe('getServiceEventSource', () => {
  afterEach(async () => {
    await shutdownServiceEventSource();
    vi.unstubAllEnvs();
  });

  it('shares one instance between concurrent first callers', async () => {
    vi.stubEnv('EVENT_SINK', 'memory');
    vi.stubEnv('LOG_LEVEL', 'silent');

    expect(peekServiceEventSource()).toBeUndefined();

    const sources = await Promise.all(Array.from({ length: 8 }, () => getServiceEventSource()));

    expect(new Set(sources).size).toBe(1);
    expect(sources[0]?.sinkName).toBe('memory');
    expect(peekServiceEventSource()).toBe(sources[0]);
  });

  it('is empty again after shutdown', async () => {
    vi.stubEnv('EVENT_SINK', 'memory');
    vi.stubEnv('LOG_LEVEL', 'silent');

    await getServiceEventSource();
    await shutdownServiceEventSource();

    expect(peekServiceEventSource()).toBeUndefined();
  });
});
