import { ALL_KEYWORDS, EventLevel } from '../../domain/index.js';
import type { EventDefinition, EventRecord, EventValue } from '../../domain/index.js';
import { matchesSubscription } from './subscription.js';
import { decodeEventPayload, encodeEventPayload } from './encoding.js';
import type { EventSink, EventSubscription } from './types.js';

export interface CapturedEvent {
  readonly eventId: number;
  readonly eventName: string;
  readonly values: readonly EventValue[];
  readonly payload: Buffer;
}

/**
 * Keeps every record in memory. Used by tests and local runs; never persisted.
 * Both emission paths store the same payload bytes.
 */
export class InMemoryEventSink implements EventSink {
  readonly name = 'memory';
  private readonly captured: CapturedEvent[] = [];
  private readonly subscription: EventSubscription;

  constructor(subscription: EventSubscription = { enabled: true, level: EventLevel.Verbose, keywords: ALL_KEYWORDS }) {
    this.subscription = subscription;
  }

  isEnabled(level?: EventLevel, keywords?: number): boolean {
    return matchesSubscription(this.subscription, level, keywords);
  }

  emit(record: EventRecord): void {
    this.captured.push({
      eventId: record.definition.id,
      eventName: record.definition.name,
      values: [...record.values],
      payload: encodeEventPayload(record.definition, record.values),
    });
  }

  emitEncoded(definition: EventDefinition, payload: Uint8Array): void {
    const copy = Buffer.from(payload);
    this.captured.push({
      eventId: definition.id,
      eventName: definition.name,
      values: decodeEventPayload(definition, copy),
      payload: copy,
    });
  }

  get records(): readonly CapturedEvent[] {
    return this.captured;
  }

  clear(): void {
    this.captured.length = 0;
  }
}
