import type { EventDefinition, EventLevel, EventRecord } from '../../domain/index.js';

/**
 * Boundary to the external collector.
 *
 * `isEnabled` must be cheap and side-effect-free: it runs before every
 * emission. `emitEncoded`, when present, receives the same payload bytes
 * `emit` would produce, already marshalled into a reused buffer; the view
 * is only valid for the duration of the call.
 */
export interface EventSink {
  readonly name: string;
  isEnabled(level?: EventLevel, keywords?: number): boolean;
  emit(record: EventRecord): void;
  emitEncoded?(definition: EventDefinition, payload: Uint8Array): void;
  close?(): Promise<void>;
}

/** What a sink's consumer subscribed to. */
export interface EventSubscription {
  readonly enabled: boolean;
  /** Most verbose level delivered. */
  readonly level: EventLevel;
  /** Keyword mask; events with no keywords match any mask. */
  readonly keywords: number;
}
