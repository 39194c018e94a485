import { UNKNOWN } from '../domain/index.js';
import type { ServiceEventSource } from './event-source.js';

export interface PartitionContext {
  readonly partitionId: string;
}

/** Callbacks an event processor host drives for each leased partition. */
export interface PartitionProcessor<E = unknown> {
  open(context: PartitionContext): Promise<void>;
  close(context: PartitionContext, reason: string): Promise<void>;
  processEvents(context: PartitionContext, events: readonly E[]): Promise<void>;
}

export interface PartitionTarget {
  readonly eventHub: string;
  readonly consumerGroup: string;
}

/**
 * Wraps a partition processor so every open, close and batch is recorded
 * before it is delegated. The wrapped processor's class name is reported as
 * the calling component. Processor errors propagate unchanged.
 */
export function instrumentPartitionProcessor<E>(
  source: ServiceEventSource,
  processor: PartitionProcessor<E>,
  target: PartitionTarget,
): PartitionProcessor<E> {
  const component = processor.constructor.name || UNKNOWN;
  const { eventHub, consumerGroup } = target;

  return {
    async open(context) {
      source.openPartition(eventHub, consumerGroup, context.partitionId, { component, operation: 'open' });
      await processor.open(context);
    },

    async close(context, reason) {
      source.closePartition(eventHub, consumerGroup, context.partitionId, reason, {
        component,
        operation: 'close',
      });
      await processor.close(context, reason);
    },

    async processEvents(context, events) {
      source.processEvents(eventHub, consumerGroup, context.partitionId, events.length, {
        component,
        operation: 'processEvents',
      });
      await processor.processEvents(context, events);
    },
  };
}
