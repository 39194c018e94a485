import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  EventLevel,
  EventRecord,
  NodeContextProvider,
  StatefulService,
  StatelessService,
} from '../src/domain/index.js';
import type { EventSink } from '../src/infrastructure/sink/types.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  } as unknown as Logger;
}

/** Sink double that counts gate checks and keeps emitted records. */
export class CountingSink implements EventSink {
  readonly name = 'counting';
  enabled: boolean;
  isEnabledCalls = 0;
  readonly emitted: EventRecord[] = [];

  constructor(enabled: boolean = true) {
    this.enabled = enabled;
  }

  isEnabled(_level?: EventLevel, _keywords?: number): boolean {
    this.isEnabledCalls++;
    return this.enabled;
  }

  emit(record: EventRecord): void {
    this.emitted.push(record);
  }
}

export const PARTITION_GUID = '0f8fad5b-d9cb-469f-a165-70867728950e';

export function statelessService(instanceId: bigint = 131n): StatelessService {
  return {
    kind: 'stateless',
    context: {
      serviceName: 'fabric:/IngestApp/Processor',
      serviceTypeName: 'ProcessorType',
      instanceId,
      partitionId: PARTITION_GUID,
      codePackageActivationContext: {
        applicationName: 'fabric:/IngestApp',
        applicationTypeName: 'IngestAppType',
      },
    },
  };
}

export function statefulService(replicaId: bigint = 9_000_000_000n): StatefulService {
  return {
    kind: 'stateful',
    context: {
      serviceName: 'fabric:/IngestApp/Checkpoints',
      serviceTypeName: 'CheckpointsType',
      replicaId,
      partitionId: PARTITION_GUID,
      codePackageActivationContext: {
        applicationName: 'fabric:/IngestApp',
        applicationTypeName: 'IngestAppType',
      },
    },
  };
}

export function fixedNode(nodeName: string): NodeContextProvider {
  return { getNodeName: () => nodeName };
}
