import pino from 'pino';
import type { Logger } from 'pino';
import type { CallerHint, EventDefinition, EventLevel, EventRecord, NodeContextProvider, ServiceDescriptor } from '../domain/index.js';
import type { EventSink } from '../infrastructure/sink/types.js';
import { EventPayloadWriter, checkRecord } from '../infrastructure/sink/encoding.js';
import { EVENTS, assertValidCatalog, createRecord } from './event-catalog.js';
import { resolveCaller } from './caller-context.js';
import { describeFailure, formatMessage } from './message-format.js';
import { hostNodeContext, projectServiceIdentity, serviceMessageValues } from './service-identity.js';

export interface ServiceEventSourceOptions {
  /** Diagnostics about the facade itself (dropped events). */
  logger?: Logger;
  /** Hosting node lookup for ServiceMessage. Defaults to the OS host name. */
  nodeContext?: NodeContextProvider;
  /** Hand sinks that support it a pre-marshalled payload instead of the record. */
  preferEncoded?: boolean;
}

function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim() === '';
}

/**
 * Typed emission facade over the event catalog.
 *
 * Every operation asks the sink whether its event is enabled before doing
 * any other work, and none of them throws: a record that cannot be built
 * or delivered is dropped and logged. Values are checked against their
 * parameter types before either delivery path.
 */
export class ServiceEventSource {
  private readonly sink: EventSink;
  private readonly log: Logger;
  private readonly nodeContext: NodeContextProvider;
  private readonly preferEncoded: boolean;
  private readonly writer = new EventPayloadWriter();

  constructor(sink: EventSink, options: ServiceEventSourceOptions = {}) {
    assertValidCatalog();
    this.sink = sink;
    this.log = options.logger ?? pino({ level: 'silent' });
    this.nodeContext = options.nodeContext ?? hostNodeContext();
    this.preferEncoded = options.preferEncoded ?? false;
  }

  get sinkName(): string {
    return this.sink.name;
  }

  /** Whether anything is subscribed, optionally for a level and keyword mask. */
  isEnabled(level?: EventLevel, keywords?: number): boolean {
    try {
      return this.sink.isEnabled(level, keywords);
    } catch (err: unknown) {
      this.log.warn({ err, sink: this.sink.name }, 'Event sink enablement check failed');
      return false;
    }
  }

  // --------------------------------------------------
  // Catalog operations
  // --------------------------------------------------

  /** Free-form message tagged with the calling component and operation. */
  message(message: string, caller?: CallerHint): void {
    if (isBlank(message) || !this.isEnabledFor(EVENTS.Message)) return;

    this.send(EVENTS.Message, () => {
      const { component, operation } = resolveCaller(this.message, caller);
      return createRecord(EVENTS.Message, [`[${component}::${operation}] ${message}`]);
    });
  }

  /**
   * Message carrying the identity of the reporting service.
   * `template` uses positional placeholders bound to `args`.
   */
  serviceMessage(service: ServiceDescriptor, template: string, ...args: unknown[]): void {
    if (!this.isEnabledFor(EVENTS.ServiceMessage)) return;

    this.send(EVENTS.ServiceMessage, () => {
      const identity = projectServiceIdentity(service, this.nodeContext);
      const finalMessage = formatMessage(template, args);
      return createRecord(EVENTS.ServiceMessage, serviceMessageValues(identity, finalMessage));
    });
  }

  serviceTypeRegistered(hostProcessId: number, serviceType: string): void {
    if (!this.isEnabledFor(EVENTS.ServiceTypeRegistered)) return;
    this.send(EVENTS.ServiceTypeRegistered, () =>
      createRecord(EVENTS.ServiceTypeRegistered, [hostProcessId, serviceType]),
    );
  }

  serviceHostInitializationFailed(failure: unknown): void {
    if (!this.isEnabledFor(EVENTS.ServiceHostInitializationFailed)) return;
    this.send(EVENTS.ServiceHostInitializationFailed, () =>
      createRecord(EVENTS.ServiceHostInitializationFailed, [describeFailure(failure)]),
    );
  }

  serviceRequestStart(requestTypeName: string): void {
    if (!this.isEnabledFor(EVENTS.ServiceRequestStart)) return;
    this.send(EVENTS.ServiceRequestStart, () => createRecord(EVENTS.ServiceRequestStart, [requestTypeName]));
  }

  serviceRequestStop(requestTypeName: string): void {
    if (!this.isEnabledFor(EVENTS.ServiceRequestStop)) return;
    this.send(EVENTS.ServiceRequestStop, () => createRecord(EVENTS.ServiceRequestStop, [requestTypeName]));
  }

  serviceRequestFailed(requestTypeName: string, failure: unknown): void {
    if (!this.isEnabledFor(EVENTS.ServiceRequestFailed)) return;
    this.send(EVENTS.ServiceRequestFailed, () =>
      createRecord(EVENTS.ServiceRequestFailed, [requestTypeName, describeFailure(failure)]),
    );
  }

  openPartition(eventHub: string, consumerGroup: string, partitionId: string, caller?: CallerHint): void {
    if (isBlank(eventHub) || isBlank(consumerGroup) || isBlank(partitionId)) return;
    if (!this.isEnabledFor(EVENTS.OpenPartition)) return;

    this.send(EVENTS.OpenPartition, () => {
      const { component, operation } = resolveCaller(this.openPartition, caller);
      return createRecord(EVENTS.OpenPartition, [eventHub, consumerGroup, partitionId, component, operation]);
    });
  }

  closePartition(
    eventHub: string,
    consumerGroup: string,
    partitionId: string,
    reason: string,
    caller?: CallerHint,
  ): void {
    if (isBlank(eventHub) || isBlank(consumerGroup) || isBlank(partitionId)) return;
    if (!this.isEnabledFor(EVENTS.ClosePartition)) return;

    this.send(EVENTS.ClosePartition, () => {
      const { component, operation } = resolveCaller(this.closePartition, caller);
      return createRecord(EVENTS.ClosePartition, [
        eventHub, consumerGroup, partitionId, reason, component, operation,
      ]);
    });
  }

  processEvents(
    eventHub: string,
    consumerGroup: string,
    partitionId: string,
    messageCount: number,
    caller?: CallerHint,
  ): void {
    if (isBlank(eventHub) || isBlank(consumerGroup) || isBlank(partitionId)) return;
    if (!this.isEnabledFor(EVENTS.ProcessEvents)) return;

    this.send(EVENTS.ProcessEvents, () => {
      const { component, operation } = resolveCaller(this.processEvents, caller);
      return createRecord(EVENTS.ProcessEvents, [
        eventHub, consumerGroup, partitionId, messageCount, component, operation,
      ]);
    });
  }

  /** Releases the sink's connection, if it holds one. */
  async close(): Promise<void> {
    await this.sink.close?.();
  }

  // --------------------------------------------------
  // Internals
  // --------------------------------------------------

  private isEnabledFor(definition: EventDefinition): boolean {
    return this.isEnabled(definition.level, definition.keywords);
  }

  private send(definition: EventDefinition, build: () => EventRecord): void {
    try {
      const record = build();
      checkRecord(record.definition, record.values);
      if (this.preferEncoded && this.sink.emitEncoded !== undefined) {
        this.sink.emitEncoded(record.definition, this.writer.write(record.definition, record.values));
      } else {
        this.sink.emit(record);
      }
    } catch (err: unknown) {
      this.log.warn({ err, eventId: definition.id, eventName: definition.name }, 'Service event dropped');
    }
  }
}
