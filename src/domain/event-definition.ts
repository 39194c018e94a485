/**
 * Core domain types for the service event catalog.
 *
 * An event definition is immutable and describes one kind of occurrence
 * the host process reports. The collector keys historical queries on `id`,
 * so ids never change once published.
 */

/** Ordered severity. Lower is more severe. */
export enum EventLevel {
  Critical = 1,
  Error = 2,
  Warning = 3,
  Informational = 4,
  Verbose = 5,
}

/**
 * Category bit flags. A definition may carry several; sinks use them
 * for selective subscription.
 */
export const Keywords = {
  None: 0x0,
  Requests: 0x1,
  ServiceInitialization: 0x2,
  EventHub: 0x4,
} as const;

export type KeywordName = Exclude<keyof typeof Keywords, 'None'>;

/** Every keyword bit set. */
export const ALL_KEYWORDS = Keywords.Requests | Keywords.ServiceInitialization | Keywords.EventHub;

/** Primitive types the sink accepts. */
export type ParameterType = 'int32' | 'int64' | 'string' | 'datetime' | 'guid';

/** TypeScript value carried for each parameter type. */
export interface ParameterValueMap {
  int32: number;
  int64: bigint;
  string: string;
  datetime: Date;
  guid: string;
}

export type EventValue = ParameterValueMap[ParameterType];

export interface ParameterDefinition {
  readonly name: string;
  readonly type: ParameterType;
}

export interface EventDefinition {
  readonly id: number;
  readonly name: string;
  readonly level: EventLevel;
  readonly keywords: number;
  readonly messageTemplate: string;
  readonly parameters: readonly ParameterDefinition[];
}

/** Value tuple matching a parameter list positionally and in count. */
export type EventValues<P extends readonly ParameterDefinition[]> = {
  readonly [K in keyof P]: P[K] extends ParameterDefinition ? ParameterValueMap[P[K]['type']] : never;
};

/**
 * Ephemeral record built per emission. Owned by the emitting call,
 * never retained by the facade.
 */
export interface EventRecord<D extends EventDefinition = EventDefinition> {
  readonly definition: D;
  readonly values: EventValues<D['parameters']>;
}
