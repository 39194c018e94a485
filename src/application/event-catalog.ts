import { z } from 'zod';
import { EventLevel, Keywords } from '../domain/index.js';
import type { EventDefinition, EventRecord, EventValues } from '../domain/index.js';
import { placeholderIndices } from './message-format.js';

/**
 * The closed set of events the host process can emit.
 *
 * Ids are stable across releases; add new events with new ids, never reuse one.
 * A `<Stem>Start` / `<Stem>Stop` / `<Stem>Failed` triple marks an activity the
 * collector pairs into one span: Start and Stop carry the same single
 * parameter, Failed repeats it and adds the failure description.
 */
export const EVENTS = {
  Message: {
    id: 1,
    name: 'Message',
    level: EventLevel.Informational,
    keywords: Keywords.None,
    messageTemplate: '{0}',
    parameters: [{ name: 'message', type: 'string' }],
  },
  ServiceMessage: {
    id: 2,
    name: 'ServiceMessage',
    level: EventLevel.Informational,
    keywords: Keywords.None,
    messageTemplate: '{7}',
    parameters: [
      { name: 'serviceName', type: 'string' },
      { name: 'serviceTypeName', type: 'string' },
      { name: 'replicaOrInstanceId', type: 'int64' },
      { name: 'partitionId', type: 'guid' },
      { name: 'applicationName', type: 'string' },
      { name: 'applicationTypeName', type: 'string' },
      { name: 'nodeName', type: 'string' },
      { name: 'message', type: 'string' },
    ],
  },
  ServiceTypeRegistered: {
    id: 3,
    name: 'ServiceTypeRegistered',
    level: EventLevel.Informational,
    keywords: Keywords.ServiceInitialization,
    messageTemplate: 'Service host process {0} registered service type {1}',
    parameters: [
      { name: 'hostProcessId', type: 'int32' },
      { name: 'serviceType', type: 'string' },
    ],
  },
  ServiceHostInitializationFailed: {
    id: 4,
    name: 'ServiceHostInitializationFailed',
    level: EventLevel.Error,
    keywords: Keywords.ServiceInitialization,
    messageTemplate: 'Service host initialization failed',
    parameters: [{ name: 'exception', type: 'string' }],
  },
  ServiceRequestStart: {
    id: 5,
    name: 'ServiceRequestStart',
    level: EventLevel.Informational,
    keywords: Keywords.Requests,
    messageTemplate: "Service request '{0}' started",
    parameters: [{ name: 'requestTypeName', type: 'string' }],
  },
  ServiceRequestStop: {
    id: 6,
    name: 'ServiceRequestStop',
    level: EventLevel.Informational,
    keywords: Keywords.Requests,
    messageTemplate: "Service request '{0}' finished",
    parameters: [{ name: 'requestTypeName', type: 'string' }],
  },
  ServiceRequestFailed: {
    id: 7,
    name: 'ServiceRequestFailed',
    level: EventLevel.Error,
    keywords: Keywords.Requests,
    messageTemplate: "Service request '{0}' failed",
    parameters: [
      { name: 'requestTypeName', type: 'string' },
      { name: 'exception', type: 'string' },
    ],
  },
  OpenPartition: {
    id: 8,
    name: 'OpenPartition',
    level: EventLevel.Informational,
    keywords: Keywords.EventHub,
    messageTemplate: '[{3}::{4}] EventHub=[{0}] ConsumerGroup=[{1}] PartitionId=[{2}]',
    parameters: [
      { name: 'eventHub', type: 'string' },
      { name: 'consumerGroup', type: 'string' },
      { name: 'partitionId', type: 'string' },
      { name: 'source', type: 'string' },
      { name: 'method', type: 'string' },
    ],
  },
  ClosePartition: {
    id: 9,
    name: 'ClosePartition',
    level: EventLevel.Informational,
    keywords: Keywords.EventHub,
    messageTemplate: '[{4}::{5}] EventHub=[{0}] ConsumerGroup=[{1}] PartitionId=[{2}] Reason=[{3}]',
    parameters: [
      { name: 'eventHub', type: 'string' },
      { name: 'consumerGroup', type: 'string' },
      { name: 'partitionId', type: 'string' },
      { name: 'reason', type: 'string' },
      { name: 'source', type: 'string' },
      { name: 'method', type: 'string' },
    ],
  },
  ProcessEvents: {
    id: 10,
    name: 'ProcessEvents',
    level: EventLevel.Informational,
    keywords: Keywords.EventHub,
    messageTemplate: '[{4}::{5}] EventHub=[{0}] ConsumerGroup=[{1}] PartitionId=[{2}] MessageCount=[{3}]',
    parameters: [
      { name: 'eventHub', type: 'string' },
      { name: 'consumerGroup', type: 'string' },
      { name: 'partitionId', type: 'string' },
      { name: 'messageCount', type: 'int32' },
      { name: 'source', type: 'string' },
      { name: 'method', type: 'string' },
    ],
  },
} as const satisfies Record<string, EventDefinition>;

export type EventName = keyof typeof EVENTS;

export const EVENT_CATALOG: readonly EventDefinition[] = Object.values(EVENTS);

/** Pairs a definition with values whose count and types follow its parameter list. */
export function createRecord<D extends EventDefinition>(
  definition: D,
  values: EventValues<D['parameters']>,
): EventRecord<D> {
  return { definition, values };
}

export function findDefinition(
  id: number,
  catalog: readonly EventDefinition[] = EVENT_CATALOG,
): EventDefinition | undefined {
  return catalog.find((definition) => definition.id === id);
}

/** Stems of every `<Stem>Start` definition in the catalog. */
export function findActivityStems(catalog: readonly EventDefinition[] = EVENT_CATALOG): string[] {
  return catalog
    .filter((definition) => definition.name.endsWith('Start') && definition.name.length > 'Start'.length)
    .map((definition) => definition.name.slice(0, -'Start'.length));
}

const definitionSchema = z
  .object({
    id: z.number().int().positive(),
    name: z.string().regex(/^[A-Z][A-Za-z0-9]*$/, 'Must be a PascalCase identifier'),
    level: z.nativeEnum(EventLevel),
    keywords: z.number().int().nonnegative(),
    messageTemplate: z.string(),
    parameters: z.array(
      z.object({
        name: z.string().min(1),
        type: z.enum(['int32', 'int64', 'string', 'datetime', 'guid']),
      }),
    ),
  })
  .superRefine((definition, ctx) => {
    for (const index of placeholderIndices(definition.messageTemplate)) {
      if (index >= definition.parameters.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['messageTemplate'],
          message: `Placeholder {${index}} has no matching parameter`,
        });
      }
    }
  });

export type CatalogValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly issues: readonly string[] };

function activityIssues(catalog: readonly EventDefinition[]): string[] {
  const issues: string[] = [];
  const byName = new Map(catalog.map((definition) => [definition.name, definition]));

  for (const stem of findActivityStems(catalog)) {
    const start = byName.get(`${stem}Start`);
    const stop = byName.get(`${stem}Stop`);
    const failed = byName.get(`${stem}Failed`);
    if (start === undefined) continue;

    if (stop === undefined || failed === undefined) {
      issues.push(`Activity "${stem}" needs ${stem}Start, ${stem}Stop and ${stem}Failed`);
      continue;
    }

    const key = start.parameters[0];
    if (key === undefined || start.parameters.length !== 1) {
      issues.push(`${stem}Start must take exactly one parameter`);
      continue;
    }
    const stopKey = stop.parameters[0];
    if (stop.parameters.length !== 1 || stopKey?.name !== key.name || stopKey.type !== key.type) {
      issues.push(`${stem}Stop must take the same parameter as ${stem}Start`);
    }
    const failedKey = failed.parameters[0];
    if (failed.parameters.length !== 2 || failedKey?.name !== key.name || failedKey.type !== key.type) {
      issues.push(`${stem}Failed must take ${key.name} followed by the failure description`);
    }
    if (failed.level !== EventLevel.Error) {
      issues.push(`${stem}Failed must be error severity`);
    }
  }

  return issues;
}

/**
 * Checks a catalog: well-formed definitions, unique ids and names,
 * placeholders bound to parameters, complete activity triples.
 */
export function validateCatalog(catalog: readonly EventDefinition[] = EVENT_CATALOG): CatalogValidation {
  const issues: string[] = [];
  const ids = new Set<number>();
  const names = new Set<string>();

  for (const definition of catalog) {
    const parsed = definitionSchema.safeParse(definition);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`${definition.name}: ${issue.path.join('.') || 'definition'} ${issue.message}`);
      }
    }
    if (ids.has(definition.id)) issues.push(`Duplicate event id ${definition.id}`);
    if (names.has(definition.name)) issues.push(`Duplicate event name ${definition.name}`);
    ids.add(definition.id);
    names.add(definition.name);
  }

  issues.push(...activityIssues(catalog));

  return issues.length === 0 ? { valid: true } : { valid: false, issues };
}

export class CatalogError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid event catalog:\n${issues.join('\n')}`);
    this.name = 'CatalogError';
    this.issues = issues;
  }
}

export function assertValidCatalog(catalog: readonly EventDefinition[] = EVENT_CATALOG): void {
  const result = validateCatalog(catalog);
  if (!result.valid) throw new CatalogError(result.issues);
}
