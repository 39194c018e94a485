import { inspect } from 'node:util';
import type { EventDefinition, EventValue } from '../domain/index.js';

/**
 * Raised when a template references a positional argument that was not supplied.
 */
export class EventFormatError extends Error {
  readonly template: string;
  readonly index: number;

  constructor(template: string, index: number, argumentCount: number) {
    super(`Template "${template}" references {${index}} but only ${argumentCount} argument(s) were supplied`);
    this.name = 'EventFormatError';
    this.template = template;
    this.index = index;
  }
}

const TOKEN = /\{\{|\}\}|\{(\d+)\}/g;

function renderArgument(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return value instanceof Error ? String(value) : inspect(value);
  return String(value);
}

/**
 * Positional formatting: `{0}`, `{1}` ... bind to `args` in order,
 * `{{` and `}}` render literal braces. Null and undefined render empty.
 *
 * @throws EventFormatError when an index is out of range.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  return template.replace(TOKEN, (token: string, digits: string | undefined) => {
    if (digits === undefined) return token === '{{' ? '{' : '}';
    const index = Number(digits);
    if (index >= args.length) {
      throw new EventFormatError(template, index, args.length);
    }
    return renderArgument(args[index]);
  });
}

/** Placeholder indices referenced by a template, in order of appearance. */
export function placeholderIndices(template: string): number[] {
  const indices: number[] = [];
  for (const match of template.matchAll(TOKEN)) {
    const digits = match[1];
    if (digits !== undefined) indices.push(Number(digits));
  }
  return indices;
}

/** Human-readable rendering of a record, as a collector would display it. */
export function renderEventMessage(
  definition: EventDefinition,
  values: readonly EventValue[],
): string {
  return formatMessage(definition.messageTemplate, values);
}

/**
 * Serialises a failure for the error-severity events.
 * Errors keep their stack so the collector sees where the failure happened.
 */
export function describeFailure(failure: unknown): string {
  if (failure instanceof Error) {
    return failure.stack ?? `${failure.name}: ${failure.message}`;
  }
  if (typeof failure === 'string') return failure;
  return inspect(failure);
}
