import { UNKNOWN } from '../domain/index.js';
import type { CallerContext, CallerHint } from '../domain/index.js';

/**
 * Component name for a source location: the file name without directory
 * or final extension. Pure; `UNKNOWN` for a missing or blank path.
 */
export function componentFromFilePath(filePath: string | null | undefined): string {
  if (filePath == null || filePath.trim() === '') return UNKNOWN;

  let path = filePath.trim();
  if (path.startsWith('file://')) path = path.slice('file://'.length);

  const base = path.split(/[\\/]/).at(-1) ?? '';
  const dot = base.lastIndexOf('.');
  const name = dot === -1 ? base : base.slice(0, dot);

  return name === '' ? UNKNOWN : name;
}

/**
 * Operation name from a V8 frame function name:
 * `PartitionPump.processBatch [as run]` -> `processBatch`, `new Host` -> `Host`.
 */
export function operationFromFunctionName(functionName: string | null | undefined): string {
  if (functionName == null) return UNKNOWN;

  const name = functionName
    .replace(/^new\s+/, '')
    .replace(/\s*\[as [^\]]*\]$/, '')
    .trim();
  const member = name.split('.').at(-1) ?? '';

  return member === '' || member === '<anonymous>' ? UNKNOWN : member;
}

// at [async ]<function> (<file>:<line>:<column>)   or   at [async ]<file>:<line>:<column>
const FRAME = /^\s*at\s+(?:async\s+)?(?:(.*?)\s+\()?(.+?):\d+:\d+\)?$/;

export interface StackFrame {
  readonly functionName: string | undefined;
  readonly fileName: string | undefined;
}

export function parseStackFrame(line: string): StackFrame | undefined {
  const match = FRAME.exec(line);
  if (match === null) return undefined;
  return { functionName: match[1], fileName: match[2] };
}

/** Caller context from the first frame of a V8 stack string. */
export function callerFromStack(stack: string | undefined): CallerContext {
  const frame = (stack ?? '')
    .split('\n')
    .map(parseStackFrame)
    .find((parsed): parsed is StackFrame => parsed !== undefined);

  return {
    component: componentFromFilePath(frame?.fileName),
    operation: operationFromFunctionName(frame?.functionName),
  };
}

/**
 * Resolves who is emitting. Explicit hint fields win; the rest is derived
 * from the stack frame just below `boundary`, the public emission method
 * the instrumented code called.
 */
export function resolveCaller(
  boundary: (...args: never[]) => unknown,
  hint?: CallerHint,
): CallerContext {
  const component = hintField(hint?.component);
  const operation = hintField(hint?.operation);
  if (component !== undefined && operation !== undefined) {
    return { component, operation };
  }

  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  const derived = callerFromStack(holder.stack);

  return {
    component: component ?? derived.component,
    operation: operation ?? derived.operation,
  };
}

// A given but blank hint field is UNKNOWN rather than derived.
function hintField(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? UNKNOWN : value;
}
