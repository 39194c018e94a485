import type { EventDefinition, EventValue, ParameterDefinition, ParameterType } from '../../domain/index.js';

/**
 * Payload wire format, one field per parameter in declared order:
 *
 * - int32: 4 bytes little-endian
 * - int64: 8 bytes little-endian
 * - string: UTF-16LE code units followed by a 2-byte NUL
 * - datetime: FILETIME (100 ns ticks since 1601-01-01 UTC), int64 little-endian
 * - guid: 16 bytes, first three groups little-endian (Windows GUID layout)
 */

const GUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

// Milliseconds between 1601-01-01 and 1970-01-01.
const FILETIME_EPOCH_OFFSET_MS = 11_644_473_600_000n;
const TICKS_PER_MS = 10_000n;

const EXPECTED: Record<ParameterType, string> = {
  int32: 'an int32',
  int64: 'an int64 bigint',
  datetime: 'a valid Date',
  guid: 'a GUID',
  string: 'a string',
};

export class EventEncodingError extends Error {
  constructor(definition: EventDefinition, message: string) {
    super(`${definition.name}: ${message}`);
    this.name = 'EventEncodingError';
  }
}

/** A value checked against its parameter type. */
export type CheckedField =
  | { type: 'int32'; value: number }
  | { type: 'int64'; value: bigint }
  | { type: 'datetime'; value: Date }
  | { type: 'guid'; value: string }
  | { type: 'string'; value: string };

function checkField(parameter: ParameterDefinition, value: EventValue): CheckedField | undefined {
  switch (parameter.type) {
    case 'int32':
      return typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
        ? { type: 'int32', value }
        : undefined;
    case 'int64':
      return typeof value === 'bigint' && value >= INT64_MIN && value <= INT64_MAX
        ? { type: 'int64', value }
        : undefined;
    case 'datetime':
      return value instanceof Date && !Number.isNaN(value.getTime()) ? { type: 'datetime', value } : undefined;
    case 'guid':
      return typeof value === 'string' && GUID.test(value) ? { type: 'guid', value } : undefined;
    case 'string':
      return typeof value === 'string' ? { type: 'string', value } : undefined;
  }
}

/**
 * Checks `values` against the definition's parameter list: count, order
 * and type (including int32/int64 range and GUID form).
 * @throws {EventEncodingError} on the first mismatch
 */
export function checkRecord(definition: EventDefinition, values: readonly EventValue[]): CheckedField[] {
  if (values.length !== definition.parameters.length) {
    throw new EventEncodingError(
      definition,
      `expected ${definition.parameters.length} value(s), got ${values.length}`,
    );
  }
  return definition.parameters.map((parameter, i) => {
    const value = values[i];
    if (value === undefined) {
      throw new EventEncodingError(definition, `missing value for ${parameter.name}`);
    }
    const field = checkField(parameter, value);
    if (field === undefined) {
      throw new EventEncodingError(definition, `${parameter.name} must be ${EXPECTED[parameter.type]}`);
    }
    return field;
  });
}

function fieldSize(field: CheckedField): number {
  switch (field.type) {
    case 'int32':
      return 4;
    case 'int64':
    case 'datetime':
      return 8;
    case 'guid':
      return 16;
    case 'string':
      return (field.value.length + 1) * 2;
  }
}

function sizeOf(fields: readonly CheckedField[]): number {
  return fields.reduce((size, field) => size + fieldSize(field), 0);
}

export function encodedSize(definition: EventDefinition, values: readonly EventValue[]): number {
  return sizeOf(checkRecord(definition, values));
}

function writeGuid(target: Buffer, offset: number, guid: string): void {
  const hex = Buffer.from(guid.replace(/-/g, ''), 'hex');
  // Data1 (4), Data2 (2), Data3 (2) little-endian; Data4 (8) as-is
  target.writeUInt32LE(hex.readUInt32BE(0), offset);
  target.writeUInt16LE(hex.readUInt16BE(4), offset + 4);
  target.writeUInt16LE(hex.readUInt16BE(6), offset + 6);
  hex.copy(target, offset + 8, 8, 16);
}

function readGuid(source: Uint8Array, offset: number): string {
  const bytes = Buffer.from(source.subarray(offset, offset + 16));
  const hex = Buffer.alloc(16);
  hex.writeUInt32BE(bytes.readUInt32LE(0), 0);
  hex.writeUInt16BE(bytes.readUInt16LE(4), 4);
  hex.writeUInt16BE(bytes.readUInt16LE(6), 6);
  bytes.copy(hex, 8, 8, 16);
  const s = hex.toString('hex');
  return `${s.slice(0, 8)}-${s.slice(8, 12)}-${s.slice(12, 16)}-${s.slice(16, 20)}-${s.slice(20)}`;
}

function writeFields(target: Buffer, fields: readonly CheckedField[]): number {
  let offset = 0;

  for (const field of fields) {
    switch (field.type) {
      case 'int32':
        offset = target.writeInt32LE(field.value, offset);
        break;
      case 'int64':
        offset = target.writeBigInt64LE(field.value, offset);
        break;
      case 'datetime':
        offset = target.writeBigInt64LE(
          (BigInt(field.value.getTime()) + FILETIME_EPOCH_OFFSET_MS) * TICKS_PER_MS,
          offset,
        );
        break;
      case 'guid':
        writeGuid(target, offset, field.value);
        offset += 16;
        break;
      case 'string':
        offset += target.write(field.value, offset, 'utf16le');
        offset = target.writeUInt16LE(0, offset);
        break;
    }
  }

  return offset;
}

/**
 * Writes the payload into `target` at offset 0 and returns the byte count.
 * `target` must hold at least `encodedSize(definition, values)` bytes.
 */
export function writeEventPayload(
  target: Buffer,
  definition: EventDefinition,
  values: readonly EventValue[],
): number {
  return writeFields(target, checkRecord(definition, values));
}

/** Encodes into a freshly allocated buffer. */
export function encodeEventPayload(definition: EventDefinition, values: readonly EventValue[]): Buffer {
  const fields = checkRecord(definition, values);
  const buffer = Buffer.alloc(sizeOf(fields));
  writeFields(buffer, fields);
  return buffer;
}

/**
 * Inverse of `encodeEventPayload`, for tests and local runs (the in-memory
 * sink). GUIDs come back lower-case.
 */
export function decodeEventPayload(definition: EventDefinition, payload: Uint8Array): EventValue[] {
  const view = Buffer.from(payload);
  const values: EventValue[] = [];
  let offset = 0;

  for (const parameter of definition.parameters) {
    switch (parameter.type) {
      case 'int32':
        values.push(view.readInt32LE(offset));
        offset += 4;
        break;
      case 'int64':
        values.push(view.readBigInt64LE(offset));
        offset += 8;
        break;
      case 'datetime': {
        const ticks = view.readBigInt64LE(offset);
        values.push(new Date(Number(ticks / TICKS_PER_MS - FILETIME_EPOCH_OFFSET_MS)));
        offset += 8;
        break;
      }
      case 'guid':
        values.push(readGuid(view, offset));
        offset += 16;
        break;
      case 'string': {
        let end = offset;
        while (end + 1 < view.length && view.readUInt16LE(end) !== 0) end += 2;
        values.push(view.toString('utf16le', offset, end));
        offset = end + 2;
        break;
      }
    }
  }

  return values;
}

/**
 * Reusable marshalling buffer for the low-overhead emission path.
 * The returned view is overwritten by the next `write`.
 */
export class EventPayloadWriter {
  private buffer: Buffer;

  constructor(initialSize: number = 1024) {
    this.buffer = Buffer.alloc(initialSize);
  }

  write(definition: EventDefinition, values: readonly EventValue[]): Uint8Array {
    const fields = checkRecord(definition, values);
    const size = sizeOf(fields);
    if (size > this.buffer.length) {
      this.buffer = Buffer.alloc(Math.max(size, this.buffer.length * 2));
    }
    const written = writeFields(this.buffer, fields);
    return this.buffer.subarray(0, written);
  }

  /** Current capacity, for tests. */
  get capacity(): number {
    return this.buffer.length;
  }
}
