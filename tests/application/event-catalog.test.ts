import { describe, it, expect } from 'vitest';
import {
  EVENTS,
  EVENT_CATALOG,
  CatalogError,
  assertValidCatalog,
  findActivityStems,
  findDefinition,
  validateCatalog,
} from '../../src/application/event-catalog.js';
import { EventLevel, Keywords } from '../../src/domain/index.js';
import type { EventDefinition } from '../../src/domain/index.js';

function definition(overrides: Partial<EventDefinition> & Pick<EventDefinition, 'id' | 'name'>): EventDefinition {
  return {
    level: EventLevel.Informational,
    keywords: Keywords.None,
    messageTemplate: '{0}',
    parameters: [{ name: 'partitionId', type: 'string' }],
    ...overrides,
  };
}

describe('EVENT_CATALOG', () => {
  it('holds ten events with ids 1 through 10', () => {
    expect(EVENT_CATALOG.map((d) => d.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('passes validation', () => {
    expect(validateCatalog()).toEqual({ valid: true });
  });

  it('tags EventHub events with the EventHub keyword', () => {
    expect(EVENTS.OpenPartition.keywords).toBe(Keywords.EventHub);
    expect(EVENTS.ClosePartition.keywords).toBe(Keywords.EventHub);
    expect(EVENTS.ProcessEvents.keywords).toBe(Keywords.EventHub);
  });

  it('marks failure events as errors', () => {
    expect(EVENTS.ServiceHostInitializationFailed.level).toBe(EventLevel.Error);
    expect(EVENTS.ServiceRequestFailed.level).toBe(EventLevel.Error);
  });
});

describe('findDefinition', () => {
  it('looks up a definition by id', () => {
    expect(findDefinition(10)?.name).toBe('ProcessEvents');
  });

  it('returns undefined for an unknown id', () => {
    expect(findDefinition(99)).toBeUndefined();
  });
});

describe('findActivityStems', () => {
  it('finds the ServiceRequest activity', () => {
    expect(findActivityStems()).toEqual(['ServiceRequest']);
  });
});

describe('validateCatalog', () => {
  it('rejects duplicate ids', () => {
    const result = validateCatalog([...EVENT_CATALOG, definition({ id: 1, name: 'Duplicate' })]);

    expect(result.valid).toBe(false);
    if (!result.valid) expect(result.issues).toContain('Duplicate event id 1');
  });

  it('rejects a placeholder with no parameter', () => {
    const result = validateCatalog([definition({ id: 11, name: 'Broken', messageTemplate: '{2}' })]);

    expect(result).toEqual({
      valid: false,
      issues: ['Broken: messageTemplate Placeholder {2} has no matching parameter'],
    });
  });

  it('rejects a non-positive id', () => {
    const result = validateCatalog([definition({ id: 0, name: 'Zero' })]);

    expect(result.valid).toBe(false);
    if (!result.valid) expect(result.issues).toHaveLength(1);
  });

  it('rejects an incomplete activity', () => {
    const result = validateCatalog([
      definition({ id: 1, name: 'PumpStart' }),
      definition({ id: 2, name: 'PumpStop' }),
    ]);

    expect(result).toEqual({
      valid: false,
      issues: ['Activity "Pump" needs PumpStart, PumpStop and PumpFailed'],
    });
  });

  it('rejects a Failed event that does not repeat the Start parameter', () => {
    const result = validateCatalog([
      definition({ id: 1, name: 'PumpStart' }),
      definition({ id: 2, name: 'PumpStop' }),
      definition({
        id: 3,
        name: 'PumpFailed',
        level: EventLevel.Error,
        parameters: [
          { name: 'exception', type: 'string' },
          { name: 'partitionId', type: 'string' },
        ],
      }),
    ]);

    expect(result).toEqual({
      valid: false,
      issues: ['PumpFailed must take partitionId followed by the failure description'],
    });
  });

  it('accepts a complete activity', () => {
    const result = validateCatalog([
      definition({ id: 1, name: 'PumpStart' }),
      definition({ id: 2, name: 'PumpStop' }),
      definition({
        id: 3,
        name: 'PumpFailed',
        level: EventLevel.Error,
        parameters: [
          { name: 'partitionId', type: 'string' },
          { name: 'exception', type: 'string' },
        ],
      }),
    ]);

    expect(result).toEqual({ valid: true });
  });
});

describe('assertValidCatalog', () => {
  it('throws CatalogError listing the issues', () => {
    expect(() => assertValidCatalog([definition({ id: 4, name: 'A' }), definition({ id: 4, name: 'B' })]))
      .toThrow(CatalogError);
  });

  it('accepts the built-in catalog', () => {
    expect(() => assertValidCatalog()).not.toThrow();
  });
});
