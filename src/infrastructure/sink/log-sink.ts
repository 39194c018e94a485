import type { Logger } from 'pino';
import { EventLevel } from '../../domain/index.js';
import type { EventRecord, EventValue } from '../../domain/index.js';
import { renderEventMessage } from '../../application/message-format.js';
import { matchesSubscription } from './subscription.js';
import type { EventSink, EventSubscription } from './types.js';

type LogMethod = 'fatal' | 'error' | 'warn' | 'info' | 'debug';

const LOG_METHOD: Record<EventLevel, LogMethod> = {
  [EventLevel.Critical]: 'fatal',
  [EventLevel.Error]: 'error',
  [EventLevel.Warning]: 'warn',
  [EventLevel.Informational]: 'info',
  [EventLevel.Verbose]: 'debug',
};

function toJsonValue(value: EventValue | undefined): string | number | null {
  if (value === undefined) return null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  return value;
}

export interface LogEventSinkOptions {
  provider: string;
  subscription: EventSubscription;
}

/**
 * Writes each record as one structured pino line. Parameter values are
 * keyed by their declared names; int64 values are written as strings.
 */
export class LogEventSink implements EventSink {
  readonly name = 'log';
  private readonly log: Logger;
  private readonly provider: string;
  private readonly subscription: EventSubscription;

  constructor(log: Logger, options: LogEventSinkOptions) {
    this.log = log;
    this.provider = options.provider;
    this.subscription = options.subscription;
  }

  isEnabled(level?: EventLevel, keywords?: number): boolean {
    return matchesSubscription(this.subscription, level, keywords);
  }

  emit(record: EventRecord): void {
    const { definition, values } = record;

    const payload: Record<string, string | number | null> = {};
    definition.parameters.forEach((parameter, i) => {
      payload[parameter.name] = toJsonValue(values[i]);
    });

    this.log[LOG_METHOD[definition.level]](
      {
        provider: this.provider,
        eventId: definition.id,
        eventName: definition.name,
        keywords: definition.keywords,
        payload,
      },
      renderEventMessage(definition, values),
    );
  }
}
