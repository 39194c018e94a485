import { z } from 'zod';
import { ALL_KEYWORDS, EventLevel, Keywords } from '../domain/index.js';
import type { KeywordName } from '../domain/index.js';
import type { EventSubscription } from './sink/types.js';

export type SinkKind = 'log' | 'redis' | 'memory';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Event source configuration, read from the environment.
 */
export interface EventSourceConfig {
  sourceName: string;
  sink: SinkKind;
  subscription: EventSubscription;
  streamKey: string;
  streamMaxLen: number;
  preferEncoded: boolean;
  redisUrl: string;
  logLevel: LogLevel;
  /** Overrides the OS host name reported as the hosting node. */
  nodeName: string | undefined;
}

const LEVELS = {
  critical: EventLevel.Critical,
  error: EventLevel.Error,
  warning: EventLevel.Warning,
  informational: EventLevel.Informational,
  verbose: EventLevel.Verbose,
} as const;

const KEYWORD_NAMES: Record<string, KeywordName> = {
  requests: 'Requests',
  serviceinitialization: 'ServiceInitialization',
  eventhub: 'EventHub',
};

/**
 * Keyword mask from `all` or a comma-separated list of keyword names
 * (case-insensitive). Returns null for an unknown name.
 */
export function parseKeywords(value: string): number | null {
  const names = value.split(',').map((name) => name.trim().toLowerCase()).filter((name) => name !== '');
  if (names.length === 0 || names.includes('all')) return ALL_KEYWORDS;

  let mask = 0;
  for (const name of names) {
    const keyword = KEYWORD_NAMES[name];
    if (keyword === undefined) return null;
    mask |= Keywords[keyword];
  }
  return mask;
}

const envSchema = z.object({
  EVENT_SOURCE_NAME: z.string().min(1).default('EventProcessorHostService'),
  EVENT_SINK: z.enum(['log', 'redis', 'memory']).default('log'),
  EVENT_ENABLED: z.enum(['true', 'false']).default('true'),
  EVENT_LEVEL: z.enum(['critical', 'error', 'warning', 'informational', 'verbose']).default('informational'),
  EVENT_KEYWORDS: z.string().default('all'),
  EVENT_STREAM_KEY: z.string().min(1).default('service_events'),
  EVENT_STREAM_MAXLEN: z.coerce.number().int().positive().default(10_000),
  EVENT_PREFER_ENCODED: z.enum(['true', 'false']).default('false'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_NAME: z.string().min(1).optional(),
});

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid event source configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Loads configuration from environment variables.
 *
 * Unset variables take their defaults; invalid values throw ConfigError
 * listing every problem.
 */
export function loadEventSourceConfig(env: NodeJS.ProcessEnv = process.env): EventSourceConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  const keywords = parseKeywords(vars.EVENT_KEYWORDS);
  if (keywords === null) {
    throw new ConfigError([`EVENT_KEYWORDS: unknown keyword in "${vars.EVENT_KEYWORDS}"`]);
  }

  return {
    sourceName: vars.EVENT_SOURCE_NAME,
    sink: vars.EVENT_SINK,
    subscription: {
      enabled: vars.EVENT_ENABLED === 'true',
      level: LEVELS[vars.EVENT_LEVEL],
      keywords,
    },
    streamKey: vars.EVENT_STREAM_KEY,
    streamMaxLen: vars.EVENT_STREAM_MAXLEN,
    preferEncoded: vars.EVENT_PREFER_ENCODED === 'true',
    redisUrl: vars.REDIS_URL,
    logLevel: vars.LOG_LEVEL,
    nodeName: vars.NODE_NAME,
  };
}
