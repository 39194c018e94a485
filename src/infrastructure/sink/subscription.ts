import { ALL_KEYWORDS, EventLevel } from '../../domain/index.js';
import type { EventSubscription } from './types.js';

export const DEFAULT_SUBSCRIPTION: EventSubscription = {
  enabled: true,
  level: EventLevel.Informational,
  keywords: ALL_KEYWORDS,
};

/**
 * Enablement check shared by the sinks.
 *
 * No level/keywords -> "is anything subscribed at all".
 */
export function matchesSubscription(
  subscription: EventSubscription,
  level?: EventLevel,
  keywords?: number,
): boolean {
  if (!subscription.enabled) return false;
  if (level !== undefined && level > subscription.level) return false;
  if (keywords !== undefined && keywords !== 0 && (keywords & subscription.keywords) === 0) return false;
  return true;
}
