/** Sentinel used when a call-site field cannot be determined. */
export const UNKNOWN = 'UNKNOWN';

/**
 * Where an emission originated: a component derived from the source
 * file name and the operation (function or method) name.
 */
export interface CallerContext {
  readonly component: string;
  readonly operation: string;
}

/** Explicit call-site token. Missing fields fall back to derivation or `UNKNOWN`. */
export type CallerHint = Partial<CallerContext>;
