import type { ServiceEventSource } from './event-source.js';

/**
 * Runs `operation` as a ServiceRequest activity: Start before it begins,
 * then exactly one of Stop or Failed. The operation's failure is re-thrown
 * after it has been recorded.
 */
export async function runServiceRequest<T>(
  source: ServiceEventSource,
  requestTypeName: string,
  operation: () => Promise<T> | T,
): Promise<T> {
  source.serviceRequestStart(requestTypeName);

  let result: T;
  try {
    result = await operation();
  } catch (err: unknown) {
    source.serviceRequestFailed(requestTypeName, err);
    throw err;
  }

  source.serviceRequestStop(requestTypeName);
  return result;
}
