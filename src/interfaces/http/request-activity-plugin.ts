import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { ServiceEventSource } from '../../application/event-source.js';

export interface RequestActivityOptions {
  source: ServiceEventSource;
}

/** `<METHOD> <route pattern>`, or the raw URL when no route matched. */
export function requestTypeName(request: FastifyRequest): string {
  return `${request.method} ${request.routeOptions.url ?? request.url}`;
}

/**
 * Records every HTTP request as a ServiceRequest activity.
 *
 * - onRequest  → ServiceRequestStart
 * - onError    → ServiceRequestFailed with the thrown error, for 5xx errors
 * - onResponse → ServiceRequestStop, or ServiceRequestFailed for a 5xx
 *   reply that no error hook has already reported
 *
 * A 4xx ends as Stop whether it was thrown or sent. Each request gets
 * exactly one closing event.
 */
async function requestActivityPlugin(
  fastify: FastifyInstance,
  options: RequestActivityOptions,
): Promise<void> {
  const { source } = options;

  fastify.decorateRequest('activityFailed', false);

  fastify.addHook('onRequest', async (request) => {
    source.serviceRequestStart(requestTypeName(request));
  });

  fastify.addHook('onError', async (request, _reply, error) => {
    if ((error.statusCode ?? 500) < 500) return;
    request.activityFailed = true;
    source.serviceRequestFailed(requestTypeName(request), error);
  });

  fastify.addHook('onResponse', async (request, reply) => {
    if (request.activityFailed) return;

    if (reply.statusCode >= 500) {
      source.serviceRequestFailed(requestTypeName(request), `HTTP ${reply.statusCode}`);
      return;
    }
    source.serviceRequestStop(requestTypeName(request));
  });
}

export default fp(requestActivityPlugin, {
  name: 'request-activity',
  fastify: '5.x',
});

/** Set once a failure has been reported for the request. */
declare module 'fastify' {
  interface FastifyRequest {
    activityFailed: boolean;
  }
}
