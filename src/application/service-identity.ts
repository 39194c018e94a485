import { hostname } from 'node:os';
import type { NodeContextProvider, ServiceDescriptor, ServiceIdentity, EventValues } from '../domain/index.js';
import type { EVENTS } from './event-catalog.js';

/**
 * Flattens a service descriptor into the identity carried by ServiceMessage.
 * Stateless services report their instance id, stateful services their replica id.
 * Read on every call: replica and partition ids change when the descriptor does.
 */
export function projectServiceIdentity(
  service: ServiceDescriptor,
  node: NodeContextProvider,
): ServiceIdentity {
  const { context } = service;
  return {
    serviceName: context.serviceName,
    serviceTypeName: context.serviceTypeName,
    replicaOrInstanceId: service.kind === 'stateful' ? service.context.replicaId : service.context.instanceId,
    partitionId: context.partitionId,
    applicationName: context.codePackageActivationContext.applicationName,
    applicationTypeName: context.codePackageActivationContext.applicationTypeName,
    nodeName: node.getNodeName(),
  };
}

export type ServiceMessageValues = EventValues<(typeof EVENTS)['ServiceMessage']['parameters']>;

/** The eight ordered ServiceMessage values: identity followed by the final message. */
export function serviceMessageValues(identity: ServiceIdentity, message: string): ServiceMessageValues {
  return [
    identity.serviceName,
    identity.serviceTypeName,
    identity.replicaOrInstanceId,
    identity.partitionId,
    identity.applicationName,
    identity.applicationTypeName,
    identity.nodeName,
    message,
  ];
}

/** Node context backed by configuration, falling back to the OS host name. */
export function hostNodeContext(nodeName?: string): NodeContextProvider {
  return {
    getNodeName: () => nodeName ?? hostname(),
  };
}
