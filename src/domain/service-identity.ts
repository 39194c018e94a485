/**
 * Read-only view of the hosting runtime's service descriptor.
 *
 * The facade owns none of these fields; it only flattens them into
 * event values at emission time.
 */
interface ServiceContextBase {
  readonly serviceName: string;
  readonly serviceTypeName: string;
  readonly partitionId: string; // GUID
  readonly codePackageActivationContext: {
    readonly applicationName: string;
    readonly applicationTypeName: string;
  };
}

export interface StatelessServiceContext extends ServiceContextBase {
  readonly instanceId: bigint;
}

export interface StatefulServiceContext extends ServiceContextBase {
  readonly replicaId: bigint;
}

/** Continuously-running service; identified by instance id. */
export interface StatelessService {
  readonly kind: 'stateless';
  readonly context: StatelessServiceContext;
}

/** Partitioned, replicated service; identified by replica id. */
export interface StatefulService {
  readonly kind: 'stateful';
  readonly context: StatefulServiceContext;
}

export type ServiceDescriptor = StatelessService | StatefulService;

/** Queried per emission for the current hosting node. */
export interface NodeContextProvider {
  getNodeName(): string;
}

/** Flattened identity, in emission order. */
export interface ServiceIdentity {
  readonly serviceName: string;
  readonly serviceTypeName: string;
  readonly replicaOrInstanceId: bigint;
  readonly partitionId: string;
  readonly applicationName: string;
  readonly applicationTypeName: string;
  readonly nodeName: string;
}
