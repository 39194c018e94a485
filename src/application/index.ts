export {
  EVENTS,
  EVENT_CATALOG,
  CatalogError,
  assertValidCatalog,
  createRecord,
  findActivityStems,
  findDefinition,
  validateCatalog,
} from './event-catalog.js';
export type { EventName, CatalogValidation } from './event-catalog.js';
export {
  EventFormatError,
  describeFailure,
  formatMessage,
  placeholderIndices,
  renderEventMessage,
} from './message-format.js';
export {
  callerFromStack,
  componentFromFilePath,
  operationFromFunctionName,
  parseStackFrame,
  resolveCaller,
} from './caller-context.js';
export type { StackFrame } from './caller-context.js';
export { hostNodeContext, projectServiceIdentity, serviceMessageValues } from './service-identity.js';
export type { ServiceMessageValues } from './service-identity.js';
export { ServiceEventSource } from './event-source.js';
export type { ServiceEventSourceOptions } from './event-source.js';
export { runServiceRequest } from './activity.js';
export { instrumentPartitionProcessor } from './partition-instrumentation.js';
export type { PartitionContext, PartitionProcessor, PartitionTarget } from './partition-instrumentation.js';
export { SingletonCell } from './singleton.js';
