export { EventLevel, Keywords, ALL_KEYWORDS } from './event-definition.js';
export type {
  KeywordName,
  ParameterType,
  ParameterValueMap,
  EventValue,
  ParameterDefinition,
  EventDefinition,
  EventValues,
  EventRecord,
} from './event-definition.js';
export type {
  StatelessServiceContext,
  StatefulServiceContext,
  StatelessService,
  StatefulService,
  ServiceDescriptor,
  NodeContextProvider,
  ServiceIdentity,
} from './service-identity.js';
export { UNKNOWN } from './caller-context.js';
export type { CallerContext, CallerHint } from './caller-context.js';
