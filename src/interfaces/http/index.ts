export { default as requestActivityPlugin, requestTypeName } from './request-activity-plugin.js';
export type { RequestActivityOptions } from './request-activity-plugin.js';
