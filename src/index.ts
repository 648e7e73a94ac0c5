export {
  DEPARTMENTS,
  DEPARTMENT_ACTIVITY_RATES,
  isWithinWorkHours,
  lookupActivityRate,
  type ActivityRateModel,
  type Department,
} from "./workforce/activity-rates.js";
export { ActivityChannel, type ActivityNotification } from "./workforce/activity-channel.js";
export { ActivityLog, formatLogLine, readPersistedLog } from "./workforce/activity-log.js";
export { resolveDeploymentConfig, validateDeploymentConfig } from "./workforce/config.js";
export {
  LlmContentProvider,
  TemplateContentProvider,
  createContentProvider,
  type ContentProvider,
} from "./workforce/content/provider.js";
export * from "./workforce/errors.js";
export { CycleScheduler, activityProbabilities } from "./workforce/scheduler.js";
export { DeploymentController, type DeploymentControllerOptions } from "./workforce/service.js";
export {
  FileDeploymentStore,
  MemoryDeploymentStore,
  type DeploymentStore,
} from "./workforce/store.js";
export { buildWorkerTimeline } from "./workforce/timeline.js";
export type * from "./workforce/types.js";
export {
  DirectoryIdentityProvider,
  createDirectoryIdentityProviderFactory,
  type IdentityProvider,
} from "./infra/directory-identity.js";
export { GatewayCallError, callGateway, type WorkforceMethodResults } from "./gateway/call.js";
export { workforceHandlers } from "./gateway/server-methods/workforce.js";
