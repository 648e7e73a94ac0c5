import type { ActivityRateModel, Department } from "./activity-rates.js";

export type ActivityKind = "message" | "chatMessage" | "document";

export type ActivityEvent = {
  kind: ActivityKind;
  workerId: string;
  timestampUtc: string;
  subject?: string;
};

export type WorkerTimeline = {
  readonly workerId: string;
  readonly displayName: string;
  readonly department: Department;
  readonly activityRate: ActivityRateModel;
};

export type WorkerIdentity = {
  workerId: string;
  displayName: string;
  principalName: string;
  objectId: string;
  department: Department;
  index: number;
};

export type DeploymentStatus =
  | "Pending"
  | "Running"
  | "Stopped"
  | "CleaningUp"
  | "Completed"
  | "Failed";

export type DeploymentConfig = {
  workers?: number;
  department?: string;
  durationHours?: number | null;
  enableAiGeneration?: boolean;
  emailDirective?: string | null;
  displayNamePrefix?: string;
  activityRate?: Partial<ActivityRateModel>;
};

export type ResolvedDeploymentConfig = {
  workers: number;
  department: Department;
  durationHours: number | null;
  enableAiGeneration: boolean;
  emailDirective: string | null;
  displayNamePrefix: string;
  activityRate?: Partial<ActivityRateModel>;
};

export type DeploymentRun = {
  version: 1;
  deploymentId: string;
  status: DeploymentStatus;
  phase: string;
  startedAtMs: number;
  stoppedAtMs?: number;
  completedAtMs?: number;
  updatedAtMs: number;
  activityCount: number;
  durationHours: number | null;
  config: ResolvedDeploymentConfig;
  workersRequested: number;
  workers: WorkerIdentity[];
  /** Process that owns the deployment's scheduler. */
  ownerPid?: number;
  error?: string;
};

export type CleanupReport = {
  deploymentId: string;
  resourcesDeleted: number;
  details: string[];
  errors: string[];
};

export type SchedulerExitReason = "stopped" | "duration-expired" | "cancelled" | "failed";

export type SchedulerExit = {
  deploymentId: string;
  reason: SchedulerExitReason;
  activityCount: number;
  error?: string;
};
