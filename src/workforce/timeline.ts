import type { WorkerTimeline } from "./types.js";
import { ConfigurationError } from "./errors.js";
import {
  lookupActivityRate,
  validateActivityRate,
  type ActivityRateModel,
  type Department,
} from "./activity-rates.js";

export const DEFAULT_DISPLAY_NAME_PREFIX = "Kwsim";

export type WorkerTimelineInput = {
  deploymentId: string;
  /** 1-based ordinal within the deployment. */
  index: number;
  department: Department;
  displayNamePrefix?: string;
  activityRate?: Partial<ActivityRateModel>;
};

export function deriveWorkerId(deploymentId: string, index: number): string {
  return `worker-${deploymentId}-${index}`;
}

export function deriveDisplayName(index: number, prefix = DEFAULT_DISPLAY_NAME_PREFIX): string {
  return `${prefix.trim() || DEFAULT_DISPLAY_NAME_PREFIX} Worker ${index}`;
}

// Identifiers are a pure function of the inputs so a restarted process can re-derive them.
export function buildWorkerTimeline(input: WorkerTimelineInput): WorkerTimeline {
  const base = lookupActivityRate(input.department);
  const activityRate: ActivityRateModel = input.activityRate
    ? Object.freeze({ ...base, ...input.activityRate })
    : base;
  const problems = validateActivityRate(activityRate);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid activity rate override: ${problems.join("; ")}`, problems);
  }
  return Object.freeze({
    workerId: deriveWorkerId(input.deploymentId, input.index),
    displayName: deriveDisplayName(input.index, input.displayNamePrefix),
    department: input.department,
    activityRate,
  });
}
