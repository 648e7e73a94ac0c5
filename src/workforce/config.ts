import {
  DEPARTMENTS,
  isDepartment,
  lookupActivityRate,
  validateActivityRate,
  type ActivityRateModel,
} from "./activity-rates.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_DISPLAY_NAME_PREFIX } from "./timeline.js";
import type { DeploymentConfig, ResolvedDeploymentConfig } from "./types.js";

export const DEFAULT_WORKERS = 25;
export const MAX_WORKERS = 300;
export const DEFAULT_DEPARTMENT = "operations";

const RATE_KEYS: readonly (keyof ActivityRateModel)[] = [
  "messagesPerHour",
  "chatMessagesPerHour",
  "documentsPerDay",
  "meetingsPerDay",
  "varianceFraction",
  "workStartHour",
  "workEndHour",
];

function normalizeDepartment(value: string | undefined): string {
  return (value ?? DEFAULT_DEPARTMENT).trim().toLowerCase();
}

/** Returns every problem with the config; an empty list means it can be deployed. */
export function validateDeploymentConfig(config: DeploymentConfig): string[] {
  const problems: string[] = [];
  const { workers } = config;
  if (workers !== undefined) {
    if (typeof workers !== "number" || !Number.isInteger(workers) || workers < 1) {
      problems.push("'workers' must be a positive integer");
    } else if (workers > MAX_WORKERS) {
      problems.push(`'workers' cannot exceed ${MAX_WORKERS}`);
    }
  }
  const { department } = config;
  if (department !== undefined) {
    if (typeof department !== "string" || !isDepartment(normalizeDepartment(department))) {
      problems.push(`'department' must be one of: ${DEPARTMENTS.join(", ")}`);
    }
  }
  const { durationHours } = config;
  if (durationHours !== undefined && durationHours !== null) {
    if (typeof durationHours !== "number" || !Number.isFinite(durationHours) || durationHours < 0) {
      problems.push("'durationHours' must be a non-negative number");
    }
  }
  if (config.enableAiGeneration !== undefined && typeof config.enableAiGeneration !== "boolean") {
    problems.push("'enableAiGeneration' must be a boolean");
  }
  if (
    config.emailDirective !== undefined &&
    config.emailDirective !== null &&
    typeof config.emailDirective !== "string"
  ) {
    problems.push("'emailDirective' must be a string");
  }
  if (
    config.displayNamePrefix !== undefined &&
    (typeof config.displayNamePrefix !== "string" || !config.displayNamePrefix.trim())
  ) {
    problems.push("'displayNamePrefix' must be a non-empty string");
  }
  if (config.activityRate !== undefined) {
    const override = config.activityRate;
    const unknownKeys = Object.keys(override).filter(
      (key) => !RATE_KEYS.some((rateKey) => rateKey === key),
    );
    for (const key of unknownKeys) {
      problems.push(`'activityRate.${key}' is not a known rate field`);
    }
    if (unknownKeys.length === 0 && problems.length === 0) {
      const base = lookupActivityRate(normalizeDepartment(config.department));
      problems.push(...validateActivityRate({ ...base, ...override }));
    }
  }
  return problems;
}

export function resolveDeploymentConfig(config: DeploymentConfig = {}): ResolvedDeploymentConfig {
  const problems = validateDeploymentConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid deployment config: ${problems.join("; ")}`, problems);
  }
  const department = normalizeDepartment(config.department);
  const resolved: ResolvedDeploymentConfig = {
    workers: config.workers ?? DEFAULT_WORKERS,
    department: isDepartment(department) ? department : DEFAULT_DEPARTMENT,
    durationHours: config.durationHours ?? null,
    enableAiGeneration: config.enableAiGeneration ?? false,
    emailDirective: config.emailDirective?.trim() || null,
    displayNamePrefix: config.displayNamePrefix?.trim() || DEFAULT_DISPLAY_NAME_PREFIX,
  };
  if (config.activityRate && Object.keys(config.activityRate).length > 0) {
    resolved.activityRate = { ...config.activityRate };
  }
  return resolved;
}
