export class SimulatorError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SimulatorError";
    this.code = code;
    this.context = context;
  }
}

/** Invalid deployment config or missing credentials. Raised before any work starts. */
export class ConfigurationError extends SimulatorError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = [], context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", { ...context, problems });
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export class ProvisioningError extends SimulatorError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "PROVISIONING_ERROR", context, options);
    this.name = "ProvisioningError";
  }
}

export class ContentGenerationError extends SimulatorError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "CONTENT_GENERATION_ERROR", context, options);
    this.name = "ContentGenerationError";
  }
}

/** Control-flow signal raised inside the cycle loop when `stop()` cancels it. */
export class SchedulerCancelledError extends SimulatorError {
  constructor(deploymentId: string) {
    super(`Scheduler for ${deploymentId} was cancelled`, "SCHEDULER_CANCELLED", { deploymentId });
    this.name = "SchedulerCancelledError";
  }
}

export class CleanupError extends SimulatorError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "CLEANUP_ERROR", context, options);
    this.name = "CleanupError";
  }
}

export class DeploymentNotFoundError extends SimulatorError {
  readonly deploymentId: string;

  constructor(deploymentId: string) {
    super(`Deployment ${deploymentId} not found`, "DEPLOYMENT_NOT_FOUND", { deploymentId });
    this.name = "DeploymentNotFoundError";
    this.deploymentId = deploymentId;
  }
}

/** The deployment's scheduler runs in another live process. */
export class DeploymentOwnedElsewhereError extends SimulatorError {
  readonly deploymentId: string;
  readonly ownerPid: number;

  constructor(deploymentId: string, ownerPid: number) {
    super(
      `Deployment ${deploymentId} is running in process ${ownerPid}`,
      "DEPLOYMENT_OWNED_ELSEWHERE",
      { deploymentId, ownerPid },
    );
    this.name = "DeploymentOwnedElsewhereError";
    this.deploymentId = deploymentId;
    this.ownerPid = ownerPid;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
