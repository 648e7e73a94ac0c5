import type { IdentityProvider } from "../infra/directory-identity.js";
import type { ActivityLog } from "./activity-log.js";
import type { CycleScheduler } from "./scheduler.js";
import type { DeploymentRun } from "./types.js";

export type DeploymentEntry = {
  run: DeploymentRun;
  /** Present only while this process owns the deployment's timelines. */
  scheduler: CycleScheduler | null;
  identity: IdentityProvider | null;
  log: ActivityLog | null;
  /** Settles once worker creation has ended; null outside `deploy`. */
  provisioning: Promise<unknown> | null;
};

/** Deployments known to this process, keyed by id. */
export class DeploymentRegistry {
  private readonly entries = new Map<string, DeploymentEntry>();

  get(deploymentId: string): DeploymentEntry | undefined {
    return this.entries.get(deploymentId);
  }

  set(entry: DeploymentEntry): void {
    this.entries.set(entry.run.deploymentId, entry);
  }

  has(deploymentId: string): boolean {
    return this.entries.has(deploymentId);
  }

  values(): DeploymentEntry[] {
    return [...this.entries.values()];
  }

  live(): DeploymentEntry[] {
    return this.values().filter((entry) => entry.scheduler?.isRunning === true);
  }
}
