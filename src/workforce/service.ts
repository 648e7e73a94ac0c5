import { randomUUID } from "node:crypto";
import {
  createDirectoryIdentityProviderFactory,
  type IdentityProvider,
  type IdentityProviderFactory,
} from "../infra/directory-identity.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { ActivityChannel, type ActivityListener } from "./activity-channel.js";
import { ActivityLog, followPersistedLog, readPersistedLog } from "./activity-log.js";
import { resolveDeploymentConfig } from "./config.js";
import { createContentProvider, type ContentProvider } from "./content/provider.js";
import {
  CleanupError,
  DeploymentNotFoundError,
  DeploymentOwnedElsewhereError,
  ProvisioningError,
  describeError,
} from "./errors.js";
import { DeploymentRegistry, type DeploymentEntry } from "./registry.js";
import { CycleScheduler } from "./scheduler.js";
import { FileDeploymentStore, type DeploymentStore } from "./store.js";
import { buildWorkerTimeline } from "./timeline.js";
import type {
  CleanupReport,
  DeploymentConfig,
  DeploymentRun,
  ResolvedDeploymentConfig,
  SchedulerExit,
  WorkerIdentity,
  WorkerTimeline,
} from "./types.js";

const log = createSubsystemLogger("workforce/controller");

export type LogQueryOptions = {
  follow?: boolean;
  lines?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
};

export type DeploymentControllerOptions = {
  store?: DeploymentStore;
  registry?: DeploymentRegistry;
  channel?: ActivityChannel;
  identityFactory?: IdentityProviderFactory;
  contentFactory?: (config: ResolvedDeploymentConfig) => ContentProvider;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  random?: () => number;
  cycleIntervalMs?: number;
  createDeploymentId?: () => string;
  isProcessAlive?: (pid: number) => boolean;
};

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists under another user.
    return (err as { code?: unknown })?.code === "EPERM";
  }
}

export function createDeploymentId(): string {
  return `kw-${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

async function* iterateLines(lines: readonly string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

/**
 * Owns the lifecycle of every deployment in this process:
 * Pending -> Running -> Stopped -> CleaningUp -> Completed | Failed.
 */
export class DeploymentController {
  private readonly store: DeploymentStore;
  private readonly registry: DeploymentRegistry;
  private readonly channel: ActivityChannel;
  private readonly identityFactory: IdentityProviderFactory;
  private readonly contentFactory: (config: ResolvedDeploymentConfig) => ContentProvider;
  private readonly now: () => Date;
  private readonly random: (() => number) | undefined;
  private readonly cycleIntervalMs: number | undefined;
  private readonly nextDeploymentId: () => string;
  private readonly isOwnerAlive: (pid: number) => boolean;
  private readonly writes = new Map<string, Promise<void>>();

  constructor(options: DeploymentControllerOptions = {}) {
    const env = options.env ?? process.env;
    this.store = options.store ?? new FileDeploymentStore();
    this.registry = options.registry ?? new DeploymentRegistry();
    this.channel = options.channel ?? new ActivityChannel();
    this.identityFactory =
      options.identityFactory ?? createDirectoryIdentityProviderFactory({ env });
    this.contentFactory =
      options.contentFactory ??
      ((config) =>
        createContentProvider({
          enableAi: config.enableAiGeneration,
          directive: config.emailDirective,
          env,
        }));
    this.now = options.now ?? (() => new Date());
    this.random = options.random;
    this.cycleIntervalMs = options.cycleIntervalMs;
    this.nextDeploymentId = options.createDeploymentId ?? createDeploymentId;
    this.isOwnerAlive = options.isProcessAlive ?? isProcessAlive;
    this.channel.onExit((exit) => this.handleSchedulerExit(exit));
  }

  /**
   * Validates, provisions and starts a deployment. Configuration and credential problems
   * throw before any record exists; individual provisioning failures are logged and skipped.
   */
  async deploy(config: DeploymentConfig = {}): Promise<string> {
    const resolved = resolveDeploymentConfig(config);
    const deploymentId = this.nextDeploymentId();
    const identity = this.identityFactory(deploymentId);
    await identity.ensureReady();

    const startedAtMs = this.now().getTime();
    const run: DeploymentRun = {
      version: 1,
      deploymentId,
      status: "Pending",
      phase: "initializing",
      startedAtMs,
      updatedAtMs: startedAtMs,
      activityCount: 0,
      durationHours: resolved.durationHours,
      config: resolved,
      workersRequested: resolved.workers,
      workers: [],
      ownerPid: process.pid,
    };
    const activityLog = new ActivityLog({
      filePath: this.store.logPath(deploymentId),
      now: this.now,
    });
    const entry: DeploymentEntry = {
      run,
      scheduler: null,
      identity,
      log: activityLog,
      provisioning: null,
    };
    this.registry.set(entry);
    activityLog.append(
      `Deployment ${deploymentId} created: ${resolved.workers} ${resolved.department} workers`,
    );
    log.info(
      { deploymentId, workers: resolved.workers, department: resolved.department },
      "Deploying",
    );

    this.transition(run, "Pending", "creating_workers");
    await this.persist(run);
    const provisioning = this.provisionWorkers(entry, resolved);
    entry.provisioning = provisioning;
    let timelines: WorkerTimeline[];
    try {
      timelines = await provisioning;
    } finally {
      entry.provisioning = null;
    }
    if (run.status !== "Pending") {
      // Stopped or cleaned up while workers were being created; record the final roster.
      await this.persist(run);
      return deploymentId;
    }

    if (timelines.length === 0) {
      run.error = "No workers could be provisioned";
      this.transition(run, "Failed", "provisioning_failed");
      activityLog.append(`Deployment ${deploymentId} failed: ${run.error}`, "ERROR");
      await this.persist(run);
      return deploymentId;
    }

    const scheduler = new CycleScheduler({
      deploymentId,
      workers: timelines,
      content: this.contentFactory(resolved),
      log: activityLog,
      channel: this.channel,
      durationHours: resolved.durationHours,
      cycleIntervalMs: this.cycleIntervalMs,
      now: this.now,
      random: this.random,
    });
    entry.scheduler = scheduler;
    this.transition(run, "Running", "executing");
    activityLog.append(`Deployment ${deploymentId} running with ${timelines.length} workers`);
    await this.persist(run);
    scheduler.start();
    return deploymentId;
  }

  async getStatus(deploymentId: string): Promise<DeploymentRun> {
    const entry = await this.resolveEntry(deploymentId);
    this.syncActivityCount(entry);
    return structuredClone(entry.run);
  }

  /**
   * Returns true once the deployment is stopped; false when it already reached a later state.
   * Throws `DeploymentOwnedElsewhereError` when another live process runs it.
   */
  async stop(deploymentId: string): Promise<boolean> {
    const entry = await this.resolveEntry(deploymentId);
    const { run } = entry;
    if (run.status === "Stopped") {
      return true;
    }
    if (run.status !== "Running" && run.status !== "Pending") {
      return false;
    }
    const ownerPid = this.foreignOwner(run);
    if (ownerPid !== null) {
      throw new DeploymentOwnedElsewhereError(deploymentId, ownerPid);
    }
    if (entry.scheduler) {
      const exit = await entry.scheduler.stop();
      this.syncActivityCount(entry);
      if (exit && exit.reason !== "cancelled" && exit.reason !== "stopped") {
        // The scheduler ended on its own; its exit handler recorded the transition.
        return true;
      }
    }
    run.stoppedAtMs = this.now().getTime();
    this.transition(run, "Stopped", "stopped");
    if (entry.provisioning) {
      // Worker creation checks the status before each worker; wait for the one in flight.
      await entry.provisioning;
    }
    this.logFor(entry)?.append(`Deployment ${deploymentId} stopped`);
    log.info({ deploymentId, activityCount: run.activityCount }, "Deployment stopped");
    await this.persist(run);
    return true;
  }

  /** Deletes every worker identity. Failures are reported, never thrown. */
  async cleanup(deploymentId: string): Promise<CleanupReport> {
    const entry = await this.resolveEntry(deploymentId);
    const { run } = entry;
    const report: CleanupReport = { deploymentId, resourcesDeleted: 0, details: [], errors: [] };
    if (run.status === "Completed" || run.status === "Failed" || run.status === "CleaningUp") {
      report.details.push(`Deployment is ${run.status}; nothing to clean up`);
      return report;
    }
    const ownerPid = this.foreignOwner(run);
    if (ownerPid !== null) {
      report.errors.push(new DeploymentOwnedElsewhereError(deploymentId, ownerPid).message);
      return report;
    }

    try {
      if (entry.scheduler) {
        await entry.scheduler.stop();
        this.syncActivityCount(entry);
      }
      run.stoppedAtMs ??= this.now().getTime();
      this.transition(run, "CleaningUp", "deleting_workers");
      this.logFor(entry)?.append(`Cleaning up deployment ${deploymentId}`);
      if (entry.provisioning) {
        await entry.provisioning;
      }
      await this.persist(run);

      const identity = this.identityFor(entry);
      const deleted = await identity.deleteAll();
      report.resourcesDeleted = deleted;
      report.details.push(`Deleted ${deleted} worker identities`);
      if (deleted < run.workers.length) {
        report.details.push(`${run.workers.length - deleted} identities were already absent`);
      }
      entry.scheduler = null;
      run.completedAtMs = this.now().getTime();
      this.transition(run, "Completed", "cleaned_up");
      this.logFor(entry)?.append(`Deployment ${deploymentId} cleaned up`);
      log.info({ deploymentId, resourcesDeleted: deleted }, "Deployment cleaned up");
    } catch (err) {
      const failure =
        err instanceof CleanupError
          ? err
          : new CleanupError(describeError(err), { deploymentId }, { cause: err });
      report.errors.push(failure.message);
      run.error = failure.message;
      this.transition(run, "Failed", "cleanup_failed");
      this.logFor(entry)?.append(`Cleanup failed: ${failure.message}`, "ERROR");
      log.error({ deploymentId, error: failure.message }, "Deployment cleanup failed");
    }

    try {
      await this.persist(run);
    } catch (err) {
      report.errors.push(`Failed to persist deployment record: ${describeError(err)}`);
    }
    return report;
  }

  /**
   * Recent log lines; with `follow`, keeps yielding new lines while the scheduler runs
   * and ends after its final lines.
   */
  async getLogs(
    deploymentId: string,
    options: LogQueryOptions = {},
  ): Promise<AsyncIterable<string>> {
    const entry = await this.resolveEntry(deploymentId);
    const { scheduler } = entry;
    if (options.follow && scheduler?.isRunning) {
      return scheduler.follow({
        lines: options.lines,
        pollIntervalMs: options.pollIntervalMs,
        signal: options.signal,
      });
    }
    const filePath = this.store.logPath(deploymentId);
    const ownerPid = this.foreignOwner(entry.run);
    if (options.follow && filePath && ownerPid !== null) {
      return followPersistedLog(filePath, {
        lines: options.lines,
        isLive: () => this.isOwnerAlive(ownerPid),
        pollIntervalMs: options.pollIntervalMs,
        signal: options.signal,
      });
    }
    if (filePath) {
      return iterateLines(await readPersistedLog(filePath, options.lines));
    }
    return iterateLines(entry.log?.tail(options.lines) ?? []);
  }

  /** Live and persisted deployments, oldest first. */
  async listDeployments(): Promise<DeploymentRun[]> {
    const byId = new Map<string, DeploymentRun>();
    for (const run of await this.store.list()) {
      byId.set(run.deploymentId, run);
    }
    for (const entry of this.registry.values()) {
      this.syncActivityCount(entry);
      byId.set(entry.run.deploymentId, structuredClone(entry.run));
    }
    return [...byId.values()].sort(
      (a, b) => a.startedAtMs - b.startedAtMs || a.deploymentId.localeCompare(b.deploymentId),
    );
  }

  /**
   * Marks deployments left Pending or Running by a process that is gone as Stopped.
   * Their identities stay tracked so cleanup can still delete them.
   */
  async recover(): Promise<string[]> {
    const orphaned: string[] = [];
    for (const run of await this.store.list()) {
      if (this.registry.has(run.deploymentId)) {
        continue;
      }
      if (run.status !== "Pending" && run.status !== "Running") {
        continue;
      }
      if (run.ownerPid !== undefined && this.isOwnerAlive(run.ownerPid)) {
        continue;
      }
      run.stoppedAtMs = this.now().getTime();
      this.transition(run, "Stopped", "orphaned");
      const filePath = this.store.logPath(run.deploymentId);
      if (filePath) {
        new ActivityLog({ filePath, now: this.now }).append(
          `Deployment ${run.deploymentId} marked stopped after restart`,
          "WARNING",
        );
      }
      await this.persist(run);
      orphaned.push(run.deploymentId);
    }
    if (orphaned.length > 0) {
      log.warn({ deployments: orphaned }, "Recovered orphaned deployments");
    }
    return orphaned;
  }

  /**
   * Pid of another live process that runs this deployment's scheduler, or null when the
   * deployment is not running or runs here.
   */
  foreignOwner(run: DeploymentRun): number | null {
    if (run.status !== "Running" && run.status !== "Pending") {
      return null;
    }
    if (run.ownerPid === undefined || run.ownerPid === process.pid) {
      return null;
    }
    if (this.registry.get(run.deploymentId)?.scheduler) {
      return null;
    }
    return this.isOwnerAlive(run.ownerPid) ? run.ownerPid : null;
  }

  /** Resolves when the deployment's scheduler has exited and its record is written. */
  async waitForExit(deploymentId: string): Promise<SchedulerExit | null> {
    const entry = await this.resolveEntry(deploymentId);
    const exit = entry.scheduler ? await entry.scheduler.finished() : null;
    await this.writes.get(deploymentId);
    return exit;
  }

  onActivity(listener: ActivityListener, deploymentId?: string): () => void {
    return this.channel.onActivity(listener, deploymentId);
  }

  /** Stops every running deployment owned by this process. */
  async shutdown(): Promise<void> {
    const live = this.registry.live();
    await Promise.all(live.map((entry) => this.stop(entry.run.deploymentId)));
    await Promise.all(this.writes.values());
  }

  private async provisionWorkers(
    entry: DeploymentEntry,
    config: ResolvedDeploymentConfig,
  ): Promise<WorkerTimeline[]> {
    const { run } = entry;
    const identity = this.identityFor(entry);
    const timelines: WorkerTimeline[] = [];
    for (let index = 1; index <= config.workers; index += 1) {
      if (run.status !== "Pending") {
        break;
      }
      let worker: WorkerIdentity;
      try {
        worker = await identity.createWorker({
          deploymentId: run.deploymentId,
          index,
          department: config.department,
          displayNamePrefix: config.displayNamePrefix,
        });
      } catch (err) {
        const failure =
          err instanceof ProvisioningError
            ? err
            : new ProvisioningError(describeError(err), { index }, { cause: err });
        entry.log?.append(`Failed to create worker ${index}: ${failure.message}`, "ERROR");
        log.warn(
          { deploymentId: run.deploymentId, index, error: failure.message },
          "Worker provisioning failed",
        );
        continue;
      }
      run.workers.push(worker);
      timelines.push(
        buildWorkerTimeline({
          deploymentId: run.deploymentId,
          index,
          department: config.department,
          displayNamePrefix: config.displayNamePrefix,
          activityRate: config.activityRate,
        }),
      );
    }
    entry.log?.append(`Provisioned ${timelines.length} of ${config.workers} workers`);
    return timelines;
  }

  private handleSchedulerExit(exit: SchedulerExit): void {
    const entry = this.registry.get(exit.deploymentId);
    if (!entry) {
      return;
    }
    const { run } = entry;
    run.activityCount = Math.max(run.activityCount, exit.activityCount);
    // Cancellation is finished by whoever called stop(); only self-terminations land here.
    if (run.status !== "Running" || exit.reason === "cancelled" || exit.reason === "stopped") {
      return;
    }
    run.stoppedAtMs = this.now().getTime();
    if (exit.reason === "failed") {
      run.error = exit.error ?? "Scheduler failed";
      this.transition(run, "Stopped", "scheduler_failed");
    } else {
      this.transition(run, "Stopped", "duration_expired");
    }
    entry.log?.append(`Deployment ${run.deploymentId} stopped (${run.phase})`);
    this.persist(run).catch((err: unknown) => {
      log.error(
        { deploymentId: run.deploymentId, error: describeError(err) },
        "Failed to persist deployment after scheduler exit",
      );
    });
  }

  private logFor(entry: DeploymentEntry): ActivityLog | null {
    if (!entry.log) {
      const filePath = this.store.logPath(entry.run.deploymentId);
      entry.log = filePath ? new ActivityLog({ filePath, now: this.now }) : null;
    }
    return entry.log;
  }

  private identityFor(entry: DeploymentEntry): IdentityProvider {
    if (!entry.identity) {
      const identity = this.identityFactory(entry.run.deploymentId);
      identity.restore(entry.run.workers);
      entry.identity = identity;
    }
    return entry.identity;
  }

  private async resolveEntry(deploymentId: string): Promise<DeploymentEntry> {
    const existing = this.registry.get(deploymentId);
    if (existing) {
      return existing;
    }
    const run = await this.store.load(deploymentId);
    if (!run) {
      throw new DeploymentNotFoundError(deploymentId);
    }
    // Another call may have hydrated it while the store was read.
    const raced = this.registry.get(deploymentId);
    if (raced) {
      return raced;
    }
    const entry: DeploymentEntry = {
      run,
      scheduler: null,
      identity: null,
      log: null,
      provisioning: null,
    };
    this.registry.set(entry);
    return entry;
  }

  private syncActivityCount(entry: DeploymentEntry): void {
    if (entry.scheduler) {
      entry.run.activityCount = Math.max(entry.run.activityCount, entry.scheduler.activityCount);
    }
  }

  private transition(run: DeploymentRun, status: DeploymentRun["status"], phase: string): void {
    run.status = status;
    run.phase = phase;
    run.updatedAtMs = this.now().getTime();
  }

  /** Writes are serialized per deployment so a later snapshot never loses to an earlier one. */
  private persist(run: DeploymentRun): Promise<void> {
    const snapshot = structuredClone(run);
    const previous = this.writes.get(run.deploymentId) ?? Promise.resolve();
    const write = previous.then(() => this.store.save(snapshot));
    // The chain only orders writes; callers see failures through `write`.
    this.writes.set(
      run.deploymentId,
      write.catch(() => undefined),
    );
    return write;
  }
}
