import JSON5 from "json5";
import fs from "node:fs";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { resolveWorkforceDir } from "../config/paths.js";
import { isDepartment } from "./activity-rates.js";
import type { DeploymentRun, DeploymentStatus, WorkerIdentity } from "./types.js";

const DEPLOYMENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;
const STATUSES: readonly DeploymentStatus[] = [
  "Pending",
  "Running",
  "Stopped",
  "CleaningUp",
  "Completed",
  "Failed",
];

export function isSafeDeploymentId(deploymentId: string): boolean {
  return DEPLOYMENT_ID_PATTERN.test(deploymentId);
}

/** Durable home of deployment records and their activity logs. */
export interface DeploymentStore {
  load(deploymentId: string): Promise<DeploymentRun | null>;
  save(run: DeploymentRun): Promise<void>;
  list(): Promise<DeploymentRun[]>;
  /** `null` when activity logs are kept in memory only. */
  logPath(deploymentId: string): string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isWorkerIdentity(value: unknown): value is WorkerIdentity {
  return (
    isRecord(value) &&
    typeof value.workerId === "string" &&
    typeof value.displayName === "string" &&
    typeof value.principalName === "string" &&
    typeof value.objectId === "string" &&
    typeof value.index === "number" &&
    isDepartment(value.department)
  );
}

function isDeploymentRun(value: unknown): value is DeploymentRun {
  return (
    isRecord(value) &&
    value.version === 1 &&
    typeof value.deploymentId === "string" &&
    typeof value.status === "string" &&
    STATUSES.some((status) => status === value.status) &&
    typeof value.startedAtMs === "number" &&
    isRecord(value.config) &&
    Array.isArray(value.workers)
  );
}

function sanitizeRun(run: DeploymentRun): DeploymentRun {
  return {
    ...run,
    phase: typeof run.phase === "string" ? run.phase : "unknown",
    updatedAtMs: typeof run.updatedAtMs === "number" ? run.updatedAtMs : run.startedAtMs,
    activityCount:
      typeof run.activityCount === "number" && run.activityCount >= 0 ? run.activityCount : 0,
    durationHours: typeof run.durationHours === "number" ? run.durationHours : null,
    workersRequested:
      typeof run.workersRequested === "number" ? run.workersRequested : run.workers.length,
    workers: run.workers.filter(isWorkerIdentity),
  };
}

export async function loadDeploymentRecord(recordPath: string): Promise<DeploymentRun | null> {
  try {
    const raw = await fs.promises.readFile(recordPath, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON5.parse(raw);
    } catch (err) {
      throw new Error(`Failed to parse deployment record at ${recordPath}: ${String(err)}`, {
        cause: err,
      });
    }
    return isDeploymentRun(parsed) ? sanitizeRun(parsed) : null;
  } catch (err) {
    if ((err as { code?: unknown })?.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

const RETRYABLE_RENAME_CODES = new Set(["EPERM", "EBUSY", "EACCES"]);

export type RenameWithRetryOptions = {
  attempts?: number;
  backoffMs?: number;
  rename?: (from: string, to: string) => Promise<void>;
};

/** Renames `from` over `to`, retrying transient lock errors with linear backoff. */
export async function renameWithRetry(
  from: string,
  to: string,
  options: RenameWithRetryOptions = {},
): Promise<void> {
  const attempts = Math.max(1, options.attempts ?? 5);
  const backoffMs = options.backoffMs ?? 20;
  const rename = options.rename ?? fs.promises.rename;
  for (let attempt = 1; ; attempt += 1) {
    try {
      await rename(from, to);
      return;
    } catch (err) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (typeof code !== "string" || !RETRYABLE_RENAME_CODES.has(code) || attempt >= attempts) {
        throw err;
      }
      await delay(backoffMs * attempt);
    }
  }
}

export async function saveDeploymentRecord(recordPath: string, run: DeploymentRun) {
  await fs.promises.mkdir(path.dirname(recordPath), { recursive: true });
  const tmp = `${recordPath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
  await fs.promises.writeFile(tmp, `${JSON.stringify(run, null, 2)}\n`, "utf-8");
  await renameWithRetry(tmp, recordPath);
}

/**
 * One JSON5 file per deployment under `<root>/deployments`, plus an activity log
 * under `<root>/logs/<id>/activity.log`.
 */
export class FileDeploymentStore implements DeploymentStore {
  readonly rootDir: string;

  constructor(rootDir: string = resolveWorkforceDir()) {
    this.rootDir = path.resolve(rootDir);
  }

  get deploymentsDir(): string {
    return path.join(this.rootDir, "deployments");
  }

  recordPath(deploymentId: string): string {
    return path.join(this.deploymentsDir, `${deploymentId}.json`);
  }

  logPath(deploymentId: string): string {
    return path.join(this.rootDir, "logs", deploymentId, "activity.log");
  }

  async load(deploymentId: string): Promise<DeploymentRun | null> {
    if (!isSafeDeploymentId(deploymentId)) {
      return null;
    }
    return await loadDeploymentRecord(this.recordPath(deploymentId));
  }

  async save(run: DeploymentRun): Promise<void> {
    if (!isSafeDeploymentId(run.deploymentId)) {
      throw new Error(`Refusing to persist deployment with unsafe id: ${run.deploymentId}`);
    }
    await saveDeploymentRecord(this.recordPath(run.deploymentId), run);
  }

  async list(): Promise<DeploymentRun[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.deploymentsDir);
    } catch (err) {
      if ((err as { code?: unknown })?.code === "ENOENT") {
        return [];
      }
      throw err;
    }
    const runs: DeploymentRun[] = [];
    for (const entry of entries.sort()) {
      if (!entry.endsWith(".json")) {
        continue;
      }
      const run = await this.load(entry.slice(0, -".json".length));
      if (run) {
        runs.push(run);
      }
    }
    return runs;
  }
}

/** Process-local store used by tests and embedders that need no durability. */
export class MemoryDeploymentStore implements DeploymentStore {
  private readonly runs = new Map<string, DeploymentRun>();

  async load(deploymentId: string): Promise<DeploymentRun | null> {
    const run = this.runs.get(deploymentId);
    return run ? structuredClone(run) : null;
  }

  async save(run: DeploymentRun): Promise<void> {
    this.runs.set(run.deploymentId, structuredClone(run));
  }

  async list(): Promise<DeploymentRun[]> {
    return [...this.runs.values()].map((run) => structuredClone(run));
  }

  logPath(): null {
    return null;
  }
}
