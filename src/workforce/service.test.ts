import fs from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DirectoryIdentityProvider,
  type IdentityProvider,
  type WorkerProvisionRequest,
} from "../infra/directory-identity.js";
import type { ActivityNotification } from "./activity-channel.js";
import { TemplateContentProvider } from "./content/provider.js";
import {
  ConfigurationError,
  DeploymentNotFoundError,
  DeploymentOwnedElsewhereError,
} from "./errors.js";
import { DeploymentController, type DeploymentControllerOptions } from "./service.js";
import { FileDeploymentStore, MemoryDeploymentStore } from "./store.js";
import type { DeploymentRun, WorkerIdentity } from "./types.js";

const testRoots: string[] = [];
const WORK_HOUR = new Date(Date.UTC(2026, 0, 5, 10, 0, 0));
const CREDENTIAL_ENV = {
  KW_TENANT_ID: "test-tenant",
  KW_APP_ID: "test-app",
  KW_CLIENT_SECRET: "test-secret",
  KWSIM_DIRECTORY_CREDENTIALS_PATH: path.join(os.tmpdir(), "kwsim-no-such-dir", "directory.json"),
};

function makeRoot() {
  const root = path.join(
    os.tmpdir(),
    "kwsim-controller-tests",
    `${Date.now()}-${Math.random().toString(16).slice(2)}`,
  );
  testRoots.push(root);
  return root;
}

afterEach(async () => {
  await Promise.all(
    testRoots.splice(0).map((root) => fs.rm(root, { recursive: true, force: true })),
  );
});

class FakeIdentityProvider implements IdentityProvider {
  readonly workers: WorkerIdentity[] = [];

  constructor(
    private readonly failures: { createIndexes?: number[]; deleteAll?: boolean } = {},
  ) {}

  async ensureReady(): Promise<void> {}

  async createWorker(request: WorkerProvisionRequest): Promise<WorkerIdentity> {
    if (this.failures.createIndexes?.includes(request.index)) {
      throw new Error(`quota exceeded for worker ${request.index}`);
    }
    const identity: WorkerIdentity = {
      workerId: `worker-${request.deploymentId}-${request.index}`,
      displayName: `Fake Worker ${request.index}`,
      principalName: `fake-${request.index}@example.test`,
      objectId: `fake-${request.index}`,
      department: request.department,
      index: request.index,
    };
    this.workers.push(identity);
    return identity;
  }

  async deleteWorker(workerId: string): Promise<boolean> {
    const index = this.workers.findIndex((worker) => worker.workerId === workerId);
    if (index === -1) {
      return false;
    }
    this.workers.splice(index, 1);
    return true;
  }

  async deleteAll(): Promise<number> {
    if (this.failures.deleteAll) {
      throw new Error("directory unavailable");
    }
    return this.workers.splice(0).length;
  }

  listWorkers(): WorkerIdentity[] {
    return [...this.workers];
  }

  restore(identities: readonly WorkerIdentity[]): void {
    this.workers.push(...identities);
  }
}

class SlowIdentityProvider extends FakeIdentityProvider {
  created = 0;

  constructor(private readonly delayMs: number) {
    super();
  }

  override async createWorker(request: WorkerProvisionRequest): Promise<WorkerIdentity> {
    await delay(this.delayMs);
    const identity = await super.createWorker(request);
    this.created += 1;
    return identity;
  }
}

function makeController(overrides: DeploymentControllerOptions = {}) {
  let next = 0;
  return new DeploymentController({
    store: new MemoryDeploymentStore(),
    identityFactory: () => new DirectoryIdentityProvider({ env: CREDENTIAL_ENV }),
    contentFactory: () => new TemplateContentProvider(),
    env: CREDENTIAL_ENV,
    now: () => WORK_HOUR,
    random: () => 0.5,
    cycleIntervalMs: 5,
    createDeploymentId: () => {
      next += 1;
      return `kw-test${next}`;
    },
    ...overrides,
  });
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) {
    out.push(line.replace(/^\[[^\]]+\] \[[A-Z]+\] /, ""));
  }
  return out;
}

describe("deployment controller", () => {
  it("runs a zero-duration deployment straight to Stopped", async () => {
    const controller = makeController();

    const deploymentId = await controller.deploy({
      workers: 5,
      department: "sales",
      durationHours: 0,
    });
    await controller.waitForExit(deploymentId);
    const status = await controller.getStatus(deploymentId);

    expect(deploymentId).toBe("kw-test1");
    expect(status).toMatchObject({
      deploymentId: "kw-test1",
      status: "Stopped",
      phase: "duration_expired",
      activityCount: 0,
      durationHours: 0,
      workersRequested: 5,
    });
    expect(status.workers.map((worker) => worker.workerId)).toEqual([
      "worker-kw-test1-1",
      "worker-kw-test1-2",
      "worker-kw-test1-3",
      "worker-kw-test1-4",
      "worker-kw-test1-5",
    ]);
    await expect(collect(await controller.getLogs(deploymentId))).resolves.toEqual([
      "Deployment kw-test1 created: 5 sales workers",
      "Provisioned 5 of 5 workers",
      "Deployment kw-test1 running with 5 workers",
      "Starting activity orchestration for 5 workers",
      "Duration limit reached",
      "Activity orchestration completed",
      "Deployment kw-test1 stopped (duration_expired)",
    ]);
  });

  it("cleans up every provisioned worker once", async () => {
    const controller = makeController();
    const deploymentId = await controller.deploy({ workers: 5, durationHours: 0 });
    await controller.waitForExit(deploymentId);

    const report = await controller.cleanup(deploymentId);

    expect(report).toEqual({
      deploymentId,
      resourcesDeleted: 5,
      details: ["Deleted 5 worker identities"],
      errors: [],
    });
    expect((await controller.getStatus(deploymentId)).status).toBe("Completed");
    await expect(controller.cleanup(deploymentId)).resolves.toEqual({
      deploymentId,
      resourcesDeleted: 0,
      details: ["Deployment is Completed; nothing to clean up"],
      errors: [],
    });
    await expect(controller.stop(deploymentId)).resolves.toBe(false);
  });

  it("reports cleanup failures and marks the deployment Failed", async () => {
    const controller = makeController({
      identityFactory: () => new FakeIdentityProvider({ deleteAll: true }),
    });
    const deploymentId = await controller.deploy({ workers: 2 });

    const report = await controller.cleanup(deploymentId);
    const status = await controller.getStatus(deploymentId);

    expect(report.errors).toEqual(["directory unavailable"]);
    expect(report.resourcesDeleted).toBe(0);
    expect(status.status).toBe("Failed");
    expect(status.phase).toBe("cleanup_failed");
    expect(status.error).toBe("directory unavailable");
  });

  it("stops idempotently and freezes the activity count", async () => {
    const controller = makeController({ random: () => 0 });
    const deploymentId = await controller.deploy({ workers: 2, department: "engineering" });
    await vi.waitFor(async () => {
      expect((await controller.getStatus(deploymentId)).activityCount).toBeGreaterThan(0);
    });

    await expect(controller.stop(deploymentId)).resolves.toBe(true);
    const stopped = await controller.getStatus(deploymentId);
    await new Promise((resolve) => setTimeout(resolve, 20));
    await expect(controller.stop(deploymentId)).resolves.toBe(true);
    const later = await controller.getStatus(deploymentId);

    expect(stopped.status).toBe("Stopped");
    expect(stopped.phase).toBe("stopped");
    expect(later.activityCount).toBe(stopped.activityCount);
    const logs = await collect(await controller.getLogs(deploymentId, { lines: 1_000 }));
    expect(logs.filter((line) => line === "Stopping activity orchestration")).toHaveLength(1);
    expect(logs.at(-1)).toBe("Deployment kw-test1 stopped");
  });

  it("skips workers that fail to provision", async () => {
    const controller = makeController({
      identityFactory: () => new FakeIdentityProvider({ createIndexes: [2] }),
    });

    const deploymentId = await controller.deploy({ workers: 3, durationHours: 0 });
    await controller.waitForExit(deploymentId);
    const status = await controller.getStatus(deploymentId);
    const logs = await collect(await controller.getLogs(deploymentId));

    expect(status.workers.map((worker) => worker.index)).toEqual([1, 3]);
    expect(status.workersRequested).toBe(3);
    expect(logs).toContain("Failed to create worker 2: quota exceeded for worker 2");
    expect(logs).toContain("Provisioned 2 of 3 workers");
  });

  it("fails the deployment when no worker can be provisioned", async () => {
    const controller = makeController({
      identityFactory: () => new FakeIdentityProvider({ createIndexes: [1, 2] }),
    });

    const deploymentId = await controller.deploy({ workers: 2 });
    const status = await controller.getStatus(deploymentId);

    expect(status.status).toBe("Failed");
    expect(status.phase).toBe("provisioning_failed");
    expect(status.error).toBe("No workers could be provisioned");
    await expect(controller.cleanup(deploymentId)).resolves.toMatchObject({ resourcesDeleted: 0 });
  });

  it("rejects invalid configs and missing credentials before creating a record", async () => {
    const controller = makeController({
      identityFactory: () =>
        new DirectoryIdentityProvider({ env: { KWSIM_STATE_DIR: makeRoot() } }),
    });

    await expect(controller.deploy({ workers: 301 })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(controller.deploy({ workers: 1 })).rejects.toThrow(
      "Missing directory credentials",
    );
    await expect(controller.listDeployments()).resolves.toEqual([]);
  });

  it("raises not found for unknown deployments", async () => {
    const controller = makeController();

    await expect(controller.getStatus("kw-missing")).rejects.toBeInstanceOf(
      DeploymentNotFoundError,
    );
    await expect(controller.stop("kw-missing")).rejects.toThrow("Deployment kw-missing not found");
    await expect(controller.cleanup("kw-missing")).rejects.toBeInstanceOf(DeploymentNotFoundError);
    await expect(controller.getLogs("kw-missing")).rejects.toBeInstanceOf(DeploymentNotFoundError);
  });

  it("notifies activity observers for one deployment", async () => {
    const controller = makeController({ random: () => 0 });
    const seen: ActivityNotification[] = [];
    controller.onActivity((notification) => seen.push(notification), "kw-test1");

    const deploymentId = await controller.deploy({ workers: 1, department: "finance" });
    await vi.waitFor(() => expect(seen.length).toBeGreaterThanOrEqual(3));
    await controller.shutdown();

    expect(seen.slice(0, 3).map((notification) => notification.kind)).toEqual([
      "message",
      "chatMessage",
      "document",
    ]);
    expect(seen[0]).toMatchObject({
      deploymentId,
      workerId: "worker-kw-test1-1",
      subject: "Work Update",
    });
    expect((await controller.getStatus(deploymentId)).status).toBe("Stopped");
  });

  it("lists live and persisted deployments oldest first", async () => {
    const store = new MemoryDeploymentStore();
    const older: DeploymentRun = {
      version: 1,
      deploymentId: "kw-older",
      status: "Completed",
      phase: "cleaned_up",
      startedAtMs: 1_000,
      updatedAtMs: 2_000,
      activityCount: 12,
      durationHours: 1,
      config: {
        workers: 1,
        department: "hr",
        durationHours: 1,
        enableAiGeneration: false,
        emailDirective: null,
        displayNamePrefix: "Kwsim",
      },
      workersRequested: 1,
      workers: [],
    };
    await store.save(older);
    const controller = makeController({ store });

    const deploymentId = await controller.deploy({ workers: 1, durationHours: 0 });
    await controller.waitForExit(deploymentId);
    const runs = await controller.listDeployments();

    expect(runs.map((run) => [run.deploymentId, run.status])).toEqual([
      ["kw-older", "Completed"],
      ["kw-test1", "Stopped"],
    ]);
  });
});

describe("deployment recovery", () => {
  it("marks runs orphaned by a restart as stopped and can still clean them up", async () => {
    const store = new FileDeploymentStore(makeRoot());
    const first = makeController({ store });
    const deploymentId = await first.deploy({ workers: 2, department: "executive" });

    const second = makeController({ store, isProcessAlive: () => false });
    await expect(makeController({ store }).recover()).resolves.toEqual([]);
    await expect(second.recover()).resolves.toEqual([deploymentId]);
    await expect(second.recover()).resolves.toEqual([]);
    const status = await second.getStatus(deploymentId);
    const report = await second.cleanup(deploymentId);
    const logs = await collect(await second.getLogs(deploymentId, { lines: 3 }));
    await first.shutdown();

    expect(status.status).toBe("Stopped");
    expect(status.phase).toBe("orphaned");
    expect(report).toMatchObject({ resourcesDeleted: 2, errors: [] });
    expect((await second.getStatus(deploymentId)).status).toBe("Completed");
    expect(logs).toEqual([
      "Deployment kw-test1 marked stopped after restart",
      "Cleaning up deployment kw-test1",
      "Deployment kw-test1 cleaned up",
    ]);
  });

  it("follows the log of a deployment owned by another live process", async () => {
    const store = new FileDeploymentStore(makeRoot());
    const owner = makeController({ store });
    const deploymentId = await owner.deploy({ workers: 1, department: "hr", durationHours: 0 });
    await owner.waitForExit(deploymentId);
    const run = await owner.getStatus(deploymentId);
    await store.save({ ...run, status: "Running", phase: "executing", ownerPid: 4242 });
    let checks = 0;
    const viewer = makeController({
      store,
      isProcessAlive: (pid) => {
        checks += 1;
        return pid === 4242 && checks < 3;
      },
    });

    const lines = await collect(
      await viewer.getLogs(deploymentId, { follow: true, lines: 2, pollIntervalMs: 1 }),
    );

    expect(lines).toEqual([
      "Activity orchestration completed",
      "Deployment kw-test1 stopped (duration_expired)",
    ]);
    expect(checks).toBe(3);
  });
});

describe("deployment interrupted during provisioning", () => {
  it("lets in-flight worker creation settle before cleanup deletes identities", async () => {
    const store = new MemoryDeploymentStore();
    const identity = new SlowIdentityProvider(20);
    const controller = makeController({ store, identityFactory: () => identity });

    const deploying = controller.deploy({ workers: 5 });
    await vi.waitFor(() => expect(identity.created).toBeGreaterThan(0), { interval: 1 });
    const report = await controller.cleanup("kw-test1");
    await deploying;
    const persisted = await store.load("kw-test1");

    expect(identity.created).toBeLessThan(5);
    expect(identity.workers).toEqual([]);
    expect(report.resourcesDeleted).toBe(identity.created);
    expect(report.errors).toEqual([]);
    expect(persisted?.status).toBe("Completed");
    expect(persisted?.workers).toHaveLength(identity.created);
  });

  it("persists every identity created before a stop took effect", async () => {
    const store = new MemoryDeploymentStore();
    const identity = new SlowIdentityProvider(20);
    const controller = makeController({ store, identityFactory: () => identity });

    const deploying = controller.deploy({ workers: 5 });
    await vi.waitFor(() => expect(identity.created).toBeGreaterThan(0), { interval: 1 });
    await expect(controller.stop("kw-test1")).resolves.toBe(true);
    await deploying;
    const persisted = await store.load("kw-test1");

    expect(identity.created).toBeLessThan(5);
    expect(persisted?.status).toBe("Stopped");
    expect(persisted?.workers.map((worker) => worker.workerId)).toEqual(
      identity.workers.map((worker) => worker.workerId),
    );
  });
});

describe("deployment owned by another process", () => {
  async function seedForeignRun() {
    const store = new FileDeploymentStore(makeRoot());
    const owner = makeController({ store });
    const deploymentId = await owner.deploy({ workers: 2, department: "hr", durationHours: 0 });
    await owner.waitForExit(deploymentId);
    const run = await owner.getStatus(deploymentId);
    await store.save({ ...run, status: "Running", phase: "executing", ownerPid: 4242 });
    return { store, deploymentId };
  }

  it("refuses to stop a deployment another live process runs", async () => {
    const { store, deploymentId } = await seedForeignRun();
    const viewer = makeController({ store, isProcessAlive: () => true });

    const stopping = viewer.stop(deploymentId);

    await expect(stopping).rejects.toBeInstanceOf(DeploymentOwnedElsewhereError);
    await expect(stopping).rejects.toMatchObject({
      message: "Deployment kw-test1 is running in process 4242",
      ownerPid: 4242,
    });
    expect((await store.load(deploymentId))?.status).toBe("Running");
  });

  it("reports cleanup of a foreign deployment as refused without touching it", async () => {
    const { store, deploymentId } = await seedForeignRun();
    const viewer = makeController({ store, isProcessAlive: () => true });

    const report = await viewer.cleanup(deploymentId);
    const persisted = await store.load(deploymentId);

    expect(report).toEqual({
      deploymentId,
      resourcesDeleted: 0,
      details: [],
      errors: ["Deployment kw-test1 is running in process 4242"],
    });
    expect(persisted?.status).toBe("Running");
    expect(persisted?.workers).toHaveLength(2);
  });
});
