import { setTimeout as delay } from "node:timers/promises";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { ActivityChannel } from "./activity-channel.js";
import type { ActivityLog } from "./activity-log.js";
import { isWithinWorkHours, type ActivityRateModel } from "./activity-rates.js";
import type { ContentProvider } from "./content/provider.js";
import { SchedulerCancelledError, describeError } from "./errors.js";
import type {
  ActivityEvent,
  ActivityKind,
  SchedulerExit,
  SchedulerExitReason,
  WorkerTimeline,
} from "./types.js";

const log = createSubsystemLogger("workforce/scheduler");

export const CYCLE_INTERVAL_MS = 60_000;
const CYCLES_PER_HOUR = 60;
const ACTIVE_HOURS_PER_DAY = 8;
const HOUR_MS = 3_600_000;

const ACTIVITY_KINDS: readonly ActivityKind[] = ["message", "chatMessage", "document"];

/** Per-cycle firing probability of each activity kind. */
export function activityProbabilities(rate: ActivityRateModel): Record<ActivityKind, number> {
  return {
    message: rate.messagesPerHour / CYCLES_PER_HOUR,
    chatMessage: rate.chatMessagesPerHour / CYCLES_PER_HOUR,
    document: rate.documentsPerDay / ACTIVE_HOURS_PER_DAY / CYCLES_PER_HOUR,
  };
}

export function describeActivity(worker: WorkerTimeline, event: ActivityEvent): string {
  switch (event.kind) {
    case "message":
      return event.subject !== undefined
        ? `Message sent by ${worker.displayName}: "${event.subject}"`
        : `Message sent by ${worker.displayName}`;
    case "chatMessage":
      return `Chat message sent by ${worker.displayName}`;
    case "document":
      return `Document created by ${worker.displayName}`;
  }
}

export type CycleSchedulerOptions = {
  deploymentId: string;
  workers: readonly WorkerTimeline[];
  content: ContentProvider;
  log: ActivityLog;
  channel?: ActivityChannel;
  /** `null` runs until stopped; `0` expires before the first cycle. */
  durationHours?: number | null;
  cycleIntervalMs?: number;
  now?: () => Date;
  random?: () => number;
};

/**
 * Drives every worker of one deployment through fixed-interval cycles. Each cycle
 * checks the duration limit, then runs one Bernoulli trial per activity kind for every
 * worker inside its working hours.
 */
export class CycleScheduler {
  readonly deploymentId: string;
  private readonly workers: readonly WorkerTimeline[];
  private readonly content: ContentProvider;
  private readonly activityLog: ActivityLog;
  private readonly channel: ActivityChannel;
  private readonly durationHours: number | null;
  private readonly cycleIntervalMs: number;
  private readonly now: () => Date;
  private readonly random: () => number;

  private running = false;
  private looping = false;
  private count = 0;
  private abort: AbortController | null = null;
  private loop: Promise<SchedulerExit> | null = null;

  constructor(options: CycleSchedulerOptions) {
    this.deploymentId = options.deploymentId;
    this.workers = options.workers;
    this.content = options.content;
    this.activityLog = options.log;
    this.channel = options.channel ?? new ActivityChannel();
    this.durationHours = options.durationHours ?? null;
    this.cycleIntervalMs = options.cycleIntervalMs ?? CYCLE_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get activityCount(): number {
    return this.count;
  }

  get workerCount(): number {
    return this.workers.length;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.looping = true;
    const abort = new AbortController();
    this.abort = abort;
    const endAtMs =
      this.durationHours === null ? null : this.now().getTime() + this.durationHours * HOUR_MS;
    this.activityLog.append(`Starting activity orchestration for ${this.workers.length} workers`);
    log.info(
      {
        deploymentId: this.deploymentId,
        workers: this.workers.length,
        durationHours: this.durationHours,
      },
      "Scheduler started",
    );
    this.loop = this.runLoop(abort.signal, endAtMs).then((exit) => {
      this.channel.publishExit(exit);
      return exit;
    });
  }

  /** Cancels the loop and resolves once the in-flight cycle has unwound. */
  async stop(): Promise<SchedulerExit | null> {
    if (this.running) {
      this.running = false;
      this.activityLog.append("Stopping activity orchestration");
      this.abort?.abort();
    }
    return this.loop ? await this.loop : null;
  }

  async finished(): Promise<SchedulerExit | null> {
    return this.loop ? await this.loop : null;
  }

  tail(lines?: number): string[] {
    return this.activityLog.tail(lines);
  }

  follow(
    options: { lines?: number; pollIntervalMs?: number; signal?: AbortSignal } = {},
  ): AsyncGenerator<string> {
    return this.activityLog.follow({ ...options, isLive: () => this.looping });
  }

  async runCycle(at: Date, signal?: AbortSignal): Promise<ActivityEvent[]> {
    const hour = at.getUTCHours();
    const fired: ActivityEvent[] = [];
    for (const worker of this.workers) {
      if (signal?.aborted) {
        throw new SchedulerCancelledError(this.deploymentId);
      }
      if (!isWithinWorkHours(worker.activityRate, hour)) {
        continue;
      }
      const probabilities = activityProbabilities(worker.activityRate);
      for (const kind of ACTIVITY_KINDS) {
        if (this.random() < probabilities[kind]) {
          fired.push(await this.perform(worker, kind));
        }
      }
    }
    return fired;
  }

  private async perform(worker: WorkerTimeline, kind: ActivityKind): Promise<ActivityEvent> {
    let subject: string | undefined;
    if (kind === "message") {
      try {
        subject = (await this.content.generate(worker.department, worker.displayName)).subject;
      } catch (err) {
        this.activityLog.append(
          `Message content unavailable for ${worker.displayName}: ${describeError(err)}`,
          "WARNING",
        );
      }
    }
    const timestampUtc = this.now().toISOString();
    const event: ActivityEvent =
      subject !== undefined
        ? { kind, workerId: worker.workerId, timestampUtc, subject }
        : { kind, workerId: worker.workerId, timestampUtc };
    this.count += 1;
    this.activityLog.append(describeActivity(worker, event));
    this.channel.publishActivity({ ...event, deploymentId: this.deploymentId });
    return event;
  }

  private async runLoop(signal: AbortSignal, endAtMs: number | null): Promise<SchedulerExit> {
    let reason: SchedulerExitReason = "stopped";
    try {
      while (this.running) {
        if (endAtMs !== null && this.now().getTime() >= endAtMs) {
          this.activityLog.append("Duration limit reached");
          reason = "duration-expired";
          break;
        }
        await this.runCycle(this.now(), signal);
        await this.sleep(signal);
      }
      this.activityLog.append("Activity orchestration completed");
    } catch (err) {
      if (!(err instanceof SchedulerCancelledError)) {
        const message = describeError(err);
        this.activityLog.append(`Activity orchestration failed: ${message}`, "ERROR");
        log.error({ deploymentId: this.deploymentId, error: message }, "Scheduler loop failed");
        return this.finish("failed", message);
      }
      this.activityLog.append("Activity orchestration cancelled");
      reason = "cancelled";
    }
    return this.finish(reason);
  }

  private finish(reason: SchedulerExitReason, error?: string): SchedulerExit {
    this.running = false;
    this.looping = false;
    log.info(
      { deploymentId: this.deploymentId, reason, activityCount: this.count },
      "Scheduler exited",
    );
    return error === undefined
      ? { deploymentId: this.deploymentId, reason, activityCount: this.count }
      : { deploymentId: this.deploymentId, reason, activityCount: this.count, error };
  }

  private async sleep(signal: AbortSignal): Promise<void> {
    try {
      await delay(this.cycleIntervalMs, undefined, { signal });
    } catch (err) {
      if (signal.aborted) {
        throw new SchedulerCancelledError(this.deploymentId);
      }
      throw err;
    }
  }
}
