import { describe, expect, it, vi } from "vitest";
import { ActivityChannel, type ActivityNotification } from "./activity-channel.js";
import { ActivityLog } from "./activity-log.js";
import { DEPARTMENT_ACTIVITY_RATES } from "./activity-rates.js";
import { TemplateContentProvider, type ContentProvider } from "./content/provider.js";
import { ContentGenerationError } from "./errors.js";
import { CycleScheduler, activityProbabilities } from "./scheduler.js";
import { buildWorkerTimeline } from "./timeline.js";
import type { SchedulerExit } from "./types.js";

const WORK_HOUR = new Date(Date.UTC(2026, 0, 5, 10, 0, 0));
const NIGHT = new Date(Date.UTC(2026, 0, 5, 3, 0, 0));
const STAMP = "[2026-01-05T10:00:00.000Z]";

function makeScheduler(
  options: {
    content?: ContentProvider;
    channel?: ActivityChannel;
    durationHours?: number | null;
    random?: () => number;
    now?: () => Date;
  } = {},
) {
  const log = new ActivityLog({ now: () => WORK_HOUR });
  const workers = [1, 2].map((index) =>
    buildWorkerTimeline({ deploymentId: "dep1", index, department: "sales" }),
  );
  const scheduler = new CycleScheduler({
    deploymentId: "dep1",
    workers,
    content: options.content ?? new TemplateContentProvider(),
    log,
    channel: options.channel,
    durationHours: options.durationHours ?? null,
    cycleIntervalMs: 5,
    now: options.now ?? (() => WORK_HOUR),
    random: options.random ?? (() => 0),
  });
  return { scheduler, log };
}

function messagesOf(lines: string[]): string[] {
  return lines.map((line) => line.replace(/^\[[^\]]+\] \[[A-Z]+\] /, ""));
}

describe("activityProbabilities", () => {
  it("normalizes hourly and daily rates to one-minute cycles", () => {
    const probabilities = activityProbabilities(DEPARTMENT_ACTIVITY_RATES.sales);
    expect(probabilities.message).toBeCloseTo(0.2, 10);
    expect(probabilities.chatMessage).toBeCloseTo(10 / 60, 10);
    expect(probabilities.document).toBeCloseTo(0.00625, 10);
  });
});

describe("cycle scheduler", () => {
  it("fires every activity kind in order when every trial succeeds", async () => {
    const { scheduler, log } = makeScheduler();

    const events = await scheduler.runCycle(WORK_HOUR);

    expect(events.map((event) => [event.workerId, event.kind])).toEqual([
      ["worker-dep1-1", "message"],
      ["worker-dep1-1", "chatMessage"],
      ["worker-dep1-1", "document"],
      ["worker-dep1-2", "message"],
      ["worker-dep1-2", "chatMessage"],
      ["worker-dep1-2", "document"],
    ]);
    expect(events[0]).toEqual({
      kind: "message",
      workerId: "worker-dep1-1",
      timestampUtc: "2026-01-05T10:00:00.000Z",
      subject: "Pipeline Update",
    });
    expect(scheduler.activityCount).toBe(6);
    expect(log.tail(3)).toEqual([
      `${STAMP} [INFO] Message sent by Kwsim Worker 2: "Client Follow-up"`,
      `${STAMP} [INFO] Chat message sent by Kwsim Worker 2`,
      `${STAMP} [INFO] Document created by Kwsim Worker 2`,
    ]);
  });

  it("does nothing outside working hours", async () => {
    const { scheduler, log } = makeScheduler();
    await expect(scheduler.runCycle(NIGHT)).resolves.toEqual([]);
    await expect(
      scheduler.runCycle(new Date(Date.UTC(2026, 0, 5, 17, 0, 0))),
    ).resolves.toEqual([]);
    expect(scheduler.activityCount).toBe(0);
    expect(log.size).toBe(0);
  });

  it("does nothing when every trial fails", async () => {
    const { scheduler } = makeScheduler({ random: () => 0.999 });
    await expect(scheduler.runCycle(WORK_HOUR)).resolves.toEqual([]);
  });

  it("records a message without a subject when content generation fails", async () => {
    const content: ContentProvider = {
      kind: "template",
      generate: vi.fn(async () => {
        throw new ContentGenerationError("provider offline");
      }),
    };
    const { scheduler, log } = makeScheduler({ content, random: () => 0.19 });

    const events = await scheduler.runCycle(WORK_HOUR);

    expect(events).toEqual([
      { kind: "message", workerId: "worker-dep1-1", timestampUtc: "2026-01-05T10:00:00.000Z" },
      { kind: "message", workerId: "worker-dep1-2", timestampUtc: "2026-01-05T10:00:00.000Z" },
    ]);
    expect(log.tail(2)).toEqual([
      `${STAMP} [WARNING] Message content unavailable for Kwsim Worker 2: provider offline`,
      `${STAMP} [INFO] Message sent by Kwsim Worker 2`,
    ]);
  });

  it("notifies observers and isolates failing ones", async () => {
    const channel = new ActivityChannel();
    const seen: ActivityNotification[] = [];
    channel.onActivity(() => {
      throw new Error("observer bug");
    });
    channel.onActivity((notification) => seen.push(notification), "dep1");
    channel.onActivity(() => {
      throw new Error("wrong deployment");
    }, "other");
    const { scheduler } = makeScheduler({ channel, random: () => 0.18 });

    await scheduler.runCycle(WORK_HOUR);

    expect(scheduler.activityCount).toBe(2);
    expect(seen.map((notification) => [notification.deploymentId, notification.kind])).toEqual([
      ["dep1", "message"],
      ["dep1", "message"],
    ]);
  });

  it("expires immediately with a zero duration", async () => {
    const channel = new ActivityChannel();
    const exits: SchedulerExit[] = [];
    channel.onExit((exit) => exits.push(exit));
    const { scheduler, log } = makeScheduler({ channel, durationHours: 0 });

    scheduler.start();
    const exit = await scheduler.finished();

    expect(exit).toEqual({ deploymentId: "dep1", reason: "duration-expired", activityCount: 0 });
    expect(exits).toEqual([exit]);
    expect(scheduler.isRunning).toBe(false);
    await expect(scheduler.stop()).resolves.toEqual(exit);
    expect(messagesOf(log.tail())).toEqual([
      "Starting activity orchestration for 2 workers",
      "Duration limit reached",
      "Activity orchestration completed",
    ]);
  });

  it("runs cycles until the clock passes the duration bound", async () => {
    // Ten simulated minutes pass on every clock read.
    let reads = 0;
    const now = () => new Date(WORK_HOUR.getTime() + reads++ * 10 * 60_000);
    const random = vi.fn(() => 1);
    const { scheduler, log } = makeScheduler({ durationHours: 1, now, random });

    scheduler.start();
    const exit = await scheduler.finished();

    // Start reads 10:00; cycles run at 10:20, 10:40 and 11:00; the 11:10 check expires.
    expect(exit).toEqual({ deploymentId: "dep1", reason: "duration-expired", activityCount: 0 });
    expect(random).toHaveBeenCalledTimes(3 * 2 * 3);
    expect(messagesOf(log.tail())).toEqual([
      "Starting activity orchestration for 2 workers",
      "Duration limit reached",
      "Activity orchestration completed",
    ]);
  });

  it("starts once, stops once, and freezes the count after stop", async () => {
    const { scheduler, log } = makeScheduler({ random: () => 0.5 });
    const busy = makeScheduler();

    busy.scheduler.start();
    busy.scheduler.start();
    await vi.waitFor(() => expect(busy.scheduler.activityCount).toBeGreaterThan(0));
    const exit = await busy.scheduler.stop();
    const secondExit = await busy.scheduler.stop();
    const count = busy.scheduler.activityCount;
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(exit?.reason).toBe("cancelled");
    expect(exit?.activityCount).toBe(count);
    expect(secondExit).toEqual(exit);
    expect(busy.scheduler.activityCount).toBe(count);
    const messages = messagesOf(busy.log.tail(1_000));
    expect(messages.filter((line) => line.startsWith("Starting"))).toHaveLength(1);
    expect(messages.filter((line) => line.startsWith("Stopping"))).toHaveLength(1);
    expect(messages.at(-1)).toBe("Activity orchestration cancelled");

    await expect(scheduler.stop()).resolves.toBeNull();
    expect(log.size).toBe(0);
  });

  it("delivers the final lines to followers after stop", async () => {
    const { scheduler, log } = makeScheduler({ random: () => 0.5 });
    scheduler.start();
    const seen: string[] = [];
    const follower = (async () => {
      for await (const line of scheduler.follow({ lines: 10, pollIntervalMs: 2 })) {
        seen.push(line);
      }
    })();

    await new Promise((resolve) => setTimeout(resolve, 15));
    await scheduler.stop();
    await follower;

    expect(seen).toEqual(log.tail(10));
    expect(messagesOf(seen).at(-1)).toBe("Activity orchestration cancelled");
  });
});
