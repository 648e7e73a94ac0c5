import fs from "node:fs";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { describeError } from "./errors.js";

const log = createSubsystemLogger("workforce/activity-log");

export type ActivityLogLevel = "INFO" | "WARNING" | "ERROR";

export const DEFAULT_TAIL_LINES = 100;
export const DEFAULT_FOLLOW_POLL_MS = 500;

export type FollowOptions = {
  lines?: number;
  /** Tailing ends once this returns false and the remaining lines are drained. */
  isLive: () => boolean;
  pollIntervalMs?: number;
  signal?: AbortSignal;
};

export function formatLogLine(at: Date, level: ActivityLogLevel, message: string): string {
  return `[${at.toISOString()}] [${level}] ${message}`;
}

function clampLines(lines: number | undefined): number {
  if (typeof lines !== "number" || !Number.isFinite(lines)) {
    return DEFAULT_TAIL_LINES;
  }
  return Math.max(0, Math.floor(lines));
}

/**
 * Append-only activity record for one deployment. Every line goes to an ordered
 * in-memory buffer and, when a file path is set, to durable storage.
 */
export class ActivityLog {
  readonly filePath: string | null;
  private readonly lines: string[] = [];
  private readonly now: () => Date;
  private fileFailed = false;

  constructor(options: { filePath?: string | null; now?: () => Date } = {}) {
    this.filePath = options.filePath ?? null;
    this.now = options.now ?? (() => new Date());
    if (this.filePath) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  get size(): number {
    return this.lines.length;
  }

  append(message: string, level: ActivityLogLevel = "INFO"): string {
    const line = formatLogLine(this.now(), level, message);
    this.lines.push(line);
    if (this.filePath && !this.fileFailed) {
      try {
        fs.appendFileSync(this.filePath, `${line}\n`, "utf-8");
      } catch (err) {
        // Keep the in-memory record going; report the storage failure once.
        this.fileFailed = true;
        log.error(
          { filePath: this.filePath, error: describeError(err) },
          "Activity log file is no longer writable",
        );
      }
    }
    return line;
  }

  tail(lines?: number): string[] {
    const count = clampLines(lines);
    return count === 0 ? [] : this.lines.slice(-count);
  }

  async *follow(options: FollowOptions): AsyncGenerator<string> {
    const pollIntervalMs = Math.max(1, options.pollIntervalMs ?? DEFAULT_FOLLOW_POLL_MS);
    let cursor = Math.max(0, this.lines.length - clampLines(options.lines));
    for (;;) {
      // Sample liveness before draining so lines written just before the end are delivered.
      const live = options.isLive();
      while (cursor < this.lines.length) {
        yield this.lines[cursor];
        cursor += 1;
      }
      if (!live || options.signal?.aborted) {
        return;
      }
      try {
        await delay(pollIntervalMs, undefined, { signal: options.signal });
      } catch (err) {
        if (options.signal?.aborted) {
          return;
        }
        throw err;
      }
    }
  }
}

async function readCompleteLines(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as { code?: unknown })?.code === "ENOENT") {
      return [];
    }
    throw err;
  }
  // The segment after the last newline is either empty or still being written.
  return raw
    .split("\n")
    .slice(0, -1)
    .filter((line) => line.length > 0);
}

export async function readPersistedLog(filePath: string, lines?: number): Promise<string[]> {
  const count = clampLines(lines);
  const all = await readCompleteLines(filePath);
  return count === 0 ? [] : all.slice(-count);
}

/** Tails a log file written by another process. */
export async function* followPersistedLog(
  filePath: string,
  options: FollowOptions,
): AsyncGenerator<string> {
  const pollIntervalMs = Math.max(1, options.pollIntervalMs ?? DEFAULT_FOLLOW_POLL_MS);
  let cursor: number | null = null;
  for (;;) {
    const live = options.isLive();
    const all = await readCompleteLines(filePath);
    cursor ??= Math.max(0, all.length - clampLines(options.lines));
    while (cursor < all.length) {
      yield all[cursor];
      cursor += 1;
    }
    if (!live || options.signal?.aborted) {
      return;
    }
    try {
      await delay(pollIntervalMs, undefined, { signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) {
        return;
      }
      throw err;
    }
  }
}
