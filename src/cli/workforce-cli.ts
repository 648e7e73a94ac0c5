import { readFileSync } from "node:fs";
import path from "node:path";
import type { Command } from "commander";
import JSON5 from "json5";
import { defaultRuntime } from "../runtime.js";
import { colorize, isRich, theme, type ThemeColor } from "../terminal/theme.js";
import { DEPARTMENTS } from "../workforce/activity-rates.js";
import type { CleanupReport, DeploymentRun, DeploymentStatus } from "../workforce/types.js";
import {
  addGatewayClientOptions,
  callGatewayFromCli,
  resolveCliGatewaySession,
  type GatewayRpcOpts,
} from "./gateway-rpc.js";

type DeployOpts = GatewayRpcOpts & {
  workers?: string;
  department?: string;
  durationHours?: string;
  ai?: boolean;
  directive?: string;
  prefix?: string;
  configJson?: string;
  configJsonFile?: string;
  lines?: string;
};

type LogsOpts = GatewayRpcOpts & {
  lines?: string;
  follow?: boolean;
};

function toNumber(input: string | undefined, optionName: string): number | undefined {
  if (input === undefined || !input.trim()) {
    return undefined;
  }
  const parsed = Number(input);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number for ${optionName}: ${input}`);
  }
  return parsed;
}

function printJsonIfRequested(opts: GatewayRpcOpts, payload: unknown): boolean {
  if (!opts.json) {
    return false;
  }
  defaultRuntime.log(JSON.stringify(payload, null, 2));
  return true;
}

function ensureJsonRecord(parsed: unknown, optionName: string): Record<string, unknown> {
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Invalid JSON for ${optionName}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function normalizeJsonCandidate(raw: string): string {
  return raw
    .trim()
    .replaceAll("\u201c", '"')
    .replaceAll("\u201d", '"')
    .replaceAll("\u2018", "'")
    .replaceAll("\u2019", "'");
}

function stripMatchingOuterQuotes(raw: string): string {
  if (raw.length < 2) {
    return raw;
  }
  const first = raw[0];
  const last = raw[raw.length - 1];
  if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
    return raw.slice(1, -1).trim();
  }
  return raw;
}

/** Quotes bare-word values such as `{department:sales}` that shells leave unquoted. */
function quoteBareWordValues(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("{") || !trimmed.endsWith("}")) {
    return raw;
  }
  return trimmed.replaceAll(
    /:\s*([A-Za-z_][A-Za-z0-9_ .-]*?)(\s*[,}])/g,
    (match: string, token: string, suffix: string) => {
      if (token === "true" || token === "false" || token === "null") {
        return match;
      }
      return `: "${token}"${suffix}`;
    },
  );
}

/**
 * Parses a deployment config from a command-line argument. Accepts JSON5, shell-escaped
 * JSON and object literals with unquoted keys and values.
 */
export function parseDeploymentConfigJson(
  raw: string,
  optionName = "--config-json",
): Record<string, unknown> {
  const normalized = normalizeJsonCandidate(raw);
  const candidates = new Set<string>();
  const add = (candidate: string) => {
    const value = candidate.trim();
    if (value) {
      candidates.add(value);
    }
  };

  const unescaped = normalized.replaceAll('\\"', '"').replaceAll("\\'", "'");
  for (const base of [normalized, unescaped]) {
    add(base);
    add(stripMatchingOuterQuotes(base));
    add(quoteBareWordValues(stripMatchingOuterQuotes(base)));
  }

  let parseError: unknown;
  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON5.parse(candidate);
      if (typeof parsed === "string") {
        parsed = JSON5.parse(parsed);
      }
    } catch (error) {
      parseError = error;
      continue;
    }
    return ensureJsonRecord(parsed, optionName);
  }

  throw new Error(
    `Invalid JSON for ${optionName}: ${String(parseError)}. Try ${optionName} '{"workers":10}'`,
    { cause: parseError },
  );
}

export function parseDeploymentConfigJsonFile(filePath: string): Record<string, unknown> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = readFileSync(resolved, "utf8");
  } catch (error) {
    throw new Error(`Failed to read --config-json-file: ${resolved}: ${String(error)}`, {
      cause: error,
    });
  }
  return parseDeploymentConfigJson(raw, "--config-json-file");
}

/** Config file first, then inline JSON, then individual flags. */
export function buildDeployParams(opts: DeployOpts): Record<string, unknown> {
  const params: Record<string, unknown> = {
    ...(opts.configJsonFile ? parseDeploymentConfigJsonFile(opts.configJsonFile) : {}),
    ...(opts.configJson ? parseDeploymentConfigJson(opts.configJson) : {}),
  };
  const workers = toNumber(opts.workers, "--workers");
  if (workers !== undefined) {
    params.workers = workers;
  }
  const durationHours = toNumber(opts.durationHours, "--duration-hours");
  if (durationHours !== undefined) {
    params.durationHours = durationHours;
  }
  if (opts.department) {
    params.department = opts.department.trim().toLowerCase();
  }
  if (opts.ai) {
    params.enableAiGeneration = true;
  }
  if (opts.directive) {
    params.emailDirective = opts.directive;
  }
  if (opts.prefix) {
    params.displayNamePrefix = opts.prefix;
  }
  return params;
}

const STATUS_COLORS: Record<DeploymentStatus, ThemeColor> = {
  Pending: theme.muted,
  Running: theme.success,
  Stopped: theme.warn,
  CleaningUp: theme.accent,
  Completed: theme.heading,
  Failed: theme.error,
};

function formatTimestamp(ms: number | undefined): string {
  return typeof ms === "number" ? new Date(ms).toISOString() : "-";
}

export function formatDeploymentSummary(run: DeploymentRun, rich = false): string[] {
  const lines = [
    `${colorize(rich, theme.heading, run.deploymentId)} ${colorize(rich, STATUS_COLORS[run.status], run.status)} (${run.phase})`,
    `Department: ${run.config.department}`,
    `Workers: ${run.workers.length} of ${run.workersRequested}`,
    `Activities: ${run.activityCount}`,
    `Duration: ${run.durationHours === null ? "unlimited" : `${run.durationHours}h`}`,
    `Started: ${formatTimestamp(run.startedAtMs)}`,
  ];
  if (run.stoppedAtMs !== undefined) {
    lines.push(`Stopped: ${formatTimestamp(run.stoppedAtMs)}`);
  }
  if (run.completedAtMs !== undefined) {
    lines.push(`Completed: ${formatTimestamp(run.completedAtMs)}`);
  }
  if (run.error) {
    lines.push(colorize(rich, theme.error, `Error: ${run.error}`));
  }
  return lines;
}

export const DEPLOYMENT_TABLE_HEADER = [
  "ID".padEnd(12),
  "STATUS".padEnd(10),
  "DEPARTMENT".padEnd(11),
  "WORKERS".padStart(7),
  "ACTIVITY".padStart(8),
  "STARTED",
].join("  ");

export function formatDeploymentRow(run: DeploymentRun, rich = false): string {
  return [
    run.deploymentId.padEnd(12),
    colorize(rich, STATUS_COLORS[run.status], run.status.padEnd(10)),
    run.config.department.padEnd(11),
    String(run.workers.length).padStart(7),
    String(run.activityCount).padStart(8),
    formatTimestamp(run.startedAtMs),
  ].join("  ");
}

function renderCleanupReport(report: CleanupReport) {
  const rich = isRich();
  defaultRuntime.log(
    `${colorize(rich, theme.heading, "Cleanup")} ${report.deploymentId}: ${report.resourcesDeleted} identities deleted`,
  );
  for (const detail of report.details) {
    defaultRuntime.log(`- ${detail}`);
  }
  for (const error of report.errors) {
    defaultRuntime.error(colorize(rich, theme.error, `- ${error}`));
  }
}

async function runForegroundDeployment(opts: DeployOpts) {
  const session = await resolveCliGatewaySession(opts);
  const deployed = await callGatewayFromCli("workforce.deploy", opts, buildDeployParams(opts));
  const { deploymentId } = deployed;
  const rich = isRich();
  if (!opts.json) {
    defaultRuntime.log(
      `${colorize(rich, theme.heading, "Deployed")} ${deploymentId} (${deployed.status.status})`,
    );
  }
  if (deployed.status.status !== "Running") {
    if (!printJsonIfRequested(opts, deployed)) {
      for (const line of formatDeploymentSummary(deployed.status, rich)) {
        defaultRuntime.log(line);
      }
    }
    process.exitCode = deployed.status.status === "Failed" ? 1 : 0;
    return;
  }

  const stopRequest: { pending: Promise<void> | null } = { pending: null };
  const requestStop = () => {
    stopRequest.pending ??= callGatewayFromCli("workforce.stop", opts, { deploymentId }).then(
      () => undefined,
      (err: unknown) => {
        defaultRuntime.error(`Failed to stop ${deploymentId}: ${String(err)}`);
      },
    );
  };
  process.once("SIGINT", requestStop);
  process.once("SIGTERM", requestStop);
  const unsubscribe = session.onEvent((event, payload) => {
    if (event !== "workforce.log" || opts.json) {
      return;
    }
    if (payload && typeof payload === "object" && "line" in payload) {
      defaultRuntime.log(String(payload.line));
    }
  });
  try {
    await callGatewayFromCli("workforce.logs", opts, {
      deploymentId,
      follow: true,
      lines: toNumber(opts.lines, "--lines") ?? 50,
    });
    if (stopRequest.pending) {
      await stopRequest.pending;
    }
    await session.deployments.waitForExit(deploymentId);
  } finally {
    unsubscribe();
    process.off("SIGINT", requestStop);
    process.off("SIGTERM", requestStop);
  }

  const status = await callGatewayFromCli("workforce.status", opts, { deploymentId });
  if (printJsonIfRequested(opts, { deploymentId, status })) {
    return;
  }
  defaultRuntime.log("");
  for (const line of formatDeploymentSummary(status, rich)) {
    defaultRuntime.log(line);
  }
  defaultRuntime.log(
    colorize(rich, theme.muted, `Run 'kwsim workforce cleanup ${deploymentId}' to delete workers.`),
  );
}

export function registerWorkforceCli(program: Command) {
  const workforce = program
    .command("workforce")
    .description("Deploy and manage simulated knowledge-worker workforces");

  addGatewayClientOptions(
    workforce
      .command("deploy")
      .description("Provision workers and run their activity in the foreground")
      .option("--workers <count>", "Number of workers (1-300, default 25)")
      .option("--department <name>", `Department (${DEPARTMENTS.join(", ")})`)
      .option("--duration-hours <hours>", "Stop after this many hours (default unlimited)")
      .option("--ai", "Generate message content with the language model", false)
      .option("--directive <text>", "Extra context for generated messages")
      .option("--prefix <name>", "Display name prefix for workers")
      .option("--config-json <json>", "Deployment config as a JSON object")
      .option("--config-json-file <path>", "Read the deployment config from a JSON file")
      .option("--lines <count>", "Log lines to show when following starts", "50")
      .option("--json", "Output JSON", false)
      .action(async (opts: DeployOpts) => {
        await runForegroundDeployment(opts);
      }),
  );

  addGatewayClientOptions(
    workforce
      .command("status")
      .description("Show one deployment")
      .argument("<deploymentId>", "Deployment id")
      .option("--json", "Output JSON", false)
      .action(async (deploymentId: string, opts: GatewayRpcOpts) => {
        const status = await callGatewayFromCli("workforce.status", opts, { deploymentId });
        if (printJsonIfRequested(opts, status)) {
          return;
        }
        for (const line of formatDeploymentSummary(status, isRich())) {
          defaultRuntime.log(line);
        }
      }),
  );

  addGatewayClientOptions(
    workforce
      .command("list")
      .description("List deployments, oldest first")
      .option("--json", "Output JSON", false)
      .action(async (opts: GatewayRpcOpts) => {
        const result = await callGatewayFromCli("workforce.list", opts);
        if (printJsonIfRequested(opts, result)) {
          return;
        }
        if (result.deployments.length === 0) {
          defaultRuntime.log("No deployments.");
          return;
        }
        const rich = isRich();
        defaultRuntime.log(colorize(rich, theme.heading, DEPLOYMENT_TABLE_HEADER));
        for (const run of result.deployments) {
          defaultRuntime.log(formatDeploymentRow(run, rich));
        }
      }),
  );

  addGatewayClientOptions(
    workforce
      .command("stop")
      .description("Stop a running deployment")
      .argument("<deploymentId>", "Deployment id")
      .option("--json", "Output JSON", false)
      .action(async (deploymentId: string, opts: GatewayRpcOpts) => {
        const session = await resolveCliGatewaySession(opts);
        const current = await callGatewayFromCli("workforce.status", opts, { deploymentId });
        const ownerPid = session.deployments.foreignOwner(current);
        if (ownerPid !== null) {
          process.kill(ownerPid, "SIGTERM");
          if (!printJsonIfRequested(opts, { deploymentId, signalled: ownerPid })) {
            defaultRuntime.log(`Stop requested from process ${ownerPid} running ${deploymentId}`);
          }
          return;
        }
        const result = await callGatewayFromCli("workforce.stop", opts, { deploymentId });
        if (printJsonIfRequested(opts, result)) {
          return;
        }
        const rich = isRich();
        if (result.stopped) {
          defaultRuntime.log(`${colorize(rich, theme.success, "Stopped")} ${deploymentId}`);
        } else {
          defaultRuntime.log(`${deploymentId} is ${result.status.status}; nothing to stop`);
        }
      }),
  );

  addGatewayClientOptions(
    workforce
      .command("cleanup")
      .description("Stop a deployment and delete its worker identities")
      .argument("<deploymentId>", "Deployment id")
      .option("--json", "Output JSON", false)
      .action(async (deploymentId: string, opts: GatewayRpcOpts) => {
        const result = await callGatewayFromCli("workforce.cleanup", opts, { deploymentId });
        if (printJsonIfRequested(opts, result)) {
          return;
        }
        renderCleanupReport(result.report);
        if (result.report.errors.length > 0) {
          process.exitCode = 1;
        }
      }),
  );

  addGatewayClientOptions(
    workforce
      .command("logs")
      .description("Print a deployment's activity log")
      .argument("<deploymentId>", "Deployment id")
      .option("--lines <count>", "Number of recent lines", "100")
      .option("--follow", "Keep printing new lines while the deployment runs", false)
      .option("--json", "Output JSON", false)
      .action(async (deploymentId: string, opts: LogsOpts) => {
        const session = await resolveCliGatewaySession(opts);
        const follow = opts.follow === true;
        const unsubscribe = session.onEvent((event, payload) => {
          if (event === "workforce.log" && payload && typeof payload === "object") {
            if ("line" in payload) {
              defaultRuntime.log(String(payload.line));
            }
          }
        });
        try {
          const lines = toNumber(opts.lines, "--lines");
          const result = await callGatewayFromCli("workforce.logs", opts, {
            deploymentId,
            follow,
            ...(lines !== undefined ? { lines } : {}),
          });
          if (follow || printJsonIfRequested(opts, result)) {
            return;
          }
          for (const line of result.lines) {
            defaultRuntime.log(line);
          }
        } finally {
          unsubscribe();
        }
      }),
  );
}
