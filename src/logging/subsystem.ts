import pino, { type Logger } from "pino";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.KWSIM_LOG_LEVEL?.trim().toLowerCase() ?? "";
  return isLogLevel(raw) ? raw : "info";
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (rootLogger) {
    return rootLogger;
  }
  const env = process.env;
  const options = { name: "kwsim", level: resolveLevel(env) };
  // stderr, so CLI output on stdout stays parseable.
  rootLogger =
    env.KWSIM_LOG_PRETTY === "1"
      ? pino({
          ...options,
          transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
        })
      : pino(options, pino.destination(2));
  return rootLogger;
}

export type SubsystemLogger = Logger;

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return getRootLogger().child({ subsystem });
}
