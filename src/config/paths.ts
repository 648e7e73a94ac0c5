import os from "node:os";
import path from "node:path";

function resolveUserPath(input: string, env: NodeJS.ProcessEnv): string {
  const trimmed = input.trim();
  if (trimmed === "~" || trimmed.startsWith("~/")) {
    const home = env.HOME?.trim() || os.homedir();
    return path.resolve(home, trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/** Root directory for persisted simulator state (`KWSIM_STATE_DIR`, else `~/.kwsim`). */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.KWSIM_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env);
  }
  return resolveUserPath("~/.kwsim", env);
}

export function resolveCredentialsDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "credentials");
}

export function resolveWorkforceDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "workforce");
}
