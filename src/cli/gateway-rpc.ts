import type { Command } from "commander";
import { resolveWorkforceDir } from "../config/paths.js";
import { callGateway, type WorkforceMethod, type WorkforceMethodResults } from "../gateway/call.js";
import type { GatewayRequestContext } from "../gateway/server-methods/types.js";
import { DeploymentController } from "../workforce/service.js";
import { FileDeploymentStore } from "../workforce/store.js";

export type GatewayRpcOpts = {
  stateDir?: string;
  json?: boolean;
};

export type GatewayEventListener = (event: string, payload: unknown) => void;

export type CliGatewaySession = {
  context: GatewayRequestContext;
  deployments: DeploymentController;
  recovered: string[];
  onEvent: (listener: GatewayEventListener) => () => void;
};

export const addGatewayClientOptions = (cmd: Command) =>
  cmd.option("--state-dir <dir>", "State directory (defaults to $KWSIM_STATE_DIR or ~/.kwsim)");

export function resolveCliEnv(opts: GatewayRpcOpts): NodeJS.ProcessEnv {
  const stateDir = opts.stateDir?.trim();
  return stateDir ? { ...process.env, KWSIM_STATE_DIR: stateDir } : process.env;
}

export async function createCliGatewaySession(opts: GatewayRpcOpts): Promise<CliGatewaySession> {
  const env = resolveCliEnv(opts);
  const listeners = new Set<GatewayEventListener>();
  const deployments = new DeploymentController({
    env,
    store: new FileDeploymentStore(resolveWorkforceDir(env)),
  });
  const recovered = await deployments.recover();
  const context: GatewayRequestContext = {
    deployments,
    broadcast: (event, payload) => {
      for (const listener of listeners) {
        listener(event, payload);
      }
    },
  };
  return {
    context,
    deployments,
    recovered,
    onEvent: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}

let sharedSession: Promise<CliGatewaySession> | null = null;

/** One controller per CLI process, so a foreground deploy and its log follower share state. */
export function resolveCliGatewaySession(opts: GatewayRpcOpts): Promise<CliGatewaySession> {
  sharedSession ??= createCliGatewaySession(opts);
  return sharedSession;
}

export const callGatewayFromCli = async <M extends WorkforceMethod>(
  method: M,
  opts: GatewayRpcOpts,
  params?: Record<string, unknown>,
): Promise<WorkforceMethodResults[M]> => {
  const session = await resolveCliGatewaySession(opts);
  return await callGateway({ method, params, context: session.context });
};
