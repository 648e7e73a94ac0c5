import { randomUUID } from "node:crypto";
import type { CleanupReport, DeploymentRun } from "../workforce/types.js";
import { ErrorCodes, errorShape, type ErrorCode, type ErrorShape } from "./protocol/index.js";
import type { GatewayRequestContext, GatewayRequestHandlers } from "./server-methods/types.js";
import { workforceHandlers } from "./server-methods/workforce.js";

export type WorkforceMethodResults = {
  "workforce.deploy": { deploymentId: string; status: DeploymentRun };
  "workforce.status": DeploymentRun;
  "workforce.list": { deployments: DeploymentRun[] };
  "workforce.stop": { stopped: boolean; status: DeploymentRun };
  "workforce.cleanup": { report: CleanupReport; status: DeploymentRun };
  "workforce.logs": { deploymentId: string; lines: string[]; delivered: number };
};

export type WorkforceMethod = keyof WorkforceMethodResults;

export class GatewayCallError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(error: ErrorShape) {
    super(error.message);
    this.name = "GatewayCallError";
    this.code = error.code;
    this.details = error.details;
  }
}

export type CallGatewayOptions<M extends WorkforceMethod> = {
  method: M;
  params?: Record<string, unknown>;
  context: GatewayRequestContext;
  handlers?: GatewayRequestHandlers;
};

type Outcome = { ok: boolean; payload?: unknown; error?: ErrorShape };

/** Dispatches one request to the in-process handlers and unwraps the response. */
export async function callGateway<M extends WorkforceMethod>(
  opts: CallGatewayOptions<M>,
): Promise<WorkforceMethodResults[M]> {
  const handlers = opts.handlers ?? workforceHandlers;
  const handler = handlers[opts.method];
  if (!handler) {
    throw new GatewayCallError(
      errorShape(ErrorCodes.METHOD_NOT_FOUND, `unknown method: ${opts.method}`),
    );
  }
  const responses: Outcome[] = [];
  await handler({
    req: { id: randomUUID(), type: "req", method: opts.method },
    params: opts.params ?? {},
    respond: (ok, payload, error) => {
      responses.push({ ok, payload, error });
    },
    context: opts.context,
  });
  const [outcome] = responses;
  if (!outcome) {
    throw new GatewayCallError(
      errorShape(ErrorCodes.UNAVAILABLE, `${opts.method} returned no response`),
    );
  }
  if (!outcome.ok) {
    throw new GatewayCallError(
      outcome.error ?? errorShape(ErrorCodes.UNAVAILABLE, `${opts.method} failed`),
    );
  }
  return outcome.payload as WorkforceMethodResults[M];
}
