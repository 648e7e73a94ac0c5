import type { DeploymentController } from "../../workforce/service.js";
import type { ErrorShape } from "../protocol/index.js";

export type GatewayBroadcastOpts = {
  dropIfSlow?: boolean;
};

export type GatewayRequestContext = {
  deployments: DeploymentController;
  broadcast: (event: string, payload: unknown, opts?: GatewayBroadcastOpts) => void;
};

export type GatewayRequest = {
  id: string;
  type: "req";
  method: string;
};

export type RespondFn = (ok: boolean, payload?: unknown, error?: ErrorShape) => void;

export type GatewayRequestHandlerOptions = {
  req: GatewayRequest;
  params: Record<string, unknown>;
  respond: RespondFn;
  context: GatewayRequestContext;
};

export type GatewayRequestHandler = (opts: GatewayRequestHandlerOptions) => Promise<void> | void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;
