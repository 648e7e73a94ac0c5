import type { GatewayRequestHandlers } from "./types.js";
import {
  ConfigurationError,
  DeploymentNotFoundError,
  DeploymentOwnedElsewhereError,
} from "../../workforce/errors.js";
import {
  ErrorCodes,
  errorShape,
  formatValidationErrors,
  validateWorkforceDeployParams,
  validateWorkforceDeploymentRefParams,
  validateWorkforceListParams,
  validateWorkforceLogsParams,
  type ErrorShape,
} from "../protocol/index.js";

function toErrorShape(err: unknown): ErrorShape {
  if (err instanceof DeploymentNotFoundError) {
    return errorShape(ErrorCodes.NOT_FOUND, err.message, { deploymentId: err.deploymentId });
  }
  if (err instanceof DeploymentOwnedElsewhereError) {
    return errorShape(ErrorCodes.CONFLICT, err.message, {
      deploymentId: err.deploymentId,
      ownerPid: err.ownerPid,
    });
  }
  if (err instanceof ConfigurationError) {
    return errorShape(
      ErrorCodes.INVALID_REQUEST,
      err.message,
      err.problems.length > 0 ? { problems: err.problems } : undefined,
    );
  }
  return errorShape(ErrorCodes.UNAVAILABLE, String(err));
}

export const workforceHandlers: GatewayRequestHandlers = {
  "workforce.deploy": async ({ params, respond, context }) => {
    if (!validateWorkforceDeployParams(params)) {
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid workforce.deploy params: ${formatValidationErrors(validateWorkforceDeployParams.errors)}`,
        ),
      );
      return;
    }
    try {
      const deploymentId = await context.deployments.deploy(params);
      const status = await context.deployments.getStatus(deploymentId);
      context.broadcast(
        "workforce.updated",
        { kind: "deploy", deploymentId, status: status.status, ts: Date.now() },
        { dropIfSlow: true },
      );
      respond(true, { deploymentId, status }, undefined);
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
  "workforce.status": async ({ params, respond, context }) => {
    if (!validateWorkforceDeploymentRefParams(params)) {
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid workforce.status params: ${formatValidationErrors(validateWorkforceDeploymentRefParams.errors)}`,
        ),
      );
      return;
    }
    try {
      const status = await context.deployments.getStatus(params.deploymentId);
      respond(true, status, undefined);
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
  "workforce.list": async ({ params, respond, context }) => {
    if (!validateWorkforceListParams(params)) {
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid workforce.list params: ${formatValidationErrors(validateWorkforceListParams.errors)}`,
        ),
      );
      return;
    }
    try {
      const deployments = await context.deployments.listDeployments();
      respond(true, { deployments }, undefined);
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
  "workforce.stop": async ({ params, respond, context }) => {
    if (!validateWorkforceDeploymentRefParams(params)) {
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid workforce.stop params: ${formatValidationErrors(validateWorkforceDeploymentRefParams.errors)}`,
        ),
      );
      return;
    }
    try {
      const stopped = await context.deployments.stop(params.deploymentId);
      const status = await context.deployments.getStatus(params.deploymentId);
      if (stopped) {
        context.broadcast(
          "workforce.updated",
          {
            kind: "stop",
            deploymentId: params.deploymentId,
            status: status.status,
            ts: Date.now(),
          },
          { dropIfSlow: true },
        );
      }
      respond(true, { stopped, status }, undefined);
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
  "workforce.cleanup": async ({ params, respond, context }) => {
    if (!validateWorkforceDeploymentRefParams(params)) {
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid workforce.cleanup params: ${formatValidationErrors(validateWorkforceDeploymentRefParams.errors)}`,
        ),
      );
      return;
    }
    try {
      const report = await context.deployments.cleanup(params.deploymentId);
      const status = await context.deployments.getStatus(params.deploymentId);
      context.broadcast(
        "workforce.updated",
        {
          kind: "cleanup",
          deploymentId: params.deploymentId,
          status: status.status,
          ts: Date.now(),
        },
        { dropIfSlow: true },
      );
      respond(true, { report, status }, undefined);
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
  "workforce.logs": async ({ params, respond, context }) => {
    if (!validateWorkforceLogsParams(params)) {
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid workforce.logs params: ${formatValidationErrors(validateWorkforceLogsParams.errors)}`,
        ),
      );
      return;
    }
    try {
      const { deploymentId } = params;
      const follow = params.follow === true;
      const stream = await context.deployments.getLogs(deploymentId, {
        follow,
        lines: params.lines,
      });
      const lines: string[] = [];
      let delivered = 0;
      for await (const line of stream) {
        delivered += 1;
        if (follow) {
          // Followers receive lines as events; the response only closes the stream.
          context.broadcast("workforce.log", { deploymentId, line });
        } else {
          lines.push(line);
        }
      }
      respond(true, { deploymentId, lines, delivered }, undefined);
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
};
