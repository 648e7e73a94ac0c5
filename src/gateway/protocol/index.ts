import { Ajv, type ErrorObject } from "ajv";
import {
  WorkforceDeployParamsSchema,
  WorkforceDeploymentRefParamsSchema,
  WorkforceListParamsSchema,
  WorkforceLogsParamsSchema,
  type WorkforceDeployParams,
  type WorkforceDeploymentRefParams,
  type WorkforceListParams,
  type WorkforceLogsParams,
} from "./schema/workforce.js";

export * from "./schema/workforce.js";

const ajv = new Ajv({ allErrors: true, strict: false });

export const validateWorkforceDeployParams = ajv.compile<WorkforceDeployParams>(
  WorkforceDeployParamsSchema,
);
export const validateWorkforceDeploymentRefParams = ajv.compile<WorkforceDeploymentRefParams>(
  WorkforceDeploymentRefParamsSchema,
);
export const validateWorkforceListParams = ajv.compile<WorkforceListParams>(
  WorkforceListParamsSchema,
);
export const validateWorkforceLogsParams = ajv.compile<WorkforceLogsParams>(
  WorkforceLogsParamsSchema,
);

export const ErrorCodes = {
  INVALID_REQUEST: "INVALID_REQUEST",
  NOT_FOUND: "NOT_FOUND",
  METHOD_NOT_FOUND: "METHOD_NOT_FOUND",
  CONFLICT: "CONFLICT",
  UNAVAILABLE: "UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorShape = {
  code: ErrorCode;
  message: string;
  details?: unknown;
};

export function errorShape(code: ErrorCode, message: string, details?: unknown): ErrorShape {
  return details === undefined ? { code, message } : { code, message, details };
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown validation error";
  }
  return errors
    .map((error) => {
      const where = error.instancePath || "params";
      if (error.keyword === "additionalProperties") {
        return `${where}: unexpected property '${String(error.params.additionalProperty)}'`;
      }
      return `${where} ${error.message ?? "is invalid"}`;
    })
    .join("; ");
}
