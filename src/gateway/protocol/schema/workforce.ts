import { Type, type Static } from "@sinclair/typebox";
import { DeploymentIdString, NonEmptyString } from "./primitives.js";

export const DepartmentSchema = Type.Union([
  Type.Literal("operations"),
  Type.Literal("engineering"),
  Type.Literal("sales"),
  Type.Literal("hr"),
  Type.Literal("finance"),
  Type.Literal("executive"),
]);

export const ActivityRateOverrideSchema = Type.Object(
  {
    messagesPerHour: Type.Optional(Type.Number({ minimum: 0 })),
    chatMessagesPerHour: Type.Optional(Type.Number({ minimum: 0 })),
    documentsPerDay: Type.Optional(Type.Number({ minimum: 0 })),
    meetingsPerDay: Type.Optional(Type.Number({ minimum: 0 })),
    varianceFraction: Type.Optional(Type.Number({ minimum: 0, exclusiveMaximum: 1 })),
    workStartHour: Type.Optional(Type.Integer({ minimum: 0, maximum: 23 })),
    workEndHour: Type.Optional(Type.Integer({ minimum: 0, maximum: 23 })),
  },
  { additionalProperties: false },
);

export const WorkforceDeployParamsSchema = Type.Object(
  {
    workers: Type.Optional(Type.Integer({ minimum: 1, maximum: 300 })),
    department: Type.Optional(DepartmentSchema),
    durationHours: Type.Optional(Type.Union([Type.Number({ minimum: 0 }), Type.Null()])),
    enableAiGeneration: Type.Optional(Type.Boolean()),
    emailDirective: Type.Optional(Type.Union([Type.String(), Type.Null()])),
    displayNamePrefix: Type.Optional(NonEmptyString),
    activityRate: Type.Optional(ActivityRateOverrideSchema),
  },
  { additionalProperties: false },
);

export const WorkforceDeploymentRefParamsSchema = Type.Object(
  {
    deploymentId: DeploymentIdString,
  },
  { additionalProperties: false },
);

export const WorkforceListParamsSchema = Type.Object({}, { additionalProperties: false });

export const WorkforceLogsParamsSchema = Type.Object(
  {
    deploymentId: DeploymentIdString,
    lines: Type.Optional(Type.Integer({ minimum: 1, maximum: 10000 })),
    follow: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export type WorkforceDeployParams = Static<typeof WorkforceDeployParamsSchema>;
export type WorkforceDeploymentRefParams = Static<typeof WorkforceDeploymentRefParamsSchema>;
export type WorkforceListParams = Static<typeof WorkforceListParamsSchema>;
export type WorkforceLogsParams = Static<typeof WorkforceLogsParamsSchema>;
