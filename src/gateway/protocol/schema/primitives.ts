import { Type } from "@sinclair/typebox";

export const NonEmptyString = Type.String({ minLength: 1 });

export const DeploymentIdString = Type.String({
  minLength: 1,
  maxLength: 64,
  pattern: "^[A-Za-z0-9][A-Za-z0-9_-]*$",
});
