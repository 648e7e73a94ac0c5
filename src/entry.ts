#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { defaultRuntime } from "./runtime.js";
import { describeError } from "./workforce/errors.js";

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  defaultRuntime.error(describeError(err));
  defaultRuntime.exit(1);
}
