import { Command } from "commander";
import { registerWorkforceCli } from "./workforce-cli.js";

export const CLI_VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("kwsim")
    .description("Simulate knowledge-worker activity across a provisioned workforce")
    .version(CLI_VERSION);
  registerWorkforceCli(program);
  return program;
}
