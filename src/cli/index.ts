#!/usr/bin/env node

/**
 * release-steward CLI entry point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerCreateCommand } from "./commands/create.js";
import { registerDeleteCommand } from "./commands/delete.js";
import { registerRollbackCommand } from "./commands/rollback.js";
import { registerPromoteCommand } from "./commands/promote.js";
import { registerStatusCommand } from "./commands/status.js";
import { formatError } from "../utils/errors.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("steward")
    .description("Create, delete, roll back and promote releases across git, GitHub and the params repo")
    .version(VERSION, "-v, --version", "Output the current version");

  registerCreateCommand(program);
  registerDeleteCommand(program);
  registerRollbackCommand(program);
  registerPromoteCommand(program);
  registerStatusCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
