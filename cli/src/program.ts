/**
 * runnerkit CLI — Program
 *
 * Commands:
 *   runnerkit register [--experimental]   Register the catalog's runner types
 *   runnerkit list [--available]          List registered runner types
 *   runnerkit show <name>                 Show one runner type
 *   runnerkit history [name]              Show the registration audit trail
 *   runnerkit validate [file]             Validate a catalog
 */

import { Command } from "commander";
import { registerRegisterCommand } from "./commands/register";
import { registerListCommand } from "./commands/list";
import { registerShowCommand } from "./commands/show";
import { registerHistoryCommand } from "./commands/history";
import { registerValidateCommand } from "./commands/validate";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("runnerkit")
    .description("Register runner types from a catalog into a local registry")
    .version("0.1.0");

  registerRegisterCommand(program);
  registerListCommand(program);
  registerShowCommand(program);
  registerHistoryCommand(program);
  registerValidateCommand(program);

  return program;
}
