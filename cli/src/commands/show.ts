/**
 * runnerkit CLI — Show Command
 *
 * Usage:
 *   runnerkit show <name>    Show a registered runner type and its parameters
 */

import { Command } from "commander";
import { Registrar } from "@runnerkit/registrar";
import type { RunnerTypeRecord } from "@runnerkit/registrar";
import { getRegistrarOptions, loadConfig } from "../config";
import {
  colors,
  formatDefault,
  printDetail,
  printError,
  printHeader,
  printTable,
} from "../output";

export function registerShowCommand(program: Command): void {
  program
    .command("show <name>")
    .description("Show a registered runner type")
    .action(async (name: string) => {
      const registrar = new Registrar(getRegistrarOptions(loadConfig()));
      await registrar.init();

      try {
        const record = await registrar.getRunnerType(name);
        if (!record) {
          printError(`Runner type "${name}" is not registered.`);
          process.exitCode = 1;
          return;
        }
        printRunnerType(record);
      } finally {
        registrar.close();
      }
    });
}

function printRunnerType(record: RunnerTypeRecord): void {
  printHeader(record.name);
  printDetail("Id", colors.dim(record.id));
  printDetail("Description", record.description);
  printDetail("Enabled", record.enabled ? "yes" : "no");
  printDetail("Runner module", colors.module(record.runner_module));
  if (record.query_module) {
    printDetail("Query module", colors.module(record.query_module));
  }

  const parameters = Object.entries(record.parameters);
  if (parameters.length === 0) {
    printDetail("Parameters", colors.dim("(none)"));
    return;
  }

  console.log();
  printTable({
    head: ["Parameter", "Type", "Required", "Immutable", "Default"],
    rows: parameters.map(([paramName, param]) => [
      colors.name(paramName),
      param.type,
      param.required ? colors.warn("yes") : "no",
      param.immutable ? "yes" : "no",
      formatDefault(param.default),
    ]),
  });
}
