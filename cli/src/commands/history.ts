/**
 * runnerkit CLI — History Command
 *
 * Shows the audit trail of runner type registrations, newest first.
 *
 * Usage:
 *   runnerkit history              Recent changes to any runner type
 *   runnerkit history <name>       Changes to one runner type
 *   runnerkit history -n 10        Limit the number of entries
 */

import { Command, InvalidArgumentError } from "commander";
import { Registrar } from "@runnerkit/registrar";
import { getRegistrarOptions, loadConfig } from "../config";
import {
  colors,
  formatDate,
  formatOperation,
  printInfo,
  printTable,
} from "../output";

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError("Limit must be a positive integer.");
  }
  return limit;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command("history [name]")
    .description("Show the registration audit trail")
    .option("-n, --limit <count>", "Maximum number of entries", parseLimit, 20)
    .action(async (name: string | undefined, opts: { limit: number }) => {
      const registrar = new Registrar(getRegistrarOptions(loadConfig()));
      await registrar.init();

      try {
        const entries = registrar.getAuditLog(name, opts.limit);
        if (entries.length === 0) {
          printInfo(
            name
              ? `No history for runner type "${name}".`
              : "No registrations recorded yet.",
          );
          return;
        }

        printTable({
          head: ["When", "Runner Type", "Operation", "Id"],
          rows: entries.map((e) => [
            formatDate(e.recorded_at),
            colors.name(e.name),
            formatOperation(e.operation),
            colors.dim(e.runner_type_id),
          ]),
        });
      } finally {
        registrar.close();
      }
    });
}
