/**
 * runnerkit CLI - List Command
 *
 * Lists registered runner types, or the definitions in the catalog.
 *
 * Usage:
 *   runnerkit list              List registered runner types
 *   runnerkit list --available  List catalog definitions
 */

import { Command } from "commander";
import { Registrar } from "@runnerkit/registrar";
import { getRegistrarOptions, loadConfig } from "../config";
import { printInfo, printTable, truncateText, colors } from "../output";

interface ListFlags {
  available: boolean;
  catalog?: string;
}

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List registered runner types")
    .option("-a, --available", "List catalog definitions instead", false)
    .option("-c, --catalog <file>", "Catalog YAML to read with --available")
    .action(async (opts: ListFlags) => {
      const registrar = new Registrar(
        getRegistrarOptions(loadConfig(), { catalog: opts.catalog }),
      );
      await registrar.init();

      try {
        if (opts.available) {
          const definitions = registrar.getCatalog().definitions();
          printInfo(
            `${colors.bold(String(definitions.length))} runner type(s) in the catalog:\n`,
          );
          printTable({
            head: ["Name", "Module", "Parameters", "Flags"],
            rows: definitions.map((d) => [
              colors.name(d.name),
              colors.module(d.runner_module),
              String(Object.keys(d.parameters).length),
              [
                d.enabled ? "" : "disabled",
                d.experimental ? "experimental" : "",
              ]
                .filter(Boolean)
                .join(", ") || colors.dim("-"),
            ]),
          });
          return;
        }

        const records = registrar.listRunnerTypes();
        if (records.length === 0) {
          printInfo("No runner types registered yet.");
          printInfo(`Run ${colors.bold("runnerkit register")} to get started.`);
          return;
        }

        printInfo(
          `${colors.bold(String(records.length))} runner type(s) registered:\n`,
        );
        printTable({
          head: ["Name", "Enabled", "Module", "Description"],
          rows: records.map((r) => [
            colors.name(r.name),
            r.enabled ? colors.success("yes") : colors.dim("no"),
            colors.module(r.runner_module),
            truncateText(r.description, 48),
          ]),
        });
      } finally {
        registrar.close();
      }
    });
}
