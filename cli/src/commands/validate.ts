/**
 * runnerkit CLI — Validate Command
 *
 * Checks a catalog without touching the registry.
 *
 * Usage:
 *   runnerkit validate             Validate the built-in catalog
 *   runnerkit validate <file>      Validate a catalog YAML file
 */

import { Command } from "commander";
import { Catalog, validateDefinition } from "@runnerkit/catalog";
import { colors, printError, printSuccess, symbols } from "../output";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate [file]")
    .description("Validate a catalog's runner type definitions")
    .action((file: string | undefined) => {
      const catalog = file ? Catalog.fromFile(file) : Catalog.builtin();
      let invalid = 0;

      for (const definition of catalog.definitions()) {
        const result = validateDefinition(definition);
        if (result.valid) {
          console.log(`  ${symbols.success} ${definition.name}`);
          continue;
        }
        invalid += 1;
        console.log(`  ${symbols.error} ${colors.name(definition.name)}`);
        for (const issue of result.errors) {
          console.log(
            `    ${colors.dim(`[${issue.rule}]`)} ${issue.path}: ${issue.message}`,
          );
        }
      }
      console.log();

      if (invalid > 0) {
        printError(`${invalid} of ${catalog.size} runner type(s) invalid.`);
        process.exitCode = 1;
      } else {
        printSuccess(`All ${catalog.size} runner type(s) are valid.`);
      }
    });
}
