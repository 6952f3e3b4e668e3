/**
 * runnerkit CLI — Register Command
 *
 * Reconciles the catalog into the registry database and prints one line
 * per runner type. Exits 1 when any runner type failed to register.
 *
 * Usage:
 *   runnerkit register                   Register stable runner types
 *   runnerkit register --experimental    Include experimental runner types
 *   runnerkit register --catalog <file>  Register a catalog file instead
 */

import { Command } from "commander";
import { Registrar } from "@runnerkit/registrar";
import type { RegistrarError } from "@runnerkit/registrar";
import { getRegistrarOptions, loadConfig } from "../config";
import {
  createSpinner,
  formatOutcome,
  formatSummary,
  printDebug,
  printError,
  printSuccess,
  setDebugMode,
} from "../output";

interface RegisterFlags {
  experimental: boolean;
  catalog?: string;
  debug: boolean;
}

export function registerRegisterCommand(program: Command): void {
  program
    .command("register")
    .description("Register the catalog's runner types in the registry")
    .option("-e, --experimental", "Include experimental runner types", false)
    .option("-c, --catalog <file>", "Catalog YAML to register")
    .option("--debug", "Show registrar debug logs", false)
    .action(async (opts: RegisterFlags) => {
      setDebugMode(opts.debug);
      const config = loadConfig();
      const registrar = new Registrar(getRegistrarOptions(config, opts));
      await registrar.init();

      try {
        const spinner = createSpinner("Registering runner types...").start();
        const report = await registrar.register(
          opts.experimental || config.includeExperimental,
        );
        spinner.stop();

        for (const outcome of report.outcomes) {
          console.log(`  ${formatOutcome(outcome)}`);
          if (outcome.status === "failed") {
            printDebug(describeFailure(outcome.name, outcome.error));
          }
        }
        console.log();

        if (report.summary.ok) {
          printSuccess(formatSummary(report.summary));
        } else {
          printError(formatSummary(report.summary));
          process.exitCode = 1;
        }
      } finally {
        registrar.close();
      }
    });
}

/**
 * Error code of a failed outcome, plus the store error behind it when
 * there is one.
 */
export function describeFailure(name: string, error: RegistrarError): string {
  const cause = error.cause;
  if (cause === undefined) return `${name} ${error.code}`;
  const detail = cause instanceof Error ? cause.message : String(cause);
  return `${name} ${error.code} caused by: ${detail}`;
}
