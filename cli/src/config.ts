/**
 * runnerkit CLI — Configuration
 *
 * Central location for CLI paths and defaults, read from the environment.
 * All runnerkit data lives under ~/.runnerkit unless RUNNERKIT_HOME says
 * otherwise.
 *
 *   RUNNERKIT_HOME          data directory
 *   RUNNERKIT_DB_PATH       registry database (default <home>/registry.db)
 *   RUNNERKIT_CATALOG       catalog YAML to register instead of the built-in one
 *   RUNNERKIT_LOG_LEVEL     silent | debug | info | warn | error
 *   RUNNERKIT_EXPERIMENTAL  true | false | 1 | 0
 */

import * as path from "path";
import * as os from "os";
import { z } from "zod";
import type { LogLevel, RegistrarOptions } from "@runnerkit/registrar";

const envSchema = z.object({
  RUNNERKIT_HOME: z.string().min(1).optional(),
  RUNNERKIT_DB_PATH: z.string().min(1).optional(),
  RUNNERKIT_CATALOG: z.string().min(1).optional(),
  RUNNERKIT_LOG_LEVEL: z
    .enum(["silent", "debug", "info", "warn", "error"])
    .default("silent"),
  RUNNERKIT_EXPERIMENTAL: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
});

export interface CliConfig {
  home: string;
  dbPath: string;
  catalogPath?: string;
  logLevel: LogLevel;
  includeExperimental: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const home = vars.RUNNERKIT_HOME ?? path.join(os.homedir(), ".runnerkit");
  return {
    home,
    dbPath: vars.RUNNERKIT_DB_PATH ?? path.join(home, "registry.db"),
    ...(vars.RUNNERKIT_CATALOG ? { catalogPath: vars.RUNNERKIT_CATALOG } : {}),
    logLevel: vars.RUNNERKIT_LOG_LEVEL,
    includeExperimental: vars.RUNNERKIT_EXPERIMENTAL,
  };
}

export interface CommandFlags {
  debug?: boolean;
  catalog?: string;
}

/**
 * Build RegistrarOptions from CLI configuration and per-command flags.
 */
export function getRegistrarOptions(
  config: CliConfig,
  flags: CommandFlags = {},
): RegistrarOptions {
  const catalogPath = flags.catalog ?? config.catalogPath;
  return {
    state_db_path: config.dbPath,
    ...(catalogPath ? { catalog_path: catalogPath } : {}),
    log_level: flags.debug ? "debug" : config.logLevel,
  };
}
