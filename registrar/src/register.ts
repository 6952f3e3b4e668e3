/**
 * runnerkit Registrar — Startup Registration
 *
 * registerRunnerTypes() is the single entry point called once during
 * system startup. It reconciles a catalog (the built-in one by default)
 * against the given store and reports what happened.
 */

import { Catalog } from "@runnerkit/catalog";
import {
  AuditSink,
  DefinitionSource,
  RegistrationReport,
  RunnerTypeStore,
} from "./types";
import { reconcile, summarizeOutcomes } from "./reconciler";
import { createLogger, Logger } from "./utils/logger";

export interface RegisterOptions {
  store: RunnerTypeStore;
  /** Also register runner types marked experimental */
  includeExperimental?: boolean;
  catalog?: DefinitionSource;
  audit?: AuditSink;
  logger?: Logger;
}

export async function registerRunnerTypes(
  options: RegisterOptions,
): Promise<RegistrationReport> {
  const logger = options.logger ?? createLogger();
  const catalog = options.catalog ?? Catalog.builtin();

  logger.debug("Start : register default RunnerTypes.");

  const outcomes = await reconcile(catalog, options.store, {
    includeExperimental: options.includeExperimental ?? false,
    audit: options.audit,
    logger,
  });
  const summary = summarizeOutcomes(outcomes);

  logger.info(
    {
      created: summary.created,
      updated: summary.updated,
      skipped: summary.skipped,
      failed: summary.failed,
    },
    "Runner types registered",
  );
  logger.debug("End : register default RunnerTypes.");

  return { outcomes, summary };
}
