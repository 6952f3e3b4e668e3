/**
 * runnerkit Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the Catalog class, the definition validator, and types.
 */

export { Catalog, CatalogLoadError, BUILTIN_CATALOG_PATH } from "./loader";
export { validateDefinition, isRequired } from "./validator";
export type { ValidationResult, ValidationIssue } from "./validator";
export { PARAMETER_TYPES } from "./types";
export type {
  ParameterType,
  ParameterValue,
  ParameterSpec,
  ParameterMap,
  RunnerTypeDefinition,
} from "./types";
