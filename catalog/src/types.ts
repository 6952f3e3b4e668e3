/**
 * runnerkit Catalog — Definition Types
 *
 * Shapes of the runner type definitions that make up the catalog.
 * A definition is what catalog authors write; the registrar turns it
 * into a persisted record (see @runnerkit/registrar).
 */

// ─── Parameters ──────────────────────────────────────────────────

export type ParameterType = "string" | "integer" | "boolean" | "object";

export const PARAMETER_TYPES: readonly ParameterType[] = [
  "string",
  "integer",
  "boolean",
  "object",
];

/** JSON-compatible value a parameter default can hold */
export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export interface ParameterSpec {
  description: string;
  type: ParameterType;
  /** Defaults to false. A required parameter must not carry a default. */
  required?: boolean;
  default?: ParameterValue;
  /** Once set, callers further downstream cannot override the value */
  immutable?: boolean;
}

/** Parameter specs keyed by parameter name */
export type ParameterMap = Record<string, ParameterSpec>;

// ─── Runner Types ────────────────────────────────────────────────

export interface RunnerTypeDefinition {
  /** Natural key, unique across the catalog */
  name: string;
  description: string;
  enabled: boolean;
  /** Selection flag only: never persisted */
  experimental?: boolean;
  /** Reference to the module implementing the backend */
  runner_module: string;
  /** Module that polls asynchronous backends for status */
  query_module?: string;
  parameters: ParameterMap;
}
