/**
 * runnerkit Catalog — Definition Validator
 *
 * Validates runner type definitions against the JSON Schema in schema.json.
 *
 * Two levels of validation:
 * 1. Schema validation (structure, types, patterns) via AJV
 * 2. Semantic validation (rules between fields) via custom checks
 *
 * The catalog never calls this itself. The registrar runs it once per
 * definition so every failure is attributed to the definition that caused it.
 */

import Ajv, { ValidateFunction } from "ajv";
import * as fs from "fs";
import * as path from "path";
import {
  PARAMETER_TYPES,
  ParameterSpec,
  ParameterType,
  ParameterValue,
  RunnerTypeDefinition,
} from "./types";

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

export interface ValidationIssue {
  path: string;
  message: string;
  rule: string;
}

const SCHEMA_PATH = path.join(__dirname, "..", "schema.json");

let _validate: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (_validate) return _validate;

  const schemaContent = fs.readFileSync(SCHEMA_PATH, "utf-8");
  const schema = JSON.parse(schemaContent);

  const ajv = new Ajv({ allErrors: true, strict: false });

  _validate = ajv.compile(schema);
  return _validate;
}

/**
 * Validate a runner type definition against the JSON Schema + semantic rules.
 */
export function validateDefinition(
  definition: RunnerTypeDefinition,
): ValidationResult {
  const errors: ValidationIssue[] = [];

  // 1. JSON Schema validation
  const validate = getValidator();
  const schemaValid = validate(definition);

  if (!schemaValid && validate.errors) {
    for (const err of validate.errors) {
      errors.push({
        path: err.instancePath || "/",
        message: err.message || "Unknown validation error",
        rule: `schema:${err.keyword}`,
      });
    }
  }

  // 2. Semantic validation
  errors.push(...validateParameterRules(definition));

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Rules between the fields of a parameter spec that JSON Schema
 * cannot express on its own.
 */
function validateParameterRules(
  definition: RunnerTypeDefinition,
): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  const parameters = definition.parameters ?? {};

  for (const [name, spec] of Object.entries(parameters)) {
    const specPath = `/parameters/${name}`;

    if (isRequired(spec) && spec.default !== undefined) {
      errors.push({
        path: specPath,
        message: `Parameter "${name}" is required and cannot declare a default`,
        rule: "semantic:required-with-default",
      });
    }

    if (
      spec.default !== undefined &&
      PARAMETER_TYPES.includes(spec.type) &&
      !matchesType(spec.default, spec.type)
    ) {
      errors.push({
        path: `${specPath}/default`,
        message: `Default for "${name}" must be of type ${spec.type}`,
        rule: "semantic:default-type-mismatch",
      });
    }
  }

  return errors;
}

function matchesType(value: ParameterValue, type: ParameterType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
  }
}

/** True when the spec must be supplied by the caller */
export function isRequired(spec: ParameterSpec): boolean {
  return spec.required === true;
}
