#!/usr/bin/env node

/**
 * runnerkit Catalog — CLI Validation Tool
 *
 * Validates every runner type in a catalog file (the built-in catalog
 * when no path is given).
 * Run via: npm run validate [-- <catalog.yaml>]
 *
 * Exit codes:
 *   0 - All runner types valid
 *   1 - One or more runner types invalid, or the catalog failed to load
 */

import { Catalog } from "./loader";
import { validateDefinition } from "./validator";

const catalogPath = process.argv[2];

console.log("runnerkit Catalog Validator");
console.log("===========================\n");

let catalog: Catalog;
try {
  catalog = catalogPath ? Catalog.fromFile(catalogPath) : Catalog.builtin();
} catch (err) {
  console.log(`  ✖ ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
}

let hasErrors = false;

for (const definition of catalog.definitions()) {
  const result = validateDefinition(definition);
  if (result.valid) {
    console.log(`  ✔ ${definition.name}`);
  } else {
    hasErrors = true;
    console.log(`  ✖ ${definition.name}`);
    for (const error of result.errors) {
      console.log(`    - [${error.rule}] ${error.path}: ${error.message}`);
    }
  }
}

console.log(`\n${catalog.size} runner type(s) checked.`);

if (hasErrors) {
  console.log("Some runner types have validation errors.\n");
  process.exit(1);
} else {
  console.log("All runner types are valid.\n");
  process.exit(0);
}
