/**
 * runnerkit Catalog — Catalog Loader
 *
 * Holds the canonical, ordered list of runner type definitions.
 *
 * Catalog file structure:
 *   runner_types:
 *     - name: run-local
 *       description: ...
 *       enabled: true
 *       runner_module: runners/local
 *       parameters:
 *         timeout: { type: integer, description: ..., default: 60 }
 *
 * Loading only checks that the document has the right structural types.
 * Business rules (empty module references, required parameters with
 * defaults, ...) belong to validateDefinition and are enforced per
 * definition by the registrar.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ParameterValue, RunnerTypeDefinition } from "./types";

/** Location of the catalog bundled with this package */
export const BUILTIN_CATALOG_PATH = path.join(
  __dirname,
  "..",
  "runner-types.yaml",
);

export class CatalogLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CatalogLoadError";
  }
}

// ─── Document Structure ──────────────────────────────────────

const parameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(parameterValueSchema),
    z.record(parameterValueSchema),
  ]),
);

const parameterSpecSchema = z
  .object({
    description: z.string(),
    type: z.enum(["string", "integer", "boolean", "object"]),
    required: z.boolean().optional(),
    default: parameterValueSchema.optional(),
    immutable: z.boolean().optional(),
  })
  .passthrough();

// Unknown keys pass through so the validator can report them
const definitionSchema = z
  .object({
    name: z.string(),
    description: z.string(),
    enabled: z.boolean(),
    experimental: z.boolean().optional(),
    runner_module: z.string(),
    query_module: z.string().optional(),
    parameters: z.record(parameterSpecSchema).default({}),
  })
  .passthrough();

const documentSchema = z.object({
  runner_types: z.array(z.unknown()),
});

// ─── Catalog ─────────────────────────────────────────────────

export class Catalog {
  private readonly entries: readonly RunnerTypeDefinition[];

  constructor(definitions: readonly RunnerTypeDefinition[]) {
    this.entries = Object.freeze(
      definitions.map((definition) => deepFreeze(structuredClone(definition))),
    );
  }

  /**
   * Load a catalog from a YAML file.
   */
  static fromFile(filePath: string): Catalog {
    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
      throw new CatalogLoadError(
        `Cannot read catalog file ${filePath}`,
        filePath,
        { cause: err },
      );
    }
    return Catalog.parse(content, filePath);
  }

  /**
   * Load the catalog that ships with runnerkit.
   */
  static builtin(): Catalog {
    return Catalog.fromFile(BUILTIN_CATALOG_PATH);
  }

  /**
   * Build a catalog from YAML text.
   */
  static parse(content: string, source: string = "<inline>"): Catalog {
    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (err) {
      throw new CatalogLoadError(`Invalid YAML in ${source}`, source, {
        cause: err,
      });
    }

    const parsedDocument = documentSchema.safeParse(document);
    if (!parsedDocument.success) {
      throw new CatalogLoadError(
        `${source} must contain a "runner_types" list`,
        source,
      );
    }

    const definitions: RunnerTypeDefinition[] = [];
    parsedDocument.data.runner_types.forEach((raw, index) => {
      const parsed = definitionSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join(".") : "entry";
        throw new CatalogLoadError(
          `Runner type #${index} in ${source} is malformed: ${where}: ${issue.message}`,
          source,
        );
      }
      definitions.push(parsed.data);
    });

    return new Catalog(definitions);
  }

  /**
   * The canonical definitions, in catalog order.
   */
  definitions(): readonly RunnerTypeDefinition[] {
    return this.entries;
  }

  get(name: string): RunnerTypeDefinition | undefined {
    return this.entries.find((d) => d.name === name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  names(): string[] {
    return this.entries.map((d) => d.name);
  }

  get size(): number {
    return this.entries.length;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
