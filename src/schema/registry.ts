import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";
import { RegistryError } from "../errors.js";
import { SCHEMA_DIR } from "../paths.js";

export type SchemaName = "registry" | "proposal" | "audit" | "discovery";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaValidation = { valid: boolean; errors: string | null };

/**
 * Schema registry. Discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new RegistryError("SCHEMA", `Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "proposal.schema.json" → "proposal"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }
    return this;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Compile and cache a validator for the given schema name. */
  getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new RegistryError("SCHEMA", `Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: string, data: unknown): SchemaValidation {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.ajv.errorsText(validate.errors),
    };
  }

  /** Throw a SCHEMA error naming `label` when `data` does not conform. */
  assertValid(name: SchemaName, data: unknown, label: string): void {
    const { valid, errors } = this.validate(name, data);
    if (!valid) {
      throw new RegistryError("SCHEMA", `${label} does not match ${name} schema: ${errors}`);
    }
  }
}

/** Extract a semver-like version from the schema $id (e.g., "...@1.0.0"). */
function extractVersion(schema: unknown): string | null {
  if (typeof schema === "object" && schema !== null && "$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

let defaultRegistry: SchemaRegistry | null = null;

/** Create and load a registry; without a directory the bundled schemas are shared. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  if (schemaDir) return new SchemaRegistry(schemaDir).load();
  defaultRegistry ??= new SchemaRegistry(SCHEMA_DIR).load();
  return defaultRegistry;
}
