import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaName = "config" | "registry";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: true; errors: null } | { valid: false; errors: string };

/** Repository-level schemas directory, the same from src/ and dist/. */
export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry — loads every *.schema.json in a directory and compiles
 * validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort()) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "registry.schema.json" → "registry"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
    return this;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: SchemaName, data: unknown): SchemaCheck {
    if (this.conforms(name, data)) return { valid: true, errors: null };
    return { valid: false, errors: this.lastErrors(name) };
  }

  /** Narrowing form of validate; follow a false result with lastErrors(name). */
  conforms<T>(name: SchemaName, data: unknown): data is T {
    return this.validator(name)(data);
  }

  lastErrors(name: SchemaName): string {
    return this.ajv.errorsText(this.validator(name).errors);
  }
}

/** "...schemas/config@1.0.0" → "1.0.0" */
function extractVersion(schema: unknown): string | null {
  if (schema === null || typeof schema !== "object" || !("$id" in schema) || typeof schema.$id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)$/.exec(schema.$id);
  return m ? m[1] : null;
}

let defaultRegistry: SchemaRegistry | null = null;

export function schemaRegistry(): SchemaRegistry {
  defaultRegistry ??= new SchemaRegistry().load();
  return defaultRegistry;
}
