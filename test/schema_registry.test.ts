import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { SchemaRegistry } from "../src/schema/registry.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

const RECORD = {
  sample_id: "a.rts",
  syntactic_status: "fail",
  structural_status: "not_run",
  last_error: {
    sample_id: "a.rts",
    kind: "syntax",
    line: 2,
    column: 5,
    unexpected: ";",
    expected: ["digit"],
    message: "Line 2, col 5: expected digit",
  },
  grammar_fingerprint: "sha256:abc",
  updated_at: "2026-02-09T10:00:00.000Z",
};

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(() => {
    registry = new SchemaRegistry(SCHEMA_DIR).load();
  });

  it("discovers all schema files with their versions", () => {
    expect(registry.names()).toEqual(["config", "registry"]);
    expect(registry.get("registry")?.version).toBe("1.0.0");
    expect(registry.get("config")?.filePath).toBe(path.join(SCHEMA_DIR, "config.schema.json"));
  });

  it("throws for a missing schema directory", () => {
    expect(() => new SchemaRegistry(path.join(SCHEMA_DIR, "missing")).load()).toThrow("Schema directory not found");
  });

  describe("registry schema", () => {
    it("accepts a valid document", () => {
      const res = registry.validate("registry", {
        schema_version: "1.0.0",
        updated_at: "2026-02-09T10:00:00.000Z",
        records: { "a.rts": RECORD },
      });
      expect(res).toEqual({ valid: true, errors: null });
    });

    it("accepts a fresh record with null fields", () => {
      const res = registry.validate("registry", {
        schema_version: "1.0.0",
        updated_at: "2026-02-09T10:00:00.000Z",
        records: {
          "b.rts": { sample_id: "b.rts", syntactic_status: "fail", structural_status: "not_run", last_error: null, grammar_fingerprint: null, updated_at: null },
        },
      });
      expect(res.valid).toBe(true);
    });

    it("rejects an unknown status", () => {
      const res = registry.validate("registry", {
        schema_version: "1.0.0",
        updated_at: "2026-02-09T10:00:00.000Z",
        records: { "a.rts": { ...RECORD, syntactic_status: "maybe" } },
      });
      expect(res.valid).toBe(false);
    });

    it("rejects a diagnostic with an unknown kind", () => {
      const res = registry.validate("registry", {
        schema_version: "1.0.0",
        updated_at: "2026-02-09T10:00:00.000Z",
        records: { "a.rts": { ...RECORD, last_error: { ...RECORD.last_error, kind: "lexical" } } },
      });
      expect(res.valid).toBe(false);
    });

    it("rejects another schema version", () => {
      const res = registry.validate("registry", { schema_version: "2.0.0", updated_at: "2026-02-09T10:00:00.000Z", records: {} });
      expect(res.valid).toBe(false);
      expect(res.errors).toContain("schema_version");
    });

    it("rejects a malformed timestamp", () => {
      const res = registry.validate("registry", { schema_version: "1.0.0", updated_at: "yesterday", records: {} });
      expect(res.valid).toBe(false);
    });
  });
});
