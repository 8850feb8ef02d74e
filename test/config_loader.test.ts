import { describe, expect, it, afterEach } from "vitest";
import path from "node:path";
import { applyEnvOverrides, deepMerge, loadConfig } from "../src/config/loader.js";
import { readConfig, validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/errors.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("GRAMCTL_")) delete process.env[key];
    }
  });

  it("loads base config with all sections", () => {
    const config = loadConfig(CONFIG_DIR, undefined, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config).toMatchObject({
      grammar: { path: "grammar/script.ohm", start_rule: null },
      corpus: { dir: "samples", extension: ".rts" },
      harness: { concurrency: 4, timeout_ms: 5000, isolation: "process", append_trailing_newline: true },
    });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig(CONFIG_DIR, "ci", {});
    expect(config).toMatchObject({
      grammar: { path: "grammar/script.ohm" },
      harness: { concurrency: 2, timeout_ms: 2000, isolation: "process" },
    });
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig(CONFIG_DIR, "nonexistent-env", {});
    expect(config).toMatchObject({ harness: { concurrency: 4 } });
  });

  it("applies nested environment variable overrides as YAML scalars", () => {
    const config = loadConfig(CONFIG_DIR, "ci", {
      GRAMCTL_HARNESS__TIMEOUT_MS: "100",
      GRAMCTL_HARNESS__ISOLATION: "inline",
      GRAMCTL_CORPUS__DIR: "fixtures/corpus",
      OTHER_HARNESS__TIMEOUT_MS: "7",
    });
    expect(config).toMatchObject({
      corpus: { dir: "fixtures/corpus", extension: ".rts" },
      harness: { concurrency: 2, timeout_ms: 100, isolation: "inline" },
    });
  });

  it("reads process.env by default", () => {
    process.env.GRAMCTL_HARNESS__CONCURRENCY = "8";
    const config = loadConfig(CONFIG_DIR);
    expect(config).toMatchObject({ harness: { concurrency: 8 } });
  });

  it("deepMerge replaces arrays instead of concatenating", () => {
    const merged = deepMerge({ a: { list: [1, 2], keep: true } }, { a: { list: [3] } });
    expect(merged).toEqual({ a: { list: [3], keep: true } });
  });

  it("ignores a bare prefix", () => {
    expect(applyEnvOverrides({ x: 1 }, { GRAMCTL_: "2" })).toEqual({ x: 1 });
  });
});

describe("config validator", () => {
  afterEach(() => {
    delete process.env.GRAMCTL_HARNESS__ISOLATION;
  });

  it("validates the base config", () => {
    const res = validateConfig(loadConfig(CONFIG_DIR, undefined, {}));
    expect(res.valid).toBe(true);
    expect(res.errors).toBeNull();
  });

  it("rejects a config missing required sections", () => {
    const res = validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property 'grammar'");
  });

  it("rejects out-of-range and unknown settings", () => {
    const config = loadConfig(CONFIG_DIR, undefined, { GRAMCTL_HARNESS__CONCURRENCY: "0", GRAMCTL_HARNESS__THREADS: "2" });
    const res = validateConfig(config);
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("data/harness/concurrency must be >= 1");
    expect(res.errors).toContain("must NOT have additional properties");
  });

  it("readConfig resolves paths against cwd", () => {
    const cwd = path.resolve("/work/project");
    const config = readConfig({ configDir: CONFIG_DIR, cwd });
    expect(config.grammar.path).toBe(path.join(cwd, "grammar", "script.ohm"));
    expect(config.corpus.dir).toBe(path.join(cwd, "samples"));
    expect(config.registry.path).toBe(path.join(cwd, ".gramctl", "registry.json"));
  });

  it("readConfig throws ConfigError for an invalid merged config", () => {
    process.env.GRAMCTL_HARNESS__ISOLATION = "thread";
    expect(() => readConfig({ configDir: CONFIG_DIR })).toThrow(ConfigError);
  });
});
