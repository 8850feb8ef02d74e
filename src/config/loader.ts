import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import type { GramctlConfig } from "../types/config.js";

export const ENV_PREFIX = "GRAMCTL_";

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Tree, override: Tree): Tree {
  const result: Tree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const prev = result[key];
      result[key] = deepMerge(isTree(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if not found. */
function loadYaml(filePath: string): Tree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) throw new ConfigError(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

/**
 * Apply GRAMCTL_ prefixed environment overrides. A double underscore descends
 * one level: GRAMCTL_HARNESS__TIMEOUT_MS=100 → harness.timeout_ms = 100.
 * Values are read as YAML scalars so numbers and booleans keep their type.
 */
export function applyEnvOverrides(config: Tree, env: NodeJS.ProcessEnv = process.env): Tree {
  let result = config;
  for (const [key, raw] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || raw === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter(Boolean);
    if (segments.length === 0) continue;

    const value: unknown = YAML.parse(raw);
    let patch: Tree = { [segments[segments.length - 1]]: value };
    for (let i = segments.length - 2; i >= 0; i--) patch = { [segments[i]]: patch };
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; run it through validateConfig before use.
 */
export function loadConfig(configDir: string, envName?: string, env: NodeJS.ProcessEnv = process.env): Tree {
  let merged = loadYaml(path.join(configDir, "base.yaml"));
  if (envName) merged = deepMerge(merged, loadYaml(path.join(configDir, `${envName}.yaml`)));
  return applyEnvOverrides(merged, env);
}

/** Resolve every path-valued setting against `cwd`. */
export function resolveConfigPaths(config: GramctlConfig, cwd: string): GramctlConfig {
  return {
    ...config,
    grammar: { ...config.grammar, path: path.resolve(cwd, config.grammar.path) },
    corpus: { ...config.corpus, dir: path.resolve(cwd, config.corpus.dir) },
    registry: { ...config.registry, path: path.resolve(cwd, config.registry.path) },
  };
}
