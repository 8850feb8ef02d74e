import { ConfigError } from "../errors.js";
import { schemaRegistry } from "../schema/registry.js";
import type { GramctlConfig } from "../types/config.js";
import { loadConfig, resolveConfigPaths } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: GramctlConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against schemas/config.schema.json. */
export function validateConfig(data: unknown): ConfigValidationResult {
  const schemas = schemaRegistry();
  if (schemas.conforms<GramctlConfig>("config", data)) return { valid: true, config: data, errors: null };
  return { valid: false, errors: schemas.lastErrors("config") };
}

/** Load, validate and resolve the config; throws ConfigError when invalid. */
export function readConfig(opts: { configDir: string; env?: string; cwd?: string }): GramctlConfig {
  const raw = loadConfig(opts.configDir, opts.env);
  const res = validateConfig(raw);
  if (!res.valid) throw new ConfigError(`Config invalid (${opts.configDir}): ${res.errors}`);
  return resolveConfigPaths(res.config, opts.cwd ?? process.cwd());
}
