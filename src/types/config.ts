/** Configuration types — layered config (base.yaml ← env.yaml ← GRAMCTL_* variables). */
export type Isolation = "process" | "inline";

export type StructuralCheckName = "section_inventory" | "section_span" | "balanced_delimiters";

export type GrammarConfig = {
  path: string;
  start_rule?: string | null;
};

export type CorpusConfig = {
  dir: string;
  extension: string;
  /** Glob patterns over sample ids; matching files are not samples. */
  exclude?: string[];
};

export type RegistryConfig = {
  path: string;
};

export type HarnessConfig = {
  concurrency: number;
  timeout_ms: number;
  isolation: Isolation;
  append_trailing_newline: boolean;
};

export type StructureConfig = {
  checks: StructuralCheckName[];
  section_names: string[];
  section_rule_suffix: string;
  section_name_rule: string;
  delimiters: string[];
  string_quotes: string[];
  comment_prefixes: string[];
};

export type GramctlConfig = {
  schema_version: string;
  grammar: GrammarConfig;
  corpus: CorpusConfig;
  registry: RegistryConfig;
  harness: HarnessConfig;
  structure: StructureConfig;
};
