import type { GrammarArtifact } from "../grammar/artifact.js";
import type { ParseOutcome } from "../types/parse.js";

export type ParseOptions = {
  /**
   * Wall-clock bound for one parse, counted from when the parse itself
   * starts. Past it the back end rejects with ParseTimeoutError.
   */
  timeoutMs: number;
  signal?: AbortSignal;
};

export type LoadOptions = {
  /** Upper bound on parses the caller will have in flight at once. */
  concurrency?: number;
};

/** A parser built from one grammar artifact. Valid for a single run. */
export interface LoadedParser {
  readonly fingerprint: string;
  parse(source: string, opts: ParseOptions): Promise<ParseOutcome>;
  dispose(): Promise<void>;
}

/**
 * Parsing capability — the only seam between the harness and a parser
 * generator. Back ends reject with GrammarLoadError when the grammar does
 * not compile; syntax errors in samples resolve as `{ ok: false }`.
 */
export interface ParsingCapability {
  readonly name: string;
  load(grammar: GrammarArtifact, opts?: LoadOptions): Promise<LoadedParser>;
}
