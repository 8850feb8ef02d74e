import fs from "node:fs/promises";
import { GrammarLoadError, errorMessage } from "../errors.js";
import { fingerprintOf } from "./fingerprint.js";

/**
 * Grammar artifact — the grammar text as an opaque, content-versioned blob.
 * Only a parser back end interprets `source`.
 */
export type GrammarArtifact = {
  path: string;
  source: string;
  fingerprint: string;
  startRule: string | null;
};

export function grammarFromSource(source: string, opts: { path?: string; startRule?: string | null } = {}): GrammarArtifact {
  return {
    path: opts.path ?? "<inline>",
    source,
    fingerprint: fingerprintOf(source),
    startRule: opts.startRule ?? null,
  };
}

/** Read the grammar fresh from disk. Nothing is cached between calls. */
export async function loadGrammar(grammarPath: string, startRule?: string | null): Promise<GrammarArtifact> {
  let source: string;
  try {
    source = await fs.readFile(grammarPath, "utf8");
  } catch (e) {
    throw new GrammarLoadError(grammarPath, `Cannot read grammar ${grammarPath}: ${errorMessage(e)}`, { cause: e });
  }
  return grammarFromSource(source, { path: grammarPath, startRule });
}
