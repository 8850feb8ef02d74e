import type { LoadedParser } from "../parser/capability.js";
import type { ParseNode } from "../types/parse.js";

export type ParsablePrefix = {
  /** Number of leading lines that parse on their own. */
  lines: number;
  totalLines: number;
  tree: ParseNode | null;
};

/**
 * Binary search for the longest run of leading lines that still parses.
 * Assumes prefixes parse monotonically, which holds for most line-oriented
 * grammars; the answer is a hint for the next grammar edit, not a proof.
 */
export async function locateParsablePrefix(parser: LoadedParser, source: string, timeoutMs: number): Promise<ParsablePrefix> {
  const lines = source.split(/(?<=\n)/);
  let lo = 0;
  let hi = lines.length;
  let best = 0;
  let tree: ParseNode | null = null;

  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    let parsed: ParseNode | null = null;
    try {
      const outcome = await parser.parse(lines.slice(0, mid).join(""), { timeoutMs });
      parsed = outcome.ok ? outcome.tree : null;
    } catch {
      // A crash or timeout on this prefix counts as a failed parse.
      parsed = null;
    }
    if (parsed) {
      best = mid;
      tree = parsed;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return { lines: best, totalLines: lines.length, tree };
}
