import { GramctlError } from "../errors.js";
import { loadGrammar } from "../grammar/artifact.js";
import { nextTarget, type Target } from "../guard/selector.js";
import { silentLogger, type Logger } from "../output/logger.js";
import { rowFromRecord, type TableRow } from "../output/render.js";
import type { GramctlConfig } from "../types/config.js";
import type { SyncReport } from "../types/registry.js";
import { openSynced, type CommandError } from "./validate.js";

export type StatusOutcome = {
  fingerprint: string;
  sync: SyncReport;
  rows: TableRow[];
  next: Target | null;
};

export type StatusResult = { ok: true; outcome: StatusOutcome } | { ok: false; error: CommandError };

/**
 * Registry table under the current grammar, without running the harness.
 * Records computed under another grammar show as unknown.
 */
export async function corpusStatus(opts: { config: GramctlConfig; logger?: Logger }): Promise<StatusResult> {
  const logger = opts.logger ?? silentLogger;
  try {
    const { registry, sync } = await openSynced(opts.config, logger);
    const grammar = await loadGrammar(opts.config.grammar.path, opts.config.grammar.start_rule);
    const snapshot = registry.snapshot();

    const rows = Object.values(snapshot).map((record) => rowFromRecord(record, grammar.fingerprint));

    return { ok: true, outcome: { fingerprint: grammar.fingerprint, sync, rows, next: nextTarget(snapshot, grammar.fingerprint) } };
  } catch (e) {
    if (e instanceof GramctlError) return { ok: false, error: { code: e.code, message: e.message } };
    throw e;
  }
}
