import fs from "node:fs";
import path from "node:path";
import { CorpusRegistry } from "../corpus/registry.js";
import { listSampleIds, readSample, readSamples, sampleIdFor } from "../corpus/samples.js";
import { atomicWriteJson } from "../corpus/atomic.js";
import { GramctlError, RegressionError } from "../errors.js";
import { loadGrammar } from "../grammar/artifact.js";
import { evaluate, type GuardVerdict } from "../guard/regression-guard.js";
import { renderErrorContext } from "../guard/context.js";
import { locateParsablePrefix, type ParsablePrefix } from "../guard/prefix.js";
import { failureOf, firstFailure, nextTarget, type Target } from "../guard/selector.js";
import { parseText, runValidation } from "../harness/harness.js";
import { combinedStatus } from "../harness/status.js";
import { silentLogger, type Logger } from "../output/logger.js";
import { createParsingCapability, type LoadedParser, type ParsingCapability } from "../parser/index.js";
import type { GramctlConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { RegistrySnapshot, SyncReport } from "../types/registry.js";
import type { ValidationRun } from "../types/run.js";
import type { Sample } from "../types/sample.js";

export type CommandError = { code: string; message: string };

/** The diagnostic to act on next, with source context. */
export type Focus = {
  sample_id: string;
  diagnostic: Diagnostic | null;
  context: string[];
  prefix: ParsablePrefix | null;
};

export type ValidateOutcome = {
  fingerprint: string;
  sync: SyncReport;
  run: ValidationRun;
  verdict: GuardVerdict;
  committed: boolean;
  registry: RegistrySnapshot;
  next: Target | null;
  focus: Focus | null;
  /** Every synced sample passes under the current grammar after this run. */
  allPass: boolean;
};

export type ValidateResult = { ok: true; outcome: ValidateOutcome } | { ok: false; error: CommandError };

export type ValidateOptions = {
  config: GramctlConfig;
  /** Sample id, or a path to a file inside the corpus directory. */
  file?: string;
  early?: boolean;
  /** Also write the run, verdict and next target to this JSON file. */
  reportPath?: string;
  signal?: AbortSignal;
  logger?: Logger;
  /** Defaults to the back end named by harness.isolation. */
  parsing?: ParsingCapability;
};

function fail(code: string, message: string): { ok: false; error: CommandError } {
  return { ok: false, error: { code, message } };
}

/** Resolve a --file argument to a sample id. */
export function resolveSampleId(corpusDir: string, ids: readonly string[], file: string): string | null {
  if (ids.includes(file)) return file;
  const id = sampleIdFor(corpusDir, path.resolve(file));
  return ids.includes(id) ? id : null;
}

/**
 * Open the registry fresh, enumerate the corpus and sync the two, writing the
 * registry back when the key set changed.
 */
export async function openSynced(config: GramctlConfig, logger: Logger): Promise<{ registry: CorpusRegistry; ids: string[]; sync: SyncReport }> {
  if (!fs.existsSync(config.corpus.dir) || !fs.statSync(config.corpus.dir).isDirectory()) {
    throw new GramctlError("CORPUS_DIR_MISSING", `Corpus directory not found: ${config.corpus.dir}`);
  }
  const registry = await CorpusRegistry.open(config.registry.path);
  const ids = await listSampleIds(config.corpus.dir, config.corpus.extension, config.corpus.exclude);
  const sync = registry.sync(ids);
  if (sync.inserted > 0 || sync.removed > 0 || !registry.exists) {
    await registry.persist();
  }
  logger.debug("registry synced", { ...sync, path: config.registry.path });
  return { registry, ids, sync };
}

async function buildFocus(
  outcome: Pick<ValidateOutcome, "verdict" | "run" | "next">,
  early: boolean,
  samples: Map<string, Sample>,
  corpusDir: string,
  parser: LoadedParser,
  harness: GramctlConfig["harness"],
): Promise<Focus | null> {
  let sampleId: string;
  let diagnostic: Diagnostic | null;

  if (outcome.verdict.decision === "reject") {
    sampleId = outcome.verdict.regressed_ids[0];
    const result = outcome.run.results.find((r) => r.sample_id === sampleId);
    diagnostic = result ? failureOf(result) : null;
  } else if (early) {
    const first = firstFailure(outcome.run);
    if (!first) return null;
    sampleId = first.result.sample_id;
    diagnostic = first.diagnostic;
  } else {
    if (!outcome.next) return null;
    sampleId = outcome.next.sample_id;
    diagnostic = outcome.next.diagnostic;
  }

  const sample = samples.get(sampleId) ?? (await readSample(corpusDir, sampleId));
  const context = diagnostic && diagnostic.line > 0 ? renderErrorContext(sample.content, diagnostic.line, diagnostic.column) : [];
  const prefix =
    early && diagnostic?.kind === "syntax"
      ? await locateParsablePrefix(parser, parseText(sample.content, harness.append_trailing_newline), harness.timeout_ms)
      : null;
  return { sample_id: sampleId, diagnostic, context, prefix };
}

/**
 * One harness invocation: sync → run → guard → commit (on accept) → select.
 * A rejected run leaves the registry as it was after sync.
 */
export async function validateCorpus(opts: ValidateOptions): Promise<ValidateResult> {
  const { config } = opts;
  const logger = opts.logger ?? silentLogger;

  try {
    const { registry, ids, sync } = await openSynced(config, logger);
    const prior = registry.snapshot();

    let selected = ids;
    if (opts.file !== undefined) {
      const id = resolveSampleId(config.corpus.dir, ids, opts.file);
      if (id === null) return fail("SAMPLE_NOT_FOUND", `No sample "${opts.file}" in ${config.corpus.dir}`);
      selected = [id];
    }

    const grammar = await loadGrammar(config.grammar.path, config.grammar.start_rule);
    const samples = await readSamples(config.corpus.dir, selected);
    const parsing = opts.parsing ?? createParsingCapability(config.harness.isolation);
    logger.info(`validating ${samples.length} sample(s)`, { grammar: grammar.path, parser: parsing.name, early: Boolean(opts.early) });

    const parser = await parsing.load(grammar, { concurrency: config.harness.concurrency });
    try {
      const run = await runValidation(samples, parser, {
        structure: config.structure,
        concurrency: config.harness.concurrency,
        timeoutMs: config.harness.timeout_ms,
        appendTrailingNewline: config.harness.append_trailing_newline,
        early: opts.early,
        signal: opts.signal,
        onResult: (result) =>
          logger.debug(`${result.sample_id}: ${result.syntactic.status}/${result.structural.status}`, { ms: result.duration_ms }),
      });

      const verdict = evaluate(prior, run);
      let committed = false;
      if (verdict.decision === "accept") {
        await registry.commit(run);
        committed = true;
      } else {
        logger.warn(new RegressionError(verdict.regressed_ids).message);
      }

      const after = registry.snapshot();
      const next = nextTarget(after, grammar.fingerprint);
      const allPass = verdict.decision === "accept" && Object.values(after).every((r) => combinedStatus(r, grammar.fingerprint) === "pass");
      const bySample = new Map(samples.map((s) => [s.id, s]));
      const focus = await buildFocus({ verdict, run, next }, Boolean(opts.early), bySample, config.corpus.dir, parser, config.harness);

      const outcome: ValidateOutcome = { fingerprint: grammar.fingerprint, sync, run, verdict, committed, registry: after, next, focus, allPass };
      if (opts.reportPath) {
        await atomicWriteJson(opts.reportPath, { fingerprint: grammar.fingerprint, verdict, committed, next, run });
      }
      return { ok: true, outcome };
    } finally {
      await parser.dispose();
    }
  } catch (e) {
    if (e instanceof GramctlError) return fail(e.code, e.message);
    throw e;
  }
}
