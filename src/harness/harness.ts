import { GrammarLoadError, RunCancelledError, errorMessage } from "../errors.js";
import type { LoadedParser } from "../parser/capability.js";
import type { StructureConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { ParseOutcome } from "../types/parse.js";
import type { Sample } from "../types/sample.js";
import type { SampleResult, ValidationRun } from "../types/run.js";
import { compareIds } from "../corpus/samples.js";
import { runStructuralChecks } from "./structure.js";

export type HarnessOptions = {
  structure: StructureConfig;
  concurrency?: number;
  timeoutMs?: number;
  /** Stop scheduling after the first syntactic failure (in sample order). */
  early?: boolean;
  appendTrailingNewline?: boolean;
  signal?: AbortSignal;
  /** Keep the caller's order instead of sorting by id. */
  preserveOrder?: boolean;
  onResult?: (result: SampleResult, index: number) => void;
};

export const DEFAULT_TIMEOUT_MS = 5000;

export function internalDiagnostic(sampleId: string, message: string): Diagnostic {
  return { sample_id: sampleId, kind: "internal", line: 0, column: 0, unexpected: null, expected: null, message };
}

/** The text a sample is parsed as: its content, newline-terminated when configured. */
export function parseText(content: string, appendTrailingNewline = false): string {
  return appendTrailingNewline && !content.endsWith("\n") ? content + "\n" : content;
}

/**
 * Stage 1 then Stage 2 for one sample. Never throws for sample-level
 * problems: crashes and timeouts become an internal diagnostic.
 */
export async function validateSample(sample: Sample, parser: LoadedParser, opts: HarnessOptions): Promise<SampleResult> {
  const started = Date.now();
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const text = parseText(sample.content, opts.appendTrailingNewline);
  const done = (result: Omit<SampleResult, "sample_id" | "duration_ms">): SampleResult => ({
    sample_id: sample.id,
    ...result,
    duration_ms: Date.now() - started,
  });

  let outcome: ParseOutcome;
  try {
    // The back end bounds the parse from the moment it starts.
    outcome = await parser.parse(text, { timeoutMs, signal: opts.signal });
  } catch (e) {
    if (e instanceof RunCancelledError || opts.signal?.aborted) throw new RunCancelledError();
    if (e instanceof GrammarLoadError) throw e;
    return done({
      syntactic: { status: "fail", diagnostic: internalDiagnostic(sample.id, `internal_error: ${errorMessage(e)}`) },
      structural: { status: "not_run", diagnostic: null },
    });
  }

  if (!outcome.ok) {
    return done({
      syntactic: { status: "fail", diagnostic: { sample_id: sample.id, kind: "syntax", ...outcome.error } },
      structural: { status: "not_run", diagnostic: null },
    });
  }

  let problems: Diagnostic[];
  try {
    problems = runStructuralChecks({ sampleId: sample.id, source: text, tree: outcome.tree, config: opts.structure });
  } catch (e) {
    problems = [internalDiagnostic(sample.id, `internal_error: structural check crashed: ${errorMessage(e)}`)];
  }

  return done({
    syntactic: { status: "pass", diagnostic: null },
    structural: problems.length > 0 ? { status: "fail", diagnostic: problems[0] } : { status: "pass", diagnostic: null },
  });
}

/**
 * Validation harness — runs both stages over `samples` with up to
 * `concurrency` samples in flight. Results come back in sample order
 * regardless of completion order. Workers share nothing; the caller folds
 * the returned run into the registry in one step.
 */
export async function runValidation(samples: readonly Sample[], parser: LoadedParser, opts: HarnessOptions): Promise<ValidationRun> {
  const startedAt = new Date().toISOString();
  const ordered = opts.preserveOrder ? [...samples] : [...samples].sort((a, b) => compareIds(a.id, b.id));
  const slots: Array<SampleResult | undefined> = new Array(ordered.length);
  const concurrency = Math.max(1, opts.concurrency ?? 1);

  let next = 0;
  let firstSyntaxFailure = Number.POSITIVE_INFINITY;

  const worker = async (): Promise<void> => {
    while (next < ordered.length) {
      if (opts.signal?.aborted) throw new RunCancelledError();
      const index = next++;
      if (opts.early && index > firstSyntaxFailure) return;

      const result = await validateSample(ordered[index], parser, opts);
      slots[index] = result;
      if (result.syntactic.status === "fail") firstSyntaxFailure = Math.min(firstSyntaxFailure, index);
      opts.onResult?.(result, index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, ordered.length) }, worker));
  if (opts.signal?.aborted) throw new RunCancelledError();

  const haltedEarly = Boolean(opts.early) && firstSyntaxFailure < ordered.length - 1;
  const upTo = opts.early && Number.isFinite(firstSyntaxFailure) ? firstSyntaxFailure + 1 : ordered.length;
  const results: SampleResult[] = [];
  for (let i = 0; i < upTo; i++) {
    const result = slots[i];
    if (result) results.push(result);
  }

  return {
    grammar_fingerprint: parser.fingerprint,
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    halted_early: haltedEarly,
    results,
  };
}
