import { compareIds } from "../corpus/samples.js";
import { combinedStatus } from "../harness/status.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { CombinedStatus, RegistrySnapshot } from "../types/registry.js";
import type { SampleResult, ValidationRun } from "../types/run.js";

export type Target = {
  sample_id: string;
  status: Exclude<CombinedStatus, "pass">;
  diagnostic: Diagnostic | null;
};

/**
 * The lexically first sample that is not a pass under `fingerprint`, with
 * its stored diagnostic; null when everything passes. Independent of the
 * order samples were run in.
 */
export function nextTarget(snapshot: RegistrySnapshot, fingerprint: string): Target | null {
  const ids = Object.keys(snapshot).sort(compareIds);
  for (const id of ids) {
    const record = snapshot[id];
    const status = combinedStatus(record, fingerprint);
    if (status !== "pass") return { sample_id: id, status, diagnostic: record.last_error };
  }
  return null;
}

export function failureOf(result: SampleResult): Diagnostic | null {
  return result.syntactic.diagnostic ?? result.structural.diagnostic;
}

/** First failing sample in run order. */
export function firstFailure(run: ValidationRun): { result: SampleResult; diagnostic: Diagnostic | null } | null {
  for (const result of run.results) {
    if (result.syntactic.status === "fail" || result.structural.status === "fail") {
      return { result, diagnostic: failureOf(result) };
    }
  }
  return null;
}
