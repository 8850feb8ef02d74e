import { compareIds } from "../corpus/samples.js";
import { acceptedPass, resultPasses } from "../harness/status.js";
import type { RegistrySnapshot } from "../types/registry.js";
import type { ValidationRun } from "../types/run.js";

export type GuardVerdict =
  | { decision: "accept"; newly_passing: string[] }
  | { decision: "reject"; regressed_ids: string[]; newly_passing: string[] };

/**
 * Regression guard — a run is accepted only if every sample that was an
 * accepted pass before the run still passes in it. One regression rejects the
 * whole run. Samples the run did not cover are not judged.
 */
export function evaluate(prior: RegistrySnapshot, run: ValidationRun): GuardVerdict {
  const regressed: string[] = [];
  const newlyPassing: string[] = [];

  for (const result of run.results) {
    const before = prior[result.sample_id];
    const wasPass = before !== undefined && acceptedPass(before);
    const isPass = resultPasses(result);
    if (wasPass && !isPass) regressed.push(result.sample_id);
    if (!wasPass && isPass) newlyPassing.push(result.sample_id);
  }

  regressed.sort(compareIds);
  newlyPassing.sort(compareIds);
  if (regressed.length > 0) return { decision: "reject", regressed_ids: regressed, newly_passing: newlyPassing };
  return { decision: "accept", newly_passing: newlyPassing };
}

