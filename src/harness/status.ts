import type { CombinedStatus, StageStatus, ValidationRecord } from "../types/registry.js";
import type { SampleResult } from "../types/run.js";

function bothStagesPass(syntactic: StageStatus, structural: string): boolean {
  return syntactic === "pass" && structural === "pass";
}

/**
 * Status under the grammar `fingerprint`: a record computed under any other
 * grammar is "unknown", never a pass.
 */
export function combinedStatus(record: ValidationRecord, fingerprint: string): CombinedStatus {
  if (record.grammar_fingerprint === null) return "fail";
  if (record.grammar_fingerprint !== fingerprint) return "unknown";
  return bothStagesPass(record.syntactic_status, record.structural_status) ? "pass" : "fail";
}

/** Pass as accepted under the grammar the record was computed with: the guarded frontier. */
export function acceptedPass(record: ValidationRecord): boolean {
  return record.grammar_fingerprint !== null && bothStagesPass(record.syntactic_status, record.structural_status);
}

export function resultPasses(result: SampleResult): boolean {
  return bothStagesPass(result.syntactic.status, result.structural.status);
}
