import type { Diagnostic } from "./diagnostic.js";
import type { StageStatus, StructuralStatus } from "./registry.js";

/** Validation run — ephemeral result of one harness execution. */
export type SyntacticResult = {
  status: StageStatus;
  diagnostic: Diagnostic | null;
};

export type StructuralResult = {
  status: StructuralStatus;
  diagnostic: Diagnostic | null;
};

export type SampleResult = {
  sample_id: string;
  syntactic: SyntacticResult;
  structural: StructuralResult;
  duration_ms: number;
};

export type ValidationRun = {
  grammar_fingerprint: string;
  started_at: string;
  finished_at: string;
  halted_early: boolean;
  results: SampleResult[];
};
