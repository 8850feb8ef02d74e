import type { Diagnostic } from "./diagnostic.js";

/** Registry records — last known validation state per sample. */
export type StageStatus = "pass" | "fail";

export type StructuralStatus = StageStatus | "not_run";

export type CombinedStatus = "pass" | "fail" | "unknown";

export type ValidationRecord = {
  sample_id: string;
  syntactic_status: StageStatus;
  structural_status: StructuralStatus;
  last_error: Diagnostic | null;
  /** Fingerprint of the grammar the record was computed under; null until first validated. */
  grammar_fingerprint: string | null;
  updated_at: string | null;
};

export type RegistrySnapshot = Record<string, ValidationRecord>;

export type RegistryDocument = {
  schema_version: string;
  updated_at: string;
  records: RegistrySnapshot;
};

export type SyncReport = {
  inserted: number;
  removed: number;
  total: number;
};
