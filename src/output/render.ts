import { shortFingerprint } from "../grammar/fingerprint.js";
import { combinedStatus, resultPasses } from "../harness/status.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { CombinedStatus, StageStatus, StructuralStatus, ValidationRecord } from "../types/registry.js";
import type { SampleResult } from "../types/run.js";

export type TableRow = {
  sample_id: string;
  syntactic: StageStatus;
  structural: StructuralStatus;
  combined: CombinedStatus;
  message: string | null;
};

export function rowFromResult(result: SampleResult): TableRow {
  const diagnostic = result.syntactic.diagnostic ?? result.structural.diagnostic;
  return {
    sample_id: result.sample_id,
    syntactic: result.syntactic.status,
    structural: result.structural.status,
    combined: resultPasses(result) ? "pass" : "fail",
    message: diagnostic ? describeDiagnostic(diagnostic) : null,
  };
}

/** A stored record, judged against the current grammar. */
export function rowFromRecord(record: ValidationRecord, fingerprint: string): TableRow {
  return {
    sample_id: record.sample_id,
    syntactic: record.syntactic_status,
    structural: record.structural_status,
    combined: combinedStatus(record, fingerprint),
    message: record.last_error ? describeDiagnostic(record.last_error) : null,
  };
}

/** One line: `line 3, col 7: syntax error: ... (unexpected ";")`. */
export function describeDiagnostic(d: Diagnostic): string {
  const where = d.line > 0 ? `line ${d.line}, col ${d.column}: ` : "";
  // ohm prefixes its own position; ours is already in front.
  const firstLine = d.message.split("\n")[0].replace(/^Line \d+, col \d+: /, "");
  const unexpected = d.unexpected !== null && !firstLine.includes(d.unexpected) ? ` (unexpected ${JSON.stringify(d.unexpected)})` : "";
  return `${where}${d.kind} error: ${firstLine}${unexpected}`;
}

const STATUS_MARK: Record<CombinedStatus, string> = { pass: "PASS", fail: "FAIL", unknown: "STALE" };

export function renderTable(rows: readonly TableRow[]): string[] {
  if (rows.length === 0) return ["(no samples)"];
  const idWidth = Math.max(6, ...rows.map((r) => r.sample_id.length));
  const out = [`${"sample".padEnd(idWidth)}  ${"syntax".padEnd(6)}  ${"struct".padEnd(7)}  result`];
  for (const r of rows) {
    const line = `${r.sample_id.padEnd(idWidth)}  ${r.syntactic.padEnd(6)}  ${r.structural.padEnd(7)}  ${STATUS_MARK[r.combined]}`;
    out.push(r.message && r.combined !== "pass" ? `${line}  ${r.message}` : line);
  }
  return out;
}

export function renderSummary(rows: readonly TableRow[], fingerprint: string): string {
  const total = rows.length;
  const passed = rows.filter((r) => r.combined === "pass").length;
  const pct = total === 0 ? "100.0" : ((passed / total) * 100).toFixed(1);
  return `${passed}/${total} samples pass (${pct}%) under grammar ${shortFingerprint(fingerprint)}`;
}
