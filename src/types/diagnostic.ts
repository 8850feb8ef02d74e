/** Per-sample diagnostics. Positions are 1-based. */
export type DiagnosticKind = "syntax" | "structural" | "internal";

export type Diagnostic = {
  sample_id: string;
  kind: DiagnosticKind;
  line: number;
  column: number;
  unexpected: string | null;
  expected: string[] | null;
  message: string;
};
