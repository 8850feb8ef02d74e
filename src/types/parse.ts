/** Parse tree and syntax failure shapes shared by every parser back end. */
export type SourcePosition = {
  offset: number;
  line: number;
  column: number;
};

export type ParseNode = {
  rule: string;
  text: string;
  start: SourcePosition;
  end: SourcePosition;
  children: ParseNode[];
};

export type SyntaxFailure = {
  line: number;
  column: number;
  unexpected: string | null;
  expected: string[] | null;
  message: string;
};

export type ParseOutcome = { ok: true; tree: ParseNode } | { ok: false; error: SyntaxFailure };
