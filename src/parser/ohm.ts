import * as ohm from "ohm-js";
import { GrammarLoadError, ParseTimeoutError, RunCancelledError, errorMessage } from "../errors.js";
import type { GrammarArtifact } from "../grammar/artifact.js";
import type { ParseNode, ParseOutcome, SyntaxFailure } from "../types/parse.js";
import type { LoadedParser, ParseOptions, ParsingCapability } from "./capability.js";
import { LineIndex } from "./line-index.js";

/** Compile grammar text written in the ohm grammar language. */
export function compileOhmGrammar(grammar: GrammarArtifact): ohm.Grammar {
  let compiled: ohm.Grammar;
  try {
    compiled = ohm.grammar(grammar.source);
  } catch (e) {
    throw new GrammarLoadError(grammar.path, `Grammar ${grammar.path} does not compile: ${errorMessage(e)}`, { cause: e });
  }
  if (grammar.startRule && !(grammar.startRule in compiled.rules)) {
    throw new GrammarLoadError(grammar.path, `Start rule "${grammar.startRule}" is not defined in ${compiled.name}`);
  }
  return compiled;
}

const SHORT_MESSAGE = /^Line (\d+), col (\d+): expected (.*)$/s;

/** ohm joins alternatives as `a, b, or c`. */
export function splitExpected(text: string): string[] {
  return text
    .split(/, or |, | or /)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function unexpectedAt(input: string, offset: number): string {
  const rest = input.slice(offset);
  if (rest.length === 0) return "<end of input>";
  const token = /^\S{1,24}/.exec(rest);
  return token ? token[0] : JSON.stringify(rest[0]);
}

function describeFailure(match: ohm.FailedMatchResult, lines: LineIndex): SyntaxFailure {
  const short = match.shortMessage ?? "";
  const parsed = SHORT_MESSAGE.exec(short);
  const line = parsed ? Number(parsed[1]) : 1;
  const column = parsed ? Number(parsed[2]) : 1;
  return {
    line,
    column,
    unexpected: unexpectedAt(lines.text, lines.offsetOf(line, column)),
    expected: parsed ? splitExpected(parsed[3]) : null,
    message: short || (match.message ?? "parse failed"),
  };
}

type TreeBuilder = (match: ohm.MatchResult, lines: LineIndex) => ParseNode[];

/**
 * CST → ParseNode. Only the grammar's own rules become nodes; built-in rules,
 * iterations and terminals are flattened into their parent.
 */
function treeBuilder(compiled: ohm.Grammar): TreeBuilder {
  // `rules` chains to the super grammar through its prototype, so own keys are the grammar's rules.
  const own = new Set(Object.keys(compiled.rules));
  let lines = new LineIndex("");

  const semantics = compiled.createSemantics().addOperation<ParseNode[]>("toTree", {
    _nonterminal(...children) {
      const inner = children.flatMap((c): ParseNode[] => c.toTree());
      if (!own.has(this.ctorName)) return inner;
      return [
        {
          rule: this.ctorName,
          text: this.sourceString,
          start: lines.at(this.source.startIdx),
          end: lines.at(this.source.endIdx),
          children: inner,
        },
      ];
    },
    _iter(...children) {
      return children.flatMap((c): ParseNode[] => c.toTree());
    },
    _terminal() {
      return [];
    },
  });

  return (match, index) => {
    lines = index;
    return semantics(match).toTree();
  };
}

/**
 * In-process ohm-js parser. A parse cannot be interrupted, so the bound is
 * checked after it returns: an overrun still fails the sample, but only
 * IsolatedParser can stop a parse that never ends.
 */
export class OhmLoadedParser implements LoadedParser {
  private readonly buildTree: TreeBuilder;

  constructor(
    private readonly compiled: ohm.Grammar,
    private readonly grammar: GrammarArtifact,
  ) {
    this.buildTree = treeBuilder(compiled);
  }

  get fingerprint(): string {
    return this.grammar.fingerprint;
  }

  parseSync(source: string): ParseOutcome {
    const lines = new LineIndex(source);
    const match = this.compiled.match(source, this.grammar.startRule ?? undefined);
    if (match.failed()) return { ok: false, error: describeFailure(match, lines) };

    const nodes = this.buildTree(match, lines);
    const root = nodes.length === 1 ? nodes[0] : syntheticRoot(lines, nodes);
    return { ok: true, tree: root };
  }

  async parse(source: string, opts: ParseOptions): Promise<ParseOutcome> {
    if (opts.signal?.aborted) throw new RunCancelledError();
    const started = performance.now();
    const outcome = this.parseSync(source);
    if (performance.now() - started > opts.timeoutMs) throw new ParseTimeoutError(opts.timeoutMs);
    return outcome;
  }

  async dispose(): Promise<void> {}
}

function syntheticRoot(lines: LineIndex, children: ParseNode[]): ParseNode {
  return { rule: "<root>", text: lines.text, start: lines.at(0), end: lines.at(lines.text.length), children };
}

export class OhmParser implements ParsingCapability {
  readonly name = "ohm-inline";

  async load(grammar: GrammarArtifact): Promise<OhmLoadedParser> {
    return new OhmLoadedParser(compileOhmGrammar(grammar), grammar);
  }
}
