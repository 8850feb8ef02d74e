import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { GrammarLoadError, ParseTimeoutError } from "../src/errors.js";
import type { GrammarArtifact } from "../src/grammar/artifact.js";
import type { LoadedParser, ParseOptions, ParsingCapability } from "../src/parser/capability.js";
import { LineIndex } from "../src/parser/line-index.js";
import type { GramctlConfig, StructureConfig } from "../src/types/config.js";
import type { ParseNode, ParseOutcome } from "../src/types/parse.js";

const created: string[] = [];

export function tmpDir(prefix = "gramctl-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  created.push(dir);
  return dir;
}

/** Remove every directory tmpDir() handed out; call from afterEach. */
export function removeTmpDirs(): void {
  for (const dir of created.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export const STRUCTURE: StructureConfig = {
  checks: ["section_inventory", "section_span", "balanced_delimiters"],
  section_names: ["Notes", "Data", "Strategy", "Settings"],
  section_rule_suffix: "Section",
  section_name_rule: "sectionName",
  delimiters: ["()", "[]", "{}"],
  string_quotes: ['"'],
  comment_prefixes: ["//"],
};

/** A config rooted at `root`: grammar.txt, corpus/ and registry.json. */
export function testConfig(root: string, harness: Partial<GramctlConfig["harness"]> = {}): GramctlConfig {
  return {
    schema_version: "1.0.0",
    grammar: { path: path.join(root, "grammar.txt"), start_rule: null },
    corpus: { dir: path.join(root, "corpus"), extension: ".rts" },
    registry: { path: path.join(root, "registry.json") },
    harness: { concurrency: 2, timeout_ms: 1000, isolation: "inline", append_trailing_newline: false, ...harness },
    structure: STRUCTURE,
  };
}

/**
 * Grammar text for the fake back end, one directive per line:
 *   deny <word>   samples containing <word> fail to parse at its first occurrence
 *   hide <name>   `<name>:` headers parse, but produce no section node
 *   broken        the grammar does not load
 */
export function fakeGrammar(...directives: string[]): string {
  return ["fake grammar", ...directives].join("\n") + "\n";
}

function directive(source: string, verb: string): string[] {
  return source.split("\n").flatMap((line) => {
    const m = new RegExp(`^${verb} (\\S+)$`).exec(line.trim());
    return m ? [m[1]] : [];
  });
}

/**
 * Parser stand-in that needs no grammar engine. Samples containing HANG never
 * finish and are failed once `timeoutMs` passes; samples containing BOOM make
 * the parser throw.
 */
export class FakeLoadedParser implements LoadedParser {
  readonly parsed: string[] = [];
  disposed = false;
  private readonly denied: string[];
  private readonly hidden: Set<string>;

  constructor(readonly fingerprint: string, source: string) {
    this.denied = directive(source, "deny");
    this.hidden = new Set(directive(source, "hide"));
  }

  parse(source: string, opts: ParseOptions): Promise<ParseOutcome> {
    this.parsed.push(source);
    if (source.includes("HANG")) {
      return new Promise<ParseOutcome>((_, reject) => setTimeout(() => reject(new ParseTimeoutError(opts.timeoutMs)), opts.timeoutMs));
    }
    if (source.includes("BOOM")) return Promise.reject(new Error("parser exploded"));

    const lines = new LineIndex(source);
    for (const word of this.denied) {
      const at = source.indexOf(word);
      if (at === -1) continue;
      const pos = lines.at(at);
      return Promise.resolve<ParseOutcome>({
        ok: false,
        error: { line: pos.line, column: pos.column, unexpected: word, expected: ["anything else"], message: `Line ${pos.line}, col ${pos.column}: expected anything else` },
      });
    }

    const sections: ParseNode[] = [];
    let offset = 0;
    for (const text of source.split("\n")) {
      const m = /^(\w+):/.exec(text);
      if (m && !this.hidden.has(m[1])) {
        sections.push({ rule: `${m[1]}Section`, text, start: lines.at(offset), end: lines.at(offset + text.length), children: [] });
      }
      offset += text.length + 1;
    }
    return Promise.resolve<ParseOutcome>({
      ok: true,
      tree: { rule: "Script", text: source, start: lines.at(0), end: lines.at(source.length), children: sections },
    });
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}

export class FakeParsing implements ParsingCapability {
  readonly name = "fake";
  readonly loaded: FakeLoadedParser[] = [];

  async load(grammar: GrammarArtifact): Promise<FakeLoadedParser> {
    if (grammar.source.split("\n").includes("broken")) {
      throw new GrammarLoadError(grammar.path, `Grammar ${grammar.path} does not compile`);
    }
    const parser = new FakeLoadedParser(grammar.fingerprint, grammar.source);
    this.loaded.push(parser);
    return parser;
  }
}
