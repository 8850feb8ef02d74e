import type { StructuralCheckName, StructureConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { ParseNode } from "../types/parse.js";

/**
 * Structural checks — document-level invariants verified on a successful
 * parse. They read the raw text independently of the grammar, so a grammar
 * loose enough to accept a malformed document is still caught.
 */
export type StructureContext = {
  sampleId: string;
  source: string;
  tree: ParseNode;
  config: StructureConfig;
};

export type StructuralCheck = (ctx: StructureContext) => Diagnostic[];

export type SectionHeader = {
  name: string;
  line: number;
  /** Offset of the section name. */
  offset: number;
  text: string;
};

export type SectionNode = {
  name: string;
  node: ParseNode;
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Header lines (`Name:` at the start of a line) for the configured section names. */
export function findSectionHeaders(source: string, sectionNames: readonly string[]): SectionHeader[] {
  if (sectionNames.length === 0) return [];
  const pattern = new RegExp(`^(\\s*)(${sectionNames.map(escapeRegExp).join("|")})\\s*:`);

  const headers: SectionHeader[] = [];
  let lineStart = 0;
  source.split("\n").forEach((text, i) => {
    const m = pattern.exec(text);
    if (m) headers.push({ name: m[2], line: i + 1, offset: lineStart + m[1].length, text: text.trim() });
    lineStart += text.length + 1;
  });
  return headers;
}

function firstDescendant(node: ParseNode, rule: string): ParseNode | null {
  for (const child of node.children) {
    if (child.rule === rule) return child;
    const deeper = firstDescendant(child, rule);
    if (deeper) return deeper;
  }
  return null;
}

function isSectionRule(rule: string, suffix: string): boolean {
  return rule.length > suffix.length && rule.endsWith(suffix);
}

/**
 * Section nodes in document order. A section rule that only wraps other
 * section rules (`AnySection = NotesSection | DataSection`) is not counted.
 */
export function findSectionNodes(tree: ParseNode, config: Pick<StructureConfig, "section_rule_suffix" | "section_name_rule">): SectionNode[] {
  const out: SectionNode[] = [];

  const visit = (node: ParseNode): boolean => {
    let containsSection = false;
    for (const child of node.children) {
      if (visit(child)) containsSection = true;
    }
    const isSection = isSectionRule(node.rule, config.section_rule_suffix);
    if (isSection && !containsSection) {
      const named = firstDescendant(node, config.section_name_rule);
      const name = named ? named.text.trim() : node.rule.slice(0, -config.section_rule_suffix.length);
      out.push({ name, node });
    }
    return isSection || containsSection;
  };

  visit(tree);
  return out.sort((a, b) => a.node.start.offset - b.node.start.offset);
}

function structural(ctx: StructureContext, line: number, column: number, message: string, unexpected: string | null = null, expected: string[] | null = null): Diagnostic {
  return { sample_id: ctx.sampleId, kind: "structural", line, column, unexpected, expected, message };
}

function groupByName<T extends { name: string }>(items: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const list = groups.get(item.name) ?? [];
    list.push(item);
    groups.set(item.name, list);
  }
  return groups;
}

/** Every section header in the text is a section node in the tree, name by name and count by count. */
export const sectionInventory: StructuralCheck = (ctx) => {
  const known = new Set(ctx.config.section_names);
  const headers = groupByName(findSectionHeaders(ctx.source, ctx.config.section_names));
  const nodes = groupByName(findSectionNodes(ctx.tree, ctx.config).filter((s) => known.has(s.name)));

  const out: Diagnostic[] = [];
  for (const name of new Set([...headers.keys(), ...nodes.keys()])) {
    const inText = headers.get(name) ?? [];
    const inTree = nodes.get(name) ?? [];
    const counts = `section "${name}" appears ${inText.length} time(s) in text but ${inTree.length} time(s) in the parse tree`;
    if (inText.length > inTree.length) {
      const missing = inText[inTree.length];
      out.push(structural(ctx, missing.line, 1, `${counts}; the header at line ${missing.line} was not parsed as a section`, missing.text));
    } else if (inTree.length > inText.length) {
      const extra = inTree[inText.length].node;
      out.push(structural(ctx, extra.start.line, extra.start.column, counts));
    }
  }
  return out.sort((a, b) => a.line - b.line || a.column - b.column);
};

/** No section may run past the header of another section. */
export const sectionSpan: StructuralCheck = (ctx) => {
  const headers = findSectionHeaders(ctx.source, ctx.config.section_names);
  const out: Diagnostic[] = [];
  for (const { name, node } of findSectionNodes(ctx.tree, ctx.config)) {
    const swallowed = headers.find((h) => h.offset > node.start.offset && h.offset < node.end.offset && h.line !== node.start.line);
    if (!swallowed) continue;
    out.push(
      structural(
        ctx,
        swallowed.line,
        1,
        `section "${name}" starting at line ${node.start.line} swallows the "${swallowed.name}" header at line ${swallowed.line}`,
        swallowed.text,
        [`end of section "${name}"`],
      ),
    );
  }
  return out;
};

type Opener = { char: string; closer: string; line: number; column: number };

/** Every opening delimiter has its closer, outside strings and comments. */
export const balancedDelimiters: StructuralCheck = (ctx) => {
  const closers = new Map<string, string>();
  const openerFor = new Map<string, string>();
  for (const pair of ctx.config.delimiters) {
    closers.set(pair[0], pair[1]);
    openerFor.set(pair[1], pair[0]);
  }
  const quotes = new Set(ctx.config.string_quotes);

  const stack: Opener[] = [];
  const src = ctx.source;
  let line = 1;
  let column = 1;
  let quote: string | null = null;

  for (let i = 0; i < src.length; i++, column++) {
    const ch = src[i];
    if (ch === "\n") {
      line++;
      column = 0;
      quote = null;
      continue;
    }
    if (quote) {
      if (ch === "\\") {
        i++;
        column++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (quotes.has(ch)) {
      quote = ch;
      continue;
    }
    if (ctx.config.comment_prefixes.some((p) => src.startsWith(p, i))) {
      const eol = src.indexOf("\n", i);
      const skipTo = eol === -1 ? src.length : eol;
      column += skipTo - i - 1;
      i = skipTo - 1;
      continue;
    }

    const closer = closers.get(ch);
    if (closer !== undefined) {
      stack.push({ char: ch, closer, line, column });
      continue;
    }
    if (openerFor.has(ch)) {
      const top = stack.pop();
      if (!top) return [structural(ctx, line, column, `unmatched "${ch}"`, ch)];
      if (top.closer !== ch) {
        return [structural(ctx, line, column, `"${ch}" does not close "${top.char}" opened at line ${top.line}, column ${top.column}`, ch, [top.closer])];
      }
    }
  }

  const open = stack.pop();
  if (open) {
    return [structural(ctx, open.line, open.column, `"${open.char}" opened at line ${open.line}, column ${open.column} is never closed`, "<end of input>", [open.closer])];
  }
  return [];
};

export const STRUCTURAL_CHECKS: Record<StructuralCheckName, StructuralCheck> = {
  section_inventory: sectionInventory,
  section_span: sectionSpan,
  balanced_delimiters: balancedDelimiters,
};

/** Run the configured checks in order; diagnostics of earlier checks come first. */
export function runStructuralChecks(ctx: StructureContext): Diagnostic[] {
  return ctx.config.checks.flatMap((name) => STRUCTURAL_CHECKS[name](ctx));
}
