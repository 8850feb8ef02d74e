import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { EXIT, exitForError } from "../src/commands/exit-codes.js";
import { countSections } from "../src/commands/sections.js";
import { corpusStatus } from "../src/commands/status.js";
import { validateCorpus, type ValidateOutcome, type ValidateResult } from "../src/commands/validate.js";
import { CorpusRegistry } from "../src/corpus/registry.js";
import type { GramctlConfig } from "../src/types/config.js";
import { FakeParsing, fakeGrammar, removeTmpDirs, testConfig, tmpDir, writeFiles } from "./helpers.js";

afterEach(removeTmpDirs);

const CORPUS = {
  "corpus/x.rts": "Notes:\n  xx\n",
  "corpus/y.rts": "Notes:\n  yy\n",
  "corpus/z.rts": "Notes:\n  zz\n",
};

function setup(files: Record<string, string> = CORPUS): { root: string; config: GramctlConfig } {
  const root = tmpDir();
  writeFiles(root, files);
  return { root, config: testConfig(root) };
}

function useGrammar(config: GramctlConfig, ...directives: string[]): void {
  fs.writeFileSync(config.grammar.path, fakeGrammar(...directives));
}

function outcomeOf(res: ValidateResult): ValidateOutcome {
  if (!res.ok) throw new Error(`${res.error.code}: ${res.error.message}`);
  return res.outcome;
}

async function statuses(config: GramctlConfig): Promise<Record<string, string>> {
  const registry = await CorpusRegistry.open(config.registry.path);
  registry.sync(fs.readdirSync(config.corpus.dir));
  return Object.fromEntries(Object.values(registry.snapshot()).map((r) => [r.sample_id, r.syntactic_status]));
}

describe("validate command", () => {
  it("records the first run and points at the first failure", async () => {
    const { config } = setup();
    useGrammar(config, "deny yy", "deny zz");
    const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));

    expect(outcome.sync).toEqual({ inserted: 3, removed: 0, total: 3 });
    expect(outcome.verdict).toEqual({ decision: "accept", newly_passing: ["x.rts"] });
    expect(outcome.committed).toBe(true);
    expect(outcome.allPass).toBe(false);
    expect(outcome.next?.sample_id).toBe("y.rts");
    expect(outcome.focus?.sample_id).toBe("y.rts");
    expect(outcome.focus?.context).toEqual(["1 | Notes:", "2 >   yy", "      ^", "3 | "]);
    expect(await statuses(config)).toEqual({ "x.rts": "pass", "y.rts": "fail", "z.rts": "fail" });
  });

  it("commits a grammar edit that fixes a sample without breaking others", async () => {
    const { config } = setup();
    useGrammar(config, "deny yy", "deny zz");
    outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));

    useGrammar(config, "deny zz");
    const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
    expect(outcome.verdict).toEqual({ decision: "accept", newly_passing: ["y.rts"] });
    expect(outcome.next?.sample_id).toBe("z.rts");
    expect(await statuses(config)).toEqual({ "x.rts": "pass", "y.rts": "pass", "z.rts": "fail" });
  });

  it("rejects an edit that fixes one sample but breaks another, leaving the registry untouched", async () => {
    const { config } = setup();
    useGrammar(config, "deny yy", "deny zz");
    outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
    const before = fs.readFileSync(config.registry.path, "utf8");

    useGrammar(config, "deny xx", "deny zz");
    const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
    expect(outcome.verdict).toEqual({ decision: "reject", regressed_ids: ["x.rts"], newly_passing: ["y.rts"] });
    expect(outcome.committed).toBe(false);
    expect(outcome.allPass).toBe(false);
    expect(outcome.focus?.sample_id).toBe("x.rts");
    expect(outcome.focus?.diagnostic?.unexpected).toBe("xx");
    expect(fs.readFileSync(config.registry.path, "utf8")).toBe(before);
    expect(exitForError("REGRESSION_REJECTED")).toBe(EXIT.REGRESSION_REJECTED);
  });

  it("only grows the set of passing samples across accepted runs", async () => {
    const { config } = setup();
    const passing: string[][] = [];
    const edits = [["deny yy", "deny zz"], ["deny zz"], ["deny xx"], []];
    for (const edit of edits) {
      useGrammar(config, ...edit);
      const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
      passing.push(Object.values(outcome.registry).filter((r) => r.syntactic_status === "pass").map((r) => r.sample_id));
    }
    expect(passing).toEqual([["x.rts"], ["x.rts", "y.rts"], ["x.rts", "y.rts"], ["x.rts", "y.rts", "z.rts"]]);
  });

  it("reports success once every sample passes", async () => {
    const { config } = setup();
    useGrammar(config);
    const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
    expect(outcome.allPass).toBe(true);
    expect(outcome.next).toBeNull();
    expect(outcome.focus).toBeNull();
  });

  it("validates a single sample by id or by path", async () => {
    const { config } = setup();
    useGrammar(config, "deny yy");
    const byId = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing(), file: "y.rts" }));
    expect(byId.run.results.map((r) => r.sample_id)).toEqual(["y.rts"]);

    const byPath = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing(), file: path.join(config.corpus.dir, "z.rts") }));
    expect(byPath.run.results.map((r) => r.sample_id)).toEqual(["z.rts"]);
    expect(await statuses(config)).toEqual({ "x.rts": "fail", "y.rts": "fail", "z.rts": "pass" });
  });

  it("refuses an unknown sample", async () => {
    const { config } = setup();
    useGrammar(config);
    const res = await validateCorpus({ config, parsing: new FakeParsing(), file: "nope.rts" });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("SAMPLE_NOT_FOUND");
  });

  it("stops at the first syntax failure in early mode", async () => {
    const { config } = setup();
    useGrammar(config, "deny yy");
    const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing(), early: true }));
    expect(outcome.run.results.map((r) => r.sample_id)).toEqual(["x.rts", "y.rts"]);
    expect(outcome.run.halted_early).toBe(true);
    expect(outcome.focus?.sample_id).toBe("y.rts");
    expect(outcome.focus?.prefix).toMatchObject({ lines: 1, totalLines: 2 });
    expect(await statuses(config)).toEqual({ "x.rts": "pass", "y.rts": "fail", "z.rts": "fail" });
  });

  it("locates the parsable prefix in the same text the run parsed", async () => {
    const root = tmpDir();
    writeFiles(root, { "corpus/x.rts": "Notes:\n  xx\n", "corpus/y.rts": "Notes:\n  yy" });
    const config = testConfig(root, { concurrency: 1, append_trailing_newline: true });
    useGrammar(config, "deny yy");
    const parsing = new FakeParsing();
    const outcome = outcomeOf(await validateCorpus({ config, parsing, early: true }));
    expect(outcome.focus?.prefix).toMatchObject({ lines: 1, totalLines: 2 });
    expect(parsing.loaded[0].parsed).toEqual(["Notes:\n  xx\n", "Notes:\n  yy\n", "Notes:\n", "Notes:\n  yy\n"]);
  });

  it("contains a parse that never finishes", async () => {
    const { config } = setup({ ...CORPUS, "corpus/w.rts": "Notes:\n  HANG\n" });
    const bounded = { ...config, harness: { ...config.harness, timeout_ms: 50 } };
    useGrammar(bounded);
    const outcome = outcomeOf(await validateCorpus({ config: bounded, parsing: new FakeParsing() }));
    expect(outcome.run.results.map((r) => [r.sample_id, r.syntactic.diagnostic?.kind ?? "ok"])).toEqual([
      ["w.rts", "internal"],
      ["x.rts", "ok"],
      ["y.rts", "ok"],
      ["z.rts", "ok"],
    ]);
  });

  it("writes a report when asked", async () => {
    const { root, config } = setup();
    useGrammar(config, "deny zz");
    const reportPath = path.join(root, "out", "report.json");
    outcomeOf(await validateCorpus({ config, parsing: new FakeParsing(), reportPath }));
    const report: unknown = JSON.parse(fs.readFileSync(reportPath, "utf8"));
    expect(report).toMatchObject({ verdict: { decision: "accept" }, committed: true, next: { sample_id: "z.rts", status: "fail" } });
  });

  it("disposes the parser after the run", async () => {
    const { config } = setup();
    useGrammar(config);
    const parsing = new FakeParsing();
    outcomeOf(await validateCorpus({ config, parsing }));
    expect(parsing.loaded.map((p) => p.disposed)).toEqual([true]);
  });

  it("reports a grammar that does not load, after syncing the registry", async () => {
    const { config } = setup();
    useGrammar(config, "broken");
    const res = await validateCorpus({ config, parsing: new FakeParsing() });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(exitForError(res.error.code)).toBe(EXIT.GRAMMAR_LOAD_FAILED);
    expect(await statuses(config)).toEqual({ "x.rts": "fail", "y.rts": "fail", "z.rts": "fail" });
  });

  it("reports a missing grammar file", async () => {
    const { config } = setup();
    const res = await validateCorpus({ config, parsing: new FakeParsing() });
    expect(!res.ok && res.error.code).toBe("GRAMMAR_LOAD_FAILED");
  });

  it("reports a missing corpus directory", async () => {
    const { config } = setup({});
    useGrammar(config);
    const res = await validateCorpus({ config, parsing: new FakeParsing() });
    expect(!res.ok && res.error.code).toBe("CORPUS_DIR_MISSING");
    expect(exitForError("CORPUS_DIR_MISSING")).toBe(EXIT.INVALID_ARGS);
  });

  it("reports a corrupt registry", async () => {
    const { config } = setup();
    useGrammar(config);
    fs.writeFileSync(config.registry.path, "[]");
    const res = await validateCorpus({ config, parsing: new FakeParsing() });
    expect(!res.ok && res.error.code).toBe("REGISTRY_INVALID");
  });

  it("leaves the registry as synced when the run is cancelled", async () => {
    const { config } = setup();
    useGrammar(config);
    const controller = new AbortController();
    controller.abort();
    const res = await validateCorpus({ config, parsing: new FakeParsing(), signal: controller.signal });
    expect(!res.ok && res.error.code).toBe("RUN_CANCELLED");
    expect(exitForError("RUN_CANCELLED")).toBe(EXIT.CANCELLED);
    expect(await statuses(config)).toEqual({ "x.rts": "fail", "y.rts": "fail", "z.rts": "fail" });
  });

  it("prunes records of deleted samples", async () => {
    const { config } = setup();
    useGrammar(config);
    outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
    fs.rmSync(path.join(config.corpus.dir, "z.rts"));
    const outcome = outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));
    expect(outcome.sync).toEqual({ inserted: 0, removed: 1, total: 2 });
    expect(Object.keys(outcome.registry)).toEqual(["x.rts", "y.rts"]);
  });
});

describe("status command", () => {
  it("shows stored results and marks them stale after a grammar edit", async () => {
    const { config } = setup();
    useGrammar(config, "deny yy");
    outcomeOf(await validateCorpus({ config, parsing: new FakeParsing() }));

    const current = await corpusStatus({ config });
    if (!current.ok) throw new Error(current.error.message);
    expect(current.outcome.rows.map((r) => [r.sample_id, r.combined])).toEqual([
      ["x.rts", "pass"],
      ["y.rts", "fail"],
      ["z.rts", "pass"],
    ]);
    expect(current.outcome.next?.sample_id).toBe("y.rts");

    useGrammar(config);
    const stale = await corpusStatus({ config });
    if (!stale.ok) throw new Error(stale.error.message);
    expect(stale.outcome.rows.map((r) => r.combined)).toEqual(["unknown", "unknown", "unknown"]);
    expect(stale.outcome.next).toEqual({ sample_id: "x.rts", status: "unknown", diagnostic: null });
  });
});

describe("sections command", () => {
  it("counts a section in text and tree per sample", async () => {
    const { config } = setup({ "corpus/a.rts": "Notes:\nData:\n", "corpus/b.rts": "Data:\n  oops\n" });
    useGrammar(config, "hide Notes", "deny oops");
    const res = await countSections({ config, name: "Data", parsing: new FakeParsing() });
    expect(res).toEqual({
      ok: true,
      section: "Data",
      counts: [
        { sample_id: "a.rts", in_text: 1, in_tree: 1 },
        { sample_id: "b.rts", in_text: 1, in_tree: null },
      ],
    });

    const notes = await countSections({ config, name: "Notes", parsing: new FakeParsing() });
    expect(notes.ok && notes.counts[0]).toEqual({ sample_id: "a.rts", in_text: 1, in_tree: 0 });
  });

  it("reports a sample that hangs or crashes the parser and carries on", async () => {
    const { config } = setup({ "corpus/a.rts": "Data:\n", "corpus/b.rts": "Data:\n  HANG\n", "corpus/c.rts": "Data:\n  BOOM\n", "corpus/d.rts": "Data:\n" });
    const bounded = { ...config, harness: { ...config.harness, timeout_ms: 30 } };
    useGrammar(bounded);
    const res = await countSections({ config: bounded, name: "Data", parsing: new FakeParsing() });
    expect(res).toEqual({
      ok: true,
      section: "Data",
      counts: [
        { sample_id: "a.rts", in_text: 1, in_tree: 1 },
        { sample_id: "b.rts", in_text: 1, in_tree: null },
        { sample_id: "c.rts", in_text: 1, in_tree: null },
        { sample_id: "d.rts", in_text: 1, in_tree: 1 },
      ],
    });
  });
});
