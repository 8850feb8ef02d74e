#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { readConfig } from "./config/validator.js";
import { GramctlError, RegressionError } from "./errors.js";
import { shortFingerprint } from "./grammar/fingerprint.js";
import { createLogger } from "./output/logger.js";
import { describeDiagnostic, renderSummary, renderTable, rowFromRecord, rowFromResult } from "./output/render.js";
import { EXIT, exitForError } from "./commands/exit-codes.js";
import { validateCorpus, type CommandError, type Focus } from "./commands/validate.js";
import { corpusStatus } from "./commands/status.js";
import { countSections } from "./commands/sections.js";
import type { Target } from "./guard/selector.js";
import type { GramctlConfig } from "./types/config.js";

type Format = "human" | "jsonl";

type CommonOpts = { config: string; env?: string; format: Format; quiet?: boolean; verbose?: boolean };

function asFormat(value: string): Format {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("expected human or jsonl");
}

function jsonl(record: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(record) + "\n");
}

function fail(format: Format, error: CommandError): never {
  if (format === "jsonl") {
    jsonl({ level: "error", code: error.code, message: error.message });
  } else {
    console.error(error.message);
  }
  process.exit(exitForError(error.code));
}

function configFor(opts: CommonOpts): GramctlConfig {
  try {
    return readConfig({ configDir: opts.config, env: opts.env });
  } catch (e) {
    if (e instanceof GramctlError) fail(opts.format, { code: e.code, message: e.message });
    throw e;
  }
}

function printTarget(label: string, target: Target | null): void {
  if (!target) {
    console.log(`${label}: none, every sample passes`);
    return;
  }
  const detail = target.diagnostic ? describeDiagnostic(target.diagnostic) : "not yet validated under this grammar";
  console.log(`${label}: ${target.sample_id} (${target.status}) ${detail}`);
}

function printFocus(focus: Focus): void {
  console.log("");
  console.log(`${focus.sample_id}: ${focus.diagnostic ? describeDiagnostic(focus.diagnostic) : "no diagnostic recorded"}`);
  for (const line of focus.context) console.log(line);
  if (focus.prefix) {
    console.log(`first ${focus.prefix.lines} of ${focus.prefix.totalLines} line(s) parse on their own`);
  }
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Config overlay to merge over base.yaml (config/<name>.yaml)")
    .option("--format <format>", "Output format: human|jsonl", asFormat, "human")
    .option("-q, --quiet", "Only log errors")
    .option("-v, --verbose", "Log debug detail");
}

const program = new Command();

program
  .name("gramctl")
  .description("Grammar development harness: validate a sample corpus against a grammar without regressions")
  .version("0.1.0")
  .exitOverride();

withCommonOptions(
  program
    .command("validate")
    .description("Validate the corpus (or one sample) against the grammar and record accepted results")
    .option("--file <id>", "Validate only this sample (id or path inside the corpus directory)")
    .option("--early", "Stop at the first syntax failure and locate its parsable prefix")
    .option("--report <path>", "Also write the run and verdict as JSON"),
).action(async (opts: CommonOpts & { file?: string; early?: boolean; report?: string }) => {
  const config = configFor(opts);
  const logger = createLogger(opts);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("interrupted; cancelling run");
    controller.abort();
  });

  const res = await validateCorpus({
    config,
    file: opts.file,
    early: opts.early,
    reportPath: opts.report,
    signal: controller.signal,
    logger,
  });
  if (!res.ok) fail(opts.format, res.error);

  const { outcome } = res;
  const rows = outcome.run.results.map(rowFromResult);
  const exit = outcome.verdict.decision === "reject" ? EXIT.REGRESSION_REJECTED : outcome.allPass ? EXIT.SUCCESS : EXIT.SAMPLES_FAILING;

  if (opts.format === "jsonl") {
    for (const row of rows) jsonl({ level: "info", code: "SAMPLE", ...row });
    if (outcome.verdict.decision === "reject") {
      jsonl({ level: "error", code: "REGRESSION_REJECTED", message: new RegressionError(outcome.verdict.regressed_ids).message, regressed_ids: outcome.verdict.regressed_ids });
    }
    jsonl({
      level: "info",
      code: "RUN",
      fingerprint: outcome.fingerprint,
      committed: outcome.committed,
      halted_early: outcome.run.halted_early,
      newly_passing: outcome.verdict.newly_passing,
      next: outcome.next,
      focus: outcome.focus,
    });
    process.exit(exit);
  }

  for (const line of renderTable(rows)) console.log(line);
  if (outcome.run.halted_early) console.log("(stopped at the first syntax failure)");
  console.log("");
  if (outcome.verdict.decision === "reject") {
    console.log(new RegressionError(outcome.verdict.regressed_ids).message);
    console.log("registry left unchanged");
  } else if (outcome.verdict.newly_passing.length > 0) {
    console.log(`newly passing: ${outcome.verdict.newly_passing.join(", ")}`);
  }
  const all = Object.values(outcome.registry).map((r) => rowFromRecord(r, outcome.fingerprint));
  console.log(renderSummary(all, outcome.fingerprint));
  printTarget("next target", outcome.next);
  if (outcome.focus) printFocus(outcome.focus);
  process.exit(exit);
});

withCommonOptions(
  program.command("status").description("Sync the registry and show each sample's status under the current grammar"),
).action(async (opts: CommonOpts) => {
  const config = configFor(opts);
  const res = await corpusStatus({ config, logger: createLogger(opts) });
  if (!res.ok) fail(opts.format, res.error);

  const { outcome } = res;
  if (opts.format === "jsonl") {
    for (const row of outcome.rows) jsonl({ level: "info", code: "SAMPLE", ...row });
    jsonl({ level: "info", code: "STATUS", fingerprint: outcome.fingerprint, sync: outcome.sync, next: outcome.next });
  } else {
    console.log(`grammar ${shortFingerprint(outcome.fingerprint)}; registry +${outcome.sync.inserted} -${outcome.sync.removed}`);
    for (const line of renderTable(outcome.rows)) console.log(line);
    console.log("");
    console.log(renderSummary(outcome.rows, outcome.fingerprint));
    printTarget("next target", outcome.next);
  }
  process.exit(outcome.next ? EXIT.SAMPLES_FAILING : EXIT.SUCCESS);
});

withCommonOptions(
  program
    .command("sections")
    .description("Count a section's headers in each sample's text against its section nodes in the parse tree")
    .argument("<name>", "Section name, e.g. Data"),
).action(async (name: string, opts: CommonOpts) => {
  const config = configFor(opts);
  const res = await countSections({ config, name, logger: createLogger(opts) });
  if (!res.ok) fail(opts.format, res.error);

  const mismatched = res.counts.filter((c) => c.in_tree !== c.in_text);
  if (opts.format === "jsonl") {
    for (const c of res.counts) jsonl({ level: c.in_tree === c.in_text ? "info" : "warn", code: "SECTION_COUNT", section: name, ...c });
  } else {
    for (const c of res.counts) {
      const tree = c.in_tree === null ? "unparsed" : String(c.in_tree);
      console.log(`${c.sample_id}  text=${c.in_text}  tree=${tree}${c.in_tree === c.in_text ? "" : "  MISMATCH"}`);
    }
    console.log(`${res.counts.length - mismatched.length}/${res.counts.length} samples agree on "${name}"`);
  }
  process.exit(mismatched.length > 0 ? EXIT.SAMPLES_FAILING : EXIT.SUCCESS);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
