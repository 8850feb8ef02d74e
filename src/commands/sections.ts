import { GramctlError, GrammarLoadError, errorMessage } from "../errors.js";
import { loadGrammar } from "../grammar/artifact.js";
import { parseText } from "../harness/harness.js";
import { findSectionHeaders, findSectionNodes } from "../harness/structure.js";
import { silentLogger, type Logger } from "../output/logger.js";
import { createParsingCapability, type ParsingCapability } from "../parser/index.js";
import { readSamples } from "../corpus/samples.js";
import type { GramctlConfig } from "../types/config.js";
import { openSynced, type CommandError } from "./validate.js";

export type SectionCount = {
  sample_id: string;
  in_text: number;
  /** null when the sample does not parse, crashes the parser or times out. */
  in_tree: number | null;
};

export type SectionsResult =
  | { ok: true; section: string; counts: SectionCount[] }
  | { ok: false; error: CommandError };

/**
 * How often section `name` appears as a header in each sample's text and as
 * a section node in its parse tree. Read-only: the registry is synced but no
 * results are recorded.
 */
export async function countSections(opts: {
  config: GramctlConfig;
  name: string;
  logger?: Logger;
  parsing?: ParsingCapability;
}): Promise<SectionsResult> {
  const { config, name } = opts;
  const logger = opts.logger ?? silentLogger;
  if (!config.structure.section_names.includes(name)) {
    logger.warn(`"${name}" is not in structure.section_names; header counts use it anyway`);
  }

  try {
    const { ids } = await openSynced(config, logger);
    const grammar = await loadGrammar(config.grammar.path, config.grammar.start_rule);
    const samples = await readSamples(config.corpus.dir, ids);
    const parser = await (opts.parsing ?? createParsingCapability(config.harness.isolation)).load(grammar, { concurrency: 1 });

    const counts: SectionCount[] = [];
    try {
      for (const sample of samples) {
        const inText = findSectionHeaders(sample.content, [name]).length;
        const text = parseText(sample.content, config.harness.append_trailing_newline);
        let inTree: number | null = null;
        try {
          const outcome = await parser.parse(text, { timeoutMs: config.harness.timeout_ms });
          if (outcome.ok) inTree = findSectionNodes(outcome.tree, config.structure).filter((s) => s.name === name).length;
        } catch (e) {
          if (e instanceof GrammarLoadError) throw e;
          logger.warn(`${sample.id}: ${errorMessage(e)}`);
        }
        counts.push({ sample_id: sample.id, in_text: inText, in_tree: inTree });
      }
    } finally {
      await parser.dispose();
    }
    return { ok: true, section: name, counts };
  } catch (e) {
    if (e instanceof GramctlError) return { ok: false, error: { code: e.code, message: e.message } };
    throw e;
  }
}
