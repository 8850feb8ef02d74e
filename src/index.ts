export * from "./errors.js";
export type * from "./types/config.js";
export type * from "./types/diagnostic.js";
export type * from "./types/parse.js";
export type * from "./types/registry.js";
export type * from "./types/run.js";
export type * from "./types/sample.js";

export { loadConfig, resolveConfigPaths } from "./config/loader.js";
export { readConfig, validateConfig } from "./config/validator.js";
export { CorpusRegistry } from "./corpus/registry.js";
export { listSampleIds, readSample, readSamples } from "./corpus/samples.js";
export { grammarFromSource, loadGrammar, type GrammarArtifact } from "./grammar/artifact.js";
export { fingerprintOf } from "./grammar/fingerprint.js";
export { createParsingCapability, type LoadedParser, type ParseOptions, type ParsingCapability } from "./parser/index.js";
export { OhmParser } from "./parser/ohm.js";
export { IsolatedParser } from "./parser/isolated.js";
export { runValidation, validateSample, type HarnessOptions } from "./harness/harness.js";
export { runStructuralChecks, STRUCTURAL_CHECKS } from "./harness/structure.js";
export { acceptedPass, combinedStatus } from "./harness/status.js";
export { evaluate, type GuardVerdict } from "./guard/regression-guard.js";
export { firstFailure, nextTarget, type Target } from "./guard/selector.js";
export { locateParsablePrefix } from "./guard/prefix.js";
export { renderErrorContext } from "./guard/context.js";
export { validateCorpus, type ValidateOptions, type ValidateOutcome } from "./commands/validate.js";
export { corpusStatus } from "./commands/status.js";
export { countSections } from "./commands/sections.js";
