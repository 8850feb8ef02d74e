/**
 * Errors thrown across module boundaries. Per-sample failures are never thrown
 * past the harness: they become diagnostics on that sample's result.
 */
export class GramctlError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends GramctlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export class RegistryError extends GramctlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REGISTRY_INVALID", message, options);
  }
}

export class GrammarLoadError extends GramctlError {
  constructor(
    readonly grammarPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("GRAMMAR_LOAD_FAILED", message, options);
  }
}

export class ParseTimeoutError extends GramctlError {
  constructor(readonly timeoutMs: number) {
    super("PARSE_TIMEOUT", `parse exceeded ${timeoutMs}ms`);
  }
}

export class RunCancelledError extends GramctlError {
  constructor() {
    super("RUN_CANCELLED", "validation run cancelled; registry left unmodified");
  }
}

/** A grammar edit that would turn previously passing samples into failures. */
export class RegressionError extends GramctlError {
  constructor(readonly regressedIds: string[]) {
    super(
      "REGRESSION_REJECTED",
      `grammar edit rejected: ${regressedIds.length} previously passing sample(s) now fail: ${regressedIds.join(", ")}`,
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
