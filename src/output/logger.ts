/**
 * Leveled logger for progress messages. Writes to stderr so stdout stays
 * reserved for command output (human tables or jsonl).
 */
export type LogLevel = "silent" | "errors" | "warnings" | "info" | "debug";

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

function formatMessage(tag: string, message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) return `[${tag}] ${message}`;
  return `[${tag}] ${message} ${JSON.stringify(context)}`;
}

export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(
    level: LogLevel = "info",
    private readonly write: (line: string) => void = (line) => process.stderr.write(line + "\n"),
  ) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  private emit(min: LogLevel, tag: string, message: string, context?: Record<string, unknown>): void {
    if (this.priority >= LOG_LEVEL_PRIORITY[min]) this.write(formatMessage(tag, message, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit("errors", "ERROR", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit("warnings", "WARN", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit("info", "INFO", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit("debug", "DEBUG", message, context);
  }
}

export const silentLogger: Logger = new ConsoleLogger("silent");

export function createLogger(opts: { quiet?: boolean; verbose?: boolean }): Logger {
  if (opts.quiet) return new ConsoleLogger("errors");
  return new ConsoleLogger(opts.verbose ? "debug" : "warnings");
}
