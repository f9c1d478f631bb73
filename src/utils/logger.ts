import { isReviewError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Shape of one line when PROSE_REVIEW_STRUCTURED_LOGS=true */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: number;
    message: string;
  };
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PREFIX = "[prose-review]";

let minLevel: LogLevel = "info";
let structuredOutput = false;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/** Lowest level that reaches the console; applies to every logger */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function setStructuredOutput(enabled: boolean): void {
  structuredOutput = enabled;
}

function describeError(error: unknown): LogEntry["error"] {
  if (isReviewError(error)) return { name: error.name, code: error.code, message: error.message };
  if (error instanceof Error) return { name: error.name, message: error.message };
  return undefined;
}

function formatLine(level: LogLevel, message: string, context: Record<string, unknown>): string {
  const line = `${PREFIX} [${level.toUpperCase()}] ${message}`;
  const pairs = Object.entries(context).map(([k, v]) => `${k}=${JSON.stringify(v)}`);
  return pairs.length > 0 ? `${line} | ${pairs.join(" ")}` : line;
}

function write(level: LogLevel, line: string): void {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Console logger carrying a fixed context (service, run, rule) that is
 * merged into every line. Text lines read `[prose-review] [LEVEL] msg | k=v`.
 */
export class ContextLogger {
  constructor(private readonly context: Record<string, unknown> = {}) {}

  child(additionalContext: Record<string, unknown>): ContextLogger {
    return new ContextLogger({ ...this.context, ...additionalContext });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("warn", message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("error", message, context, error);
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;
    const context = { ...this.context, ...extra };

    if (structuredOutput) {
      const entry: LogEntry = { level, message, timestamp: new Date().toISOString() };
      if (Object.keys(context).length > 0) entry.context = context;
      const described = describeError(error);
      if (described) entry.error = described;
      write(level, JSON.stringify(entry));
      return;
    }

    write(level, formatLine(level, message, context));
    if (error !== undefined) {
      const detail = isReviewError(error) ? error.toLogMessage() : error instanceof Error ? error.stack : undefined;
      write(level, detail ?? String(error));
    }
  }
}

export const logger = new ContextLogger();

/** Logging surface pipeline stages accept; any object with these methods fits */
export type ReviewLogger = Pick<ContextLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(context: Record<string, unknown>): ContextLogger {
  return logger.child(context);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) setLogLevel(envLevel);
if (process.env.PROSE_REVIEW_STRUCTURED_LOGS === "true") setStructuredOutput(true);
