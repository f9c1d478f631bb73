/**
 * Base error class for all prose-review errors.
 * Carries a numeric code, the operation that failed and structured metadata.
 */

export enum ErrorCode {
  // Parse errors (1xxx)
  PARSE_FAILED = 1001,
  PARSE_EMPTY_INPUT = 1002,
  PARSE_UNSUPPORTED_FORMAT = 1003,
  PARSE_PDF_FAILED = 1004,
  PARSE_DOCX_FAILED = 1005,

  // Rule errors (2xxx)
  RULE_FAILED = 2001,
  RULE_TIMEOUT = 2002,
  RULE_MALFORMED_OUTPUT = 2003,
  RULE_DUPLICATE_ID = 2004,

  // Validation errors (3xxx)
  VALIDATION_MISSING_PARAM = 3001,
  VALIDATION_INVALID_FORMAT = 3002,
  VALIDATION_INVALID_POLICY = 3003,

  // Run lifecycle errors (4xxx)
  RUN_CANCELLED = 4001,
  RUN_NOT_FOUND = 4002,
  SERVICE_UNAVAILABLE = 4003,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  runId?: string;
  ruleId?: string;
  format?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

export class ReviewError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "ReviewError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
      ...context,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  toUserMessage(): string {
    return this.message;
  }

  /**
   * Single-line form for log output.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.runId) parts.push(`Run: ${this.context.runId}`);
    if (this.context.ruleId) parts.push(`Rule: ${this.context.ruleId}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Wrap an unknown thrown value in a ReviewError, keeping an existing one's code.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): ReviewError {
  if (error instanceof ReviewError) {
    return new ReviewError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new ReviewError(error.message, code, context, { cause: error });
  }

  return new ReviewError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isReviewError(error: unknown): error is ReviewError {
  return error instanceof ReviewError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (isReviewError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}
