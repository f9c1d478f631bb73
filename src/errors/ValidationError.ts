import { ReviewError, ErrorCode, type ErrorContext } from "./ReviewError";

/**
 * Error for input and configuration validation failures.
 */
export class ReviewValidationError extends ReviewError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ReviewValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static missingParam(paramName: string, context: Partial<ErrorContext> = {}) {
    return new ReviewValidationError(
      `Missing required parameter: ${paramName}`,
      ErrorCode.VALIDATION_MISSING_PARAM,
      { ...context, field: paramName }
    );
  }

  static invalidFormat(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new ReviewValidationError(
      `Invalid format for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { ...context, field, value: actual }
    );
  }

  static invalidPolicy(field: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new ReviewValidationError(
      `Invalid review policy value for ${field}`,
      ErrorCode.VALIDATION_INVALID_POLICY,
      { ...context, field, value: actual }
    );
  }
}
