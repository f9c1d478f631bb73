import { ReviewError, ErrorCode, type ErrorContext } from "./ReviewError";

/**
 * Errors about the lifecycle of a review run rather than its content.
 */
export class ReviewRunError extends ReviewError {
  public readonly runId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ReviewRunError";
    this.runId = context.runId;
  }

  static cancelled(runId?: string) {
    return new ReviewRunError(
      runId ? `Review run ${runId} was cancelled` : "Review run was cancelled",
      ErrorCode.RUN_CANCELLED,
      { operation: "review", runId }
    );
  }

  static notFound(runId: string) {
    return new ReviewRunError(
      `No review run found with id ${runId}`,
      ErrorCode.RUN_NOT_FOUND,
      { operation: "lookupRun", runId }
    );
  }

  static serviceUnavailable(context: Partial<ErrorContext> = {}) {
    return new ReviewRunError(
      "Document review service is not registered on this runtime",
      ErrorCode.SERVICE_UNAVAILABLE,
      context
    );
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof ReviewRunError && error.code === ErrorCode.RUN_CANCELLED;
}
