import { ReviewError, ErrorCode, type ErrorContext } from "./ReviewError";
import type { IssueScope } from "../services/ReviewEngine.types";

/**
 * One rule invocation failed. Never fatal: the runner logs it and counts the
 * invocation as zero issues.
 */
export class ReviewRuleError extends ReviewError {
  public readonly ruleId: string;
  public readonly scope?: IssueScope;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RULE_FAILED,
    context: Partial<ErrorContext> & { ruleId: string; scope?: IssueScope },
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ReviewRuleError";
    this.ruleId = context.ruleId;
    this.scope = context.scope;
  }

  static failed(ruleId: string, scope: IssueScope, cause?: Error) {
    return new ReviewRuleError(
      `Rule ${ruleId} threw during ${scope} analysis`,
      ErrorCode.RULE_FAILED,
      { operation: "runRule", ruleId, scope },
      { cause }
    );
  }

  static timedOut(ruleId: string, scope: IssueScope, timeoutMs: number) {
    return new ReviewRuleError(
      `Rule ${ruleId} timed out after ${timeoutMs}ms`,
      ErrorCode.RULE_TIMEOUT,
      { operation: "runRule", ruleId, scope, timeoutMs }
    );
  }

  static malformedOutput(ruleId: string, scope: IssueScope, detail: string) {
    return new ReviewRuleError(
      `Rule ${ruleId} returned malformed output: ${detail}`,
      ErrorCode.RULE_MALFORMED_OUTPUT,
      { operation: "runRule", ruleId, scope }
    );
  }

  static duplicateId(ruleId: string) {
    return new ReviewRuleError(
      `A rule with id "${ruleId}" is already registered`,
      ErrorCode.RULE_DUPLICATE_ID,
      { operation: "registerRule", ruleId }
    );
  }
}
