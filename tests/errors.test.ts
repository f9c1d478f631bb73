import { describe, it, expect } from "vitest";
import {
  ReviewError,
  ReviewParseError,
  ReviewRuleError,
  ReviewValidationError,
  ReviewRunError,
  ErrorCode,
  wrapError,
  isReviewError,
  isCancellation,
  getErrorCode,
} from "../src/errors";

describe("ReviewError", () => {
  it("should create error with code and context", () => {
    const error = new ReviewError("Test error", ErrorCode.INTERNAL, { operation: "test", runId: "run-1" });

    expect(error.message).toBe("Test error");
    expect(error.code).toBe(ErrorCode.INTERNAL);
    expect(error.context.operation).toBe("test");
    expect(error.context.runId).toBe("run-1");
    expect(error.isRetryable).toBe(false);
  });

  it("should default the operation to unknown", () => {
    const error = new ReviewError("Test");
    expect(error.context.operation).toBe("unknown");
    expect(error.code).toBe(ErrorCode.UNKNOWN);
  });

  it("should serialize to JSON", () => {
    const cause = new Error("root cause");
    const error = new ReviewError("Test", ErrorCode.UNKNOWN, { operation: "test" }, { cause });
    const json = error.toJSON();

    expect(json.name).toBe("ReviewError");
    expect(json.code).toBe(ErrorCode.UNKNOWN);
    expect(json.message).toBe("Test");
    expect(json.cause).toBe("root cause");
  });

  it("should build a single-line log message", () => {
    const error = ReviewRuleError.timedOut("passive-voice", "sentence", 2000);
    expect(error.toLogMessage()).toBe(
      "[ReviewRuleError] | Code: 2002 | Op: runRule | Rule passive-voice timed out after 2000ms | Rule: passive-voice"
    );
  });
});

describe("ReviewParseError", () => {
  it("should create empty input error", () => {
    const error = ReviewParseError.emptyInput({ operation: "parseMarkup" });
    expect(error.code).toBe(ErrorCode.PARSE_EMPTY_INPUT);
    expect(error.context.operation).toBe("parseMarkup");
  });

  it("should record the rejected format", () => {
    const error = ReviewParseError.unsupportedFormat("docx");
    expect(error.code).toBe(ErrorCode.PARSE_UNSUPPORTED_FORMAT);
    expect(error.format).toBe("docx");
    expect(error.message).toBe("Unsupported document format: docx");
  });

  it("should keep the PDF failure cause", () => {
    const cause = new Error("bad xref table");
    const error = ReviewParseError.pdfFailed(cause);
    expect(error.code).toBe(ErrorCode.PARSE_PDF_FAILED);
    expect(error.format).toBe("pdf");
    expect(error.cause).toBe(cause);
  });
});

describe("ReviewRuleError", () => {
  it("should carry rule id and scope", () => {
    const error = ReviewRuleError.failed("long-sentences", "document", new Error("boom"));
    expect(error.code).toBe(ErrorCode.RULE_FAILED);
    expect(error.ruleId).toBe("long-sentences");
    expect(error.scope).toBe("document");
    expect(error.cause?.message).toBe("boom");
  });

  it("should create malformed output error", () => {
    const error = ReviewRuleError.malformedOutput("custom", "sentence", "expected an array");
    expect(error.code).toBe(ErrorCode.RULE_MALFORMED_OUTPUT);
    expect(error.message).toBe("Rule custom returned malformed output: expected an array");
  });

  it("should create duplicate id error", () => {
    const error = ReviewRuleError.duplicateId("conciseness");
    expect(error.code).toBe(ErrorCode.RULE_DUPLICATE_ID);
    expect(error.scope).toBeUndefined();
  });
});

describe("ReviewValidationError", () => {
  it("should create missing param error", () => {
    const error = ReviewValidationError.missingParam("content");
    expect(error.code).toBe(ErrorCode.VALIDATION_MISSING_PARAM);
    expect(error.field).toBe("content");
  });

  it("should create invalid policy error", () => {
    const error = ReviewValidationError.invalidPolicy("ruleConcurrency", 0);
    expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_POLICY);
    expect(error.field).toBe("ruleConcurrency");
    expect(error.value).toBe(0);
  });
});

describe("ReviewRunError", () => {
  it("should create cancelled error", () => {
    const error = ReviewRunError.cancelled("run-7");
    expect(error.code).toBe(ErrorCode.RUN_CANCELLED);
    expect(error.runId).toBe("run-7");
    expect(error.message).toBe("Review run run-7 was cancelled");
    expect(isCancellation(error)).toBe(true);
  });

  it("should not treat other errors as cancellation", () => {
    expect(isCancellation(ReviewRunError.notFound("run-7"))).toBe(false);
    expect(isCancellation(new Error("cancelled"))).toBe(false);
  });
});

describe("wrapError", () => {
  it("should wrap plain Error", () => {
    const original = new Error("Something went wrong");
    const wrapped = wrapError(original, ErrorCode.INTERNAL, { operation: "test" });

    expect(wrapped).toBeInstanceOf(ReviewError);
    expect(wrapped.message).toBe("Something went wrong");
    expect(wrapped.code).toBe(ErrorCode.INTERNAL);
    expect(wrapped.cause).toBe(original);
  });

  it("should wrap string error", () => {
    const wrapped = wrapError("String error", ErrorCode.UNKNOWN);
    expect(wrapped.message).toBe("String error");
  });

  it("should preserve the code of a ReviewError", () => {
    const original = ReviewParseError.emptyInput();
    const wrapped = wrapError(original, ErrorCode.INTERNAL, { runId: "run-1" });

    expect(wrapped.code).toBe(ErrorCode.PARSE_EMPTY_INPUT);
    expect(wrapped.context.runId).toBe("run-1");
  });
});

describe("isReviewError / getErrorCode", () => {
  it("should recognize subclasses", () => {
    expect(isReviewError(ReviewRunError.serviceUnavailable())).toBe(true);
    expect(isReviewError(new Error("Plain"))).toBe(false);
  });

  it("should return UNKNOWN for plain Error", () => {
    expect(getErrorCode(ReviewRuleError.duplicateId("x"))).toBe(ErrorCode.RULE_DUPLICATE_ID);
    expect(getErrorCode(new Error("Plain"))).toBe(ErrorCode.UNKNOWN);
  });
});
