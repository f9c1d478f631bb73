import { describe, it, expect } from "vitest";
import { DEFAULT_REVIEW_POLICY, mergeReviewPolicy } from "../src/config/ReviewPolicy";
import { ErrorCode, ReviewValidationError } from "../src/errors";

describe("mergeReviewPolicy", () => {
  it("returns a copy of the defaults for missing overrides", () => {
    const merged = mergeReviewPolicy(undefined);
    expect(merged).toEqual(DEFAULT_REVIEW_POLICY);
    expect(merged).not.toBe(DEFAULT_REVIEW_POLICY);
    expect(merged.scopes).not.toBe(DEFAULT_REVIEW_POLICY.scopes);
  });

  it("has the documented defaults", () => {
    expect(DEFAULT_REVIEW_POLICY.minSentenceChars).toBe(3);
    expect(DEFAULT_REVIEW_POLICY.minSentenceTokens).toBe(2);
    expect(DEFAULT_REVIEW_POLICY.shortBlockChars).toBe(200);
    expect(DEFAULT_REVIEW_POLICY.ruleConcurrency).toBe(4);
    expect(DEFAULT_REVIEW_POLICY.ruleTimeoutMs).toBe(2000);
    expect(DEFAULT_REVIEW_POLICY.duplicateOverlap).toBe(0.6);
    expect(DEFAULT_REVIEW_POLICY.scopes).toEqual(["document", "sentence"]);
  });

  it("overlays numeric fields and accepts numeric strings", () => {
    const merged = mergeReviewPolicy({ ruleConcurrency: 8, ruleTimeoutMs: "500" });
    expect(merged.ruleConcurrency).toBe(8);
    expect(merged.ruleTimeoutMs).toBe(500);
    expect(merged.minSentenceChars).toBe(3);
  });

  it("ignores unknown keys", () => {
    const merged = mergeReviewPolicy({ sweepCron: "* * * * *" });
    expect(merged).toEqual(DEFAULT_REVIEW_POLICY);
  });

  it("merges over a custom base", () => {
    const base = mergeReviewPolicy({ ruleConcurrency: 2 });
    const merged = mergeReviewPolicy({ scopes: ["sentence"] }, base);
    expect(merged.ruleConcurrency).toBe(2);
    expect(merged.scopes).toEqual(["sentence"]);
  });

  it("dedupes scopes", () => {
    expect(mergeReviewPolicy({ scopes: ["document", "document"] }).scopes).toEqual(["document"]);
  });

  it("rejects out-of-range and non-integer values", () => {
    expect(() => mergeReviewPolicy({ ruleConcurrency: 0 })).toThrow(ReviewValidationError);
    expect(() => mergeReviewPolicy({ minSentenceTokens: 1.5 })).toThrow(ReviewValidationError);
    expect(() => mergeReviewPolicy({ duplicateOverlap: 2 })).toThrow(ReviewValidationError);
    expect(() => mergeReviewPolicy({ ruleTimeoutMs: "soon" })).toThrow(ReviewValidationError);
  });

  it("reports the offending field", () => {
    try {
      mergeReviewPolicy({ scopes: ["paragraph"] });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ReviewValidationError);
      const error = err as ReviewValidationError;
      expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_POLICY);
      expect(error.field).toBe("scopes");
    }
  });

  it("rejects a non-object", () => {
    expect(() => mergeReviewPolicy("fast")).toThrow(/expected an object/);
    expect(() => mergeReviewPolicy([1, 2])).toThrow(ReviewValidationError);
  });
});
