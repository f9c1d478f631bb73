import { ReviewValidationError } from "../errors";
import {
  RESOLVER_DEFAULTS,
  RUNNER_DEFAULTS,
  SEGMENTER_DEFAULTS,
  SERVICE_DEFAULTS,
} from "./constants";
import type { IssueScope } from "../services/ReviewEngine.types";

export interface ReviewPolicy {
  minSentenceChars: number;
  minSentenceTokens: number;
  shortBlockChars: number;
  ruleConcurrency: number;
  ruleTimeoutMs: number;
  duplicateOverlap: number;
  resultTtlMs: number;
  /** Which granularities rules run at; skipping one saves time on long documents */
  scopes: IssueScope[];
}

export const DEFAULT_REVIEW_POLICY: ReviewPolicy = {
  minSentenceChars: SEGMENTER_DEFAULTS.MIN_SENTENCE_CHARS,
  minSentenceTokens: SEGMENTER_DEFAULTS.MIN_SENTENCE_TOKENS,
  shortBlockChars: SEGMENTER_DEFAULTS.SHORT_BLOCK_CHARS,
  ruleConcurrency: RUNNER_DEFAULTS.CONCURRENCY,
  ruleTimeoutMs: RUNNER_DEFAULTS.RULE_TIMEOUT_MS,
  duplicateOverlap: RESOLVER_DEFAULTS.DUPLICATE_OVERLAP,
  resultTtlMs: SERVICE_DEFAULTS.RESULT_TTL_MS,
  scopes: ["document", "sentence"],
};

type NumericField = Exclude<keyof ReviewPolicy, "scopes">;

const NUMERIC_FIELDS: Record<NumericField, { min: number; max: number; integer: boolean }> = {
  minSentenceChars: { min: 0, max: 1_000, integer: true },
  minSentenceTokens: { min: 1, max: 100, integer: true },
  shortBlockChars: { min: 0, max: 1_000_000, integer: true },
  ruleConcurrency: { min: 1, max: 64, integer: true },
  ruleTimeoutMs: { min: 1, max: 10 * 60 * 1000, integer: true },
  duplicateOverlap: { min: 0, max: 1, integer: false },
  resultTtlMs: { min: 0, max: 24 * 60 * 60 * 1000, integer: true },
};

const NUMERIC_FIELD_NAMES: readonly NumericField[] = [
  "minSentenceChars",
  "minSentenceTokens",
  "shortBlockChars",
  "ruleConcurrency",
  "ruleTimeoutMs",
  "duplicateOverlap",
  "resultTtlMs",
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScope(value: unknown): value is IssueScope {
  return value === "document" || value === "sentence";
}

function readNumber(field: NumericField, raw: unknown): number {
  // Character settings often arrive as strings
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  const bounds = NUMERIC_FIELDS[field];
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < bounds.min ||
    value > bounds.max ||
    (bounds.integer && !Number.isInteger(value))
  ) {
    throw ReviewValidationError.invalidPolicy(field, raw, { operation: "mergeReviewPolicy" });
  }
  return value;
}

/**
 * Merge untrusted overrides (agent character settings, caller options) over a base policy.
 * Unknown keys are ignored; known keys with bad values throw.
 */
export function mergeReviewPolicy(
  overrides: unknown,
  base: ReviewPolicy = DEFAULT_REVIEW_POLICY
): ReviewPolicy {
  const merged: ReviewPolicy = { ...base, scopes: [...base.scopes] };
  if (overrides === undefined || overrides === null) return merged;
  if (!isRecord(overrides)) {
    throw ReviewValidationError.invalidFormat("reviewPolicy", "an object", overrides, {
      operation: "mergeReviewPolicy",
    });
  }

  for (const field of NUMERIC_FIELD_NAMES) {
    if (overrides[field] !== undefined) {
      merged[field] = readNumber(field, overrides[field]);
    }
  }

  const scopes = overrides.scopes;
  if (scopes !== undefined) {
    if (!Array.isArray(scopes) || scopes.length === 0 || !scopes.every(isScope)) {
      throw ReviewValidationError.invalidPolicy("scopes", scopes, { operation: "mergeReviewPolicy" });
    }
    merged.scopes = [...new Set(scopes)];
  }

  return merged;
}
