/**
 * Centralized constants for prose-review.
 */

export const SEGMENTER_DEFAULTS = {
  /** A sentence candidate must be longer than this (trimmed) to survive */
  MIN_SENTENCE_CHARS: 3,
  /** ...and carry at least this many whitespace-separated tokens */
  MIN_SENTENCE_TOKENS: 2,
  /** Blocks shorter than this keep their full markup for every sentence */
  SHORT_BLOCK_CHARS: 200,
} as const;

export const RUNNER_DEFAULTS = {
  CONCURRENCY: 4,
  RULE_TIMEOUT_MS: 2_000,
} as const;

export const RESOLVER_DEFAULTS = {
  /** Token Jaccard at or above which two matched texts count as the same complaint */
  DUPLICATE_OVERLAP: 0.6,
} as const;

export const SERVICE_DEFAULTS = {
  /** Finished runs stay pollable this long */
  RESULT_TTL_MS: 10 * 60 * 1000,
  /** Sweep finished runs every five minutes */
  SWEEP_CRON: "*/5 * * * *",
} as const;

/** Coarse progress checkpoints, by stage */
export const PROGRESS_PERCENT = {
  parsing: 10,
  segmentation: 30,
  rules: 50,
  scoring: 90,
  complete: 100,
} as const;
