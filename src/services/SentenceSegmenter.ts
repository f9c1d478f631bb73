/**
 * SentenceSegmenter: Block → sentence drafts with best-effort markup.
 *
 * Offsets are not assigned here; Normalizer anchors drafts in document space.
 */

import { DEFAULT_REVIEW_POLICY, type ReviewPolicy } from "../config/ReviewPolicy";
import { hasWords } from "./BlockExtractor";
import {
  dictionaryTokenizer,
  tokenizeSentences,
  type SentenceTokenizer,
} from "./SentenceTokenizer";
import type { Block, SentenceDraft } from "./ReviewEngine.types";
import type { ReviewLogger } from "../utils/logger";

export type SegmenterPolicy = Pick<ReviewPolicy, "minSentenceChars" | "minSentenceTokens" | "shortBlockChars">;

export interface SegmentOptions {
  policy?: SegmenterPolicy;
  /** null forces the regex fallback */
  tokenizer?: SentenceTokenizer | null;
  logger?: ReviewLogger;
}

export function countWords(text: string): number {
  const t = text.trim();
  if (!t) return 0;
  return t.split(/\s+/).length;
}

/**
 * Degenerate-fragment filter: long enough, at least N tokens, and not just
 * punctuation. Dropping "The" split off "The. Document follows." is the
 * case this exists for.
 */
export function isViableSentence(candidate: string, policy: SegmenterPolicy = DEFAULT_REVIEW_POLICY): boolean {
  const trimmed = candidate.trim();
  if (trimmed.length <= policy.minSentenceChars) return false;
  if (countWords(trimmed) < policy.minSentenceTokens) return false;
  return hasWords(trimmed);
}

const TRAILING_PUNCT = /[\s\p{P}]+$/u;

function stripTrailingPunctuation(text: string): string {
  return text.replace(TRAILING_PUNCT, "");
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Formatting-preservation heuristic, in priority order:
 * (a) single-boundary or short block → the block's own fragment;
 * (b) sentence is the block's prefix or suffix → the block's fragment, which may
 *     carry formatting belonging to a sibling sentence;
 * (c) otherwise the plain sentence in a bare <span>, inline formatting lost.
 */
export function recoverMarkup(
  sentence: string,
  block: Block,
  candidateCount: number,
  policy: SegmenterPolicy = DEFAULT_REVIEW_POLICY
): string {
  if (candidateCount <= 1 || block.plainText.length < policy.shortBlockChars) {
    return block.markupFragment;
  }

  const core = stripTrailingPunctuation(sentence);
  const blockCore = stripTrailingPunctuation(block.plainText);
  if (core && (blockCore.startsWith(core) || blockCore.endsWith(core))) {
    return block.markupFragment;
  }

  return `<span>${escapeHtml(sentence)}</span>`;
}

export function segmentBlock(block: Block, options: SegmentOptions = {}): SentenceDraft[] {
  const policy = options.policy ?? DEFAULT_REVIEW_POLICY;
  const primary = options.tokenizer === undefined ? dictionaryTokenizer : options.tokenizer;

  const { candidates } = tokenizeSentences(block.plainText, primary, (err) => {
    options.logger?.warn(
      "Primary sentence tokenizer failed, using regex fallback",
      { blockOrder: block.order, tokenizer: primary?.name },
      err
    );
  });

  const drafts: SentenceDraft[] = [];
  for (const candidate of candidates) {
    if (!isViableSentence(candidate, policy)) continue;
    drafts.push({
      plainText: candidate,
      markupFragment: recoverMarkup(candidate, block, candidates.length, policy),
      blockOrder: block.order,
      wordCount: countWords(candidate),
    });
  }
  return drafts;
}

export function segmentBlocks(blocks: readonly Block[], options: SegmentOptions = {}): SentenceDraft[] {
  return blocks.flatMap((block) => segmentBlock(block, options));
}
