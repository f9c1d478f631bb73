/**
 * Normalizer: flattened document text and sentence anchoring.
 *
 * Blocks are joined with a single space. Sentences are anchored by searching
 * forward from a cursor that only ever moves right, so a sentence repeated
 * later in the document never re-anchors onto an earlier copy.
 */

import type { Block, Sentence, SentenceDraft } from "./ReviewEngine.types";
import type { ReviewLogger } from "../utils/logger";

export const BLOCK_SEPARATOR = " ";

export interface FlattenedDocument {
  readonly text: string;
  /** blockOffsets[order] = document offset where that block's text starts */
  readonly blockOffsets: readonly number[];
}

export function flattenBlocks(blocks: readonly Block[]): FlattenedDocument {
  const parts: string[] = [];
  const blockOffsets: number[] = [];
  let offset = 0;

  for (const block of blocks) {
    if (parts.length > 0) {
      parts.push(BLOCK_SEPARATOR);
      offset += BLOCK_SEPARATOR.length;
    }
    blockOffsets[block.order] = offset;
    parts.push(block.plainText);
    offset += block.plainText.length;
  }

  return { text: parts.join(""), blockOffsets };
}

/** Block space → document space. Returns null for an unknown block. */
export function blockOffsetToDocument(
  doc: FlattenedDocument,
  blockOrder: number,
  blockOffset: number
): number | null {
  const base = doc.blockOffsets[blockOrder];
  if (base === undefined || blockOffset < 0) return null;
  return base + blockOffset;
}

/** Sentence space → document space */
export function sentenceOffsetToDocument(sentence: Sentence, sentenceOffset: number): number {
  const clamped = Math.min(Math.max(sentenceOffset, 0), sentence.documentEnd - sentence.documentStart);
  return sentence.documentStart + clamped;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface Match {
  start: number;
  end: number;
}

/**
 * Forward search for a sentence: exact first, then tolerant of whitespace
 * differences between the tokenizer's output and the flattened text.
 */
export function findForward(haystack: string, needle: string, cursor: number): Match | null {
  const exact = haystack.indexOf(needle, cursor);
  if (exact !== -1) return { start: exact, end: exact + needle.length };

  const tokens = needle.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;
  const pattern = new RegExp(tokens.map(escapeRegExp).join("\\s+"), "g");
  pattern.lastIndex = cursor;
  const loose = pattern.exec(haystack);
  if (!loose) return null;
  return { start: loose.index, end: loose.index + loose[0].length };
}

export interface AnchorResult {
  sentences: Sentence[];
  /** Indexes of sentences that could not be found and got a synthetic range */
  synthetic: number[];
}

/**
 * Assign indexes and document offsets. A sentence that cannot be found from
 * the cursor gets a zero-width range at the cursor and anchoring continues.
 */
export function anchorSentences(
  doc: FlattenedDocument,
  drafts: readonly SentenceDraft[],
  logger?: ReviewLogger
): AnchorResult {
  const sentences: Sentence[] = [];
  const synthetic: number[] = [];
  let cursor = 0;

  for (const draft of drafts) {
    const index = sentences.length;
    // The sentence cannot start before its own block
    const blockStart = doc.blockOffsets[draft.blockOrder] ?? 0;
    const from = Math.max(cursor, blockStart);
    const match = findForward(doc.text, draft.plainText, from);

    if (match) {
      sentences.push({ ...draft, index, documentStart: match.start, documentEnd: match.end });
      cursor = match.end;
      continue;
    }

    logger?.warn("Sentence not found in flattened text; using synthetic offset", {
      sentenceIndex: index,
      cursor,
    });
    synthetic.push(index);
    sentences.push({ ...draft, index, documentStart: cursor, documentEnd: cursor });
  }

  return { sentences, synthetic };
}
