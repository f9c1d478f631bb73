/**
 * PositionResolver: document offset → sentence index.
 *
 * Every issue ends up in exactly one place: one sentence's list, or the
 * document-level `unassigned` list. Nothing without a usable position is ever
 * parked on sentence 0.
 */

import { DEFAULT_REVIEW_POLICY } from "../config/ReviewPolicy";
import type { ReviewLogger } from "../utils/logger";
import { sentenceOffsetToDocument } from "./Normalizer";
import type { Issue, Sentence, SentenceIssueMap } from "./ReviewEngine.types";

interface Range {
  start: number;
  end: number;
}

/**
 * Sorted, non-overlapping sentence ranges with binary-search lookup.
 * Zero-width (synthetic) sentences are left out; nothing can land on them.
 */
export class SentenceIntervalIndex {
  private readonly entries: readonly Sentence[];

  constructor(sentences: readonly Sentence[]) {
    this.entries = sentences.filter((s) => s.documentEnd > s.documentStart);
  }

  /** First entry whose end lies past `offset` */
  private lowerBound(offset: number): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.entries[mid].documentEnd <= offset) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** Index of the first sentence overlapping [start, end), in document order */
  firstOverlap(start: number, end: number): number | null {
    if (end <= start) return null;
    const candidate = this.entries[this.lowerBound(start)];
    if (!candidate || candidate.documentStart >= end) return null;
    return candidate.index;
  }

  /** Index of the sentence containing a single offset */
  containing(offset: number): number | null {
    const candidate = this.entries[this.lowerBound(offset)];
    if (!candidate || candidate.documentStart > offset) return null;
    return candidate.index;
  }
}

/** Document space → sentence index; null for gaps, synthetic sentences and out-of-range offsets */
export function documentOffsetToSentence(sentences: readonly Sentence[], offset: number): number | null {
  return new SentenceIntervalIndex(sentences).containing(offset);
}

export interface ResolveOptions {
  /** Token overlap (Jaccard) at which two same-family issues count as one */
  duplicateOverlap?: number;
  logger?: ReviewLogger;
}

interface Placed {
  issue: Issue;
  /** Document-space range, when the issue has one */
  range: Range | null;
}

/** Every non-overlapping occurrence of `needle`; stops early once two are seen */
function occurrences(haystack: string, needle: string): number[] {
  const found: number[] = [];
  let from = 0;
  while (found.length < 2) {
    const at = haystack.indexOf(needle, from);
    if (at === -1) break;
    found.push(at);
    from = at + needle.length;
  }
  return found;
}

function resolveDocumentIssue(
  issue: Issue,
  documentText: string,
  index: SentenceIntervalIndex
): Placed & { target: number | null } {
  const { start, end } = issue;
  if (start < 0 || end > documentText.length || start > end) {
    return { issue, range: null, target: null };
  }

  if (start < end) {
    return { issue, range: { start, end }, target: index.firstOverlap(start, end) };
  }

  if (start === 0) {
    // Position-less: fall back to the matched text, but only when it is unambiguous
    const needle = issue.matchedText.trim();
    if (!needle) return { issue, range: null, target: null };
    const hits = occurrences(documentText, needle);
    if (hits.length !== 1) return { issue, range: null, target: null };
    const located: Issue = { ...issue, start: hits[0], end: hits[0] + needle.length };
    return {
      issue: located,
      range: { start: located.start, end: located.end },
      target: index.firstOverlap(located.start, located.end),
    };
  }

  return { issue, range: null, target: index.containing(start) };
}

function resolveSentenceIssue(
  issue: Issue,
  byIndex: ReadonlyMap<number, Sentence>
): Placed & { target: number | null } {
  const sentence = issue.sentenceHint === null ? undefined : byIndex.get(issue.sentenceHint);
  if (!sentence) return { issue, range: null, target: null };

  const range =
    issue.start < issue.end
      ? { start: sentenceOffsetToDocument(sentence, issue.start), end: sentenceOffsetToDocument(sentence, issue.end) }
      : null;
  return { issue, range: range && range.start < range.end ? range : null, target: sentence.index };
}

// ---------------------------------------------------------------------------
// Deduplication
// ---------------------------------------------------------------------------

function messagePattern(message: string): string {
  return message
    .toLowerCase()
    .replace(/"[^"]*"|“[^”]*”/g, '""')
    .replace(/\d+/g, "#")
    .replace(/\s+/g, " ")
    .trim();
}

const KEYWORD_FAMILIES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b(long|too long|sentence length|complex)\b/i, "sentence-length"],
  [/\bpassive\b/i, "passive-voice"],
  [/\brepeated\b/i, "repeated-word"],
  [/\b(wordy|redundant|concise|conciseness)\b/i, "conciseness"],
];

/**
 * Which human-visible complaint an issue is: the rule's declared category,
 * else a family recognized from the message, else the rule id.
 */
export function issueFamily(issue: Issue): string {
  if (issue.category) return issue.category;
  for (const [pattern, family] of KEYWORD_FAMILIES) {
    if (pattern.test(issue.message)) return family;
  }
  return issue.ruleId;
}

function tokens(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? []);
}

/** Jaccard similarity of word sets, or 1 when one set contains the other */
export function textOverlap(a: string, b: string): number {
  const left = tokens(a);
  const right = tokens(b);
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const token of left) if (right.has(token)) shared++;
  if (shared === Math.min(left.size, right.size)) return 1;
  return shared / (left.size + right.size - shared);
}

function isDuplicate(kept: Placed, candidate: Placed, threshold: number): boolean {
  if (issueFamily(kept.issue) !== issueFamily(candidate.issue)) return false;

  if (kept.range && candidate.range) {
    const disjoint = kept.range.end <= candidate.range.start || candidate.range.end <= kept.range.start;
    if (disjoint) return false;
  }

  const a = kept.issue.matchedText.trim();
  const b = candidate.issue.matchedText.trim();
  if (!a && !b) return messagePattern(kept.issue.message) === messagePattern(candidate.issue.message);
  if (!a || !b) return false;
  return textOverlap(a, b) >= threshold;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Associate issues with sentences. Input order is the merge order: when two
 * issues are duplicates, the later one is dropped.
 */
export function resolveIssues(
  issues: readonly Issue[],
  sentences: readonly Sentence[],
  documentText: string,
  options: ResolveOptions = {}
): SentenceIssueMap {
  const threshold = options.duplicateOverlap ?? DEFAULT_REVIEW_POLICY.duplicateOverlap;
  const index = new SentenceIntervalIndex(sentences);
  const byIndex = new Map(sentences.map((s) => [s.index, s] as const));

  const placed = new Map<number, Placed[]>();
  for (const sentence of sentences) placed.set(sentence.index, []);
  const unassigned: Placed[] = [];
  let duplicatesRemoved = 0;

  for (const raw of issues) {
    const resolved =
      raw.scope === "sentence" ? resolveSentenceIssue(raw, byIndex) : resolveDocumentIssue(raw, documentText, index);
    let bucket = resolved.target === null ? undefined : placed.get(resolved.target);

    if (!bucket) {
      options.logger?.debug("Issue has no resolvable position; keeping it at document level", {
        ruleId: raw.ruleId,
        scope: raw.scope,
        start: raw.start,
        end: raw.end,
      });
      bucket = unassigned;
    }

    if (bucket.some((kept) => isDuplicate(kept, resolved, threshold))) {
      duplicatesRemoved++;
      continue;
    }
    bucket.push({ issue: resolved.issue, range: resolved.range });
  }

  const bySentence = new Map<number, readonly Issue[]>();
  for (const [sentenceIndex, entries] of placed) {
    bySentence.set(sentenceIndex, Object.freeze(entries.map((entry) => entry.issue)));
  }

  return Object.freeze({
    bySentence,
    unassigned: Object.freeze(unassigned.map((entry) => entry.issue)),
    duplicatesRemoved,
  });
}
