/**
 * Shared shapes for one review run.
 *
 * Three coordinate spaces are in play:
 * - block space: offsets into one Block's plainText
 * - document space: offsets into the flattened document text
 * - sentence space: offsets into one Sentence's plainText
 * Conversions live in Normalizer.ts and PositionResolver.ts, and only go
 * block → document → sentence index.
 */

/** One text-bearing markup element (paragraph, heading, list item, quote, container). */
export interface Block {
  readonly plainText: string;
  readonly markupFragment: string;
  readonly order: number;
}

/** Segmenter output before document offsets are known. */
export interface SentenceDraft {
  readonly plainText: string;
  readonly markupFragment: string;
  readonly blockOrder: number;
  readonly wordCount: number;
}

export interface Sentence extends SentenceDraft {
  readonly index: number;
  readonly documentStart: number; // offset in flattened document text
  readonly documentEnd: number;   // exclusive
}

export type IssueScope = "document" | "sentence";

export interface Issue {
  readonly ruleId: string;
  readonly message: string;
  readonly matchedText: string;
  readonly start: number;
  readonly end: number;
  readonly scope: IssueScope;
  readonly sentenceHint: number | null;
  /** Rule family used for deduplication ("sentence-length", "passive-voice", ...) */
  readonly category?: string;
  readonly suggestion?: string;
}

export interface SentenceIssueMap {
  readonly bySentence: ReadonlyMap<number, readonly Issue[]>;
  readonly unassigned: readonly Issue[];
  readonly duplicatesRemoved: number;
}

/** Classic readability formulas scored over a single sentence; all 0 when it has no words */
export interface ReadabilityScores {
  readonly fleschReadingEase: number;
  readonly gunningFog: number;
  readonly smogIndex: number;
  readonly automatedReadabilityIndex: number;
}

export interface SentenceReport {
  readonly index: number;
  readonly plainText: string;
  readonly markupFragment: string;
  readonly documentStart: number;
  readonly documentEnd: number;
  readonly wordCount: number;
  readonly issueCount: number;
  readonly issues: readonly Issue[];
  readonly readability: ReadabilityScores;
}

export interface ReportSummary {
  readonly totalSentences: number;
  readonly totalIssues: number;
  readonly qualityScore: number;
  readonly totalWords: number;
  readonly blockCount: number;
  readonly duplicatesRemoved: number;
  readonly failedRules: readonly string[];
}

export interface DocumentReport {
  readonly sentences: readonly SentenceReport[];
  readonly unassigned: readonly Issue[];
  readonly summary: ReportSummary;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/** Structured issue a rule may return. Offsets are in the coordinate space of the text it was given. */
export interface RuleIssueRecord {
  message: string;
  text?: string;
  start?: number;
  end?: number;
  suggestion?: string;
  category?: string;
}

/** Bare strings are the legacy form: document scope, no position. */
export type RawRuleIssue = string | RuleIssueRecord;

export interface ReviewRule {
  readonly id: string;
  /** Family shared by rules that raise the same human-visible complaint. */
  readonly category?: string;
  /** Granularities the rule is meaningful at; both when omitted. */
  readonly scopes?: readonly IssueScope[];
  /** Sentence-scope runs are skipped unless the sentence mentions one of these. */
  readonly triggers?: readonly string[];
  run(text: string): readonly RawRuleIssue[] | Promise<readonly RawRuleIssue[]>;
}

// ---------------------------------------------------------------------------
// Collaborators outside the core
// ---------------------------------------------------------------------------

export type DocumentType = "technical" | "marketing" | "procedural" | "general";

/** Produces rewrite suggestions for one issue. Called by hosts, never by the engine. */
export interface SuggestionProvider {
  suggest(issueMessage: string, sentenceText: string, documentType: DocumentType): Promise<string>;
}

export interface ReviewRunSummary {
  readonly runId: string;
  readonly format: string;
  readonly totalSentences: number;
  readonly totalIssues: number;
  readonly qualityScore: number;
  readonly failedRules: readonly string[];
  readonly durationMs: number;
}

/** Usage-analytics persistence lives behind this interface. */
export interface ReviewAnalyticsSink {
  record(summary: ReviewRunSummary): Promise<void>;
}
