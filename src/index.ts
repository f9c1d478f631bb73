import type { Plugin, IAgentRuntime } from "@elizaos/core";

import { DocumentReviewService } from "./services/DocumentReviewService";
import { ReviewDocumentAction } from "./actions/reviewDocumentAction";
import { GetReviewStatusAction } from "./actions/getReviewStatusAction";
import { CancelReviewAction } from "./actions/cancelReviewAction";
import { createLogger } from "./utils/logger";

async function initPlugin(_config: Record<string, string>, runtime: IAgentRuntime): Promise<void> {
  createLogger({ plugin: "prose-review" }).info("Plugin loaded", { agentId: runtime.agentId });
}

export const proseReviewPlugin: Plugin = {
  name: "plugin-prose-review",
  description:
    "Prose review - sentence-anchored writing-quality analysis. " +
    "Splits documents into sentences, runs pluggable style rules, and attaches every issue " +
    "to the sentence that caused it (or reports it at document level).",
  init: initPlugin,
  services: [DocumentReviewService],
  actions: [ReviewDocumentAction, GetReviewStatusAction, CancelReviewAction],
};

export default proseReviewPlugin;

// ============================================================================
// RE-EXPORTS (for external consumers)
// ============================================================================

export { DocumentReviewService, getDocumentReviewService, type StartReviewInput } from "./services/DocumentReviewService";
export { reviewDocument, reviewHtml, reviewMarkup, type PipelineOptions } from "./services/ReviewPipeline";
export { FormatDecoder, inferFormat, isDocumentFormat, DOCUMENT_FORMATS, type DocumentFormat } from "./services/FormatDecoder";
export { parseMarkup, type MarkupDocument } from "./services/MarkupParser";
export { extractBlocks } from "./services/BlockExtractor";
export { segmentBlock, segmentBlocks, isViableSentence } from "./services/SentenceSegmenter";
export { dictionaryTokenizer, regexTokenizer, type SentenceTokenizer } from "./services/SentenceTokenizer";
export {
  flattenBlocks,
  anchorSentences,
  blockOffsetToDocument,
  sentenceOffsetToDocument,
} from "./services/Normalizer";
export { runRules, normalizeRuleOutput, type RuleRunOptions, type RuleRunResult } from "./services/RuleRunner";
export { resolveIssues, documentOffsetToSentence, SentenceIntervalIndex } from "./services/PositionResolver";
export { aggregateReport, calculateQualityScore } from "./services/ScoreAggregator";
export { countSyllables, sentenceReadability } from "./services/Readability";
export {
  ProgressTracker,
  type ProgressRecord,
  type ProgressStage,
  type ProgressWriter,
  type RunState,
} from "./services/ProgressTracker";

export type {
  Block,
  Sentence,
  Issue,
  IssueScope,
  SentenceIssueMap,
  SentenceReport,
  ReadabilityScores,
  ReportSummary,
  DocumentReport,
  ReviewRule,
  RawRuleIssue,
  RuleIssueRecord,
  DocumentType,
  SuggestionProvider,
  ReviewAnalyticsSink,
  ReviewRunSummary,
} from "./services/ReviewEngine.types";

// Rules
export * from "./rules";

// Config
export { DEFAULT_REVIEW_POLICY, mergeReviewPolicy, type ReviewPolicy } from "./config/ReviewPolicy";

// Error types
export {
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
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { logger, createLogger, setLogLevel, setStructuredOutput, type LogLevel, type LogEntry } from "./utils/logger";
