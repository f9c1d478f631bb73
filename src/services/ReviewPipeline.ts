/**
 * ReviewPipeline: decode → parse → blocks → sentences → rules → resolve → score.
 *
 * One call owns its blocks, sentences and issues; nothing is shared between
 * runs. Progress is only written through the ProgressWriter the caller hands
 * in. Completion, failure and cancellation states are left to the owner of
 * the run, which stores the report first.
 */

import { PROGRESS_PERCENT } from "../config/constants";
import { DEFAULT_REVIEW_POLICY, type ReviewPolicy } from "../config/ReviewPolicy";
import { ReviewRunError } from "../errors";
import { createDefaultRegistry, type RuleRegistry } from "../rules/RuleRegistry";
import { logger as rootLogger, type ReviewLogger } from "../utils/logger";
import { extractBlocks } from "./BlockExtractor";
import { FormatDecoder, type DecodeInput } from "./FormatDecoder";
import { parseMarkup, type MarkupDocument } from "./MarkupParser";
import { anchorSentences, flattenBlocks } from "./Normalizer";
import { resolveIssues } from "./PositionResolver";
import type { ProgressStage, ProgressWriter } from "./ProgressTracker";
import type { DocumentReport, ReviewRule } from "./ReviewEngine.types";
import { runRules } from "./RuleRunner";
import { aggregateReport } from "./ScoreAggregator";
import { segmentBlocks } from "./SentenceSegmenter";
import type { SentenceTokenizer } from "./SentenceTokenizer";

export interface PipelineOptions {
  rules?: RuleRegistry | readonly ReviewRule[];
  policy?: ReviewPolicy;
  /** null forces the regex sentence fallback */
  tokenizer?: SentenceTokenizer | null;
  progress?: ProgressWriter;
  isCancelled?: () => boolean;
  logger?: ReviewLogger;
  decoder?: FormatDecoder;
}

class PipelineRun {
  private readonly log: ReviewLogger;
  private readonly policy: ReviewPolicy;

  constructor(private readonly options: PipelineOptions) {
    this.log = options.logger ?? rootLogger;
    this.policy = options.policy ?? DEFAULT_REVIEW_POLICY;
  }

  stage(stage: ProgressStage, message?: string, percentage?: number): void {
    if (this.options.isCancelled?.()) {
      throw ReviewRunError.cancelled(this.options.progress?.runId);
    }
    this.options.progress?.update(stage, message, percentage);
  }

  async review(doc: MarkupDocument): Promise<DocumentReport> {
    const started = Date.now();

    this.stage("segmentation");
    const blocks = extractBlocks(doc);
    const drafts = segmentBlocks(blocks, {
      policy: this.policy,
      tokenizer: this.options.tokenizer,
      logger: this.log,
    });
    const flattened = flattenBlocks(blocks);
    const { sentences, synthetic } = anchorSentences(flattened, drafts, this.log);
    this.log.debug("Segmentation finished", {
      blocks: blocks.length,
      sentences: sentences.length,
      synthetic: synthetic.length,
    });

    this.stage("rules");
    const span = PROGRESS_PERCENT.scoring - PROGRESS_PERCENT.rules;
    const run = await runRules(this.options.rules ?? createDefaultRegistry(), flattened.text, sentences, {
      scopes: this.policy.scopes,
      concurrency: this.policy.ruleConcurrency,
      timeoutMs: this.policy.ruleTimeoutMs,
      isCancelled: this.options.isCancelled,
      logger: this.log,
      onProgress: (done, total) => {
        const percentage = PROGRESS_PERCENT.rules + Math.floor((span * done) / Math.max(total, 1));
        this.options.progress?.update("rules", `Ran ${done} of ${total} rule checks`, Math.min(percentage, PROGRESS_PERCENT.scoring - 1));
      },
    });

    this.stage("scoring");
    const resolved = resolveIssues(run.issues, sentences, flattened.text, {
      duplicateOverlap: this.policy.duplicateOverlap,
      logger: this.log,
    });
    const report = aggregateReport({ sentences, resolved, blocks, failedRules: run.failedRules });

    this.log.info("Review finished", {
      sentences: report.summary.totalSentences,
      issues: report.summary.totalIssues,
      unassigned: report.unassigned.length,
      qualityScore: report.summary.qualityScore,
      failedRules: run.failedRules.length,
      durationMs: Date.now() - started,
    });
    return report;
  }
}

/** Review an already parsed markup tree */
export function reviewMarkup(doc: MarkupDocument, options: PipelineOptions = {}): Promise<DocumentReport> {
  return new PipelineRun(options).review(doc);
}

/** Review normalized HTML */
export async function reviewHtml(html: string, options: PipelineOptions = {}): Promise<DocumentReport> {
  const run = new PipelineRun(options);
  run.stage("parsing");
  return run.review(parseMarkup(html));
}

/** Review an uploaded document in any supported format */
export async function reviewDocument(input: DecodeInput, options: PipelineOptions = {}): Promise<DocumentReport> {
  const run = new PipelineRun(options);
  run.stage("parsing", `Decoding ${input.format} document`);
  const html = await (options.decoder ?? new FormatDecoder()).decode(input);
  return run.review(parseMarkup(html));
}
