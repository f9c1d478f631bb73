import { Service, type IAgentRuntime } from "@elizaos/core";
import * as cron from "node-cron";
import { randomUUID } from "crypto";

import { SERVICE_DEFAULTS } from "../config/constants";
import { DEFAULT_REVIEW_POLICY, isRecord, mergeReviewPolicy, type ReviewPolicy } from "../config/ReviewPolicy";
import { ReviewRunError, isCancellation, wrapError, ErrorCode } from "../errors";
import { createDefaultRegistry, type RuleRegistry } from "../rules/RuleRegistry";
import { createLogger, type ReviewLogger } from "../utils/logger";
import { FormatDecoder, inferFormat, type DocumentFormat } from "./FormatDecoder";
import { ProgressTracker, type ProgressListener, type ProgressRecord } from "./ProgressTracker";
import type { DocumentReport, ReviewAnalyticsSink, ReviewRule } from "./ReviewEngine.types";
import { reviewDocument } from "./ReviewPipeline";

export interface StartReviewInput {
  content: string | Uint8Array;
  /** Takes precedence over the file name's extension */
  format?: DocumentFormat;
  fileName?: string;
  /** Per-run overrides, merged over the service policy */
  policy?: unknown;
}

interface RunEntry {
  readonly runId: string;
  readonly format: DocumentFormat;
  cancelRequested: boolean;
  report: DocumentReport | null;
  /** Settles when the run reaches a terminal state; never rejects */
  done: Promise<void>;
}

/**
 * DocumentReviewService
 * - Owns background review runs: start, poll by id, subscribe, cancel, fetch the report.
 * - Each run's progress record is written only by that run's worker.
 * - Finished runs are dropped after `resultTtlMs` by a node-cron sweep.
 *
 * Settings are read from `character.settings.proseReview` (policy fields plus
 * `sweepCron`).
 */
export class DocumentReviewService extends Service {
  static readonly serviceType = "document-review";

  override capabilityDescription =
    "Reviews documents for writing-quality issues and anchors each issue to the sentence that caused it.";

  private policy: ReviewPolicy = DEFAULT_REVIEW_POLICY;
  private readonly registry: RuleRegistry = createDefaultRegistry();
  private readonly decoder = new FormatDecoder();
  private readonly log: ReviewLogger = createLogger({ service: DocumentReviewService.serviceType });
  private readonly tracker = new ProgressTracker(this.log);
  private readonly runs = new Map<string, RunEntry>();
  private sweepTask: cron.ScheduledTask | null = null;
  private analytics: ReviewAnalyticsSink | null = null;

  /** Required by ElizaOS core (service registration). */
  static async start(runtime: IAgentRuntime): Promise<DocumentReviewService> {
    const svc = new DocumentReviewService(runtime);
    await svc.initialize(runtime);
    return svc;
  }

  /**
   * Apply character settings and schedule the sweep. Safe to call again; the
   * previous schedule is replaced.
   */
  async initialize(runtime: IAgentRuntime): Promise<void> {
    const charSettings: unknown = runtime.character?.settings;
    const settings = isRecord(charSettings) && isRecord(charSettings.proseReview) ? charSettings.proseReview : {};

    this.policy = mergeReviewPolicy(settings);

    const expression = typeof settings.sweepCron === "string" ? settings.sweepCron : SERVICE_DEFAULTS.SWEEP_CRON;
    this.sweepTask?.stop();
    this.sweepTask = null;
    if (!cron.validate(expression)) {
      this.log.warn("Invalid sweep cron expression; finished runs will not be swept", { expression });
      return;
    }
    this.sweepTask = cron.schedule(expression, () => {
      const removed = this.sweepFinished();
      if (removed.length > 0) this.log.debug("Swept finished review runs", { count: removed.length });
    });

    this.log.info("Document review service ready", {
      rules: this.registry.size,
      sweepCron: expression,
      resultTtlMs: this.policy.resultTtlMs,
    });
  }

  override async stop(): Promise<void> {
    this.sweepTask?.stop();
    this.sweepTask = null;

    const active = [...this.runs.values()].filter((entry) => this.isRunning(entry.runId));
    for (const entry of active) entry.cancelRequested = true;
    await Promise.all(active.map((entry) => entry.done));
    this.log.info("Document review service stopped", { cancelledRuns: active.length });
  }

  getPolicy(): ReviewPolicy {
    return { ...this.policy, scopes: [...this.policy.scopes] };
  }

  registerRule(rule: ReviewRule): void {
    this.registry.register(rule);
  }

  listRules(): string[] {
    return this.registry.list().map((rule) => rule.id);
  }

  setAnalyticsSink(sink: ReviewAnalyticsSink | null): void {
    this.analytics = sink;
  }

  /**
   * Validate the request and start a background run. Returns the run id at
   * once; poll `getProgress` or `subscribe` for the outcome.
   */
  startReview(input: StartReviewInput): string {
    const format = input.format ?? (input.fileName ? inferFormat(input.fileName) : "text");
    const policy = mergeReviewPolicy(input.policy, this.policy);
    const runId = randomUUID();

    const writer = this.tracker.open(runId);
    const entry: RunEntry = {
      runId,
      format,
      cancelRequested: false,
      report: null,
      done: Promise.resolve(),
    };
    this.runs.set(runId, entry);

    const log = createLogger({ service: DocumentReviewService.serviceType, runId });
    const startedAt = Date.now();
    // The registry is snapshotted so rules registered mid-run do not change it
    const rules = this.registry.list();

    entry.done = reviewDocument(
      { content: input.content, format },
      {
        rules,
        policy,
        progress: writer,
        isCancelled: () => entry.cancelRequested,
        logger: log,
        decoder: this.decoder,
      }
    ).then(
      async (report) => {
        entry.report = report;
        writer.complete();
        await this.recordAnalytics(runId, format, report, Date.now() - startedAt, log);
      },
      (err: unknown) => {
        if (isCancellation(err)) {
          writer.cancel();
          log.info("Review cancelled");
          return;
        }
        const error = wrapError(err, ErrorCode.INTERNAL, { operation: "review", runId, format });
        writer.fail(error);
        log.error("Review failed", { format }, error);
      }
    );

    log.info("Review started", { format, bytes: input.content.length });
    return runId;
  }

  getProgress(runId: string): ProgressRecord | undefined {
    return this.tracker.get(runId);
  }

  subscribe(runId: string, listener: ProgressListener): () => void {
    this.requireRun(runId);
    return this.tracker.subscribe(runId, listener);
  }

  /** The report of a completed run; null while it runs or when it failed or was cancelled */
  getReport(runId: string): DocumentReport | null {
    return this.requireRun(runId).report;
  }

  /** Resolve with the terminal progress record once the run ends */
  async waitForRun(runId: string): Promise<ProgressRecord> {
    await this.requireRun(runId).done;
    const record = this.tracker.get(runId);
    if (!record) throw ReviewRunError.notFound(runId);
    return record;
  }

  /**
   * Ask a run to stop. The in-flight rule check finishes first. Returns false
   * when the run had already ended.
   */
  cancel(runId: string): boolean {
    const entry = this.requireRun(runId);
    if (!this.isRunning(runId)) return false;
    entry.cancelRequested = true;
    return true;
  }

  /** Forget finished runs older than the result TTL; returns their ids */
  sweepFinished(maxAgeMs: number = this.policy.resultTtlMs): string[] {
    const removed = this.tracker.sweep(maxAgeMs);
    for (const runId of removed) this.runs.delete(runId);
    return removed;
  }

  private isRunning(runId: string): boolean {
    return this.tracker.get(runId)?.state === "running";
  }

  private requireRun(runId: string): RunEntry {
    const entry = this.runs.get(runId);
    if (!entry) throw ReviewRunError.notFound(runId);
    return entry;
  }

  private async recordAnalytics(
    runId: string,
    format: DocumentFormat,
    report: DocumentReport,
    durationMs: number,
    log: ReviewLogger
  ): Promise<void> {
    if (!this.analytics) return;
    try {
      await this.analytics.record({
        runId,
        format,
        totalSentences: report.summary.totalSentences,
        totalIssues: report.summary.totalIssues,
        qualityScore: report.summary.qualityScore,
        failedRules: report.summary.failedRules,
        durationMs,
      });
    } catch (err) {
      log.warn("Analytics sink rejected the run summary", {}, err);
    }
  }
}

export function getDocumentReviewService(runtime: IAgentRuntime): DocumentReviewService | null {
  const service = runtime.getService(DocumentReviewService.serviceType);
  return service instanceof DocumentReviewService ? service : null;
}
