/**
 * ProgressTracker: one progress record per run.
 *
 * Exactly one ProgressWriter is handed out per run id, to the worker that owns
 * the run. Everyone else reads frozen snapshots, by polling `get` or through
 * `subscribe`. Last value wins; terminal states never change again.
 */

import { PROGRESS_PERCENT } from "../config/constants";
import { ErrorCode, ReviewError, getErrorCode } from "../errors";
import { logger as rootLogger, type ReviewLogger } from "../utils/logger";

export type ProgressStage = keyof typeof PROGRESS_PERCENT;
export type RunState = "running" | "completed" | "failed" | "cancelled";

export interface ProgressRecord {
  readonly runId: string;
  readonly stage: ProgressStage;
  readonly percentage: number;
  readonly message: string;
  readonly state: RunState;
  /** Epoch millis of the last write */
  readonly updatedAt: number;
  readonly error?: { readonly code: ErrorCode; readonly message: string };
}

export type ProgressListener = (record: ProgressRecord) => void;

export interface ProgressWriter {
  readonly runId: string;
  /** Returns false when the run is already terminal and the write was ignored */
  update(stage: ProgressStage, message?: string, percentage?: number): boolean;
  complete(message?: string): boolean;
  fail(error: unknown): boolean;
  cancel(message?: string): boolean;
}

export function isTerminal(state: RunState): boolean {
  return state !== "running";
}

export class ProgressTracker {
  private readonly records = new Map<string, ProgressRecord>();
  private readonly listeners = new Map<string, Set<ProgressListener>>();

  constructor(
    private readonly log: ReviewLogger = rootLogger,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Create the record for a new run and return its only writer.
   */
  open(runId: string, message = "Queued"): ProgressWriter {
    if (this.records.has(runId)) {
      throw new ReviewError(`Progress record for run ${runId} already exists`, ErrorCode.INTERNAL, {
        operation: "openProgress",
        runId,
      });
    }

    this.publish({
      runId,
      stage: "parsing",
      percentage: 0,
      message,
      state: "running",
      updatedAt: this.now(),
    });

    const write = (patch: Partial<Omit<ProgressRecord, "runId" | "updatedAt">>): boolean => {
      const current = this.records.get(runId);
      if (!current || isTerminal(current.state)) return false;
      const percentage = Math.min(100, Math.max(current.percentage, patch.percentage ?? current.percentage));
      this.publish({ ...current, ...patch, percentage, updatedAt: this.now() });
      return true;
    };

    return {
      runId,
      update: (stage, text, percentage) =>
        write({ stage, message: text ?? stageMessage(stage), percentage: percentage ?? PROGRESS_PERCENT[stage] }),
      complete: (text = "Review complete") =>
        write({ stage: "complete", message: text, percentage: PROGRESS_PERCENT.complete, state: "completed" }),
      fail: (error) =>
        write({
          message: "Review failed",
          state: "failed",
          error: {
            code: getErrorCode(error),
            message: error instanceof Error ? error.message : String(error),
          },
        }),
      cancel: (text = "Review cancelled") => write({ message: text, state: "cancelled" }),
    };
  }

  get(runId: string): ProgressRecord | undefined {
    return this.records.get(runId);
  }

  list(): ProgressRecord[] {
    return [...this.records.values()];
  }

  /**
   * Listen for every write to one run. The listener is called at once with the
   * current record when there is one. Returns the unsubscribe function.
   */
  subscribe(runId: string, listener: ProgressListener): () => void {
    let set = this.listeners.get(runId);
    if (!set) {
      set = new Set();
      this.listeners.set(runId, set);
    }
    set.add(listener);

    const current = this.records.get(runId);
    if (current) this.notify(listener, current);

    return () => {
      const active = this.listeners.get(runId);
      active?.delete(listener);
      if (active && active.size === 0) this.listeners.delete(runId);
    };
  }

  delete(runId: string): boolean {
    this.listeners.delete(runId);
    return this.records.delete(runId);
  }

  /** Drop terminal records last written more than `maxAgeMs` ago; returns their ids */
  sweep(maxAgeMs: number): string[] {
    const cutoff = this.now() - maxAgeMs;
    const removed: string[] = [];
    for (const record of this.records.values()) {
      if (isTerminal(record.state) && record.updatedAt <= cutoff) {
        removed.push(record.runId);
      }
    }
    for (const runId of removed) this.delete(runId);
    return removed;
  }

  private publish(record: ProgressRecord): void {
    const frozen = Object.freeze(record);
    this.records.set(record.runId, frozen);
    for (const listener of this.listeners.get(record.runId) ?? []) {
      this.notify(listener, frozen);
    }
  }

  private notify(listener: ProgressListener, record: ProgressRecord): void {
    try {
      listener(record);
    } catch (err) {
      this.log.warn("Progress listener threw", { runId: record.runId }, err);
    }
  }
}

function stageMessage(stage: ProgressStage): string {
  switch (stage) {
    case "parsing":
      return "Parsing document";
    case "segmentation":
      return "Splitting into sentences";
    case "rules":
      return "Running rules";
    case "scoring":
      return "Scoring";
    case "complete":
      return "Review complete";
  }
}
