import { describe, it, expect, vi, beforeEach } from "vitest";
import * as cron from "node-cron";
import { createMockRuntime } from "./setup";
import { DocumentReviewService, getDocumentReviewService } from "../src/services/DocumentReviewService";
import { ErrorCode, ReviewRunError, ReviewValidationError } from "../src/errors";
import type { ReviewRule } from "../src/services/ReviewEngine.types";

async function startService(settings: Record<string, unknown> = {}) {
  const runtime = createMockRuntime({ character: { name: "Tester", settings } });
  return DocumentReviewService.start(runtime as any);
}

describe("DocumentReviewService", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("initialize", () => {
    it("merges character settings over the default policy", async () => {
      const service = await startService({ proseReview: { ruleTimeoutMs: "500", scopes: ["sentence"] } });
      const policy = service.getPolicy();
      expect(policy.ruleTimeoutMs).toBe(500);
      expect(policy.scopes).toEqual(["sentence"]);
      expect(policy.ruleConcurrency).toBe(4);
    });

    it("schedules the sweep with the configured expression", async () => {
      await startService({ proseReview: { sweepCron: "0 * * * *" } });
      expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith("0 * * * *", expect.any(Function));
    });

    it("uses the default sweep schedule", async () => {
      await startService();
      expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith("*/5 * * * *", expect.any(Function));
    });

    it("skips scheduling for an invalid expression", async () => {
      vi.mocked(cron.validate).mockReturnValueOnce(false);
      await startService({ proseReview: { sweepCron: "not a schedule" } });
      expect(vi.mocked(cron.schedule)).not.toHaveBeenCalled();
    });

    it("rejects invalid policy settings", async () => {
      await expect(startService({ proseReview: { ruleConcurrency: 0 } })).rejects.toBeInstanceOf(ReviewValidationError);
    });
  });

  describe("runs", () => {
    it("reviews a document to completion", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "Enable autostart." });

      const record = await service.waitForRun(runId);
      expect(record).toMatchObject({ runId, state: "completed", stage: "complete", percentage: 100 });
      expect(service.getReport(runId)?.summary).toMatchObject({
        totalSentences: 1,
        totalIssues: 0,
        qualityScore: 100,
      });
    });

    it("infers the format from the file name", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "# Title\n\nEnable autostart.", fileName: "notes.md" });
      await service.waitForRun(runId);
      expect(service.getReport(runId)?.sentences.map((s) => s.markupFragment)).toEqual(["<p>Enable autostart.</p>"]);
    });

    it("cancels a run that has just started", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "Enable autostart." });

      expect(service.cancel(runId)).toBe(true);
      const record = await service.waitForRun(runId);
      expect(record.state).toBe("cancelled");
      expect(service.getReport(runId)).toBeNull();
    });

    it("does not cancel a finished run", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "Enable autostart." });
      await service.waitForRun(runId);
      expect(service.cancel(runId)).toBe(false);
      expect(service.getProgress(runId)?.state).toBe("completed");
    });

    it("records a failed run with the error code", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "binary", format: "doc" });

      const record = await service.waitForRun(runId);
      expect(record.state).toBe("failed");
      expect(record.error).toEqual({ code: ErrorCode.PARSE_UNSUPPORTED_FORMAT, message: "Unsupported document format: doc" });
      expect(service.getReport(runId)).toBeNull();
    });

    it("rejects an invalid per-run policy before starting", async () => {
      const service = await startService();
      expect(() => service.startReview({ content: "Enable autostart.", policy: { scopes: [] } })).toThrow(
        ReviewValidationError
      );
    });

    it("throws for unknown runs", async () => {
      const service = await startService();
      expect(() => service.getReport("missing")).toThrow(ReviewRunError);
      expect(() => service.cancel("missing")).toThrow("No review run found with id missing");
      expect(() => service.subscribe("missing", vi.fn())).toThrow(ReviewRunError);
      expect(service.getProgress("missing")).toBeUndefined();
    });

    it("notifies subscribers until the run ends", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "Enable autostart." });
      const listener = vi.fn();
      service.subscribe(runId, listener);

      await service.waitForRun(runId);
      const states = listener.mock.calls.map(([record]) => record.state);
      expect(states[0]).toBe("running");
      expect(states[states.length - 1]).toBe("completed");
    });
  });

  describe("rules", () => {
    it("runs registered rules alongside the built-in ones", async () => {
      const service = await startService();
      const rule: ReviewRule = {
        id: "autostart-term",
        category: "terminology",
        run: (text) => {
          const at = text.indexOf("autostart");
          return at === -1 ? [] : [{ message: "Use 'automatic start'", text: "autostart", start: at, end: at + 9 }];
        },
      };
      service.registerRule(rule);
      expect(service.listRules()).toEqual([
        "long-sentences",
        "complex-sentences",
        "passive-voice",
        "repeated-words",
        "conciseness",
        "autostart-term",
      ]);

      const runId = service.startReview({ content: "Enable autostart." });
      await service.waitForRun(runId);
      const issues = service.getReport(runId)?.sentences[0].issues ?? [];
      expect(issues.map((i) => [i.ruleId, i.start, i.end])).toEqual([["autostart-term", 7, 16]]);
    });

    it("refuses a duplicate rule id", async () => {
      const service = await startService();
      expect(() => service.registerRule({ id: "passive-voice", run: () => [] })).toThrow(
        expect.objectContaining({ code: ErrorCode.RULE_DUPLICATE_ID })
      );
    });
  });

  describe("analytics", () => {
    it("records a summary of each completed run", async () => {
      const service = await startService();
      const record = vi.fn().mockResolvedValue(undefined);
      service.setAnalyticsSink({ record });

      const runId = service.startReview({ content: "Enable autostart." });
      await service.waitForRun(runId);
      expect(record).toHaveBeenCalledWith(
        expect.objectContaining({
          runId,
          format: "text",
          totalSentences: 1,
          totalIssues: 0,
          qualityScore: 100,
          failedRules: [],
        })
      );
    });

    it("keeps the run completed when the sink rejects", async () => {
      const service = await startService();
      service.setAnalyticsSink({ record: vi.fn().mockRejectedValue(new Error("store down")) });

      const runId = service.startReview({ content: "Enable autostart." });
      const final = await service.waitForRun(runId);
      expect(final.state).toBe("completed");
    });
  });

  describe("lifecycle", () => {
    it("sweeps finished runs", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "Enable autostart." });
      await service.waitForRun(runId);

      expect(service.sweepFinished(0)).toEqual([runId]);
      expect(service.getProgress(runId)).toBeUndefined();
      expect(() => service.getReport(runId)).toThrow(ReviewRunError);
    });

    it("keeps finished runs younger than the TTL", async () => {
      const service = await startService();
      const runId = service.startReview({ content: "Enable autostart." });
      await service.waitForRun(runId);
      expect(service.sweepFinished()).toEqual([]);
    });

    it("stops the sweep and cancels active runs", async () => {
      const service = await startService();
      const task = vi.mocked(cron.schedule).mock.results[0].value;
      const runId = service.startReview({ content: "Enable autostart." });

      await service.stop();
      expect(task.stop).toHaveBeenCalled();
      expect(service.getProgress(runId)?.state).toBe("cancelled");
    });
  });

  it("is found on the runtime by service type", async () => {
    const service = await startService();
    const runtime = createMockRuntime({ getService: vi.fn().mockReturnValue(service) });
    expect(getDocumentReviewService(runtime as any)).toBe(service);
    expect(runtime.getService).toHaveBeenCalledWith("document-review");

    const other = createMockRuntime({ getService: vi.fn().mockReturnValue({}) });
    expect(getDocumentReviewService(other as any)).toBeNull();
  });
});
