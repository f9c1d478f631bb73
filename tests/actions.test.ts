import { describe, it, expect, vi, beforeEach } from "vitest";
import { ReviewDocumentAction } from "../src/actions/reviewDocumentAction";
import { GetReviewStatusAction } from "../src/actions/getReviewStatusAction";
import { CancelReviewAction } from "../src/actions/cancelReviewAction";
import { DocumentReviewService } from "../src/services/DocumentReviewService";
import { createMessage, createMockRuntime } from "./setup";

async function runtimeWithService() {
  const base = createMockRuntime();
  const service = await DocumentReviewService.start(base as any);
  const runtime = createMockRuntime({ getService: vi.fn().mockReturnValue(service) });
  return { runtime, service };
}

describe("ReviewDocumentAction", () => {
  let callback: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    callback = vi.fn();
  });

  describe("validate", () => {
    const runtime = createMockRuntime();

    it("matches review requests", async () => {
      expect(await ReviewDocumentAction.validate(runtime as any, createMessage({ text: "Please review this draft" }))).toBe(true);
      expect(await ReviewDocumentAction.validate(runtime as any, createMessage({ text: "proofread my writing" }))).toBe(true);
    });

    it("ignores unrelated messages", async () => {
      expect(await ReviewDocumentAction.validate(runtime as any, createMessage({ text: "what time is it" }))).toBe(false);
    });
  });

  it("reports a missing service", async () => {
    const result = await ReviewDocumentAction.handler(
      createMockRuntime() as any,
      createMessage({ content: "Enable autostart." }),
      undefined,
      undefined,
      callback
    );
    expect(result).toMatchObject({
      success: false,
      text: "Document review is not available: the review service is not running.",
    });
    expect(callback).toHaveBeenCalledWith({
      text: "Document review is not available: the review service is not running.",
      action: "REVIEW_DOCUMENT",
    });
  });

  it("waits for the report when asked", async () => {
    const { runtime } = await runtimeWithService();
    const result = await ReviewDocumentAction.handler(
      runtime as any,
      createMessage({ content: "Enable autostart.", wait: true }),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({
      success: true,
      text: "Review complete: 1 sentences, 0 issues, quality score 100/100.",
    });
    expect((result as any).data).toMatchObject({ state: "completed", report: { summary: { qualityScore: 100 } } });
  });

  it("takes the document from the text after a colon", async () => {
    const { runtime } = await runtimeWithService();
    const result = await ReviewDocumentAction.handler(
      runtime as any,
      createMessage({ text: "Review this: The file was deleted by the the admin.", wait: true }),
      undefined,
      undefined,
      callback
    );

    expect((result as any).text).toBe(
      [
        "Review complete: 1 sentences, 2 issues, quality score 0/100.",
        '- Sentence 1: "The file was deleted by the the admin." ' +
          'Passive voice: "was deleted". Consider rewriting in active voice. ' +
          'Repeated word: "the" appears twice in a row.',
      ].join("\n")
    );
  });

  it("requires content", async () => {
    const { runtime } = await runtimeWithService();
    const result = await ReviewDocumentAction.handler(runtime as any, createMessage({ text: "review" }), undefined, undefined, callback);
    expect(result).toMatchObject({ success: false, text: "Missing required parameter: content" });
  });

  it("rejects an unknown format", async () => {
    const { runtime } = await runtimeWithService();
    const result = await ReviewDocumentAction.handler(
      runtime as any,
      createMessage({ content: "Enable autostart.", format: "rtf" }),
      undefined,
      undefined,
      callback
    );
    expect(result).toMatchObject({
      success: false,
      text: "Invalid format for format: expected text | markdown | adoc | html | pdf | docx | doc",
    });
  });

  it("returns a run id without waiting, which the status action can follow", async () => {
    const { runtime, service } = await runtimeWithService();
    const started = await ReviewDocumentAction.handler(
      runtime as any,
      createMessage({ content: "Enable autostart." }),
      undefined,
      undefined,
      callback
    );

    const data = (started as any).data;
    const runId: string = data.runId;
    expect((started as any).text).toBe(`Started review ${runId}. Ask for its status with GET_REVIEW_STATUS.`);
    expect(data.state).toBe("running");

    await service.waitForRun(runId);
    const status = await GetReviewStatusAction.handler(runtime as any, createMessage({ runId }), undefined, undefined, callback);
    expect(status).toMatchObject({
      success: true,
      text: "Review complete: 1 sentences, 0 issues, quality score 100/100.",
    });
  });
});

describe("GetReviewStatusAction", () => {
  it("describes a run that has not finished", async () => {
    const { runtime, service } = await runtimeWithService();
    const runId = service.startReview({ content: "Enable autostart." });

    const status = await GetReviewStatusAction.handler(runtime as any, createMessage({ runId }), undefined, undefined, undefined);
    expect((status as any).text).toBe(`Review ${runId} is running (parsing, 10%): Decoding text document.`);
    await service.waitForRun(runId);
  });

  it("reports an unknown run", async () => {
    const { runtime } = await runtimeWithService();
    const status = await GetReviewStatusAction.handler(
      runtime as any,
      createMessage({ runId: "missing" }),
      undefined,
      undefined,
      undefined
    );
    expect(status).toMatchObject({
      success: false,
      text: "No review found with id missing. Finished reviews are kept for a limited time.",
    });
  });

  it("requires a run id", async () => {
    const { runtime } = await runtimeWithService();
    const status = await GetReviewStatusAction.handler(runtime as any, createMessage({}), undefined, undefined, undefined);
    expect(status).toMatchObject({ success: false, text: "runId is required" });
  });
});

describe("CancelReviewAction", () => {
  it("cancels a running review", async () => {
    const { runtime, service } = await runtimeWithService();
    const runId = service.startReview({ content: "Enable autostart." });

    const result = await CancelReviewAction.handler(runtime as any, createMessage({ runId }), undefined, undefined, undefined);
    expect(result).toMatchObject({ success: true, text: `Cancelling review ${runId}.` });
    expect((await service.waitForRun(runId)).state).toBe("cancelled");
  });

  it("leaves a finished review alone", async () => {
    const { runtime, service } = await runtimeWithService();
    const runId = service.startReview({ content: "Enable autostart." });
    await service.waitForRun(runId);

    const result = await CancelReviewAction.handler(runtime as any, createMessage({ runId }), undefined, undefined, undefined);
    expect(result).toMatchObject({
      success: false,
      text: `Review ${runId} has already finished and cannot be cancelled.`,
    });
  });

  it("reports an unknown run", async () => {
    const { runtime } = await runtimeWithService();
    const result = await CancelReviewAction.handler(
      runtime as any,
      createMessage({ runId: "missing" }),
      undefined,
      undefined,
      undefined
    );
    expect(result).toMatchObject({ success: false, text: "No review run found with id missing" });
  });
});
