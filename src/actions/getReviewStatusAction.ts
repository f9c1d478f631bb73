import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { getDocumentReviewService } from "../services/DocumentReviewService";
import { safeSerialize } from "../utils/safeSerialize";
import { describeProgress, describeReport, stringArg } from "./reviewFormatting";

const ACTION = "GET_REVIEW_STATUS";

export const GetReviewStatusAction: Action = {
  name: ACTION,
  description: "Report the progress of a document review, and its results once it has finished.",
  similes: ["REVIEW_STATUS", "REVIEW_PROGRESS", "REVIEW_RESULTS"],
  parameters: {
    type: "object",
    properties: {
      runId: { type: "string", description: "Id returned by REVIEW_DOCUMENT" },
    },
    required: ["runId"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = (message.content?.text || "").toLowerCase();
    return /\b(status|progress|result|results)\b.*\breview\b|\breview\b.*\b(status|progress|done|finished)\b/i.test(text);
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const args: Record<string, unknown> = { ...message.content };
    const service = getDocumentReviewService(runtime);
    const runId = stringArg(args, "runId");

    if (!service || !runId) {
      const text = service ? "runId is required" : "Document review is not available: the review service is not running.";
      if (callback) {
        await callback({ text, action: ACTION });
      }
      return { success: false, text, data: safeSerialize({ error: service ? "missing_run_id" : "service_unavailable" }) };
    }

    const record = service.getProgress(runId);
    if (!record) {
      const text = `No review found with id ${runId}. Finished reviews are kept for a limited time.`;
      if (callback) {
        await callback({ text, action: ACTION });
      }
      return { success: false, text, data: safeSerialize({ error: "run_not_found", runId }) };
    }

    const report = record.state === "completed" ? service.getReport(runId) : null;
    const text = report ? describeReport(report) : describeProgress(record);
    if (callback) {
      await callback({ text, action: ACTION });
    }
    return { success: true, text, data: safeSerialize({ progress: record, report }) };
  },
};
