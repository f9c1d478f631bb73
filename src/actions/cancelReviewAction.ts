import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { isReviewError } from "../errors";
import { getDocumentReviewService } from "../services/DocumentReviewService";
import { safeSerialize } from "../utils/safeSerialize";
import { stringArg } from "./reviewFormatting";

const ACTION = "CANCEL_REVIEW";

export const CancelReviewAction: Action = {
  name: ACTION,
  description: "Stop a running document review. The rule check in progress finishes first; no report is produced.",
  similes: ["STOP_REVIEW", "ABORT_REVIEW"],
  parameters: {
    type: "object",
    properties: {
      runId: { type: "string", description: "Id returned by REVIEW_DOCUMENT" },
    },
    required: ["runId"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = (message.content?.text || "").toLowerCase();
    return /\b(cancel|stop|abort)\b.*\breview\b/i.test(text);
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

    let cancelled: boolean;
    try {
      cancelled = service.cancel(runId);
    } catch (err) {
      if (isReviewError(err)) {
        const text = err.toUserMessage();
        if (callback) {
          await callback({ text, action: ACTION });
        }
        return { success: false, text, data: safeSerialize({ error: err }) };
      }
      throw err;
    }

    const text = cancelled
      ? `Cancelling review ${runId}.`
      : `Review ${runId} has already finished and cannot be cancelled.`;
    if (callback) {
      await callback({ text, action: ACTION });
    }
    return { success: cancelled, text, data: safeSerialize({ runId, cancelled }) };
  },
};
