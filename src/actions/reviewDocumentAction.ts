import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { ReviewValidationError, isReviewError } from "../errors";
import { getDocumentReviewService } from "../services/DocumentReviewService";
import { DOCUMENT_FORMATS, isDocumentFormat, type DocumentFormat } from "../services/FormatDecoder";
import { safeSerialize } from "../utils/safeSerialize";
import { describeProgress, describeReport, stringArg } from "./reviewFormatting";

const ACTION = "REVIEW_DOCUMENT";

/** "Review this: <text>" → "<text>" */
function inlineText(messageText: string): string | undefined {
  const colon = messageText.indexOf(":");
  if (colon === -1) return undefined;
  const rest = messageText.slice(colon + 1).trim();
  return rest || undefined;
}

export const ReviewDocumentAction: Action = {
  name: ACTION,
  description:
    "Review a document for writing-quality issues (long or complex sentences, passive voice, " +
    "repeated words, wordy phrases). Each issue is anchored to the sentence that caused it.",
  similes: ["PROOFREAD_DOCUMENT", "CHECK_WRITING", "REVIEW_TEXT", "STYLE_CHECK"],
  examples: [
    [
      {
        name: "{{name1}}",
        content: { text: "Review this: The report was written by the team. It is very very long." },
      },
      {
        name: "{{name2}}",
        content: {
          text: "Review complete: 2 sentences, 2 issues, quality score 0/100.",
          actions: [ACTION],
        },
      },
    ],
  ],

  parameters: {
    type: "object",
    properties: {
      content: { type: "string", description: "Document text (HTML, Markdown, AsciiDoc or plain text)" },
      format: { type: "string", description: `One of ${DOCUMENT_FORMATS.join(", ")}` },
      fileName: { type: "string", description: "File name; its extension picks the format" },
      wait: { type: "boolean", description: "Wait for the report instead of returning a run id" },
    },
    required: [],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = (message.content?.text || "").toLowerCase();
    return /\b(review|proofread|check)\b.*\b(document|text|writing|draft|this)\b/i.test(text);
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
    if (!service) {
      const text = "Document review is not available: the review service is not running.";
      if (callback) {
        await callback({ text, action: ACTION });
      }
      return { success: false, text, data: safeSerialize({ error: "service_unavailable" }) };
    }

    let runId: string;
    try {
      const content = stringArg(args, "content") ?? inlineText(stringArg(args, "text") ?? "");
      if (!content) {
        throw ReviewValidationError.missingParam("content", { operation: ACTION });
      }
      const formatArg = stringArg(args, "format");
      let format: DocumentFormat | undefined;
      if (formatArg !== undefined) {
        if (!isDocumentFormat(formatArg)) {
          throw ReviewValidationError.invalidFormat("format", DOCUMENT_FORMATS.join(" | "), formatArg, { operation: ACTION });
        }
        format = formatArg;
      }
      runId = service.startReview({ content, format, fileName: stringArg(args, "fileName") });
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

    if (args.wait !== true) {
      const text = `Started review ${runId}. Ask for its status with GET_REVIEW_STATUS.`;
      if (callback) {
        await callback({ text, action: ACTION });
      }
      return { success: true, text, data: safeSerialize({ runId, state: "running" }) };
    }

    const record = await service.waitForRun(runId);
    const report = service.getReport(runId);
    const text = report ? describeReport(report) : describeProgress(record);
    if (callback) {
      await callback({ text, action: ACTION });
    }
    return {
      success: record.state === "completed",
      text,
      data: safeSerialize({ runId, state: record.state, report }),
    };
  },
};
