/**
 * PdfExtractor: PDF → per-page plain text and document info via unpdf.
 * No structured extraction (font-size heuristics unreliable).
 */

import { extractText, getDocumentProxy } from "unpdf";
import { isRecord } from "../config/ReviewPolicy";
import { ReviewParseError } from "../errors";
import { logger } from "../utils/logger";

export interface PdfExtractionResult {
  pages: string[];
  metadata: {
    /** Document-info title; FormatDecoder renders it as the leading heading */
    title?: string;
  };
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value ? value : undefined;
}

export class PdfExtractor {
  async extract(data: Uint8Array): Promise<PdfExtractionResult> {
    let pages: string[];
    let doc: Awaited<ReturnType<typeof getDocumentProxy>>;
    try {
      doc = await getDocumentProxy(data);
      const result = await extractText(doc, { mergePages: false });
      pages = Array.isArray(result.text) ? result.text : [result.text];
    } catch (err) {
      throw ReviewParseError.pdfFailed(err instanceof Error ? err : undefined, { operation: "extractPdf" });
    }

    let metadata: PdfExtractionResult["metadata"] = {};
    try {
      const info: unknown = (await doc.getMetadata()).info;
      if (isRecord(info)) {
        metadata = { title: stringField(info, "Title") };
      }
    } catch (err) {
      logger.debug("PDF metadata unavailable", { error: err instanceof Error ? err.message : String(err) });
    }

    return { pages, metadata };
  }
}
