/**
 * DocxExtractor: Word (.docx) → HTML via mammoth. Paragraphs become <p>
 * and styled headings become <h1>..<h6>.
 */

import * as mammoth from "mammoth";
import { ReviewParseError } from "../errors";
import { logger } from "../utils/logger";

export interface DocxConversionResult {
  html: string;
  /** Conversion notes from mammoth (unrecognised styles and the like) */
  warnings: string[];
}

export class DocxExtractor {
  async convert(data: Uint8Array): Promise<DocxConversionResult> {
    let result: Awaited<ReturnType<typeof mammoth.convertToHtml>>;
    try {
      result = await mammoth.convertToHtml({ buffer: Buffer.from(data.buffer, data.byteOffset, data.byteLength) });
    } catch (err) {
      throw ReviewParseError.docxFailed(err instanceof Error ? err : undefined, { operation: "convertDocx" });
    }

    const warnings = result.messages.map((message) => message.message);
    if (warnings.length > 0) {
      logger.debug("DOCX converted with warnings", { count: warnings.length, first: warnings[0] });
    }
    return { html: result.value, warnings };
  }
}
