import { ReviewError, ErrorCode, type ErrorContext } from "./ReviewError";

/**
 * Markup could not be produced or parsed. Fatal for the run: no partial report.
 */
export class ReviewParseError extends ReviewError {
  public readonly format?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ReviewParseError";
    this.format = context.format;
  }

  static emptyInput(context: Partial<ErrorContext> = {}) {
    return new ReviewParseError(
      "Document is empty; nothing to review.",
      ErrorCode.PARSE_EMPTY_INPUT,
      context
    );
  }

  static unsupportedFormat(format: string, context: Partial<ErrorContext> = {}) {
    return new ReviewParseError(
      `Unsupported document format: ${format}`,
      ErrorCode.PARSE_UNSUPPORTED_FORMAT,
      { ...context, format }
    );
  }

  static pdfFailed(cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ReviewParseError(
      "Failed to extract text from PDF",
      ErrorCode.PARSE_PDF_FAILED,
      { ...context, format: "pdf" },
      { cause }
    );
  }

  static docxFailed(cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ReviewParseError(
      "Failed to convert Word document",
      ErrorCode.PARSE_DOCX_FAILED,
      { ...context, format: "docx" },
      { cause }
    );
  }

  static markupFailed(cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ReviewParseError(
      "Failed to parse document markup",
      ErrorCode.PARSE_FAILED,
      context,
      { cause }
    );
  }
}
