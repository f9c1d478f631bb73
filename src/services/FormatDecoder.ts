/**
 * FormatDecoder: uploaded document → normalized HTML for MarkupParser.
 *
 * Text and AsciiDoc are split into paragraphs on blank lines, Markdown goes
 * through remark, PDF pages through unpdf and DOCX through mammoth. Legacy
 * binary .doc is rejected.
 */

import rehypeStringify from "rehype-stringify";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import remarkRehype from "remark-rehype";
import { unified } from "unified";
import { ReviewParseError, ReviewValidationError } from "../errors";
import { DocxExtractor } from "./DocxExtractor";
import { PdfExtractor } from "./PdfExtractor";
import { escapeHtml } from "./SentenceSegmenter";

export const DOCUMENT_FORMATS = ["text", "markdown", "adoc", "html", "pdf", "docx", "doc"] as const;
export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  "": "text",
  txt: "text",
  md: "markdown",
  markdown: "markdown",
  adoc: "adoc",
  asciidoc: "adoc",
  html: "html",
  htm: "html",
  pdf: "pdf",
  docx: "docx",
  doc: "doc",
};

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

/** Format from a file name's extension; a name without one is plain text */
export function inferFormat(fileName: string): DocumentFormat {
  const base = fileName.trim().toLowerCase().split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  const extension = dot > 0 ? base.slice(dot + 1) : "";
  const format = EXTENSION_FORMATS[extension];
  if (!format) {
    throw ReviewParseError.unsupportedFormat(extension, { operation: "inferFormat" });
  }
  return format;
}

export interface DecodeInput {
  content: string | Uint8Array;
  format: DocumentFormat;
}

const utf8 = new TextDecoder("utf-8");

function asText(content: string | Uint8Array): string {
  return typeof content === "string" ? content : utf8.decode(content);
}

function asBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === "string" ? new TextEncoder().encode(content) : content;
}

function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);
}

function paragraphsToHtml(paragraphs: readonly string[]): string {
  return paragraphs.map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`).join("\n");
}

const ADOC_HEADING = /^(={1,6})\s+(.+)$/;

function adocToHtml(source: string): string {
  return splitParagraphs(source)
    .map((paragraph) => {
      const heading = ADOC_HEADING.exec(paragraph);
      if (heading && !paragraph.includes("\n")) {
        const level = heading[1].length;
        return `<h${level}>${escapeHtml(heading[2])}</h${level}>`;
      }
      return `<p>${escapeHtml(paragraph)}</p>`;
    })
    .join("\n");
}

async function markdownToHtml(source: string): Promise<string> {
  const file = await unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkRehype)
    .use(rehypeStringify)
    .process(source);
  return String(file);
}

export class FormatDecoder {
  constructor(
    private readonly pdf: PdfExtractor = new PdfExtractor(),
    private readonly docx: DocxExtractor = new DocxExtractor()
  ) {}

  async decode({ content, format }: DecodeInput): Promise<string> {
    if (!isDocumentFormat(format)) {
      throw ReviewValidationError.invalidFormat("format", DOCUMENT_FORMATS.join(" | "), format);
    }

    const html = await this.toHtml(content, format);
    if (!html.trim()) {
      throw ReviewParseError.emptyInput({ operation: "decodeDocument", format });
    }
    return html;
  }

  private async toHtml(content: string | Uint8Array, format: DocumentFormat): Promise<string> {
    switch (format) {
      case "text":
        return paragraphsToHtml(splitParagraphs(asText(content)));
      case "adoc":
        return adocToHtml(asText(content));
      case "markdown":
        return markdownToHtml(asText(content));
      case "html":
        return asText(content);
      case "pdf": {
        const { pages, metadata } = await this.pdf.extract(asBytes(content));
        const body = paragraphsToHtml(pages.flatMap(splitParagraphs));
        const title = metadata.title?.trim();
        if (!title) return body;
        return body ? `<h1>${escapeHtml(title)}</h1>\n${body}` : `<h1>${escapeHtml(title)}</h1>`;
      }
      case "docx":
        return (await this.docx.convert(asBytes(content))).html;
      case "doc":
        throw ReviewParseError.unsupportedFormat(format, { operation: "decodeDocument", format });
    }
  }
}
