/**
 * MarkupParser: normalized HTML → MarkupDocument.
 * Uses linkedom for lightweight DOM parsing.
 *
 * The engine only needs a small structural slice of the DOM, so nodes are
 * read through MarkupNode rather than the full DOM typings.
 */

import { parseHTML } from "linkedom";
import { ReviewParseError } from "../errors";

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;

export interface MarkupNode {
  readonly nodeType: number;
  readonly nodeName: string;
  readonly textContent: string | null;
  readonly childNodes: ArrayLike<MarkupNode>;
}

export interface MarkupElement extends MarkupNode {
  readonly outerHTML: string;
}

export interface MarkupDocument {
  /** The <body> element of the parsed document */
  readonly root: MarkupNode;
}

export function isElement(node: MarkupNode): node is MarkupElement {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: MarkupNode): boolean {
  return node.nodeType === TEXT_NODE;
}

export function tagName(node: MarkupNode): string {
  return node.nodeName.toLowerCase();
}

/** linkedom needs a full document; fragments are wrapped in one */
function asFullDocument(html: string): string {
  if (/<html[\s>]/i.test(html)) return html;
  return `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
}

export function parseMarkup(html: string): MarkupDocument {
  if (!html.trim()) {
    throw ReviewParseError.emptyInput({ operation: "parseMarkup" });
  }

  let root: MarkupNode | null;
  try {
    const { document } = parseHTML(asFullDocument(html));
    root = document.body;
  } catch (err) {
    throw ReviewParseError.markupFailed(err instanceof Error ? err : undefined, {
      operation: "parseMarkup",
    });
  }

  if (!root) {
    throw ReviewParseError.markupFailed(undefined, { operation: "parseMarkup" });
  }
  return { root };
}
