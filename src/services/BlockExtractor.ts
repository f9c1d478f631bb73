/**
 * BlockExtractor: markup tree → ordered Block[].
 *
 * Depth-first walk selecting block-level elements. Once an element is selected,
 * nothing below it becomes a block of its own, so nested lists and quotes are
 * counted once, as part of their outermost block.
 */

import {
  isElement,
  isText,
  tagName,
  type MarkupDocument,
  type MarkupElement,
  type MarkupNode,
} from "./MarkupParser";
import type { Block } from "./ReviewEngine.types";

/** Always selected when not nested in another block */
const BLOCK_TAGS = new Set([
  "p", "h1", "h2", "h3", "h4", "h5", "h6", "li", "blockquote",
]);

/** Generic containers: selected only when they hold text themselves */
const CONTAINER_TAGS = new Set([
  "div", "section", "article", "main", "figcaption", "dd", "dt",
  "td", "th", "pre", "address", "caption", "summary",
]);

/** Subtrees that never contribute text */
const SKIP_TAGS = new Set([
  "script", "style", "noscript", "template", "svg", "head",
]);

const PUNCTUATION_ONLY = /^[\p{P}\p{S}\s]*$/u;

export function isBlockTag(tag: string): boolean {
  return BLOCK_TAGS.has(tag) || CONTAINER_TAGS.has(tag);
}

/** Whether a block's text is worth segmenting */
export function hasWords(text: string): boolean {
  return !PUNCTUATION_ONLY.test(text);
}

function collectText(node: MarkupNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.textContent ?? "");
    return;
  }
  if (!isElement(node) || SKIP_TAGS.has(tagName(node))) return;
  for (const child of Array.from(node.childNodes)) {
    collectText(child, out);
  }
}

/**
 * Flattened text of an element: descendant text nodes joined with a space so
 * inline elements never run together, whitespace collapsed, and the space the
 * join leaves before closing punctuation removed ("<b>Save</b>." → "Save.").
 */
export function flattenText(node: MarkupNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts
    .join(" ")
    .replace(/\s+/g, " ")
    .replace(/ ([.,;:!?)\]}])/g, "$1")
    .trim();
}

/** A container holds text directly when a text child or an inline child carries words */
function holdsDirectText(el: MarkupElement): boolean {
  for (const child of Array.from(el.childNodes)) {
    if (isText(child)) {
      if ((child.textContent ?? "").trim()) return true;
      continue;
    }
    if (!isElement(child)) continue;
    const tag = tagName(child);
    if (SKIP_TAGS.has(tag) || isBlockTag(tag)) continue;
    if (flattenText(child)) return true;
  }
  return false;
}

function walk(node: MarkupNode, selected: MarkupElement[]): void {
  for (const child of Array.from(node.childNodes)) {
    if (!isElement(child)) continue;
    const tag = tagName(child);
    if (SKIP_TAGS.has(tag)) continue;

    if (BLOCK_TAGS.has(tag) || (CONTAINER_TAGS.has(tag) && holdsDirectText(child))) {
      selected.push(child);
      continue;
    }
    walk(child, selected);
  }
}

export function extractBlocks(doc: MarkupDocument): Block[] {
  const selected: MarkupElement[] = [];
  walk(doc.root, selected);

  const blocks: Block[] = [];
  for (const el of selected) {
    const plainText = flattenText(el);
    if (!plainText || !hasWords(plainText)) continue;
    blocks.push({
      plainText,
      markupFragment: el.outerHTML,
      order: blocks.length,
    });
  }
  return blocks;
}
