import { dictionaryTokenizer } from "../services/SentenceTokenizer";

export interface TextSpan {
  text: string;
  start: number;
  end: number;
}

/** Sentence candidates of `text` with their offsets in it */
export function sentenceSpans(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let cursor = 0;
  for (const piece of dictionaryTokenizer.split(text)) {
    const start = text.indexOf(piece, cursor);
    if (start === -1) continue;
    spans.push({ text: piece, start, end: start + piece.length });
    cursor = start + piece.length;
  }
  return spans;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive whole-word occurrences of a phrase */
export function phraseMatches(text: string, phrase: string): TextSpan[] {
  const pattern = new RegExp(`\\b${escapeRegExp(phrase).replace(/ /g, "\\s+")}\\b`, "gi");
  const spans: TextSpan[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    spans.push({ text: match[0], start, end: start + match[0].length });
  }
  return spans;
}

/** Words, ignoring tokens made only of punctuation */
export function countContentWords(text: string): number {
  return text.split(/\s+/).filter((token) => /[\p{L}\p{N}]/u.test(token)).length;
}
