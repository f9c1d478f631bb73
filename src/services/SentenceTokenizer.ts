/**
 * SentenceTokenizer: raw sentence boundary detection for one block of text.
 *
 * The primary tokenizer scans character by character and consults an
 * abbreviation dictionary; the fallback is a single regular expression.
 * Neither filters anything: degenerate candidates are the segmenter's concern.
 */

export interface SentenceTokenizer {
  readonly name: string;
  split(text: string): string[];
}

/**
 * Known abbreviations that should NOT trigger sentence boundaries.
 * Case-insensitive, trailing period not included.
 */
const ABBREVIATIONS = new Set([
  // Titles
  "mr", "mrs", "ms", "dr", "prof", "rev", "gov", "sgt", "cpl",
  "jr", "sr", "lt", "maj", "capt",
  // Address
  "ave", "blvd", "apt",
  // Latin / academic
  "etc", "e.g", "i.e", "vs", "viz", "dept", "cf",
  // Months ("mar" is below: it is also a verb)
  "jan", "feb", "apr", "jun", "jul", "aug", "sept", "sep", "oct", "nov", "dec",
  // Technical writing
  "incl",
]);

/**
 * Words that also end ordinary sentences ("Select No.", "set it to the max.").
 * They only count as abbreviations when a number follows: "No. 5", "Fig. 3".
 */
const NUMBERED_ABBREVIATIONS = new Set([
  "no", "nos", "vol", "fig", "figs", "ch", "sec", "min", "max", "ca",
  "ref", "ver", "approx", "mar", "pp",
]);

const CLOSING = /[)"'”’\]]/;
const OPENING_UPPER = /[A-Z0-9“"(]/;

function isAbbreviation(text: string, periodPos: number): boolean {
  let wordStart = periodPos - 1;
  while (wordStart >= 0 && /[a-zA-Z.]/.test(text[wordStart])) {
    wordStart--;
  }
  wordStart++;

  const word = text.substring(wordStart, periodPos).toLowerCase();
  if (!word) return false;
  if (NUMBERED_ABBREVIATIONS.has(word)) return /^\s*\d/.test(text.substring(periodPos + 1));
  if (ABBREVIATIONS.has(word)) return true;

  // "et al."
  if (word === "al") return /\bet\s+$/i.test(text.substring(0, wordStart));

  // Multi-period forms: "e.g", "i.e", "U.S.A"
  if (word.includes(".") && ABBREVIATIONS.has(word.replace(/\./g, ""))) return true;
  if (/^[a-z](\.[a-z])+$/.test(word)) return true;

  // Single-letter initial: "J." "K."
  return word.length === 1;
}

function pushSpan(out: string[], text: string, start: number, end: number): void {
  const piece = text.substring(start, end).trim();
  if (piece) out.push(piece);
}

/**
 * Dictionary scanner. A boundary is a run of . ! or ? that
 * - is followed (after closing quotes/brackets) by whitespace or end of text,
 * - is not part of a known abbreviation or initial,
 * - is not a decimal point,
 * - and, for an ellipsis, is followed by an uppercase start.
 */
function scanSentences(text: string): string[] {
  const out: string[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch !== "." && ch !== "!" && ch !== "?") {
      i++;
      continue;
    }

    if (ch === "." && text[i + 1] === ".") {
      while (text[i] === ".") i++;
      let after = i;
      while (after < text.length && CLOSING.test(text[after])) after++;
      if (after >= text.length) break;
      if (/\s/.test(text[after])) {
        let peek = after;
        while (peek < text.length && /\s/.test(text[peek])) peek++;
        if (peek < text.length && OPENING_UPPER.test(text[peek])) {
          pushSpan(out, text, start, after);
          start = peek;
          i = peek;
        }
      }
      continue;
    }

    if (ch === "." && i > 0 && /\d/.test(text[i - 1]) && /\d/.test(text[i + 1] ?? "")) {
      i++;
      continue;
    }

    if (ch === "." && isAbbreviation(text, i)) {
      i++;
      continue;
    }

    // Consume the whole terminator run ("?!", "!!") and closing punctuation
    while (i < text.length && /[.!?]/.test(text[i])) i++;
    while (i < text.length && CLOSING.test(text[i])) i++;

    if (i >= text.length) break;
    if (/\s/.test(text[i])) {
      pushSpan(out, text, start, i);
      while (i < text.length && /\s/.test(text[i])) i++;
      start = i;
    }
    // No whitespace after the terminator ("example.com", "v1.2"): not a boundary
  }

  pushSpan(out, text, start, text.length);
  return out;
}

export const dictionaryTokenizer: SentenceTokenizer = {
  name: "dictionary",
  split: scanSentences,
};

const REGEX_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z0-9])/;

/** Fallback: `[.!?]+` followed by whitespace and an uppercase letter or digit */
export const regexTokenizer: SentenceTokenizer = {
  name: "regex",
  split(text: string): string[] {
    return text
      .split(REGEX_BOUNDARY)
      .map((piece) => piece.trim())
      .filter((piece) => piece.length > 0);
  },
};

export interface TokenizeResult {
  candidates: string[];
  tokenizer: string;
}

/**
 * Split with the primary tokenizer when one is available, else (or when it
 * throws) with the regex fallback.
 */
export function tokenizeSentences(
  text: string,
  primary: SentenceTokenizer | null = dictionaryTokenizer,
  onFallback?: (err: unknown) => void
): TokenizeResult {
  if (primary) {
    try {
      return { candidates: primary.split(text), tokenizer: primary.name };
    } catch (err) {
      onFallback?.(err);
    }
  }
  return { candidates: regexTokenizer.split(text), tokenizer: regexTokenizer.name };
}
