/**
 * Readability: per-sentence Flesch reading ease, Gunning fog, SMOG and ARI.
 *
 * Each score treats its input as a single sentence. Syllables are estimated
 * by counting vowel groups after dropping a silent final "e", "es" or "ed".
 */

import type { ReadabilityScores } from "./ReviewEngine.types";

const WORD = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;
const WORD_CHAR = /[\p{L}\p{N}]/gu;
const SILENT_ENDING = /(?:es|ed|e)$/;
const VOWEL_GROUP = /[aeiouy]+/g;

/** Polysyllabic threshold shared by Gunning fog and SMOG */
const COMPLEX_SYLLABLES = 3;

export function countSyllables(word: string): number {
  const cleaned = word.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
  if (!cleaned) return 0;
  const groups = cleaned.replace(SILENT_ENDING, "").match(VOWEL_GROUP);
  return Math.max(1, groups?.length ?? 0);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

const EMPTY_SCORES: ReadabilityScores = Object.freeze({
  fleschReadingEase: 0,
  gunningFog: 0,
  smogIndex: 0,
  automatedReadabilityIndex: 0,
});

export function sentenceReadability(text: string): ReadabilityScores {
  const words = text.match(WORD) ?? [];
  if (words.length === 0) return EMPTY_SCORES;

  const syllables = words.map(countSyllables);
  const totalSyllables = syllables.reduce((sum, n) => sum + n, 0);
  const complex = syllables.filter((n) => n >= COMPLEX_SYLLABLES).length;
  const characters = words.reduce((sum, w) => sum + (w.match(WORD_CHAR)?.length ?? 0), 0);
  const wordCount = words.length;

  return Object.freeze({
    fleschReadingEase: round2(206.835 - 1.015 * wordCount - 84.6 * (totalSyllables / wordCount)),
    gunningFog: round2(0.4 * (wordCount + 100 * (complex / wordCount))),
    smogIndex: round2(1.043 * Math.sqrt(complex * 30) + 3.1291),
    automatedReadabilityIndex: round2(4.71 * (characters / wordCount) + 0.5 * wordCount - 21.43),
  });
}
