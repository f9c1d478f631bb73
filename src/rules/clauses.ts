/**
 * Clause detection inside one sentence. Offsets are relative to the sentence.
 */

import { countContentWords } from "./textSpans";

export interface Clause {
  start: number;
  end: number;
  text: string;
  type: "independent" | "dependent";
}

/** Subordinating conjunctions that open dependent clauses */
const SUBORDINATING = /^(?:although|because|while|when|if|since|unless|after|before|until|whereas|wherever|whenever|whether|though|even\s+(?:if|though)|so\s+that|in\s+order\s+that|provided\s+that|as\s+(?:long|soon)\s+as)\b/i;

function classify(text: string): Clause["type"] {
  return SUBORDINATING.test(text) ? "dependent" : "independent";
}

/**
 * Split at commas and before mid-sentence subordinating conjunctions. Pieces
 * under two words are not clauses; a sentence with no split is one clause.
 */
export function detectClauses(sentence: string): Clause[] {
  const trimmed = sentence.trim();
  if (!trimmed) return [];

  const splits = new Set<number>();
  for (let i = 0; i < sentence.length; i++) {
    if (sentence[i] === ",") {
      // "1,000" is a number, not a clause break
      if (/\d/.test(sentence[i - 1] ?? "") && /\d/.test(sentence[i + 1] ?? "")) continue;
      splits.add(i);
    } else if (i > 0 && /\s/.test(sentence[i - 1]) && SUBORDINATING.test(sentence.substring(i))) {
      splits.add(i);
    }
  }

  const whole: Clause = { start: 0, end: sentence.length, text: trimmed, type: classify(trimmed) };
  if (splits.size === 0) return [whole];

  const clauses: Clause[] = [];
  let prev = 0;
  const push = (start: number, end: number) => {
    const text = sentence.substring(start, end).trim();
    if (countContentWords(text) >= 2) {
      clauses.push({ start, end, text, type: classify(text) });
    }
  };

  for (const at of [...splits].sort((a, b) => a - b)) {
    if (at > prev) push(prev, at);
    // Commas are dropped; a conjunction belongs to the clause it opens
    prev = sentence[at] === "," ? at + 1 : at;
  }
  if (prev < sentence.length) push(prev, sentence.length);

  return clauses.length > 0 ? clauses : [whole];
}
