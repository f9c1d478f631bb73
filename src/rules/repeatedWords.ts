import type { ReviewRule, RuleIssueRecord } from "../services/ReviewEngine.types";

const REPEATED = /\b(\w+)\s+\1\b/gi;

/** Short words still worth flagging when doubled */
const COMMON_MISTAKES = new Set(["is", "it", "in", "on", "to", "of", "or", "at", "be", "we", "he", "me"]);

/** Repetitions that are usually deliberate */
const INTENTIONAL = new Set(["very", "so", "no", "yes", "well", "now", "oh", "ah", "ha", "had", "that"]);

function isIntentional(word: string): boolean {
  const lower = word.toLowerCase();
  if (lower.length <= 2 && !COMMON_MISTAKES.has(lower)) return true;
  if (/^\d+$/.test(lower)) return true;
  return INTENTIONAL.has(lower);
}

export const repeatedWordsRule: ReviewRule = {
  id: "repeated-words",
  category: "repeated-word",
  // Blocks are joined by a space in the flattened text, so a document run
  // would pair the last word of one list item with the first of the next
  scopes: ["sentence"],
  run(text: string): RuleIssueRecord[] {
    const issues: RuleIssueRecord[] = [];
    for (const match of text.matchAll(REPEATED)) {
      const word = match[1];
      if (isIntentional(word)) continue;
      const start = match.index ?? 0;
      issues.push({
        text: match[0],
        start,
        end: start + match[0].length,
        message: `Repeated word: "${word}" appears twice in a row.`,
        suggestion: `Remove the duplicate "${word}".`,
      });
    }
    return issues;
  },
};
