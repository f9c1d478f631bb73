import type { ReviewRule, RuleIssueRecord } from "../services/ReviewEngine.types";
import { countContentWords, sentenceSpans } from "./textSpans";

export const LONG_SENTENCE_WORDS = 25;

export function createLongSentencesRule(maxWords: number = LONG_SENTENCE_WORDS): ReviewRule {
  return {
    id: "long-sentences",
    category: "sentence-length",
    scopes: ["sentence"],
    run(text: string): RuleIssueRecord[] {
      const issues: RuleIssueRecord[] = [];
      for (const span of sentenceSpans(text)) {
        const words = countContentWords(span.text);
        if (words <= maxWords) continue;
        issues.push({
          text: span.text,
          start: span.start,
          end: span.end,
          message: `Long sentence detected (${words} words). Consider breaking this into shorter sentences for better readability.`,
          suggestion: `Aim for at most ${maxWords} words per sentence.`,
        });
      }
      return issues;
    },
  };
}

export const longSentencesRule = createLongSentencesRule();
