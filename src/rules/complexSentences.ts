import type { ReviewRule, RuleIssueRecord } from "../services/ReviewEngine.types";
import { detectClauses } from "./clauses";
import { sentenceSpans } from "./textSpans";

export const MAX_CLAUSES = 4;

/**
 * Flags sentences carrying too many clauses. Shares the "sentence-length"
 * family with long-sentences, so a sentence both rules flag is reported once.
 */
export const complexSentencesRule: ReviewRule = {
  id: "complex-sentences",
  category: "sentence-length",
  scopes: ["sentence"],
  run(text: string): RuleIssueRecord[] {
    const issues: RuleIssueRecord[] = [];
    for (const span of sentenceSpans(text)) {
      const clauses = detectClauses(span.text);
      if (clauses.length <= MAX_CLAUSES) continue;
      const dependent = clauses.filter((c) => c.type === "dependent").length;
      issues.push({
        text: span.text,
        start: span.start,
        end: span.end,
        message: `Sentence is too long and complex (${clauses.length} clauses, ${dependent} dependent). Split it up.`,
      });
    }
    return issues;
  },
};
