import type { ReviewRule, RuleIssueRecord } from "../services/ReviewEngine.types";
import tables from "./data/conciseness.json";
import { phraseMatches } from "./textSpans";

interface PhraseEntry {
  phrase: string;
  replacement: string;
  label: string;
}

const ENTRIES: PhraseEntry[] = [
  ...Object.entries(tables.redundantPhrases).map(([phrase, replacement]) => ({
    phrase,
    replacement,
    label: "Redundant phrase",
  })),
  ...tables.redundantModifiers.map((phrase) => ({
    phrase,
    replacement: phrase.split(" ").pop() ?? phrase,
    label: "Redundant modifier",
  })),
  ...Object.entries(tables.wordyExpressions).map(([phrase, replacement]) => ({
    phrase,
    replacement,
    label: "Wordy expression",
  })),
];

export const concisenessRule: ReviewRule = {
  id: "conciseness",
  category: "conciseness",
  run(text: string): RuleIssueRecord[] {
    const issues: RuleIssueRecord[] = [];
    for (const entry of ENTRIES) {
      for (const span of phraseMatches(text, entry.phrase)) {
        issues.push({
          text: span.text,
          start: span.start,
          end: span.end,
          message: `${entry.label}: replace "${span.text}" with "${entry.replacement}".`,
          suggestion: entry.replacement,
        });
      }
    }
    // Detection order follows position in the text
    return issues.sort((a, b) => (a.start ?? 0) - (b.start ?? 0));
  },
};
