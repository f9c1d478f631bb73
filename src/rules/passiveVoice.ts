import type { ReviewRule, RuleIssueRecord } from "../services/ReviewEngine.types";
import irregularParticiples from "./data/irregularParticiples.json";

const AUXILIARIES = "am|is|are|was|were|be|been|being";
const PARTICIPLE = `\\w+ed|${irregularParticiples.join("|")}`;

// "was written", "is being reviewed", "were quickly removed"
const PASSIVE = new RegExp(
  `\\b(?:${AUXILIARIES})\\s+(?:being\\s+)?(?:\\w+ly\\s+)?(?:${PARTICIPLE})\\b`,
  "gi"
);

/** Adjectival "-ed" words that read as states, not passives */
const STATE_WORDS = new Set(["interested", "tired", "bored", "excited", "concerned", "supposed", "used"]);

export const passiveVoiceRule: ReviewRule = {
  id: "passive-voice",
  category: "passive-voice",
  run(text: string): RuleIssueRecord[] {
    const issues: RuleIssueRecord[] = [];
    for (const match of text.matchAll(PASSIVE)) {
      const phrase = match[0];
      const last = phrase.split(/\s+/).pop()?.toLowerCase() ?? "";
      if (STATE_WORDS.has(last)) continue;
      const start = match.index ?? 0;
      issues.push({
        text: phrase,
        start,
        end: start + phrase.length,
        message: `Passive voice: "${phrase}". Consider rewriting in active voice.`,
      });
    }
    return issues;
  },
};
