/**
 * ScoreAggregator: sentence/issue association → DocumentReport.
 * Pure: the same inputs always give an identical report.
 */

import type {
  Block,
  DocumentReport,
  Sentence,
  SentenceIssueMap,
  SentenceReport,
} from "./ReviewEngine.types";
import { sentenceReadability } from "./Readability";

/** max(0, round(100 * (1 - issues / sentences))); 0 for an empty document */
export function calculateQualityScore(totalIssues: number, totalSentences: number): number {
  if (totalSentences <= 0) return 0;
  return Math.max(0, Math.round(100 * (1 - totalIssues / totalSentences)));
}

export interface AggregateInput {
  sentences: readonly Sentence[];
  resolved: SentenceIssueMap;
  blocks?: readonly Block[];
  failedRules?: readonly string[];
}

export function aggregateReport({ sentences, resolved, blocks = [], failedRules = [] }: AggregateInput): DocumentReport {
  const reports: SentenceReport[] = sentences.map((sentence) => {
    const issues = resolved.bySentence.get(sentence.index) ?? [];
    return Object.freeze({
      index: sentence.index,
      plainText: sentence.plainText,
      markupFragment: sentence.markupFragment,
      documentStart: sentence.documentStart,
      documentEnd: sentence.documentEnd,
      wordCount: sentence.wordCount,
      issueCount: issues.length,
      issues,
      readability: sentenceReadability(sentence.plainText),
    });
  });

  const sentenceIssues = reports.reduce((sum, r) => sum + r.issueCount, 0);
  const totalIssues = sentenceIssues + resolved.unassigned.length;

  return Object.freeze({
    sentences: Object.freeze(reports),
    unassigned: resolved.unassigned,
    summary: Object.freeze({
      totalSentences: sentences.length,
      totalIssues,
      qualityScore: calculateQualityScore(totalIssues, sentences.length),
      totalWords: sentences.reduce((sum, s) => sum + s.wordCount, 0),
      blockCount: blocks.length,
      duplicatesRemoved: resolved.duplicatesRemoved,
      failedRules: Object.freeze([...failedRules]),
    }),
  });
}
