import type { DocumentReport } from "../services/ReviewEngine.types";
import type { ProgressRecord } from "../services/ProgressTracker";

/** Sentences listed in chat replies; the full report travels in `data` */
const MAX_LISTED_SENTENCES = 5;

export function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function describeProgress(record: ProgressRecord): string {
  const base = `Review ${record.runId} is ${record.state} (${record.stage}, ${record.percentage}%): ${record.message}.`;
  return record.error ? `${base} Error ${record.error.code}: ${record.error.message}` : base;
}

export function describeReport(report: DocumentReport): string {
  const { summary } = report;
  const lines = [
    `Review complete: ${summary.totalSentences} sentences, ${summary.totalIssues} issues, ` +
      `quality score ${summary.qualityScore}/100.`,
  ];

  const flagged = report.sentences.filter((s) => s.issueCount > 0);
  for (const sentence of flagged.slice(0, MAX_LISTED_SENTENCES)) {
    const messages = sentence.issues.map((issue) => issue.message).join(" ");
    lines.push(`- Sentence ${sentence.index + 1}: "${sentence.plainText}" ${messages}`);
  }
  if (flagged.length > MAX_LISTED_SENTENCES) {
    lines.push(`...and ${flagged.length - MAX_LISTED_SENTENCES} more sentences with issues.`);
  }
  if (report.unassigned.length > 0) {
    lines.push(`Document-level issues: ${report.unassigned.map((issue) => issue.message).join(" ")}`);
  }
  if (summary.failedRules.length > 0) {
    lines.push(`Rules that failed and were skipped: ${summary.failedRules.join(", ")}.`);
  }
  return lines.join("\n");
}
