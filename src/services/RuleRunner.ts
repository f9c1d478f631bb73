/**
 * RuleRunner: invokes every registered rule against the flattened document
 * text and against each sentence, through a bounded pool.
 *
 * Invocations may finish in any order; output is merged by slot (rule
 * registration order, document run before sentence runs, sentences in order,
 * then detection order) so downstream deduplication is deterministic.
 */

import pLimit from "p-limit";
import { DEFAULT_REVIEW_POLICY, isRecord } from "../config/ReviewPolicy";
import { ReviewRuleError, ReviewRunError } from "../errors";
import { logger as rootLogger, type ReviewLogger } from "../utils/logger";
import { withTimeout } from "../utils/timeout";
import { RuleRegistry } from "../rules/RuleRegistry";
import type { Issue, IssueScope, ReviewRule, Sentence } from "./ReviewEngine.types";

export interface RuleRunOptions {
  scopes?: readonly IssueScope[];
  concurrency?: number;
  timeoutMs?: number;
  /** Checked before each invocation starts */
  isCancelled?: () => boolean;
  onProgress?: (completed: number, total: number) => void;
  logger?: ReviewLogger;
}

export interface RuleRunResult {
  issues: Issue[];
  /** Ids of rules with at least one failed or timed-out invocation, in registration order */
  failedRules: string[];
  invocations: number;
  skippedInvocations: number;
}

interface Invocation {
  rule: ReviewRule;
  scope: IssueScope;
  text: string;
  sentenceIndex: number | null;
}

// ---------------------------------------------------------------------------
// Output normalization
// ---------------------------------------------------------------------------

const LEGACY_ISSUE = /^\s*Issue:\s*(.+)$/im;
const LEGACY_SENTENCE = /^\s*Original sentence:\s*(.+)$/im;
const LEGACY_SUGGESTION = /^\s*AI suggestion:\s*(.+)$/im;

function isOffset(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function fromLegacy(raw: string, rule: ReviewRule, scope: IssueScope, sentenceIndex: number | null): Issue | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const suggestion = LEGACY_SUGGESTION.exec(trimmed)?.[1]?.trim();
  return {
    ruleId: rule.id,
    message: LEGACY_ISSUE.exec(trimmed)?.[1]?.trim() ?? trimmed,
    matchedText: LEGACY_SENTENCE.exec(trimmed)?.[1]?.trim() ?? "",
    start: 0,
    end: 0,
    scope,
    sentenceHint: sentenceIndex,
    category: rule.category,
    ...(suggestion ? { suggestion } : {}),
  };
}

function fromRecord(raw: Record<string, unknown>, rule: ReviewRule, scope: IssueScope, sentenceIndex: number | null): Issue | null {
  const { message, text, start, end, suggestion, category } = raw;
  if (typeof message !== "string" || !message.trim()) return null;
  if (text !== undefined && typeof text !== "string") return null;

  // Offsets that are missing or inconsistent degrade to "no position"
  const positioned = isOffset(start) && isOffset(end) && start <= end;
  return {
    ruleId: rule.id,
    message: message.trim(),
    matchedText: text ?? "",
    start: positioned ? start : 0,
    end: positioned ? end : 0,
    scope,
    sentenceHint: sentenceIndex,
    category: typeof category === "string" && category ? category : rule.category,
    ...(typeof suggestion === "string" && suggestion ? { suggestion } : {}),
  };
}

/**
 * Convert one invocation's raw output into Issues. Accepts legacy string
 * messages and structured records; anything else is malformed and the whole
 * invocation is rejected.
 */
export function normalizeRuleOutput(
  output: unknown,
  rule: ReviewRule,
  scope: IssueScope,
  sentenceIndex: number | null
): Issue[] {
  if (output === null || output === undefined) return [];
  if (!Array.isArray(output)) {
    throw ReviewRuleError.malformedOutput(rule.id, scope, "expected an array");
  }

  const issues: Issue[] = [];
  output.forEach((item: unknown, position) => {
    let issue: Issue | null = null;
    if (typeof item === "string") {
      issue = fromLegacy(item, rule, scope, sentenceIndex);
    } else if (isRecord(item)) {
      issue = fromRecord(item, rule, scope, sentenceIndex);
    }
    if (!issue) {
      throw ReviewRuleError.malformedOutput(rule.id, scope, `item ${position} has no usable message`);
    }
    issues.push(issue);
  });
  return issues;
}

// ---------------------------------------------------------------------------
// Invocation planning
// ---------------------------------------------------------------------------

function supportsScope(rule: ReviewRule, scope: IssueScope): boolean {
  return !rule.scopes || rule.scopes.includes(scope);
}

function mentionsTrigger(rule: ReviewRule, text: string): boolean {
  if (!rule.triggers || rule.triggers.length === 0) return true;
  const lower = text.toLowerCase();
  return rule.triggers.some((trigger) => lower.includes(trigger.toLowerCase()));
}

function planInvocations(
  rules: readonly ReviewRule[],
  documentText: string,
  sentences: readonly Sentence[],
  scopes: readonly IssueScope[]
): { plan: Invocation[]; skipped: number } {
  const plan: Invocation[] = [];
  let skipped = 0;

  for (const rule of rules) {
    if (scopes.includes("document") && supportsScope(rule, "document")) {
      plan.push({ rule, scope: "document", text: documentText, sentenceIndex: null });
    }
    if (scopes.includes("sentence") && supportsScope(rule, "sentence")) {
      for (const sentence of sentences) {
        if (!mentionsTrigger(rule, sentence.plainText)) {
          skipped++;
          continue;
        }
        plan.push({ rule, scope: "sentence", text: sentence.plainText, sentenceIndex: sentence.index });
      }
    }
  }
  return { plan, skipped };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

async function invoke(invocation: Invocation, timeoutMs: number): Promise<Issue[]> {
  const { rule, scope, text, sentenceIndex } = invocation;
  // Promise.resolve().then turns a synchronous throw into a rejection
  const work = Promise.resolve().then(() => rule.run(text));
  let output: unknown;
  try {
    output = await withTimeout(work, timeoutMs, () => ReviewRuleError.timedOut(rule.id, scope, timeoutMs));
  } catch (err) {
    if (err instanceof ReviewRuleError) throw err;
    throw ReviewRuleError.failed(rule.id, scope, err instanceof Error ? err : new Error(String(err)));
  }
  return normalizeRuleOutput(output, rule, scope, sentenceIndex);
}

export async function runRules(
  rules: RuleRegistry | readonly ReviewRule[],
  documentText: string,
  sentences: readonly Sentence[],
  options: RuleRunOptions = {}
): Promise<RuleRunResult> {
  const log = options.logger ?? rootLogger;
  const ruleList = rules instanceof RuleRegistry ? rules.list() : rules;
  const scopes = options.scopes ?? DEFAULT_REVIEW_POLICY.scopes;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REVIEW_POLICY.ruleTimeoutMs;
  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_REVIEW_POLICY.ruleConcurrency));

  const { plan, skipped } = planInvocations(ruleList, documentText, sentences, scopes);
  const slots: Issue[][] = plan.map(() => []);
  const failed = new Set<string>();
  let completed = 0;
  let cancelled = false;

  await Promise.all(
    plan.map((invocation, slot) =>
      limit(async () => {
        if (cancelled || options.isCancelled?.()) {
          cancelled = true;
          return;
        }
        try {
          slots[slot] = await invoke(invocation, timeoutMs);
        } catch (err) {
          failed.add(invocation.rule.id);
          log.warn(
            "Rule invocation failed; counting it as zero issues",
            { ruleId: invocation.rule.id, scope: invocation.scope, sentenceIndex: invocation.sentenceIndex },
            err
          );
        } finally {
          completed++;
          options.onProgress?.(completed, plan.length);
        }
      })
    )
  );

  if (cancelled) {
    throw ReviewRunError.cancelled();
  }

  return {
    issues: slots.flat(),
    failedRules: ruleList.map((r) => r.id).filter((id) => failed.has(id)),
    invocations: plan.length,
    skippedInvocations: skipped,
  };
}
