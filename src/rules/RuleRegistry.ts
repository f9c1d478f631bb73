/**
 * RuleRegistry: explicit, ordered rule registration.
 *
 * Registration order is the merge order of rule output, so it is part of the
 * determinism contract.
 */

import { ReviewRuleError } from "../errors";
import type { ReviewRule } from "../services/ReviewEngine.types";
import { complexSentencesRule } from "./complexSentences";
import { concisenessRule } from "./conciseness";
import { longSentencesRule } from "./longSentences";
import { passiveVoiceRule } from "./passiveVoice";
import { repeatedWordsRule } from "./repeatedWords";

export class RuleRegistry {
  private readonly rules = new Map<string, ReviewRule>();

  constructor(rules: readonly ReviewRule[] = []) {
    this.registerAll(rules);
  }

  register(rule: ReviewRule): this {
    if (this.rules.has(rule.id)) {
      throw ReviewRuleError.duplicateId(rule.id);
    }
    this.rules.set(rule.id, rule);
    return this;
  }

  registerAll(rules: readonly ReviewRule[]): this {
    for (const rule of rules) this.register(rule);
    return this;
  }

  unregister(id: string): boolean {
    return this.rules.delete(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  get(id: string): ReviewRule | undefined {
    return this.rules.get(id);
  }

  /** Rules in registration order */
  list(): ReviewRule[] {
    return [...this.rules.values()];
  }

  get size(): number {
    return this.rules.size;
  }
}

export const BUILTIN_RULES: readonly ReviewRule[] = [
  longSentencesRule,
  complexSentencesRule,
  passiveVoiceRule,
  repeatedWordsRule,
  concisenessRule,
];

export function createDefaultRegistry(): RuleRegistry {
  return new RuleRegistry(BUILTIN_RULES);
}
