export { RuleRegistry, BUILTIN_RULES, createDefaultRegistry } from "./RuleRegistry";
export { createLongSentencesRule, longSentencesRule, LONG_SENTENCE_WORDS } from "./longSentences";
export { complexSentencesRule, MAX_CLAUSES } from "./complexSentences";
export { passiveVoiceRule } from "./passiveVoice";
export { repeatedWordsRule } from "./repeatedWords";
export { concisenessRule } from "./conciseness";
export { detectClauses, type Clause } from "./clauses";
