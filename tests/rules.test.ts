import { describe, it, expect } from "vitest";
import {
  BUILTIN_RULES,
  RuleRegistry,
  complexSentencesRule,
  concisenessRule,
  createDefaultRegistry,
  createLongSentencesRule,
  detectClauses,
  passiveVoiceRule,
  repeatedWordsRule,
} from "../src/rules";
import { ReviewRuleError } from "../src/errors";

describe("long-sentences", () => {
  it("flags sentences over the word limit with their offsets", async () => {
    const rule = createLongSentencesRule(5);
    const issues = await rule.run("One two three four five six seven. Short one.");
    expect(issues).toEqual([
      {
        text: "One two three four five six seven.",
        start: 0,
        end: 34,
        message:
          "Long sentence detected (7 words). Consider breaking this into shorter sentences for better readability.",
        suggestion: "Aim for at most 5 words per sentence.",
      },
    ]);
  });

  it("ignores sentences at the limit", async () => {
    expect(await createLongSentencesRule(5).run("One two three four five.")).toEqual([]);
  });
});

describe("passive-voice", () => {
  it("flags auxiliary plus participle", async () => {
    const issues = await passiveVoiceRule.run("The report was written by Sam.");
    expect(issues).toEqual([
      {
        text: "was written",
        start: 11,
        end: 22,
        message: 'Passive voice: "was written". Consider rewriting in active voice.',
      },
    ]);
  });

  it("handles progressive passives", async () => {
    const issues = await passiveVoiceRule.run("It is being reviewed now.");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ text: "is being reviewed", start: 3, end: 20 });
  });

  it("skips adjectival states", async () => {
    expect(await passiveVoiceRule.run("She was tired after the trip.")).toEqual([]);
  });
});

describe("repeated-words", () => {
  it("flags a doubled word", async () => {
    const issues = await repeatedWordsRule.run("Save the the file.");
    expect(issues).toEqual([
      {
        text: "the the",
        start: 5,
        end: 12,
        message: 'Repeated word: "the" appears twice in a row.',
        suggestion: 'Remove the duplicate "the".',
      },
    ]);
  });

  it("allows deliberate repetition", async () => {
    expect(await repeatedWordsRule.run("It was very very good.")).toEqual([]);
  });
});

describe("conciseness", () => {
  it("flags wordy expressions", async () => {
    const issues = await concisenessRule.run("We left in order to win.");
    expect(issues).toEqual([
      {
        text: "in order to",
        start: 8,
        end: 19,
        message: 'Wordy expression: replace "in order to" with "to".',
        suggestion: "to",
      },
    ]);
  });

  it("flags redundant modifiers", async () => {
    const issues = await concisenessRule.run("The end result was fine.");
    expect(issues.map((i) => i.message)).toEqual(['Redundant modifier: replace "end result" with "result".']);
  });

  it("reports issues in text order", async () => {
    const issues = await concisenessRule.run("Prior to launch we met in order to plan.");
    expect(issues.map((i) => i.text)).toEqual(["Prior to", "in order to"]);
  });
});

describe("complex-sentences", () => {
  it("flags sentences with more than four clauses", async () => {
    const issues = await complexSentencesRule.run(
      "When it rains, we stay in, we read books, we cook food, and we sleep early."
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      message: "Sentence is too long and complex (5 clauses, 1 dependent). Split it up.",
      start: 0,
    });
  });

  it("does not split numbers at thousands separators", () => {
    expect(detectClauses("About 1,000 people came.")).toHaveLength(1);
  });

  it("opens a dependent clause at a mid-sentence conjunction", () => {
    const clauses = detectClauses("We stayed home because it rained.");
    expect(clauses.map((c) => [c.text, c.type])).toEqual([
      ["We stayed home", "independent"],
      ["because it rained.", "dependent"],
    ]);
  });
});

describe("RuleRegistry", () => {
  it("lists rules in registration order", () => {
    const registry = createDefaultRegistry();
    expect(registry.list().map((r) => r.id)).toEqual([
      "long-sentences",
      "complex-sentences",
      "passive-voice",
      "repeated-words",
      "conciseness",
    ]);
    expect(registry.size).toBe(BUILTIN_RULES.length);
  });

  it("keeps sentence-shaped rules out of the flattened document run", () => {
    const sentenceOnly = createDefaultRegistry()
      .list()
      .filter((r) => r.scopes?.length === 1 && r.scopes[0] === "sentence")
      .map((r) => r.id);
    expect(sentenceOnly).toEqual(["long-sentences", "complex-sentences", "repeated-words"]);
  });

  it("rejects duplicate ids", () => {
    const registry = new RuleRegistry([passiveVoiceRule]);
    expect(() => registry.register(passiveVoiceRule)).toThrow(ReviewRuleError);
  });

  it("unregisters rules", () => {
    const registry = createDefaultRegistry();
    expect(registry.unregister("conciseness")).toBe(true);
    expect(registry.has("conciseness")).toBe(false);
    expect(registry.get("passive-voice")).toBe(passiveVoiceRule);
    expect(registry.unregister("conciseness")).toBe(false);
  });
});
