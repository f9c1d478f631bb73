import { describe, it, expect } from "vitest";
import { safeSerialize } from "../src/utils/safeSerialize";
import { ReviewRunError } from "../src/errors";

describe("safeSerialize", () => {
  it("converts dates, maps and sets", () => {
    const result = safeSerialize({
      at: new Date("2026-01-02T03:04:05.000Z"),
      bySentence: new Map([[0, ["a"]]]),
      tags: new Set(["x", "y"]),
    });
    expect(result).toEqual({
      at: "2026-01-02T03:04:05.000Z",
      bySentence: { "0": ["a"] },
      tags: ["x", "y"],
    });
  });

  it("drops functions and undefined values", () => {
    expect(safeSerialize({ keep: 1, fn: () => 2, missing: undefined, nested: { fn: () => 3, n: null } })).toEqual({
      keep: 1,
      nested: { n: null },
    });
  });

  it("breaks circular references", () => {
    const node: Record<string, unknown> = { name: "loop" };
    node.self = node;
    expect(safeSerialize({ node })).toEqual({ node: { name: "loop", self: "[Circular]" } });
  });

  it("serializes review errors without their stack", () => {
    const result = safeSerialize({ error: ReviewRunError.notFound("run-9") });
    expect(result.error).toMatchObject({
      name: "ReviewRunError",
      code: 4002,
      message: "No review run found with id run-9",
      context: { operation: "lookupRun", runId: "run-9" },
    });
    expect(result.error).not.toHaveProperty("stack");
  });
});
