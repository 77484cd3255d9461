import { describe, expect, test } from "vitest";
import { applyEdits } from "../src/core/text-patcher";
import { planEdits, toEdit } from "../src/core/replacement-planner";
import type { Violation } from "../src/types";

function violation(start: number, end: number, suggestedText: string): Violation {
  return {
    rule: "pointer-spacing",
    line: 1,
    column: start + 1,
    start,
    end,
    originalText: "",
    suggestedText,
    message: "test",
  };
}

describe("applyEdits", () => {
  test("shifts later edits by the length change of earlier ones", () => {
    const result = applyEdits("abcdef", [
      { start: 1, end: 2, replacement: "XX" },
      { start: 4, end: 6, replacement: "" },
    ]);
    expect(result).toBe("aXXcd");
  });

  test("adjacent edits", () => {
    const result = applyEdits("int* a;", [
      { start: 3, end: 5, replacement: " *" },
      { start: 5, end: 6, replacement: "b" },
    ]);
    expect(result).toBe("int *b;");
  });

  test("no edits returns the input", () => {
    expect(applyEdits("x", [])).toBe("x");
  });

  test("rejects overlapping edits", () => {
    expect(() =>
      applyEdits("abcdef", [
        { start: 0, end: 3, replacement: "" },
        { start: 2, end: 4, replacement: "" },
      ])
    ).toThrow(/Invalid position/);
  });
});

describe("planEdits", () => {
  test("sorts edits by start offset", () => {
    const plan = planEdits([violation(5, 6, "b"), violation(0, 1, "a")]);
    expect(plan.edits).toEqual([
      { start: 0, end: 1, replacement: "a" },
      { start: 5, end: 6, replacement: "b" },
    ]);
    expect(plan.skipped).toEqual([]);
  });

  test("drops the later-starting edit of an overlapping pair", () => {
    const first = violation(0, 4, "x");
    const second = violation(2, 6, "y");
    const third = violation(6, 7, "z");

    const plan = planEdits([second, third, first]);

    expect(plan.applied).toEqual([first, third]);
    expect(plan.skipped).toEqual([second]);
    expect(plan.edits.map((edit) => edit.start)).toEqual([0, 6]);
  });

  test("toEdit", () => {
    expect(toEdit(violation(3, 5, " *"))).toEqual({ start: 3, end: 5, replacement: " *" });
  });
});
