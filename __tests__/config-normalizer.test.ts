import { describe, expect, test } from "vitest";
import {
  CONFIG_DEFAULTS,
  normalizeConfig,
  parseFixFlag,
  parseList,
} from "../src/core/config-normalizer";

describe("normalizeConfig", () => {
  test("defaults", () => {
    expect(normalizeConfig()).toEqual({
      ok: true,
      options: {
        fix: false,
        rules: ["pointer-spacing", "brace-placement"],
        extensions: [".c", ".h"],
      },
    });
  });

  test("normalizes extensions and removes duplicates", () => {
    const result = normalizeConfig({ extensions: ["C", ".H", ".c", " "] });
    expect(result.ok && result.options.extensions).toEqual([".c", ".h"]);
  });

  test("keeps a subset of rules", () => {
    const result = normalizeConfig({ fix: true, rules: ["brace-placement"] });
    expect(result).toEqual({
      ok: true,
      options: { fix: true, rules: ["brace-placement"], extensions: [".c", ".h"] },
    });
  });

  test("unknown rule is a configuration error", () => {
    const result = normalizeConfig({ rules: ["pointer-spacing", "tabs"] });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CONFIG001");
      expect(result.error.message).toBe("配置无效: 未知规则 tabs");
      expect(result.error.suggestion).toBe(
        `可用的规则: ${CONFIG_DEFAULTS.RULES.join(", ")}`
      );
    }
  });

  test("empty rule list is a configuration error", () => {
    const result = normalizeConfig({ rules: [] });
    expect(result.ok).toBe(false);
  });
});

describe("parseFixFlag", () => {
  test.each([
    ["true", true],
    ["TRUE", true],
    [" False ", false],
    ["false", false],
    ["yes", null],
    ["", null],
  ])("%j -> %j", (input, expected) => {
    expect(parseFixFlag(input)).toBe(expected);
  });
});

test("parseList", () => {
  expect(parseList(" .c, .h ,,")).toEqual([".c", ".h"]);
});
