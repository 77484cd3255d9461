/**
 * 大括号位置规则（Allman 风格）
 * 复合语句、函数体以及 struct/union/enum 定义的 `{` 必须独占一行。
 *
 * 初始化列表的 `{` 不是复合语句，不受约束：
 *   int arr[] = {1, 2, 3};
 *   p = (struct point){1, 2};
 *   f((struct point){1, 2});
 * `}` 永远不会被改写，`} else {` 修复为 `} else` + 换行 + `{`。
 */

import type { Violation } from "../types";
import type { LintRule, RuleContext, ViolationSite } from "../core/types";
import {
  computeParenDepths,
  leadingWhitespace,
  lineStartOf,
  matchingOpenParen,
  previousSignificant,
} from "../core/code-view";
import { createViolation } from "../core/violation";

const INITIALIZER_PREFIX = new Set(["=", ",", "{", "(", "[", "?"]);

const MESSAGE = "'{' must be on its own line";

/**
 * `)` 是否是复合字面量的类型转换，例如 `= (struct point){...}`
 */
function closesCompoundLiteralCast(masked: string, closeIndex: number): boolean {
  const open = matchingOpenParen(masked, closeIndex);
  if (open < 0) return false;

  const before = previousSignificant(masked, open);
  if (before === null) return false;
  if (before.isWord) {
    return before.value === "return" || before.value === "sizeof";
  }
  return before.value !== ")" && before.value !== "]";
}

/**
 * 控制结构首行的起始位置：跨过成对的圆括号向前找，
 * 多行条件 `if (a &&\n    b) {` 会回到 `if` 所在行
 */
function headerLineStart(masked: string, braceIndex: number): number {
  let depth = 0;
  for (let i = braceIndex - 1; i >= 0; i--) {
    const ch = masked[i];
    if (ch === ")") depth++;
    else if (ch === "(") depth--;
    else if (ch === "\n" && depth <= 0) return i + 1;
  }
  return 0;
}

export class BracePlacementRule implements LintRule {
  readonly id = "brace-placement" as const;
  readonly description = "opening '{' of a block sits on its own line";

  check(context: RuleContext): Violation[] {
    const { text, masked } = context.view;
    const depths = computeParenDepths(masked);
    const eol = text.includes("\r\n") ? "\r\n" : "\n";
    const violations: Violation[] = [];

    for (let i = masked.indexOf("{"); i !== -1; i = masked.indexOf("{", i + 1)) {
      const lineStart = lineStartOf(masked, i);
      if (masked.slice(lineStart, i).trim() === "") continue;
      if (this.isInitializer(masked, i, depths)) continue;

      violations.push(
        createViolation(context, this.id, this.buildSite(text, masked, i, lineStart, eol), MESSAGE)
      );
    }

    return violations;
  }

  private isInitializer(masked: string, braceIndex: number, depths: Int32Array): boolean {
    if (depths[braceIndex] > 0) return true;

    const previous = previousSignificant(masked, braceIndex);
    if (previous === null) return false;
    if (previous.isWord) return previous.value === "return";
    if (INITIALIZER_PREFIX.has(previous.value)) return true;
    return previous.value === ")" && closesCompoundLiteralCast(masked, previous.start);
  }

  /**
   * 替换范围是 `{` 以及它前面同一行的空白，空白按原文计算以保留行尾注释
   */
  private buildSite(
    text: string,
    masked: string,
    braceIndex: number,
    lineStart: number,
    eol: string
  ): ViolationSite {
    let start = braceIndex;
    while (start > lineStart && (text[start - 1] === " " || text[start - 1] === "\t")) {
      start--;
    }

    const indent = leadingWhitespace(text, headerLineStart(masked, braceIndex));

    return {
      anchor: braceIndex,
      start,
      end: braceIndex + 1,
      suggestedText: `${eol}${indent}{`,
    };
  }
}
