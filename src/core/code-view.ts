/**
 * Code View
 * 基于分类结果构建“遮罩”文本：与原文等长，字面量和注释被替换为占位字符，
 * 预处理指令被替换为空格。规则在遮罩文本上匹配，偏移与原文一一对应。
 */

import type { Span } from "../types";
import { classify } from "./classifier";

export interface CodeView {
  /** 原始文本 */
  text: string;
  spans: Span[];
  /** 遮罩文本 */
  masked: string;
}

/**
 * 前一个有效记号：一个单词（标识符/关键字）或一个字符
 */
export interface SignificantToken {
  value: string;
  start: number;
  isWord: boolean;
}

const WORD_CHAR = /[A-Za-z0-9_]/;

export function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f" || ch === "\v";
}

function fill(text: string, char: string): string {
  return text.replace(/[^\n]/g, char);
}

/**
 * 把预处理指令（含反斜杠续行）替换为空格
 */
function maskDirectives(masked: string): string {
  const lines = masked.split("\n");
  let continuing = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (continuing || line.trimStart().startsWith("#")) {
      continuing = line.trimEnd().endsWith("\\");
      lines[i] = fill(line, " ");
    }
  }

  return lines.join("\n");
}

export function buildCodeView(text: string, spans: Span[] = classify(text)): CodeView {
  const parts = spans.map((span) => {
    const raw = text.slice(span.start, span.end);
    switch (span.kind) {
      case "code":
        return raw;
      case "string":
        return fill(raw, '"');
      case "char":
        return fill(raw, "'");
      default:
        return fill(raw, " ");
    }
  });

  return { text, spans, masked: maskDirectives(parts.join("")) };
}

/**
 * 从 index（不含）向前查找前一个有效记号，跳过空白（含换行）
 */
export function previousSignificant(
  masked: string,
  index: number
): SignificantToken | null {
  let i = index - 1;
  while (i >= 0 && isWhitespace(masked[i])) {
    i--;
  }
  if (i < 0) return null;

  if (!isWordChar(masked[i])) {
    return { value: masked[i], start: i, isWord: false };
  }

  const end = i + 1;
  while (i > 0 && isWordChar(masked[i - 1])) {
    i--;
  }
  return { value: masked.slice(i, end), start: i, isWord: true };
}

/**
 * 从 index 开始向后查找第一个非空白字符（不跨行时传 sameLine）
 */
export function nextSignificantChar(
  masked: string,
  index: number,
  sameLine = false
): string | null {
  for (let i = index; i < masked.length; i++) {
    const ch = masked[i];
    if (sameLine && ch === "\n") return null;
    if (!isWhitespace(ch)) return ch;
  }
  return null;
}

/**
 * 计算每个位置之前未闭合的圆括号层数（多余的右括号不会让层数小于 0）
 */
export function computeParenDepths(masked: string): Int32Array {
  const depths = new Int32Array(masked.length + 1);
  let depth = 0;
  for (let i = 0; i < masked.length; i++) {
    depths[i] = depth;
    if (masked[i] === "(") depth++;
    else if (masked[i] === ")" && depth > 0) depth--;
  }
  depths[masked.length] = depth;
  return depths;
}

/**
 * 找到 closeIndex 处 `)` 对应的 `(`，不存在时返回 -1
 */
export function matchingOpenParen(masked: string, closeIndex: number): number {
  let depth = 0;
  for (let i = closeIndex; i >= 0; i--) {
    if (masked[i] === ")") depth++;
    else if (masked[i] === "(") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * 范围内是否只包含代码字符（没有注释、字面量或预处理指令）
 */
export function isPlainCode(view: CodeView, start: number, end: number): boolean {
  return view.text.slice(start, end) === view.masked.slice(start, end);
}

export function lineStartOf(text: string, index: number): number {
  if (index <= 0) return 0;
  return text.lastIndexOf("\n", index - 1) + 1;
}

export function leadingWhitespace(text: string, lineStart: number): string {
  let end = lineStart;
  while (text[end] === " " || text[end] === "\t") {
    end++;
  }
  return text.slice(lineStart, end);
}
