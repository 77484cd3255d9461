/**
 * 词法分类器
 * 单次从左到右扫描源码，把文本切分为 code / string / char / comment 片段。
 * 规则只在 code 片段上匹配，字面量和注释里的内容永远不会被误判。
 */

import type { Span, SpanKind } from "../types";

/**
 * 逐个产出片段（惰性）。片段按顺序、互不重叠、连续覆盖整个文本，且不含空片段。
 * 未闭合的注释在文件末尾隐式闭合；未闭合的字面量在行尾结束。
 */
export function* iterateSpans(text: string): Generator<Span> {
  let kind: SpanKind = "code";
  let start = 0;
  let escaped = false;
  let i = 0;

  // 切换模式：关闭当前片段（非空时产出），从 at 开始新片段
  function* switchTo(next: SpanKind, at: number): Generator<Span> {
    if (at > start) {
      yield { kind, start, end: at };
    }
    kind = next;
    start = at;
  }

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    switch (kind) {
      case "code":
        if (ch === '"') {
          yield* switchTo("string", i);
          i++;
        } else if (ch === "'") {
          yield* switchTo("char", i);
          i++;
        } else if (ch === "/" && next === "/") {
          yield* switchTo("line-comment", i);
          i += 2;
        } else if (ch === "/" && next === "*") {
          yield* switchTo("block-comment", i);
          i += 2;
        } else {
          i++;
        }
        break;

      case "string":
      case "char": {
        const quote = kind === "string" ? '"' : "'";
        if (escaped) {
          escaped = false;
          // `\` + CRLF 续行
          if (ch === "\r" && next === "\n") i++;
        } else if (ch === "\\") {
          escaped = true;
        } else if (ch === quote) {
          yield* switchTo("code", i + 1);
        } else if (ch === "\n" || (ch === "\r" && next === "\n")) {
          // 字面量不能跨行：未闭合的引号在行尾结束
          yield* switchTo("code", i);
        }
        i++;
        break;
      }

      case "line-comment":
        if (ch === "\\" && next === "\n") {
          // 行拼接：注释延续到下一行
          i += 2;
        } else if (ch === "\\" && next === "\r" && text[i + 2] === "\n") {
          i += 3;
        } else if (ch === "\n" || (ch === "\r" && next === "\n")) {
          // 换行符本身属于 code
          yield* switchTo("code", i);
          i++;
        } else {
          i++;
        }
        break;

      case "block-comment":
        if (ch === "*" && next === "/") {
          i += 2;
          yield* switchTo("code", i);
        } else {
          i++;
        }
        break;
    }
  }

  if (text.length > start) {
    yield { kind, start, end: text.length };
  }
}

/**
 * 把整个文本分类为片段列表
 */
export function classify(text: string): Span[] {
  return Array.from(iterateSpans(text));
}

export function spanText(text: string, span: Span): string {
  return text.slice(span.start, span.end);
}
