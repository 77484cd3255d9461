/**
 * 指针声明空格规则
 * `*` 必须紧贴变量名：`int *ptr`、`char **pptr`，而不是 `int* ptr` / `int*ptr` / `int * ptr`。
 *
 * 不做完整语法分析，靠前后记号判断是否处于声明上下文：
 * - 类型是内置类型关键字、限定符或 `*_t` 类型名时一定是声明；
 * - `struct` / `union` / `enum` 之后的标识符一定是类型；
 * - 其他标识符（typedef 名）只在语句开头（含 `case` / `default` / 标签之后）且声明符后
 *   紧跟 `; , = [ ( )` 时视为声明；
 * - 在 `(` / `,` 之后只接受 `T* name` 这种不对称写法，并且外层 `(` 必须是函数声明符的
 *   参数列表（`void f(Node* n)`），调用实参、条件和括号表达式里的乘法不算。
 *
 * 已知的漏报：括号内对称写法的 typedef 参数（`f(Node * n)`），
 * 以及类型与 `*` 之间夹有注释的声明。强制转换（`(char*)p`）不在检查范围内。
 */

import type { Violation } from "../types";
import type { LintRule, RuleContext, ViolationSite } from "../core/types";
import {
  computeParenDepths,
  isPlainCode,
  matchingOpenParen,
  nextSignificantChar,
  previousSignificant,
  type SignificantToken,
} from "../core/code-view";
import { createViolation } from "../core/violation";

const TYPE_KEYWORDS = new Set([
  "void",
  "char",
  "short",
  "int",
  "long",
  "float",
  "double",
  "signed",
  "unsigned",
  "_Bool",
  "bool",
  "_Complex",
  "const",
  "volatile",
  "restrict",
  "FILE",
]);

const TAG_KEYWORDS = new Set(["struct", "union", "enum"]);

const DECL_PREFIX_KEYWORDS = new Set([
  "static",
  "extern",
  "register",
  "auto",
  "inline",
  "typedef",
  "const",
  "volatile",
  "_Thread_local",
]);

const NON_TYPE_KEYWORDS = new Set([
  "return",
  "sizeof",
  "case",
  "goto",
  "if",
  "else",
  "for",
  "while",
  "do",
  "switch",
  "break",
  "continue",
  "default",
  "_Alignof",
]);

const STARS = String.raw`\*(?:[ \t]*\*)*`;
const IDENT = String.raw`[A-Za-z_]\w*`;

// TYPE ws STARS ws NAME
const DECLARATOR_PATTERN = new RegExp(
  String.raw`\b(${IDENT})([ \t]*)(${STARS})([ \t]*)(${IDENT})`,
  "g"
);
// ( ws STARS ws NAME ws )
const FUNCTION_POINTER_PATTERN = new RegExp(
  String.raw`\(([ \t]*)(${STARS})([ \t]*)(${IDENT})[ \t]*\)`,
  "g"
);
// , ws STARS ws NAME
const NEXT_DECLARATOR_PATTERN = new RegExp(
  String.raw`,[ \t]*(${STARS})([ \t]*)(${IDENT})`,
  "g"
);

const MESSAGE = "put '*' next to the variable name (e.g. 'int *x')";

export function isTypeLike(word: string): boolean {
  return TYPE_KEYWORDS.has(word) || /^[A-Za-z_]\w*_t$/.test(word);
}

function compactStars(stars: string): string {
  return stars.replace(/[ \t]/g, "");
}

/**
 * 跳过 static / const 等前缀关键字，返回类型之前的记号
 */
function tokenBeforeType(masked: string, typeStart: number): SignificantToken | null {
  let token = previousSignificant(masked, typeStart);
  while (token && token.isWord && DECL_PREFIX_KEYWORDS.has(token.value)) {
    token = previousSignificant(masked, token.start);
  }
  return token;
}

// 语句开头的 `T name` / `T *name`，T 可以是 typedef 名
const LEADING_DECLARATOR_PATTERN = new RegExp(
  String.raw`^\s*(${IDENT})(?:[ \t]+|[ \t]*${STARS}[ \t]*)${IDENT}`
);

function statementStart(masked: string, index: number): number {
  let i = index - 1;
  while (i >= 0 && !";{}".includes(masked[i])) {
    i--;
  }
  return i + 1;
}

/**
 * 所在语句是否以类型关键字 / 存储类或 typedef 名的声明符开头
 */
function statementStartsWithType(masked: string, start: number, index: number): boolean {
  const head = masked.slice(start, index);
  const first = /^\s*([A-Za-z_]\w*)/.exec(head);
  if (!first) return false;

  const word = first[1];
  if (isTypeLike(word) || TAG_KEYWORDS.has(word) || DECL_PREFIX_KEYWORDS.has(word)) {
    return true;
  }

  const declarator = LEADING_DECLARATOR_PATTERN.exec(head);
  return declarator !== null && !NON_TYPE_KEYWORDS.has(declarator[1]);
}

/**
 * `case X:`、`default:` 或 `name:` 标签的冒号
 */
function isLabelColon(masked: string, colonIndex: number): boolean {
  const label = previousSignificant(masked, colonIndex);
  if (!label?.isWord) return false;
  if (label.value === "default") return true;

  const head = masked.slice(statementStart(masked, colonIndex), colonIndex);
  if (/^\s*case\b[^:?]*$/.test(head)) return true;

  const outer = previousSignificant(masked, label.start);
  return (
    !NON_TYPE_KEYWORDS.has(label.value) &&
    (outer === null || (!outer.isWord && ";{}".includes(outer.value)))
  );
}

function isStatementBoundary(masked: string, token: SignificantToken | null): boolean {
  if (token === null) return true;
  if (token.isWord) return false;
  if (";{}".includes(token.value)) return true;
  return token.value === ":" && isLabelColon(masked, token.start);
}

/**
 * 单词是否是一个声明的类型部分（内置类型、tag 类型，或语句开头的 typedef 名）
 */
function beginsDeclaration(masked: string, word: SignificantToken): boolean {
  if (!word.isWord || NON_TYPE_KEYWORDS.has(word.value)) return false;
  if (isTypeLike(word.value)) return true;

  const previous = tokenBeforeType(masked, word.start);
  if (previous?.isWord) return TAG_KEYWORDS.has(previous.value);
  return isStatementBoundary(masked, previous);
}

/**
 * index 所在的未闭合 `(`，在语句边界之前没有找到时返回 -1
 */
function enclosingOpenParen(masked: string, index: number): number {
  let depth = 0;
  for (let i = index - 1; i >= 0; i--) {
    const ch = masked[i];
    if (ch === ")") {
      depth++;
    } else if (ch === "(") {
      if (depth === 0) return i;
      depth--;
    } else if (";{}".includes(ch)) {
      return -1;
    }
  }
  return -1;
}

/**
 * openParen 处的 `(` 是否是函数声明符的参数列表：
 * `T f(`、`T *f(`，或函数指针 `T (*f)(`
 */
function opensParameterList(masked: string, openParen: number): boolean {
  const callee = previousSignificant(masked, openParen);
  if (callee === null) return false;

  if (callee.value === ")") {
    const inner = matchingOpenParen(masked, callee.start);
    if (inner < 0 || nextSignificantChar(masked, inner + 1) !== "*") return false;
    const type = previousSignificant(masked, inner);
    return type !== null && beginsDeclaration(masked, type);
  }

  if (!callee.isWord || NON_TYPE_KEYWORDS.has(callee.value) || isTypeLike(callee.value)) {
    return false;
  }

  let type = previousSignificant(masked, callee.start);
  while (type && !type.isWord && type.value === "*") {
    type = previousSignificant(masked, type.start);
  }
  return type !== null && beginsDeclaration(masked, type);
}

export class PointerSpacingRule implements LintRule {
  readonly id = "pointer-spacing" as const;
  readonly description = "'*' binds to the declarator name, not the type";

  check(context: RuleContext): Violation[] {
    const sites = [
      ...this.findDeclarators(context),
      ...this.findFunctionPointers(context),
      ...this.findNextDeclarators(context),
    ];
    return sites.map((site) => createViolation(context, this.id, site, MESSAGE));
  }

  private findDeclarators({ view }: RuleContext): ViolationSite[] {
    const { masked } = view;
    const sites: ViolationSite[] = [];

    const pattern = new RegExp(DECLARATOR_PATTERN.source, "g");
    let match: RegExpExecArray | null;

    while ((match = pattern.exec(masked)) !== null) {
      const [full, type, before, stars, after, name] = match;
      const typeStart = match.index;
      const typeEnd = typeStart + type.length;
      const starsStart = typeEnd + before.length;
      const nameStart = starsStart + stars.length + after.length;
      const nameEnd = typeStart + full.length;
      const compact = compactStars(stars);
      // 声明符名可能是下一个匹配的类型，例如 `char* const* p`
      pattern.lastIndex = nameStart;

      if (before !== "" && after === "" && compact === stars) continue;
      if (NON_TYPE_KEYWORDS.has(type) || NON_TYPE_KEYWORDS.has(name)) continue;
      if (!this.isDeclaration(masked, type, typeStart, nameEnd, before, after)) continue;
      if (!isPlainCode(view, typeEnd, nameStart)) continue;

      sites.push({
        anchor: starsStart,
        start: typeEnd,
        end: nameStart,
        suggestedText: (before === "" ? " " : before) + compact,
      });
    }

    return sites;
  }

  private isDeclaration(
    masked: string,
    type: string,
    typeStart: number,
    nameEnd: number,
    before: string,
    after: string
  ): boolean {
    if (isTypeLike(type)) return true;

    const previous = tokenBeforeType(masked, typeStart);
    if (previous?.isWord && TAG_KEYWORDS.has(previous.value)) return true;

    const following = nextSignificantChar(masked, nameEnd);
    if (following === null) return false;

    if (isStatementBoundary(masked, previous)) {
      return ";,=[()".includes(following);
    }

    if (previous && !previous.isWord && "(,".includes(previous.value)) {
      const asymmetric = before === "" && after !== "";
      if (!asymmetric || !",)=[".includes(following)) return false;

      const openParen = enclosingOpenParen(masked, typeStart);
      return openParen >= 0 && opensParameterList(masked, openParen);
    }

    return false;
  }

  /**
   * `int (* fp)(void)` -> `int (*fp)(void)`
   */
  private findFunctionPointers({ view }: RuleContext): ViolationSite[] {
    const { masked } = view;
    const sites: ViolationSite[] = [];

    for (const match of masked.matchAll(FUNCTION_POINTER_PATTERN)) {
      const [full, before, stars, after] = match;
      const parenStart = match.index ?? 0;
      const starsStart = parenStart + 1 + before.length;
      const nameStart = starsStart + stars.length + after.length;
      const compact = compactStars(stars);

      if (before === "" && after === "" && compact === stars) continue;

      const following = nextSignificantChar(masked, parenStart + full.length, true);
      if (following !== "(" && following !== "[") continue;

      const previous = previousSignificant(masked, parenStart);
      if (!previous?.isWord || NON_TYPE_KEYWORDS.has(previous.value)) continue;
      if (!isPlainCode(view, parenStart + 1, nameStart)) continue;

      sites.push({
        anchor: starsStart,
        start: parenStart + 1,
        end: nameStart,
        suggestedText: compact,
      });
    }

    return sites;
  }

  /**
   * `int *a, * b;` -> `int *a, *b;`
   */
  private findNextDeclarators({ view }: RuleContext): ViolationSite[] {
    const { masked } = view;
    const sites: ViolationSite[] = [];
    const depths = computeParenDepths(masked);

    for (const match of masked.matchAll(NEXT_DECLARATOR_PATTERN)) {
      const [full, stars, after, name] = match;
      const commaIndex = match.index ?? 0;
      const nameStart = commaIndex + full.length - name.length;
      const starsStart = nameStart - after.length - stars.length;
      const compact = compactStars(stars);

      if (after === "" && compact === stars) continue;
      if (NON_TYPE_KEYWORDS.has(name)) continue;

      // 只处理语句顶层的逗号，函数调用实参里的 `, * p` 不算声明符
      const start = statementStart(masked, commaIndex);
      if (!statementStartsWithType(masked, start, commaIndex)) continue;
      if (depths[commaIndex] !== depths[start]) continue;
      if (!isPlainCode(view, starsStart, nameStart)) continue;

      sites.push({
        anchor: starsStart,
        start: starsStart,
        end: nameStart,
        suggestedText: compact,
      });
    }

    return sites;
  }
}
