import type { RuleId, Violation } from "../types";
import type { RuleContext, ViolationSite } from "./types";

export function createViolation(
  context: RuleContext,
  rule: RuleId,
  site: ViolationSite,
  message: string
): Violation {
  const { line, column } = context.positions.locate(site.anchor);
  return Object.freeze({
    rule,
    line,
    column,
    start: site.start,
    end: site.end,
    originalText: context.view.text.slice(site.start, site.end),
    suggestedText: site.suggestedText,
    message,
  });
}

/**
 * 按文档顺序排序：先按起始偏移，再按规则 id
 */
export function compareViolations(a: Violation, b: Violation): number {
  if (a.start !== b.start) return a.start - b.start;
  if (a.end !== b.end) return a.end - b.end;
  return a.rule < b.rule ? -1 : a.rule > b.rule ? 1 : 0;
}
