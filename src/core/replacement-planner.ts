/**
 * Replacement Planner
 * 把违规记录转换为一组有序、互不重叠的编辑。
 * 与已接受的编辑重叠的违规（起始位置更靠后的那个）被丢弃，记入 skipped。
 */

import type { Edit, Violation } from "../types";
import { compareViolations } from "./violation";

export interface ReplacementPlan {
  edits: Edit[];
  applied: Violation[];
  skipped: Violation[];
}

export function createEmptyPlan(): ReplacementPlan {
  return { edits: [], applied: [], skipped: [] };
}

export function toEdit(violation: Violation): Edit {
  return {
    start: violation.start,
    end: violation.end,
    replacement: violation.suggestedText,
  };
}

function overlaps(previous: Edit, next: Edit): boolean {
  if (next.start < previous.end) return true;
  // 同一位置的两个插入无法确定先后
  return next.start === previous.start && next.start === next.end;
}

export function planEdits(violations: Violation[]): ReplacementPlan {
  const plan = createEmptyPlan();
  const ordered = [...violations].sort(compareViolations);

  for (const violation of ordered) {
    const edit = toEdit(violation);
    const previous = plan.edits[plan.edits.length - 1];

    if (previous && overlaps(previous, edit)) {
      plan.skipped.push(violation);
      continue;
    }

    plan.edits.push(edit);
    plan.applied.push(violation);
  }

  return plan;
}
