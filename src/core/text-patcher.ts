/**
 * Text Patcher
 * 单次正向遍历应用编辑：每应用一个编辑，后续编辑的偏移累加
 * `replacement.length - (end - start)`。
 */
import type { Edit } from "../types";

export function applyEdits(code: string, edits: Edit[]): string {
  if (!edits.length) return code;

  let out = code;
  let delta = 0;
  let lastEnd = 0;

  for (const edit of edits) {
    if (edit.start < lastEnd || edit.end < edit.start || edit.end > code.length) {
      throw new Error(
        `Invalid position: edit [${edit.start}, ${edit.end}) overlaps or is out of range`
      );
    }
    out = out.slice(0, edit.start + delta) + edit.replacement + out.slice(edit.end + delta);
    delta += edit.replacement.length - (edit.end - edit.start);
    lastEnd = edit.end;
  }

  return out;
}
