import { processTarget } from "./processFiles";
import type { LintOptions } from "./types";

// 导出核心模块
export * from "./core";
export { PointerSpacingRule, BracePlacementRule } from "./rules";
export {
  processTarget,
  processFileList,
  collectSourceFiles,
  lintFile,
} from "./processFiles";
export type { FileLintResult, LintRunResult } from "./processFiles";
export { renderRunResult, formatViolation } from "./report-formatter";

export type {
  Span,
  SpanKind,
  RuleId,
  Violation,
  LintReport,
  Edit,
  FixResult,
  LintOptions,
} from "./types";

/**
 * 统一的检查主函数
 */
export async function lintC(target: string, options: LintOptions = {}) {
  return processTarget(target, options);
}

export default lintC;
