/**
 * 核心模块索引文件
 * 导出核心处理器、两个入口函数和相关类型
 */

import type { FixResult, LintReport } from "../types";
import { createLinterWithDefaultRules } from "../rules";

export { LintProcessor } from "./processor";
export { classify, iterateSpans, spanText } from "./classifier";
export { buildCodeView } from "./code-view";
export type { CodeView } from "./code-view";
export { planEdits } from "./replacement-planner";
export type { ReplacementPlan } from "./replacement-planner";
export { applyEdits } from "./text-patcher";
export type { LintRule, RuleContext } from "./types";

// 导出配置规范化系统
export { normalizeConfig, parseFixFlag, CONFIG_DEFAULTS } from "./config-normalizer";
export type { NormalizedLintOptions } from "./config-normalizer";

// 导出错误处理系统
export {
  createLintError,
  enhanceError,
  formatError,
  formatErrorForUser,
  logError,
  ErrorCategory,
  ErrorSeverity,
} from "./error-handler";
export type { LintError } from "./error-handler";

// 导出处理器工厂函数
export { createLinterWithDefaultRules } from "../rules";

/**
 * 使用全部默认规则检查文本
 */
export function scan(text: string): LintReport {
  return createLinterWithDefaultRules().scan(text);
}

/**
 * 使用全部默认规则检查并修复文本
 */
export function fix(text: string): FixResult {
  return createLinterWithDefaultRules().fix(text);
}
