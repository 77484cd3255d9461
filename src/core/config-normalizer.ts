/**
 * 配置规范化模块
 * 处理和规范化所有配置选项，确保配置的一致性
 */

import type { LintOptions, RuleId } from "../types";
import { createLintError, type LintError } from "./error-handler";

/**
 * 默认值常量 - 集中定义所有默认值
 */
const DEFAULT_RULES: readonly RuleId[] = ["pointer-spacing", "brace-placement"];
const DEFAULT_EXTENSIONS: readonly string[] = [".c", ".h"];

export const CONFIG_DEFAULTS = {
  FIX: false,
  RULES: DEFAULT_RULES,
  EXTENSIONS: DEFAULT_EXTENSIONS,
} as const;

/**
 * 规范化的检查选项 - 所有配置项都有确定的值
 */
export interface NormalizedLintOptions {
  fix: boolean;
  rules: RuleId[];
  /** 小写、带前导点 */
  extensions: string[];
}

export type NormalizeResult =
  | { ok: true; options: NormalizedLintOptions }
  | { ok: false; error: LintError };

function isRuleId(value: string): value is RuleId {
  return CONFIG_DEFAULTS.RULES.some((rule) => rule === value);
}

function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function normalizeConfig(options: LintOptions = {}): NormalizeResult {
  const requestedRules = (options.rules ?? [...CONFIG_DEFAULTS.RULES])
    .map((rule) => rule.trim())
    .filter(Boolean);

  const unknown = requestedRules.filter((rule) => !isRuleId(rule));
  if (unknown.length > 0 || requestedRules.length === 0) {
    return {
      ok: false,
      error: createLintError("CONFIG001", [
        unknown.length > 0 ? `未知规则 ${unknown.join(", ")}` : "没有启用任何规则",
        CONFIG_DEFAULTS.RULES.join(", "),
      ]),
    };
  }

  const extensions = (options.extensions ?? [...CONFIG_DEFAULTS.EXTENSIONS])
    .filter((ext) => ext.trim() !== "")
    .map(normalizeExtension);

  return {
    ok: true,
    options: {
      fix: options.fix ?? CONFIG_DEFAULTS.FIX,
      rules: Array.from(new Set(requestedRules.filter(isRuleId))),
      extensions: extensions.length > 0 ? Array.from(new Set(extensions)) : [...CONFIG_DEFAULTS.EXTENSIONS],
    },
  };
}

/**
 * 解析 CLI 的 fix 参数，大小写不敏感；无法识别时返回 null
 */
export function parseFixFlag(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return null;
}

/**
 * 逗号分隔的列表
 */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
