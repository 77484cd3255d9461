/**
 * 公共类型定义
 * Shared types for the classifier, the rules and the file driver.
 */

/**
 * 词法片段类型
 */
export type SpanKind =
  | "code"
  | "string"
  | "char"
  | "line-comment"
  | "block-comment";

/**
 * 源码中的一个连续片段，[start, end) 为原始文本偏移
 */
export interface Span {
  kind: SpanKind;
  start: number;
  end: number;
}

export type RuleId = "pointer-spacing" | "brace-placement";

/**
 * 单条违规记录
 * start/end 为建议文本要替换的原始文本范围
 */
export interface Violation {
  readonly rule: RuleId;
  /** 行号（1-based） */
  readonly line: number;
  /** 列号（1-based），指向 `*` 或 `{` */
  readonly column: number;
  readonly start: number;
  readonly end: number;
  readonly originalText: string;
  readonly suggestedText: string;
  readonly message: string;
}

/**
 * 单个文件的检查报告
 */
export interface LintReport {
  /** 按文档顺序排列 */
  violations: Violation[];
  count: number;
  /** fix 模式下因编辑冲突而未能应用的违规 */
  skipped: Violation[];
}

/**
 * 文本编辑
 */
export interface Edit {
  start: number;
  end: number;
  replacement: string;
}

export interface FixResult {
  code: string;
  report: LintReport;
  changed: boolean;
}

/**
 * Configuration options for a lint run.
 * 检查过程的配置选项。
 */
export interface LintOptions {
  /**
   * 为 true 时自动修复并写回文件，默认 false
   */
  fix?: boolean;
  /**
   * 启用的规则，默认全部
   */
  rules?: string[];
  /**
   * 目录模式下处理的文件扩展名，默认 [".c", ".h"]
   */
  extensions?: string[];
}
