/**
 * 报告输出格式
 */

import type { Violation } from "./types";
import type { FileLintResult, LintRunResult } from "./processFiles";

export function formatViolation(filePath: string, violation: Violation): string {
  return `${filePath}:${violation.line}:${violation.column}: [${violation.rule}] ${violation.message}`;
}

export function formatFixSummary(result: FileLintResult): string {
  const fixed = result.report.count - result.report.skipped.length;
  return `✅ ${result.filePath}: fixed ${fixed} violation(s)`;
}

export function formatRunSummary(run: LintRunResult): string {
  const files = `Checked ${run.files.length} file(s)`;
  const failures = run.errors.length > 0 ? `, ${run.errors.length} error(s)` : "";

  if (run.fix) {
    return `${files}: fixed ${run.totalFixed} violation(s), ${run.totalSkipped} skipped${failures}.`;
  }
  return `${files}: ${run.totalViolations} violation(s) found${failures}.`;
}

/**
 * 按运行模式输出结果：scan 模式逐条列出违规，fix 模式列出被改写的文件
 */
export function renderRunResult(run: LintRunResult): string[] {
  const lines: string[] = [];

  for (const file of run.files) {
    if (run.fix) {
      if (file.changed) lines.push(formatFixSummary(file));
    } else {
      lines.push(...file.report.violations.map((v) => formatViolation(file.filePath, v)));
    }
  }

  lines.push(formatRunSummary(run));
  return lines;
}
