/**
 * 文件驱动
 * 收集目标路径下的 C 源文件，逐个读取、检查/修复并写回。
 * 单个文件的读写失败只跳过该文件，不影响其他文件。
 */

import fs from "fs";
import type { Stats } from "fs";
import path from "path";
import { glob } from "glob";
import type { LintOptions, LintReport } from "./types";
import type { LintProcessor } from "./core/processor";
import { normalizeConfig, type NormalizedLintOptions } from "./core/config-normalizer";
import {
  createLintError,
  enhanceError,
  logError,
  toError,
  type LintError,
} from "./core/error-handler";
import { createLinterWithDefaultRules } from "./rules";

export interface FileLintResult {
  filePath: string;
  report: LintReport;
  /** fix 模式下文件内容是否被改写 */
  changed: boolean;
  error?: LintError;
}

export interface LintRunResult {
  fix: boolean;
  files: FileLintResult[];
  /** 文件级错误（读写失败等） */
  errors: LintError[];
  /** 无法自动修复的违规（FIX001） */
  warnings: LintError[];
  totalViolations: number;
  totalFixed: number;
  totalSkipped: number;
  exitCode: number;
}

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INPUT_ERROR = 2;

function emptyReport(): LintReport {
  return { violations: [], count: 0, skipped: [] };
}

function hasExtension(filePath: string, extensions: string[]): boolean {
  return extensions.includes(path.extname(filePath).toLowerCase());
}

/**
 * 收集待处理文件：单个文件直接返回，目录递归查找（结果排序）
 */
export async function collectSourceFiles(
  target: string,
  extensions: string[]
): Promise<{ files: string[]; error?: LintError }> {
  let stats: Stats;
  try {
    stats = fs.statSync(target);
  } catch (error) {
    return {
      files: [],
      error: createLintError("INPUT001", [target], { originalError: toError(error) }),
    };
  }

  if (stats.isFile()) {
    if (!hasExtension(target, extensions)) {
      return {
        files: [],
        error: createLintError("INPUT002", [target, extensions.join(", ")]),
      };
    }
    return { files: [target] };
  }

  if (!stats.isDirectory()) {
    return { files: [], error: createLintError("INPUT001", [target]) };
  }

  const matches = await glob(
    extensions.map((ext) => `**/*${ext}`),
    // 与单文件的扩展名判断一致，不区分大小写
    { cwd: target, nodir: true, nocase: true }
  );
  const files = Array.from(new Set(matches))
    .sort()
    .map((relative) => path.join(target, relative));

  if (files.length === 0) {
    return {
      files: [],
      error: createLintError("INPUT003", [target, extensions.join(", ")]),
    };
  }

  return { files };
}

/**
 * 处理单个文件
 */
export function lintFile(
  filePath: string,
  processor: LintProcessor,
  fix: boolean
): FileLintResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    return {
      filePath,
      report: emptyReport(),
      changed: false,
      error: createLintError("FILE001", [filePath], {
        filePath,
        originalError: toError(error),
      }),
    };
  }

  try {
    if (!fix) {
      return { filePath, report: processor.scan(content), changed: false };
    }

    const result = processor.fix(content);
    if (result.changed) {
      try {
        fs.writeFileSync(filePath, result.code, "utf8");
      } catch (error) {
        return {
          filePath,
          report: result.report,
          changed: false,
          error: createLintError("FILE002", [filePath], {
            filePath,
            originalError: toError(error),
          }),
        };
      }
    }

    return { filePath, report: result.report, changed: result.changed };
  } catch (error) {
    return {
      filePath,
      report: emptyReport(),
      changed: false,
      error: enhanceError(toError(error), filePath),
    };
  }
}

function conflictWarnings(result: FileLintResult): LintError[] {
  return result.report.skipped.map((violation) =>
    createLintError("FIX001", [`${violation.rule} '${violation.originalText}'`], {
      filePath: result.filePath,
      line: violation.line,
      column: violation.column,
    })
  );
}

function computeExitCode(run: Omit<LintRunResult, "exitCode">): number {
  if (run.errors.length > 0) return EXIT_FAILURE;
  if (run.fix) return run.totalSkipped > 0 ? EXIT_FAILURE : EXIT_OK;
  return run.totalViolations > 0 ? EXIT_FAILURE : EXIT_OK;
}

/**
 * 处理已收集好的文件列表
 */
export function processFileList(
  filePaths: string[],
  options: NormalizedLintOptions
): LintRunResult {
  const processor = createLinterWithDefaultRules(options.rules);
  const files: FileLintResult[] = [];
  const errors: LintError[] = [];
  const warnings: LintError[] = [];

  for (const filePath of filePaths) {
    const result = lintFile(filePath, processor, options.fix);
    files.push(result);

    if (result.error) {
      logError(result.error);
      errors.push(result.error);
    }

    for (const warning of conflictWarnings(result)) {
      logError(warning);
      warnings.push(warning);
    }
  }

  const totalViolations = files.reduce((sum, file) => sum + file.report.count, 0);
  const totalSkipped = files.reduce((sum, file) => sum + file.report.skipped.length, 0);
  const totalFixed = options.fix
    ? files
        .filter((file) => file.changed)
        .reduce((sum, file) => sum + file.report.count - file.report.skipped.length, 0)
    : 0;

  const run = {
    fix: options.fix,
    files,
    errors,
    warnings,
    totalViolations,
    totalFixed,
    totalSkipped,
  };
  return { ...run, exitCode: computeExitCode(run) };
}

function inputFailure(fix: boolean, error: LintError): LintRunResult {
  logError(error);
  return {
    fix,
    files: [],
    errors: [error],
    warnings: [],
    totalViolations: 0,
    totalFixed: 0,
    totalSkipped: 0,
    exitCode: EXIT_INPUT_ERROR,
  };
}

/**
 * 处理一个文件或目录
 */
export async function processTarget(
  target: string,
  options: LintOptions = {}
): Promise<LintRunResult> {
  const normalized = normalizeConfig(options);
  if (!normalized.ok) {
    return inputFailure(options.fix ?? false, normalized.error);
  }

  const { files, error } = await collectSourceFiles(target, normalized.options.extensions);
  if (error) {
    return inputFailure(normalized.options.fix, error);
  }

  console.log(`Found ${files.length} files to process.`);
  return processFileList(files, normalized.options);
}
