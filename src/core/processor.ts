/**
 * 核心处理器
 * 分类 -> 构建 code view -> 运行已注册的规则 -> （fix 模式）规划并应用编辑。
 * 处理器本身不持有任何与文本相关的状态，同一个实例可以处理任意多个文件。
 */

import type { FixResult, LintReport, RuleId, Violation } from "../types";
import type { LintRule } from "./types";
import { classify } from "./classifier";
import { buildCodeView } from "./code-view";
import { CodePositionCalculator } from "./code-position-calculator";
import { compareViolations } from "./violation";
import { planEdits } from "./replacement-planner";
import { applyEdits } from "./text-patcher";

export class LintProcessor {
  private rules: LintRule[] = [];

  /**
   * 注册检查规则
   */
  registerRule(rule: LintRule): void {
    this.rules.push(rule);
  }

  getRuleIds(): RuleId[] {
    return this.rules.map((rule) => rule.id);
  }

  /**
   * 检查文本，返回按文档顺序排列的违规
   */
  scan(text: string): LintReport {
    const view = buildCodeView(text, classify(text));
    const context = { view, positions: new CodePositionCalculator(text) };

    const violations: Violation[] = [];
    for (const rule of this.rules) {
      violations.push(...rule.check(context));
    }
    violations.sort(compareViolations);

    return { violations, count: violations.length, skipped: [] };
  }

  /**
   * 检查并修复文本。与其他修复重叠的违规不会被应用，记录在 report.skipped 中
   */
  fix(text: string): FixResult {
    const report = this.scan(text);
    if (report.count === 0) {
      return { code: text, report, changed: false };
    }

    const plan = planEdits(report.violations);
    const code = applyEdits(text, plan.edits);

    return {
      code,
      report: { ...report, skipped: plan.skipped },
      changed: code !== text,
    };
  }
}
