/**
 * 规则索引文件
 * 导出所有可用的检查规则
 */

export { PointerSpacingRule } from "./pointer-spacing";
export { BracePlacementRule } from "./brace-placement";

import type { RuleId } from "../types";
import type { LintRule } from "../core/types";
import { LintProcessor } from "../core/processor";
import { CONFIG_DEFAULTS } from "../core/config-normalizer";
import { PointerSpacingRule } from "./pointer-spacing";
import { BracePlacementRule } from "./brace-placement";

const RULE_FACTORIES: Record<RuleId, () => LintRule> = {
  "pointer-spacing": () => new PointerSpacingRule(),
  "brace-placement": () => new BracePlacementRule(),
};

/**
 * 创建带有指定规则（默认全部）的处理器
 */
export function createLinterWithDefaultRules(
  ruleIds: readonly RuleId[] = CONFIG_DEFAULTS.RULES
): LintProcessor {
  const processor = new LintProcessor();

  for (const id of ruleIds) {
    processor.registerRule(RULE_FACTORIES[id]());
  }

  return processor;
}
