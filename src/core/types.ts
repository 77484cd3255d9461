/**
 * 核心处理器相关类型定义
 */

import type { RuleId, Violation } from "../types";
import type { CodeView } from "./code-view";
import type { CodePositionCalculator } from "./code-position-calculator";

/**
 * 规则执行时的上下文，每次 scan 新建
 */
export interface RuleContext {
  view: CodeView;
  positions: CodePositionCalculator;
}

/**
 * 检查规则接口
 */
export interface LintRule {
  id: RuleId;

  /**
   * 规则说明，用于 CLI 帮助信息
   */
  description: string;

  /**
   * 在 code view 上查找违规，必须是纯函数
   */
  check(context: RuleContext): Violation[];
}

/**
 * 描述一次违规的替换范围
 */
export interface ViolationSite {
  /** `*` 或 `{` 的位置，用于计算行列号 */
  anchor: number;
  start: number;
  end: number;
  suggestedText: string;
}
