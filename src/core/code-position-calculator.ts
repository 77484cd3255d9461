/**
 * 代码位置计算器
 * 预计算行起始位置，把文本偏移换算为 1-based 行列号，避免每条违规都重新分割字符串
 */

export interface LineColumn {
  line: number;
  column: number;
}

export class CodePositionCalculator {
  private readonly lineStartPositions: number[];

  constructor(code: string) {
    this.lineStartPositions = this.calculateLineStartPositions(code);
  }

  /**
   * 预计算每行的起始位置
   */
  private calculateLineStartPositions(code: string): number[] {
    const positions = [0];
    for (let i = 0; i < code.length; i++) {
      if (code[i] === "\n") {
        positions.push(i + 1);
      }
    }
    return positions;
  }

  /**
   * 偏移 -> 行列号（二分查找）
   */
  locate(offset: number): LineColumn {
    let low = 0;
    let high = this.lineStartPositions.length - 1;

    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStartPositions[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return { line: low + 1, column: offset - this.lineStartPositions[low] + 1 };
  }
}
