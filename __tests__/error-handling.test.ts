/**
 * 错误处理单元测试
 */
import { describe, expect, test } from "vitest";
import {
  createLintError,
  enhanceError,
  formatError,
  formatErrorForUser,
  toError,
  ErrorCategory,
  ErrorSeverity,
} from "../src/core/error-handler";

describe("错误处理", () => {
  describe("基础错误创建和格式化", () => {
    test("应该正确创建LintError对象", () => {
      const error = createLintError("FILE001", ["src/a.c"], { filePath: "src/a.c" });

      expect(error.code).toBe("FILE001");
      expect(error.category).toBe(ErrorCategory.FILE_OPERATION);
      expect(error.severity).toBe(ErrorSeverity.ERROR);
      expect(error.message).toBe("读取文件失败: src/a.c");
      expect(error.filePath).toBe("src/a.c");
      expect(error.suggestion).toBe("请确认文件存在且有读取权限");
    });

    test("模板参数同时替换到建议中", () => {
      const error = createLintError("INPUT002", ["notes.txt", ".c, .h"]);

      expect(error.message).toBe("notes.txt 不是 C 源文件或头文件");
      expect(error.suggestion).toBe("只处理以下扩展名的文件: .c, .h");
      expect(error.severity).toBe(ErrorSeverity.FATAL);
    });

    test("缺少错误定义时应使用GENERAL001", () => {
      const error = createLintError("NONEXISTENT", ["boom"]);

      expect(error.code).toBe("GENERAL001");
      expect(error.category).toBe(ErrorCategory.UNKNOWN);
      expect(error.message).toBe("未知错误: boom");
    });

    test("冲突跳过是警告", () => {
      const error = createLintError("FIX001", ["pointer-spacing '* '"]);
      expect(error.severity).toBe(ErrorSeverity.WARNING);
      expect(error.category).toBe(ErrorCategory.FIX);
    });

    test("formatError 包含位置、详情和建议", () => {
      const error = createLintError("FILE002", ["a.c"], {
        filePath: "a.c",
        line: 3,
        column: 5,
        originalError: new Error("EACCES: permission denied"),
      });

      expect(formatError(error)).toBe(
        "[FILE002] 写入文件失败: a.c\n文件: a.c:3:5\n详情: EACCES: permission denied\n建议: 请确认文件有写入权限，检查磁盘空间是否足够"
      );
    });

    test("formatErrorForUser", () => {
      const error = createLintError("FIX001", ["brace-placement ' {'"], {
        filePath: "b.c",
        line: 10,
        column: 2,
      });

      expect(formatErrorForUser(error)).toBe(
        "❌ 错误(FIX001): 违规无法自动修复: brace-placement ' {'\n文件位置: b.c 第 10 行 第 2 列\n修复建议: 该位置与另一处修复重叠，请手动修改后重新运行"
      );
    });
  });

  describe("enhanceError", () => {
    test("文件系统错误映射为读写错误", () => {
      const error = new Error("ENOENT: no such file or directory, open 'x.c'");

      expect(enhanceError(error, "x.c").code).toBe("FILE001");
      expect(enhanceError(error, "x.c", "write").code).toBe("FILE002");
      expect(enhanceError(error, "x.c").originalError).toBe(error);
    });

    test("其他错误映射为GENERAL001", () => {
      const error = enhanceError(new Error("Invalid position"), "x.c");
      expect(error.code).toBe("GENERAL001");
      expect(error.message).toBe("未知错误: Invalid position");
    });
  });

  test("toError", () => {
    const original = new Error("x");
    expect(toError(original)).toBe(original);
    expect(toError("plain").message).toBe("plain");
  });
});
