#!/usr/bin/env node

import { Command } from "commander";
import { processTarget } from "./processFiles";
import { renderRunResult } from "./report-formatter";
import { CONFIG_DEFAULTS, parseFixFlag, parseList } from "./core/config-normalizer";
import { createLintError, formatErrorForUser } from "./core/error-handler";
import type { LintOptions } from "./types";

const program = new Command();

program
  .name("c-style-lint")
  .description("检查并修复 C 源码中的指针声明空格和大括号位置")
  .version("1.0.0")
  .argument("<target>", "要处理的 .c/.h 文件或目录（目录会递归处理）")
  .argument("<fix>", "true 自动修复并写回文件，false 只输出报告")
  .option(
    "-r, --rules <rules>",
    `启用的规则，逗号分隔 (默认: ${CONFIG_DEFAULTS.RULES.join(",")})`
  )
  .option(
    "-e, --extensions <extensions>",
    `处理的文件扩展名，逗号分隔 (默认: ${CONFIG_DEFAULTS.EXTENSIONS.join(",")})`
  )
  .action(async (target: string, fixArg: string, cmdOptions: { rules?: string; extensions?: string }) => {
    const fix = parseFixFlag(fixArg);
    if (fix === null) {
      console.error(formatErrorForUser(createLintError("CONFIG002", [fixArg])));
      process.exitCode = 2;
      return;
    }

    const options: LintOptions = {
      fix,
      rules: cmdOptions.rules ? parseList(cmdOptions.rules) : undefined,
      extensions: cmdOptions.extensions ? parseList(cmdOptions.extensions) : undefined,
    };

    try {
      const result = await processTarget(target, options);
      for (const line of renderRunResult(result)) {
        console.log(line);
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      console.error("处理文件时出错:", error);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error("处理文件时出错:", error);
  process.exitCode = 1;
});
