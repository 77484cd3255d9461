/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

// 错误类别枚举
export enum ErrorCategory {
  INPUT = "INPUT", // 输入路径错误
  CONFIG = "CONFIG", // 配置错误
  FILE_OPERATION = "FILE_OPERATION", // 文件读写错误
  FIX = "FIX", // 自动修复冲突
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，中断当前文件处理
  FATAL = "FATAL", // 致命错误，中断整个处理流程
}

// 统一错误接口
export interface LintError {
  code: string; // 错误代码，例如 FILE001
  category: ErrorCategory;
  message: string;
  details?: string;
  filePath?: string;
  line?: number;
  column?: number;
  severity: ErrorSeverity;
  suggestion?: string;
  originalError?: Error;
}

interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

const errorDefinitions: Record<string, ErrorDefinition> = {
  // 输入错误
  INPUT001: {
    code: "INPUT001",
    category: ErrorCategory.INPUT,
    messageTemplate: "{0} 不是文件或目录",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认路径存在，并且是一个 .c/.h 文件或包含它们的目录",
  },
  INPUT002: {
    code: "INPUT002",
    category: ErrorCategory.INPUT,
    messageTemplate: "{0} 不是 C 源文件或头文件",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "只处理以下扩展名的文件: {1}",
  },
  INPUT003: {
    code: "INPUT003",
    category: ErrorCategory.INPUT,
    messageTemplate: "目录 {0} 中没有找到 C 源文件",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "只处理以下扩展名的文件: {1}",
  },

  // 配置错误
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "配置无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "可用的规则: {1}",
  },
  CONFIG002: {
    code: "CONFIG002",
    category: ErrorCategory.CONFIG,
    messageTemplate: "fix 参数无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "fix 参数只能是 true 或 false",
  },

  // 文件操作错误
  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "读取文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认文件存在且有读取权限",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "写入文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认文件有写入权限，检查磁盘空间是否足够",
  },

  // 修复冲突
  FIX001: {
    code: "FIX001",
    category: ErrorCategory.FIX,
    messageTemplate: "违规无法自动修复: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "该位置与另一处修复重叠，请手动修改后重新运行",
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "如果问题持续存在，请提交问题报告",
  },
};

/**
 * 创建格式化的错误对象
 */
export function createLintError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    line?: number;
    column?: number;
    originalError?: Error;
  } = {}
): LintError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换消息模板中的参数
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate ?? "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, param);
    suggestion = suggestion.replace(`{${index}}`, param);
  });

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError?.message,
    filePath: options.filePath,
    line: options.line,
    column: options.column,
    severity: definition.severity,
    suggestion,
    originalError: options.originalError,
  };
}

/**
 * 格式化错误（日志用）
 */
export function formatError(error: LintError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n文件: ${error.filePath}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
      if (error.column) {
        formattedMessage += `:${error.column}`;
      }
    }
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: LintError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

/**
 * 提供给最终用户的简化错误消息
 */
export function formatErrorForUser(error: LintError): string {
  let message = `❌ 错误(${error.code}): ${error.message}`;

  if (error.filePath) {
    message += `\n文件位置: ${error.filePath}`;
    if (error.line) {
      message += ` 第 ${error.line} 行`;
      if (error.column) {
        message += ` 第 ${error.column} 列`;
      }
    }
  }

  if (error.suggestion) {
    message += `\n修复建议: ${error.suggestion}`;
  }

  return message;
}

/**
 * 根据原始错误（通常是 fs 抛出的）推断错误代码
 */
export function enhanceError(
  error: Error,
  filePath?: string,
  operation: "read" | "write" = "read"
): LintError {
  const errorMessage = error.message;
  const isFsError = /\b(ENOENT|EACCES|EPERM|EISDIR|ENOTDIR|EROFS|ENOSPC|EMFILE|EBUSY)\b/.test(
    errorMessage
  );

  if (isFsError) {
    const errorCode = operation === "write" ? "FILE002" : "FILE001";
    return createLintError(errorCode, [filePath ?? errorMessage], {
      filePath,
      originalError: error,
    });
  }

  return createLintError("GENERAL001", [errorMessage], {
    filePath,
    originalError: error,
  });
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
