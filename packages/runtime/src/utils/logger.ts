export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface StreamLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_LEVEL_ENV = "GRAPH_STREAM_LOG_LEVEL";

/**
 * 从环境变量解析日志级别，无法识别时回退到 warn。
 */
export function resolveLogLevel(
  raw: string | undefined = process.env[LOG_LEVEL_ENV]
): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return "warn";
}

/**
 * 创建带作用域前缀的控制台日志器，输出形如 `[ToolCallTracker] message`。
 */
export function createConsoleLogger(
  scope: string,
  level: LogLevel = resolveLogLevel()
): StreamLogger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug(message, context) {
      if (!enabled("debug")) return;
      // eslint-disable-next-line no-console
      console.debug(`${prefix} ${message}`, ...(context ? [context] : []));
    },
    info(message, context) {
      if (!enabled("info")) return;
      // eslint-disable-next-line no-console
      console.info(`${prefix} ${message}`, ...(context ? [context] : []));
    },
    warn(message, context) {
      if (!enabled("warn")) return;
      console.warn(`${prefix} ${message}`, ...(context ? [context] : []));
    },
    error(message, context) {
      if (!enabled("error")) return;
      console.error(`${prefix} ${message}`, ...(context ? [context] : []));
    },
  };
}

/**
 * 为已有日志器追加子作用域，便于同一会话内区分组件来源。
 */
export function scopedLogger(parent: StreamLogger, scope: string): StreamLogger {
  const prefix = `${scope}: `;
  return {
    debug: (message, context) => parent.debug(prefix + message, context),
    info: (message, context) => parent.info(prefix + message, context),
    warn: (message, context) => parent.warn(prefix + message, context),
    error: (message, context) => parent.error(prefix + message, context),
  };
}
