import type { ZodIssue } from "zod";

export type StreamErrorCode =
  | "unrecognized_frame_shape"
  | "orphan_argument_chunk"
  | "tool_call_json_error"
  | "configuration_error"
  | "session_disposed";

/**
 * 流处理相关错误的基类，`code` 字段在日志与诊断事件中保持稳定。
 */
export class StreamError extends Error {
  public readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 无法识别的原始帧结构：记录并丢弃，流继续 */
export class UnrecognizedFrameShapeError extends StreamError {
  public readonly frame: unknown;

  constructor(reason: string, frame: unknown) {
    super("unrecognized_frame_shape", `Unrecognized frame shape: ${reason}`);
    this.frame = frame;
  }
}

/** 参数分片引用了未知的 (messageId, index)：记录并丢弃 */
export class OrphanArgumentChunkError extends StreamError {
  public readonly messageId: string;

  public readonly index: number;

  constructor(messageId: string, index: number, detail?: string) {
    super(
      "orphan_argument_chunk",
      `No active tool call for (${messageId}, ${index})${detail ? `: ${detail}` : ""}`
    );
    this.messageId = messageId;
    this.index = index;
  }
}

/** 参数看似完整却无法解析为 JSON 对象，作为 error 状态事件交给消费方 */
export class ToolCallJsonError extends StreamError {
  public readonly toolCallId: string;

  public readonly accumulatedArgs: string;

  constructor(toolCallId: string, accumulatedArgs: string, reason: string) {
    super("tool_call_json_error", `JSON parse error: ${reason}`);
    this.toolCallId = toolCallId;
    this.accumulatedArgs = accumulatedArgs;
  }
}

/** 订阅配置非法：构造阶段直接抛出 */
export class ConfigurationError extends StreamError {
  public readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super("configuration_error", formatIssues(issues));
    this.issues = issues;
  }
}

export class SessionDisposedError extends StreamError {
  constructor(sessionId: string) {
    super("session_disposed", `Stream session ${sessionId} has been disposed`);
  }
}

function formatIssues(issues: ZodIssue[]): string {
  if (issues.length === 0) {
    return "Invalid streaming configuration";
  }
  const details = issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
  return `Invalid streaming configuration (${details})`;
}
