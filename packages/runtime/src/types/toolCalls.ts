export type ToolCallStatus = "initializing" | "streaming" | "completed" | "error";

export interface ToolCallResult {
  /** tool 消息正文（已转为纯文本） */
  content: string;
  status: "success" | "error";
  artifact?: unknown;
}

export interface ToolCallState {
  toolCallId: string;
  toolName: string;
  /** 与 index 共同组成分片关联键 */
  messageId: string;
  index: number;
  accumulatedArgs: string;
  /** 仅在参数解析成功后存在 */
  parsedArgs?: Record<string, unknown>;
  status: ToolCallStatus;
  errorMessage?: string;
  result?: ToolCallResult;
}

export interface ToolCallHistoryEntry {
  id: string;
  name: string;
  args: Record<string, unknown>;
  type: "tool_call";
  iteration: number;
}
