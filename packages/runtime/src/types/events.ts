import type { GraphMessage, GraphMessageType } from "./messages.js";
import type { ToolCallResult } from "./toolCalls.js";

export interface StreamEventBase {
  /** 事件唯一标识 */
  eventId: string;
  /** 产生事件的命名空间，根图为 "main" */
  namespace: string;
  /** 并行子任务 ID，根图为空 */
  taskId?: string;
  /** 产生事件的节点路径或节点名 */
  nodeName?: string;
  /** 事件生成时间（毫秒时间戳） */
  timestamp: number;
}

/** 通道快照中新出现的一条消息及其去重标记 */
export interface ReconciledMessage {
  message: GraphMessage;
  /** 该消息 ID 在本次出现前已被观测过（通常来自 token 流） */
  wasStreamed: boolean;
}

export interface TokenStreamEvent extends StreamEventBase {
  type: "token";
  contentDelta: string;
  accumulatedContent: string;
  messageId?: string;
  message: GraphMessage;
}

export interface MessageReceivedEvent extends StreamEventBase {
  type: "message";
  channel: string;
  message: GraphMessage;
  messageId?: string;
  role: GraphMessageType;
  content: string;
  wasStreamed: boolean;
  hasToolCalls: boolean;
  toolCallIds: string[];
  source: "channel" | "stream";
}

export interface ChannelValueEvent extends StreamEventBase {
  type: "channel.value";
  channel: string;
  value: unknown;
  valueDelta?: unknown;
  /** 仅消息通道：本次新增的消息 */
  messages?: ReconciledMessage[];
}

export interface ChannelUpdateEvent extends StreamEventBase {
  type: "channel.update";
  channel: string;
  nodeName: string;
  stateUpdate: Record<string, unknown>;
  /** 仅消息通道：本次更新携带的消息 */
  messages?: ReconciledMessage[];
}

export interface ArtifactEvent extends StreamEventBase {
  type: "artifact";
  channel: string;
  artifactType: string;
  artifactData: unknown;
  isUpdate: boolean;
}

export type ToolCallEventStatus =
  | "started" // 首个分片带来完整元数据
  | "streaming" // 参数仍在拼接
  | "completed" // 参数解析成功
  | "error" // 参数看似完整但无法解析
  | "result_success" // 工具执行成功
  | "result_error"; // 工具执行失败

export interface ToolCallEvent extends StreamEventBase {
  type: "tool_call";
  status: ToolCallEventStatus;
  /** stream：来自 token 分片；state：来自通道中的完整消息；result：来自 tool 消息 */
  source: "stream" | "state" | "result";
  toolCallId: string;
  toolName: string;
  messageId: string;
  index: number;
  argsDelta: string;
  argsAccumulated: string;
  args?: Record<string, unknown>;
  result?: ToolCallResult;
  error?: string;
}

export type StreamEvent =
  | TokenStreamEvent
  | MessageReceivedEvent
  | ChannelValueEvent
  | ChannelUpdateEvent
  | ArtifactEvent
  | ToolCallEvent;

export type StreamEventType = StreamEvent["type"];

export type StreamEventOf<T extends StreamEventType> = Extract<
  StreamEvent,
  { type: T }
>;

export type StreamDiagnosticCode =
  | "unrecognized_frame_shape"
  | "orphan_argument_chunk"
  | "invalid_message"
  | "filter_error";

/** 非致命的解析异常，通过事件总线单独广播，不进入事件流 */
export interface StreamDiagnostic {
  code: StreamDiagnosticCode;
  message: string;
  namespace?: string;
  timestamp: number;
  detail?: Record<string, unknown>;
}
