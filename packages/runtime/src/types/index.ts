import type { StreamMode } from "./frames.js";

export {
  GraphMessageSchema,
  GraphMessageTypeSchema,
  GraphToolCallChunkSchema,
  GraphToolCallSchema,
  MessageContentPartSchema,
  MessageContentSchema,
  messageText,
  parseGraphMessage,
} from "./messages.js";

export type {
  GraphMessage,
  GraphMessageType,
  GraphToolCall,
  GraphToolCallChunk,
  MessageContent,
  MessageContentPart,
} from "./messages.js";

export {
  ChannelConfigSchema,
  ChannelKindSchema,
  ChannelModeSchema,
  StreamingConfigSchema,
  TokenStreamingConfigSchema,
} from "./streamConfig.js";

export type {
  ChannelConfig,
  ChannelConfigInput,
  ChannelFilter,
  ChannelKind,
  StreamingConfig,
  StreamingConfigInput,
  TokenStreamingConfig,
  TokenStreamingConfigInput,
} from "./streamConfig.js";

export type {
  ChannelMode,
  RawFrame,
  StreamMode,
  TokenFrame,
  UpdatesFrame,
  ValuesFrame,
} from "./frames.js";

export type {
  ArtifactEvent,
  ChannelUpdateEvent,
  ChannelValueEvent,
  MessageReceivedEvent,
  ReconciledMessage,
  StreamDiagnostic,
  StreamDiagnosticCode,
  StreamEvent,
  StreamEventBase,
  StreamEventOf,
  StreamEventType,
  TokenStreamEvent,
  ToolCallEvent,
  ToolCallEventStatus,
} from "./events.js";

export type {
  ToolCallHistoryEntry,
  ToolCallResult,
  ToolCallState,
  ToolCallStatus,
} from "./toolCalls.js";

/** 上游执行引擎的最小接口：与 LangGraph 的 graph.stream(input, options) 对齐 */
export interface StreamableGraph {
  stream(
    input: unknown,
    options: GraphStreamOptions
  ): AsyncIterable<unknown> | Promise<AsyncIterable<unknown>>;
}

export interface GraphStreamOptions {
  streamMode: StreamMode[];
  /** 始终开启，用于获得命名空间信息 */
  subgraphs: true;
  [key: string]: unknown;
}

export type RunConfig = Record<string, unknown>;
