import type { GraphMessage } from "./messages.js";

export type StreamMode = "values" | "updates" | "messages";

export type ChannelMode = Exclude<StreamMode, "messages">;

/** messages 模式：一次 token 分片及其元数据 */
export interface TokenFrame {
  kind: "token";
  namespace: string;
  message: GraphMessage;
  metadata: Record<string, unknown>;
}

/** values 模式：节点执行后的完整通道快照 */
export interface ValuesFrame {
  kind: "values";
  namespace: string;
  values: Record<string, unknown>;
}

/** updates 模式：按节点划分的通道增量，未产出更新的节点为 null */
export interface UpdatesFrame {
  kind: "updates";
  namespace: string;
  updates: Record<string, Record<string, unknown> | null>;
}

export type RawFrame = TokenFrame | ValuesFrame | UpdatesFrame;
