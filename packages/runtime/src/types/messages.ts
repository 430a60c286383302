import { z } from "zod";

export const GraphMessageTypeSchema = z.enum([
  "ai", // 模型输出（包括流式分片）
  "human", // 用户输入
  "system", // 系统提示
  "tool", // 工具执行结果
]);

export const MessageContentPartSchema = z
  .object({
    /** 内容片段类型，例如 text、image_url */
    type: z.string(),
    /** 文本片段内容，仅 text 类型存在 */
    text: z.string().optional(),
  })
  .passthrough();

export const MessageContentSchema = z.union([
  z.string(),
  z.array(MessageContentPartSchema),
]);

export const GraphToolCallSchema = z
  .object({
    /** 工具调用 ID，完整消息中应当存在 */
    id: z.string().nullish(),
    /** 工具名称 */
    name: z.string(),
    /** 已解析的结构化参数 */
    args: z.record(z.string(), z.unknown()).nullish(),
  })
  .passthrough();

export const GraphToolCallChunkSchema = z
  .object({
    /** 仅首个分片携带 */
    id: z.string().nullish(),
    /** 仅首个分片携带 */
    name: z.string().nullish(),
    /** 参数文本片段 */
    args: z.string().nullish(),
    /** 同一消息内的工具调用序号，与消息 ID 组成关联键 */
    index: z.number().int().nonnegative().nullish(),
  })
  .passthrough();

export const GraphMessageSchema = z
  .object({
    type: GraphMessageTypeSchema,
    id: z.string().nullish(),
    content: MessageContentSchema,
    name: z.string().nullish(),
    tool_calls: z.array(GraphToolCallSchema).optional(),
    tool_call_chunks: z.array(GraphToolCallChunkSchema).optional(),
    /** tool 消息指向的工具调用 ID */
    tool_call_id: z.string().nullish(),
    /** tool 消息的执行状态 */
    status: z.enum(["success", "error"]).nullish(),
    artifact: z.unknown().optional(),
    response_metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export type GraphMessageType = z.infer<typeof GraphMessageTypeSchema>;
export type MessageContentPart = z.infer<typeof MessageContentPartSchema>;
export type MessageContent = z.infer<typeof MessageContentSchema>;
export type GraphToolCall = z.infer<typeof GraphToolCallSchema>;
export type GraphToolCallChunk = z.infer<typeof GraphToolCallChunkSchema>;
export type GraphMessage = z.infer<typeof GraphMessageSchema>;

/**
 * 尝试把任意值解析为消息，结构不符时返回 null。
 */
export function parseGraphMessage(value: unknown): GraphMessage | null {
  const parsed = GraphMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * 把消息内容统一成纯文本：字符串原样返回，多段内容拼接其中的 text 片段。
 */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => (part.type === "text" && part.text ? part.text : ""))
    .join("");
}
