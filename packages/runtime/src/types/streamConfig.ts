import { z } from "zod";

export type ChannelFilter = (value: unknown) => boolean;

export const ChannelModeSchema = z.enum([
  "values", // 完整快照
  "updates", // 按节点增量
]);

export const ChannelKindSchema = z.enum([
  "message", // 消息列表，参与去重与工具调用登记
  "artifact", // 产物，输出 ArtifactEvent
  "generic", // 其他通道，输出通道值/更新事件
]);

const ChannelFilterSchema = z.custom<ChannelFilter>(
  (value) => typeof value === "function",
  { message: "filter must be a function" }
);

const NamespacePatternSchema = z
  .string()
  .trim()
  .min(1, "namespace pattern cannot be empty");

const PatternSetSchema = z
  .union([z.array(NamespacePatternSchema), z.set(NamespacePatternSchema)])
  .transform((patterns) => new Set(patterns));

export interface ChannelConfig {
  /** 监听的状态键，例如 messages、notes */
  key: string;
  /** 显式指定的监听模式，缺省时由 preferUpdates 决定 */
  mode?: z.infer<typeof ChannelModeSchema>;
  kind: z.infer<typeof ChannelKindSchema>;
  /** 仅 artifact 通道存在 */
  artifactType?: string;
  filter?: ChannelFilter;
}

export const ChannelConfigSchema = z
  .object({
    key: z.string().trim().min(1, "Channel key cannot be empty"),
    mode: ChannelModeSchema.optional(),
    kind: ChannelKindSchema.optional(),
    artifactType: z
      .string({ invalid_type_error: "artifactType must be a string if provided" })
      .trim()
      .min(1, "artifactType cannot be empty")
      .optional(),
    filter: ChannelFilterSchema.optional(),
  })
  .strict()
  .superRefine((channel, ctx) => {
    if (channel.kind === "artifact" && !channel.artifactType) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["artifactType"],
        message: "artifactType must be provided for artifact channels",
      });
    }
    if (channel.artifactType && channel.kind && channel.kind !== "artifact") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["kind"],
        message: `artifactType is not allowed on ${channel.kind} channels`,
      });
    }
  })
  .transform(
    (channel): ChannelConfig => ({
      key: channel.key,
      ...(channel.mode ? { mode: channel.mode } : {}),
      kind: channel.artifactType ? "artifact" : channel.kind ?? "generic",
      ...(channel.artifactType ? { artifactType: channel.artifactType } : {}),
      ...(channel.filter ? { filter: channel.filter } : {}),
    })
  );

export const TokenStreamingConfigSchema = z
  .object({
    /** 允许输出 token 的命名空间模式，支持精确匹配、尾部通配符与 "all" */
    enabledNamespaces: PatternSetSchema.refine((patterns) => patterns.size > 0, {
      message: "At least one namespace must be enabled for token streaming",
    }).default(["main"]),
    /** 排除的命名空间模式，优先级高于 enabledNamespaces */
    excludeNamespaces: PatternSetSchema.default([]),
    /** 可选：要求 token 元数据 tags 至少命中其一 */
    messageTags: PatternSetSchema.refine((tags) => tags.size > 0, {
      message: "messageTags cannot be empty when provided",
    }).optional(),
    /** 是否输出工具调用参数的流式事件 */
    includeToolCalls: z.boolean().default(false),
  })
  .strict();

export const StreamingConfigSchema = z
  .object({
    channels: z
      .array(ChannelConfigSchema)
      .default([{ key: "messages", kind: "message" }]),
    tokenStreaming: TokenStreamingConfigSchema.default({}),
    /** 通道缺省使用 updates 模式而非 values 模式 */
    preferUpdates: z.boolean().default(false),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.channels.forEach((channel, index) => {
      if (seen.has(channel.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["channels", index, "key"],
          message: `Duplicate channel key "${channel.key}"`,
        });
      }
      seen.add(channel.key);
    });
  });

export type ChannelMode = z.infer<typeof ChannelModeSchema>;
export type ChannelKind = z.infer<typeof ChannelKindSchema>;
export type ChannelConfigInput = z.input<typeof ChannelConfigSchema>;
export type TokenStreamingConfigInput = z.input<typeof TokenStreamingConfigSchema>;
export type TokenStreamingConfig = z.output<typeof TokenStreamingConfigSchema>;
export type StreamingConfigInput = z.input<typeof StreamingConfigSchema>;
export type StreamingConfig = z.output<typeof StreamingConfigSchema>;
