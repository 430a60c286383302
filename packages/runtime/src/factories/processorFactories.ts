import {
  ChannelStreamProcessor,
  type ChannelStreamProcessorOptions,
} from "../core/ChannelStreamProcessor.js";
import type { ChannelConfigInput } from "../types/index.js";
import { createConsoleLogger } from "../utils/logger.js";

type NamespaceSet = string[] | Set<string>;

export interface SimpleProcessorOptions extends ChannelStreamProcessorOptions {
  tokenNamespaces?: NamespaceSet;
  preferUpdates?: boolean;
  includeToolCalls?: boolean;
}

export interface ArtifactProcessorOptions extends ChannelStreamProcessorOptions {
  /** channel key -> artifactType */
  artifactChannels?: Record<string, string>;
  tokenNamespaces?: NamespaceSet;
  includeToolCalls?: boolean;
}

export interface MultiAgentProcessorOptions extends ChannelStreamProcessorOptions {
  includeToolCalls?: boolean;
  preferUpdates?: boolean;
}

export interface DebugProcessorOptions extends ChannelStreamProcessorOptions {
  includeAllChannels?: boolean;
  tokenNamespaces?: NamespaceSet;
}

const DEFAULT_ARTIFACT_CHANNELS: Record<string, string> = {
  notes: "Document",
  questions: "UserClarification",
  artifacts: "GeneratedArtifact",
  documents: "Document",
  clarifications: "UserClarification",
};

function pickProcessorOptions(
  options: ChannelStreamProcessorOptions
): ChannelStreamProcessorOptions {
  return {
    ...(options.eventBus ? { eventBus: options.eventBus } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
    ...(options.clock ? { clock: options.clock } : {}),
  };
}

/** messages 通道加三个常见的 artifact 通道 */
export function createDefaultChannels(): ChannelConfigInput[] {
  return [
    { key: "messages", kind: "message", mode: "values" },
    { key: "notes", artifactType: "Document" },
    { key: "questions", artifactType: "UserClarification" },
    { key: "artifacts", artifactType: "GeneratedArtifact" },
  ];
}

export function createSimpleProcessor(
  options: SimpleProcessorOptions = {}
): ChannelStreamProcessor {
  return new ChannelStreamProcessor(
    {
      channels: createDefaultChannels(),
      tokenStreaming: {
        enabledNamespaces: options.tokenNamespaces ?? ["main"],
        includeToolCalls: options.includeToolCalls ?? false,
      },
      preferUpdates: options.preferUpdates ?? false,
    },
    pickProcessorOptions(options)
  );
}

/** 只监听 messages 通道的轻量配置 */
export function createMessageOnlyProcessor(
  options: Omit<SimpleProcessorOptions, "preferUpdates"> = {}
): ChannelStreamProcessor {
  return new ChannelStreamProcessor(
    {
      channels: [{ key: "messages", kind: "message", mode: "values" }],
      tokenStreaming: {
        enabledNamespaces: options.tokenNamespaces ?? ["main"],
        includeToolCalls: options.includeToolCalls ?? false,
      },
    },
    pickProcessorOptions(options)
  );
}

export function createArtifactProcessor(
  options: ArtifactProcessorOptions = {}
): ChannelStreamProcessor {
  const artifactChannels = options.artifactChannels ?? DEFAULT_ARTIFACT_CHANNELS;
  const channels: ChannelConfigInput[] = [
    { key: "messages", kind: "message", mode: "values" },
    ...Object.entries(artifactChannels).map(([key, artifactType]) => ({
      key,
      artifactType,
    })),
  ];
  return new ChannelStreamProcessor(
    {
      channels,
      tokenStreaming: {
        enabledNamespaces: options.tokenNamespaces ?? ["main"],
        includeToolCalls: options.includeToolCalls ?? false,
      },
    },
    pickProcessorOptions(options)
  );
}

/**
 * 多智能体场景：token 流只开启给定的智能体命名空间，默认跟踪工具调用并偏好 updates。
 */
export function createMultiAgentProcessor(
  agentNamespaces: NamespaceSet,
  options: MultiAgentProcessorOptions = {}
): ChannelStreamProcessor {
  return new ChannelStreamProcessor(
    {
      channels: [
        { key: "messages", kind: "message", mode: "values" },
        { key: "supervisor_messages", kind: "message", mode: "updates" },
        { key: "notes", artifactType: "Document" },
        { key: "questions", artifactType: "UserClarification" },
        { key: "artifacts", artifactType: "GeneratedArtifact" },
      ],
      tokenStreaming: {
        enabledNamespaces: agentNamespaces,
        includeToolCalls: options.includeToolCalls ?? true,
      },
      preferUpdates: options.preferUpdates ?? true,
    },
    pickProcessorOptions(options)
  );
}

/** 只用 updates 模式监听少量通道，适合高吞吐场景 */
export function createPerformanceOptimizedProcessor(
  monitoredChannels: string[],
  tokenNamespaces: NamespaceSet,
  options: Omit<SimpleProcessorOptions, "tokenNamespaces" | "preferUpdates"> = {}
): ChannelStreamProcessor {
  return new ChannelStreamProcessor(
    {
      channels: monitoredChannels.map((key) => ({ key, mode: "updates" as const })),
      tokenStreaming: {
        enabledNamespaces: tokenNamespaces,
        includeToolCalls: options.includeToolCalls ?? false,
      },
      preferUpdates: true,
    },
    pickProcessorOptions(options)
  );
}

/**
 * 调试用：监听尽可能多的常见通道，始终跟踪工具调用，未指定日志器时以 debug 级别输出每个事件。
 */
export function createDebugProcessor(
  options: DebugProcessorOptions = {}
): ChannelStreamProcessor {
  const channels: ChannelConfigInput[] =
    options.includeAllChannels === false
      ? createDefaultChannels()
      : [
          { key: "messages", kind: "message", mode: "values" },
          { key: "supervisor_messages", kind: "message", mode: "values" },
          { key: "notes", artifactType: "Document" },
          { key: "questions", artifactType: "UserClarification" },
          { key: "artifacts", artifactType: "GeneratedArtifact" },
          { key: "documents", artifactType: "Document" },
          { key: "clarifications", artifactType: "UserClarification" },
          { key: "state", mode: "values" },
          { key: "metadata", mode: "values" },
        ];
  return new ChannelStreamProcessor(
    {
      channels,
      tokenStreaming: {
        enabledNamespaces: options.tokenNamespaces ?? ["main"],
        includeToolCalls: true,
      },
      preferUpdates: false,
    },
    {
      ...pickProcessorOptions(options),
      logger: options.logger ?? createConsoleLogger("ChannelStreamProcessor", "debug"),
    }
  );
}
