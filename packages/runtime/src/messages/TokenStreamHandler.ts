import { createEventBase, resolveScope, type Clock } from "../event/eventFactory.js";
import { matchesNamespace } from "../namespace/namespaceResolver.js";
import type { ToolCallTracker } from "../tools/ToolCallTracker.js";
import { messageText } from "../types/index.js";
import type {
  StreamEvent,
  TokenFrame,
  TokenStreamingConfig,
} from "../types/index.js";
import type { StreamLogger } from "../utils/logger.js";
import type { MessageReconciler } from "./MessageReconciler.js";
import type { TokenAccumulator } from "./TokenAccumulator.js";

export interface TokenStreamHandlerOptions {
  config: TokenStreamingConfig;
  accumulator: TokenAccumulator;
  reconciler: MessageReconciler;
  toolCallTracker: ToolCallTracker;
  logger: StreamLogger;
  clock: Clock;
}

function readTags(metadata: Record<string, unknown>): string[] {
  const tags = metadata.tags;
  if (!Array.isArray(tags)) {
    return [];
  }
  return tags.filter((tag): tag is string => typeof tag === "string");
}

function readNodeName(metadata: Record<string, unknown>): string | undefined {
  const node = metadata.langgraph_node;
  return typeof node === "string" && node.length > 0 ? node : undefined;
}

/**
 * 处理 messages 模式的 token 分片：命名空间与标签过滤、工具调用分片、文本累积。
 */
export class TokenStreamHandler {
  private readonly options: TokenStreamHandlerOptions;

  constructor(options: TokenStreamHandlerOptions) {
    this.options = options;
  }

  public shouldStream(namespace: string): boolean {
    const { enabledNamespaces, excludeNamespaces } = this.options.config;
    return matchesNamespace(enabledNamespaces, excludeNamespaces, namespace);
  }

  public handle(frame: TokenFrame): StreamEvent[] {
    const { config, accumulator, reconciler, toolCallTracker, logger, clock } =
      this.options;
    const { namespace, message, metadata } = frame;

    if (!this.shouldStream(namespace)) {
      return [];
    }

    if (config.messageTags) {
      const tags = readTags(metadata);
      if (!tags.some((tag) => config.messageTags?.has(tag))) {
        return [];
      }
    }

    if (message.type !== "ai" && message.type !== "tool") {
      logger.warn(
        `Expected an AI chunk or tool message, got "${message.type}"; skipping token streaming`
      );
      return [];
    }

    reconciler.markStreamed(message.id);

    const scope = resolveScope(namespace, readNodeName(metadata));
    const events: StreamEvent[] = [];

    if (config.includeToolCalls) {
      if (message.type === "ai") {
        events.push(...toolCallTracker.processStreamChunk(message, scope));
      } else {
        events.push(...toolCallTracker.recordResult(message, scope));
      }
    }

    if (message.type === "ai") {
      const contentDelta = messageText(message.content);
      if (contentDelta.length > 0) {
        const messageId = message.id ?? undefined;
        const accumulatedContent = accumulator.append(
          namespace,
          scope.taskId,
          messageId,
          contentDelta
        );
        events.push({
          ...createEventBase(scope, clock),
          type: "token",
          contentDelta,
          accumulatedContent,
          ...(messageId ? { messageId } : {}),
          message,
        });
      }
    }

    return events;
  }
}
