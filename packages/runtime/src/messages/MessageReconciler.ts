import { createEventBase, type Clock, type EventScope } from "../event/eventFactory.js";
import type { ToolCallTracker } from "../tools/ToolCallTracker.js";
import { messageText } from "../types/index.js";
import type {
  GraphMessage,
  MessageReceivedEvent,
  ReconciledMessage,
  StreamEvent,
} from "../types/index.js";

export interface MessageReconcilerOptions {
  toolCallTracker: ToolCallTracker;
  clock: Clock;
}

export interface ReconcileOutcome {
  reconciled: ReconciledMessage[];
  events: StreamEvent[];
}

/**
 * 消息去重：同一条消息可能先经 token 流、后经通道快照被观测到（或反之）。
 * 已观测的消息 ID 保存在 seen 集合中，快照路径只为首次出现的消息发出 message 事件。
 */
export class MessageReconciler {
  private readonly toolCallTracker: ToolCallTracker;

  private readonly clock: Clock;

  private seenMessageIds = new Set<string>();

  constructor(options: MessageReconcilerOptions) {
    this.toolCallTracker = options.toolCallTracker;
    this.clock = options.clock;
  }

  /** token 路径：记录已流式输出过的消息 ID */
  public markStreamed(messageId: string | null | undefined): void {
    if (messageId) {
      this.seenMessageIds.add(messageId);
    }
  }

  public hasSeen(messageId: string): boolean {
    return this.seenMessageIds.has(messageId);
  }

  public get seenCount(): number {
    return this.seenMessageIds.size;
  }

  /**
   * 快照路径：为每条新消息计算 wasStreamed，并产生 message/工具调用事件。
   */
  public reconcile(
    messages: GraphMessage[],
    channel: string,
    scope: EventScope
  ): ReconcileOutcome {
    const reconciled: ReconciledMessage[] = [];
    const events: StreamEvent[] = [];

    for (const message of messages) {
      const messageId = message.id ?? undefined;
      const wasStreamed = messageId !== undefined && this.seenMessageIds.has(messageId);
      if (messageId !== undefined && !wasStreamed) {
        this.seenMessageIds.add(messageId);
      }
      reconciled.push({ message, wasStreamed });

      if (!wasStreamed) {
        events.push(this.buildMessageEvent(message, channel, scope));
      }

      if (message.type === "ai" && (message.tool_calls?.length ?? 0) > 0) {
        events.push(...this.toolCallTracker.registerCompleteToolCalls(message, scope));
      }
      if (message.type === "tool") {
        events.push(...this.toolCallTracker.recordResult(message, scope));
      }
    }

    return { reconciled, events };
  }

  public reset(): void {
    this.seenMessageIds.clear();
  }

  private buildMessageEvent(
    message: GraphMessage,
    channel: string,
    scope: EventScope
  ): MessageReceivedEvent {
    const toolCallIds = (message.tool_calls ?? [])
      .map((toolCall) => toolCall.id)
      .filter((id): id is string => typeof id === "string" && id.length > 0);
    return {
      ...createEventBase(scope, this.clock),
      type: "message",
      channel,
      message,
      ...(message.id ? { messageId: message.id } : {}),
      role: message.type,
      content: messageText(message.content),
      wasStreamed: false,
      hasToolCalls: (message.tool_calls?.length ?? 0) > 0,
      toolCallIds,
      source: "channel",
    };
  }
}
