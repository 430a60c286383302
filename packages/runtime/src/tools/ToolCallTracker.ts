import { createActor, type ActorRefFrom } from "xstate";
import { OrphanArgumentChunkError, ToolCallJsonError } from "../errors/streamErrors.js";
import {
  createDiagnostic,
  createEventBase,
  systemClock,
  type Clock,
  type DiagnosticSink,
  type EventScope,
} from "../event/eventFactory.js";
import { toolCallMachine, toolCallStatusOf } from "../fsm/toolCallMachine.js";
import { messageText } from "../types/index.js";
import type {
  GraphMessage,
  StreamEventBase,
  ToolCallEvent,
  ToolCallHistoryEntry,
  ToolCallResult,
  ToolCallState,
} from "../types/index.js";
import { createConsoleLogger, type StreamLogger } from "../utils/logger.js";
import { evaluateArguments } from "./argumentParsing.js";

export interface ToolCallTrackerOptions {
  logger?: StreamLogger;
  onDiagnostic?: DiagnosticSink;
  clock?: Clock;
}

interface ActiveToolCall {
  toolCallId: string;
  toolName: string;
  messageId: string;
  index: number;
  actor: ActorRefFrom<typeof toolCallMachine>;
}

export function toolCallKey(messageId: string, index: number): string {
  return `${messageId}#${index}`;
}

/**
 * 工具调用参数重建器。
 *
 * 同一个工具调用会以两种信号到达：
 * 1. 首个分片（announce）携带完整元数据：id、name、index
 * 2. 后续分片只有参数片段与 index，必须通过 (messageId, index) 与首个分片关联
 *
 * 构建中的调用以 (messageId, index) 为键保存在 active 表中；完成或出错后移出，
 * 改以 toolCallId 为键保存，用于结果关联与去重。由于 index 会在不同批次中复用，
 * 需要在每个批次结束时调用 startNewIteration() 划定边界。
 */
export class ToolCallTracker {
  private readonly logger: StreamLogger;

  private readonly onDiagnostic: DiagnosticSink | undefined;

  private readonly clock: Clock;

  // (messageId, index) -> 构建中的调用
  private activeCalls = new Map<string, ActiveToolCall>();

  // 本批次内参数已就绪的调用
  private completedCalls: ToolCallState[] = [];

  // 历次批次的完成记录，只追加
  private callHistory: ToolCallHistoryEntry[] = [];

  // toolCallId -> 终态快照（completed 或 error），之后不再修改
  private finalizedCalls = new Map<string, ToolCallState>();

  // toolCallId -> 执行结果
  private results = new Map<string, ToolCallResult>();

  private currentIteration = 0;

  constructor(options: ToolCallTrackerOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger("ToolCallTracker");
    this.onDiagnostic = options.onDiagnostic;
    this.clock = options.clock ?? systemClock;
  }

  public get iteration(): number {
    return this.currentIteration;
  }

  /**
   * 登记首个带元数据的分片，创建 initializing 状态并返回 started 事件。
   * 同一键上重复出现同一个调用时返回 null。
   */
  public announce(
    messageId: string,
    index: number,
    toolCallId: string,
    toolName: string,
    scope: EventScope
  ): ToolCallEvent | null {
    // 已进入终态的调用不再重新打开
    if (this.finalizedCalls.has(toolCallId)) {
      this.logger.debug(`Tool call ${toolCallId} already finalized; announcement ignored`);
      return null;
    }
    const key = toolCallKey(messageId, index);
    const existing = this.activeCalls.get(key);
    if (existing) {
      if (existing.toolCallId === toolCallId) {
        this.logger.debug(`Duplicate announcement for ${toolCallId} ignored`);
        return null;
      }
      this.logger.warn(
        `Tool call ${existing.toolCallId} at (${messageId}, ${index}) replaced by ${toolCallId} before completion`
      );
      existing.actor.stop();
    }

    const actor = createActor(toolCallMachine);
    actor.start();
    this.activeCalls.set(key, { toolCallId, toolName, messageId, index, actor });
    this.logger.debug(`Initialized tool call ${toolCallId} at (${messageId}, ${index})`);

    return this.buildEvent(scope, {
      status: "started",
      source: "stream",
      toolCallId,
      toolName,
      messageId,
      index,
      argsDelta: "",
      argsAccumulated: "",
    });
  }

  /**
   * 追加一段参数文本并尝试解析：
   * - 解析为对象：completed，移出 active 表并计入本批次完成列表
   * - 仍未闭合：streaming，返回携带本次片段的进度事件
   * - 看似完整但非法：error，移出 active 表
   * 键不存在时视为孤立分片，记录诊断并返回 null。
   */
  public applyChunk(
    messageId: string,
    index: number,
    fragment: string,
    scope: EventScope
  ): ToolCallEvent | null {
    const key = toolCallKey(messageId, index);
    const active = this.activeCalls.get(key);
    if (!active) {
      this.reportOrphan(messageId, index, scope);
      return null;
    }

    const before = active.actor.getSnapshot().context.accumulatedArgs;
    const outcome = evaluateArguments(before + fragment);
    switch (outcome.kind) {
      case "parsed":
        active.actor.send({ type: "ARGS.PARSED", fragment, args: outcome.args });
        break;
      case "partial":
        active.actor.send({ type: "ARGS.PARTIAL", fragment });
        break;
      case "invalid":
        active.actor.send({ type: "ARGS.INVALID", fragment, reason: outcome.reason });
        break;
    }

    const state = this.describe(active);
    const base = {
      source: "stream" as const,
      toolCallId: state.toolCallId,
      toolName: state.toolName,
      messageId,
      index,
      argsDelta: fragment,
      argsAccumulated: state.accumulatedArgs,
    };

    if (state.status === "completed") {
      this.finalize(key, state);
      this.completedCalls.push(state);
      this.logger.debug(`Tool call ${state.toolCallId} arguments ready`);
      return this.buildEvent(scope, {
        ...base,
        status: "completed",
        ...(state.parsedArgs ? { args: state.parsedArgs } : {}),
      });
    }

    if (state.status === "error") {
      this.finalize(key, state);
      const error = new ToolCallJsonError(
        state.toolCallId,
        state.accumulatedArgs,
        state.errorMessage ?? "invalid arguments"
      );
      this.logger.warn(`Tool call ${error.toolCallId} failed to parse`, {
        code: error.code,
        toolCallId: error.toolCallId,
        accumulatedArgs: error.accumulatedArgs,
        reason: error.message,
      });
      return this.buildEvent(scope, { ...base, status: "error", error: error.message });
    }

    return this.buildEvent(scope, { ...base, status: "streaming" });
  }

  /**
   * 处理 token 流中的 AI 分片：带 id 与 name 的条目视为 announce，
   * 带参数文本的条目视为参数分片（同一条目可以兼具两者）。
   */
  public processStreamChunk(message: GraphMessage, scope: EventScope): ToolCallEvent[] {
    const chunks = message.tool_call_chunks ?? [];
    if (chunks.length === 0) {
      return [];
    }
    const messageId = message.id;
    if (!messageId) {
      this.logger.warn("Missing message ID for tool call processing");
      return [];
    }

    const events: ToolCallEvent[] = [];
    for (const chunk of chunks) {
      const index = chunk.index ?? 0;
      if (chunk.id && chunk.name) {
        const started = this.announce(messageId, index, chunk.id, chunk.name, scope);
        if (started) events.push(started);
      }
      if (chunk.args) {
        const progressed = this.applyChunk(messageId, index, chunk.args, scope);
        if (progressed) events.push(progressed);
      }
    }
    return events;
  }

  /**
   * 登记通道快照中完整消息携带的工具调用：参数已是结构化数据，直接进入终态。
   * 已经处于终态的调用（例如此前通过 token 流完成）不会重复发出事件。
   */
  public registerCompleteToolCalls(
    message: GraphMessage,
    scope: EventScope
  ): ToolCallEvent[] {
    const toolCalls = message.tool_calls ?? [];
    const messageId = message.id ?? "";
    const events: ToolCallEvent[] = [];

    toolCalls.forEach((toolCall, index) => {
      const toolCallId = toolCall.id;
      if (!toolCallId || !toolCall.name) {
        this.logger.warn("Skipping tool call without id or name in complete message");
        return;
      }
      if (this.finalizedCalls.has(toolCallId)) {
        this.logger.debug(`Tool call ${toolCallId} already processed; skipping emission`);
        return;
      }

      const streamingKey = this.findActiveKey(toolCallId);
      if (streamingKey !== undefined) {
        // 完整消息先于最后一个参数分片到达，以快照为准
        this.activeCalls.get(streamingKey)?.actor.stop();
        this.activeCalls.delete(streamingKey);
      }

      const args = toolCall.args ?? undefined;
      const accumulatedArgs = args ? JSON.stringify(args) : "";
      const state: ToolCallState = {
        toolCallId,
        toolName: toolCall.name,
        messageId,
        index,
        accumulatedArgs,
        status: args ? "completed" : "error",
        ...(args
          ? { parsedArgs: args }
          : { errorMessage: "Invalid JSON args in complete message" }),
      };
      this.finalizedCalls.set(toolCallId, state);
      if (state.status === "completed") {
        this.completedCalls.push(state);
      }

      events.push(
        this.buildEvent(scope, {
          status: state.status === "completed" ? "completed" : "error",
          source: "state",
          toolCallId,
          toolName: state.toolName,
          messageId,
          index,
          argsDelta: accumulatedArgs,
          argsAccumulated: accumulatedArgs,
          ...(state.parsedArgs ? { args: state.parsedArgs } : {}),
          ...(state.errorMessage ? { error: state.errorMessage } : {}),
        })
      );
    });

    return events;
  }

  /**
   * 通过 tool_call_id 把 tool 消息关联回原始调用，产生执行结果事件。
   * 未知的调用会补建一条记录，以便结果仍可被追踪；同一调用的结果只处理一次。
   */
  public recordResult(message: GraphMessage, scope: EventScope): ToolCallEvent[] {
    const toolCallId = message.tool_call_id;
    if (!toolCallId) {
      return [];
    }
    if (this.results.has(toolCallId)) {
      this.logger.warn(`Tool call ${toolCallId} result already processed`);
      return [];
    }

    let state = this.finalizedCalls.get(toolCallId);
    if (!state) {
      const activeKey = this.findActiveKey(toolCallId);
      const active = activeKey !== undefined ? this.activeCalls.get(activeKey) : undefined;
      if (active) {
        state = this.describe(active);
      } else {
        this.logger.warn(
          `Received tool result for unknown tool_call_id=${toolCallId}; creating synthetic state`
        );
        state = {
          toolCallId,
          toolName: message.name ?? "",
          messageId: message.id ?? "",
          index: 0,
          accumulatedArgs: "",
          status: "completed",
        };
        this.finalizedCalls.set(toolCallId, state);
      }
    }

    const status = message.status ?? "success";
    const result: ToolCallResult = {
      content: messageText(message.content),
      status,
      ...(message.artifact !== undefined ? { artifact: message.artifact } : {}),
    };
    this.results.set(toolCallId, result);

    return [
      this.buildEvent(scope, {
        status: status === "success" ? "result_success" : "result_error",
        source: "result",
        toolCallId,
        toolName: state.toolName,
        messageId: message.id ?? state.messageId,
        index: state.index,
        argsDelta: "",
        argsAccumulated: state.accumulatedArgs,
        ...(state.parsedArgs ? { args: state.parsedArgs } : {}),
        result,
        ...(status === "error" ? { error: result.content } : {}),
      }),
    ];
  }

  /**
   * 结束当前批次：把已完成的调用写入历史，清空 active 表与本批次完成列表。
   */
  public startNewIteration(): void {
    for (const state of this.completedCalls) {
      if (state.status === "completed" && state.parsedArgs) {
        this.callHistory.push({
          id: state.toolCallId,
          name: state.toolName,
          args: state.parsedArgs,
          type: "tool_call",
          iteration: this.currentIteration,
        });
      }
    }
    this.completedCalls = [];
    this.stopActiveCalls();
    this.currentIteration += 1;
    this.logger.debug(`Started tool call iteration ${this.currentIteration}`);
  }

  public getActiveCalls(): Map<string, ToolCallState> {
    const snapshot = new Map<string, ToolCallState>();
    for (const [key, active] of this.activeCalls) {
      snapshot.set(key, this.describe(active));
    }
    return snapshot;
  }

  public getCompletedCalls(): ToolCallState[] {
    return this.completedCalls.map((state) => this.withResult(state));
  }

  public getHistory(): ToolCallHistoryEntry[] {
    return [...this.callHistory];
  }

  /** 历史记录加上本批次已完成的调用 */
  public getAllCompletedCalls(): ToolCallHistoryEntry[] {
    const current: ToolCallHistoryEntry[] = [];
    for (const state of this.completedCalls) {
      if (state.status === "completed" && state.parsedArgs) {
        current.push({
          id: state.toolCallId,
          name: state.toolName,
          args: state.parsedArgs,
          type: "tool_call",
          iteration: this.currentIteration,
        });
      }
    }
    return [...this.callHistory, ...current];
  }

  public getToolCall(toolCallId: string): ToolCallState | undefined {
    const finalized = this.finalizedCalls.get(toolCallId);
    if (finalized) {
      return this.withResult(finalized);
    }
    const key = this.findActiveKey(toolCallId);
    const active = key !== undefined ? this.activeCalls.get(key) : undefined;
    return active ? this.describe(active) : undefined;
  }

  public hasToolCall(toolCallId: string): boolean {
    return this.finalizedCalls.has(toolCallId) || this.findActiveKey(toolCallId) !== undefined;
  }

  public reset(): void {
    this.stopActiveCalls();
    this.completedCalls = [];
    this.callHistory = [];
    this.finalizedCalls.clear();
    this.results.clear();
    this.currentIteration = 0;
  }

  private describe(active: ActiveToolCall): ToolCallState {
    const snapshot = active.actor.getSnapshot();
    const { accumulatedArgs, parsedArgs, errorMessage } = snapshot.context;
    return {
      toolCallId: active.toolCallId,
      toolName: active.toolName,
      messageId: active.messageId,
      index: active.index,
      accumulatedArgs,
      status: toolCallStatusOf(snapshot),
      ...(parsedArgs ? { parsedArgs } : {}),
      ...(errorMessage ? { errorMessage } : {}),
    };
  }

  private withResult(state: ToolCallState): ToolCallState {
    const result = this.results.get(state.toolCallId);
    return result ? { ...state, result } : { ...state };
  }

  private finalize(key: string, state: ToolCallState): void {
    this.activeCalls.delete(key);
    this.finalizedCalls.set(state.toolCallId, state);
  }

  private findActiveKey(toolCallId: string): string | undefined {
    for (const [key, active] of this.activeCalls) {
      if (active.toolCallId === toolCallId) {
        return key;
      }
    }
    return undefined;
  }

  private stopActiveCalls(): void {
    for (const active of this.activeCalls.values()) {
      active.actor.stop();
    }
    this.activeCalls.clear();
  }

  private reportOrphan(messageId: string, index: number, scope: EventScope): void {
    const alreadyCompleted = this.completedCalls.some(
      (state) => state.messageId === messageId && state.index === index
    );
    const error = new OrphanArgumentChunkError(
      messageId,
      index,
      alreadyCompleted ? "tool call already completed" : undefined
    );
    this.logger.warn(error.message);
    this.onDiagnostic?.(
      createDiagnostic("orphan_argument_chunk", error.message, {
        namespace: scope.namespace,
        detail: { messageId, index },
        clock: this.clock,
      })
    );
  }

  private buildEvent(
    scope: EventScope,
    fields: Omit<ToolCallEvent, "type" | keyof StreamEventBase>
  ): ToolCallEvent {
    return {
      ...createEventBase(scope, this.clock),
      type: "tool_call",
      ...fields,
    };
  }
}
