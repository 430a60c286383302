import { nanoid } from "nanoid";
import { ChannelMonitor } from "../channels/ChannelMonitor.js";
import { determineStreamModes } from "../config/streamingConfig.js";
import { SessionDisposedError } from "../errors/streamErrors.js";
import { EventBus } from "../event/EventBus.js";
import {
  createDiagnostic,
  systemClock,
  type Clock,
} from "../event/eventFactory.js";
import { summarizeEvent } from "../event/summarizeEvent.js";
import { MessageReconciler } from "../messages/MessageReconciler.js";
import { TokenAccumulator } from "../messages/TokenAccumulator.js";
import { TokenStreamHandler } from "../messages/TokenStreamHandler.js";
import { ToolCallTracker } from "../tools/ToolCallTracker.js";
import type {
  RawFrame,
  RunConfig,
  StreamableGraph,
  StreamDiagnostic,
  StreamEvent,
  StreamingConfig,
  StreamMode,
  ToolCallHistoryEntry,
  ToolCallState,
} from "../types/index.js";
import {
  createConsoleLogger,
  scopedLogger,
  type StreamLogger,
} from "../utils/logger.js";
import { classifyWireFrame } from "./FrameDispatcher.js";

export interface StreamSessionOptions {
  config: StreamingConfig;
  eventBus?: EventBus;
  logger?: StreamLogger;
  clock?: Clock;
  sessionId?: string;
}

/**
 * 单次（或多次串行）图运行的流处理会话。
 *
 * 会话独占全部可变状态：通道上一次的值、已见消息 ID、token 缓冲与工具调用追踪器。
 * 同一会话上的帧必须串行处理；并发运行请为每次运行创建独立会话。
 */
export class StreamSession {
  public readonly sessionId: string;

  private readonly config: StreamingConfig;

  private readonly modes: StreamMode[];

  private readonly eventBus: EventBus;

  private readonly logger: StreamLogger;

  private readonly clock: Clock;

  private readonly toolCallTracker: ToolCallTracker;

  private readonly accumulator = new TokenAccumulator();

  private readonly reconciler: MessageReconciler;

  private readonly channelMonitor: ChannelMonitor;

  private readonly tokenHandler: TokenStreamHandler;

  private disposed = false;

  constructor(options: StreamSessionOptions) {
    this.sessionId = options.sessionId ?? nanoid();
    this.config = options.config;
    this.modes = determineStreamModes(options.config);
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger =
      options.logger ?? createConsoleLogger(`StreamSession ${this.sessionId}`);
    this.clock = options.clock ?? systemClock;

    const onDiagnostic = (diagnostic: StreamDiagnostic) =>
      this.eventBus.reportDiagnostic(diagnostic);

    this.toolCallTracker = new ToolCallTracker({
      logger: scopedLogger(this.logger, "ToolCallTracker"),
      onDiagnostic,
      clock: this.clock,
    });
    this.reconciler = new MessageReconciler({
      toolCallTracker: this.toolCallTracker,
      clock: this.clock,
    });
    this.channelMonitor = new ChannelMonitor({
      config: this.config,
      reconciler: this.reconciler,
      logger: scopedLogger(this.logger, "ChannelMonitor"),
      clock: this.clock,
      onDiagnostic,
    });
    this.tokenHandler = new TokenStreamHandler({
      config: this.config.tokenStreaming,
      accumulator: this.accumulator,
      reconciler: this.reconciler,
      toolCallTracker: this.toolCallTracker,
      logger: scopedLogger(this.logger, "TokenStream"),
      clock: this.clock,
    });
  }

  /** 需要向引擎请求的流模式 */
  public get streamModes(): StreamMode[] {
    return [...this.modes];
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * 处理一个已分类的帧，返回按产生顺序排列的事件，并同步发布到事件总线。
   */
  public processFrame(frame: RawFrame): StreamEvent[] {
    this.assertActive();
    const events = this.route(frame);
    for (const event of events) {
      this.logger.debug(summarizeEvent(event));
      this.eventBus.emit(event);
    }
    return events;
  }

  /**
   * 处理引擎原样输出的帧；无法识别的形状记录诊断后丢弃，不中断流。
   */
  public processWireFrame(raw: unknown): StreamEvent[] {
    this.assertActive();
    const classification = classifyWireFrame(raw, this.modes);
    if (!classification.ok) {
      const { error } = classification;
      this.logger.warn(error.message);
      this.eventBus.reportDiagnostic(
        createDiagnostic("unrecognized_frame_shape", error.message, {
          clock: this.clock,
          detail: { frame: error.frame },
        })
      );
      return [];
    }
    return this.processFrame(classification.frame);
  }

  /**
   * 逐帧消费并产出事件；一个帧的全部事件交给消费方之后才会拉取下一帧。
   */
  public async *process(
    frames: AsyncIterable<RawFrame> | Iterable<RawFrame>
  ): AsyncGenerator<StreamEvent> {
    for await (const frame of frames) {
      yield* this.processFrame(frame);
    }
  }

  /**
   * 驱动上游图运行：以推导出的流模式并开启子图命名空间调用 graph.stream，
   * 把每个原始帧转换成事件流。
   */
  public async *stream(
    graph: StreamableGraph,
    input: unknown,
    runConfig: RunConfig = {},
    options: Record<string, unknown> = {}
  ): AsyncGenerator<StreamEvent> {
    this.assertActive();
    this.logger.info(`Streaming with modes ${this.modes.join(", ")}`);
    const source = await graph.stream(input, {
      ...runConfig,
      ...options,
      streamMode: this.streamModes,
      subgraphs: true,
    });
    for await (const raw of source) {
      yield* this.processWireFrame(raw);
    }
  }

  /** 在一批工具执行结束后调用，index 从此可以被下一批复用 */
  public startNewToolCallIteration(): void {
    this.assertActive();
    this.toolCallTracker.startNewIteration();
  }

  public getActiveToolCalls(): Map<string, ToolCallState> {
    return this.toolCallTracker.getActiveCalls();
  }

  public getCompletedToolCalls(): ToolCallState[] {
    return this.toolCallTracker.getCompletedCalls();
  }

  public getAllCompletedToolCalls(): ToolCallHistoryEntry[] {
    return this.toolCallTracker.getAllCompletedCalls();
  }

  public getToolCall(toolCallId: string): ToolCallState | undefined {
    return this.toolCallTracker.getToolCall(toolCallId);
  }

  public getPreviousChannelValue(namespace: string, channel: string): unknown {
    return this.channelMonitor.getPreviousValue(namespace, channel);
  }

  /** 清空全部会话状态，之后的帧视为一次全新的运行 */
  public reset(): void {
    this.assertActive();
    this.clearState();
    this.logger.debug("Session state reset");
  }

  /** 释放会话；之后任何处理调用都会抛出 SessionDisposedError */
  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.clearState();
    this.disposed = true;
  }

  private clearState(): void {
    this.channelMonitor.reset();
    this.reconciler.reset();
    this.accumulator.reset();
    this.toolCallTracker.reset();
  }

  private route(frame: RawFrame): StreamEvent[] {
    switch (frame.kind) {
      case "token":
        return this.tokenHandler.handle(frame);
      case "values":
        return this.channelMonitor.processValues(frame);
      case "updates":
        return this.channelMonitor.processUpdates(frame);
    }
  }

  private assertActive(): void {
    if (this.disposed) {
      throw new SessionDisposedError(this.sessionId);
    }
  }
}
