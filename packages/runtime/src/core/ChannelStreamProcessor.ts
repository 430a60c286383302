import { nanoid } from "nanoid";
import type { Observable } from "rxjs";
import { createStreamingConfig } from "../config/streamingConfig.js";
import { EventBus } from "../event/EventBus.js";
import type { Clock } from "../event/eventFactory.js";
import type {
  RawFrame,
  RunConfig,
  StreamableGraph,
  StreamDiagnostic,
  StreamEvent,
  StreamingConfig,
  StreamingConfigInput,
  StreamMode,
  ToolCallHistoryEntry,
  ToolCallState,
} from "../types/index.js";
import {
  createConsoleLogger,
  scopedLogger,
  type StreamLogger,
} from "../utils/logger.js";
import { StreamSession } from "./StreamSession.js";

export interface ChannelStreamProcessorOptions {
  eventBus?: EventBus;
  logger?: StreamLogger;
  clock?: Clock;
}

export interface ProcessorEventStream {
  events$: Observable<StreamEvent>;
  diagnostics$: Observable<StreamDiagnostic>;
}

/**
 * 流处理入口：持有一份校验过的订阅配置，创建会话并代理一个默认会话。
 * 所有会话产生的事件同时发布到处理器的事件总线上。
 */
export class ChannelStreamProcessor {
  public readonly config: StreamingConfig;

  private readonly eventBus: EventBus;

  private readonly logger: StreamLogger;

  private readonly clock: Clock | undefined;

  private defaultSession: StreamSession;

  constructor(
    config: StreamingConfigInput = {},
    options: ChannelStreamProcessorOptions = {}
  ) {
    this.config = createStreamingConfig(config);
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger = options.logger ?? createConsoleLogger("ChannelStreamProcessor");
    this.clock = options.clock;
    this.defaultSession = this.createSession();
  }

  public get streams(): ProcessorEventStream {
    return {
      events$: this.eventBus.events(),
      diagnostics$: this.eventBus.diagnostics(),
    };
  }

  public get bus(): EventBus {
    return this.eventBus;
  }

  public get streamModes(): StreamMode[] {
    return this.defaultSession.streamModes;
  }

  public get session(): StreamSession {
    return this.defaultSession;
  }

  /**
   * 创建一个状态独立的会话，适用于并发运行的多个图。
   */
  public createSession(): StreamSession {
    const sessionId = nanoid();
    return new StreamSession({
      config: this.config,
      eventBus: this.eventBus,
      logger: scopedLogger(this.logger, `session ${sessionId}`),
      sessionId,
      ...(this.clock ? { clock: this.clock } : {}),
    });
  }

  public stream(
    graph: StreamableGraph,
    input: unknown,
    runConfig: RunConfig = {},
    options: Record<string, unknown> = {}
  ): AsyncGenerator<StreamEvent> {
    return this.defaultSession.stream(graph, input, runConfig, options);
  }

  public processFrames(
    frames: AsyncIterable<RawFrame> | Iterable<RawFrame>
  ): AsyncGenerator<StreamEvent> {
    return this.defaultSession.process(frames);
  }

  public processFrame(frame: RawFrame): StreamEvent[] {
    return this.defaultSession.processFrame(frame);
  }

  public startNewToolCallIteration(): void {
    this.defaultSession.startNewToolCallIteration();
  }

  public getActiveToolCalls(): Map<string, ToolCallState> {
    return this.defaultSession.getActiveToolCalls();
  }

  public getCompletedToolCalls(): ToolCallState[] {
    return this.defaultSession.getCompletedToolCalls();
  }

  public getAllCompletedToolCalls(): ToolCallHistoryEntry[] {
    return this.defaultSession.getAllCompletedToolCalls();
  }

  /** 丢弃默认会话并换上一个全新的会话 */
  public resetState(): void {
    this.defaultSession.dispose();
    this.defaultSession = this.createSession();
  }
}
