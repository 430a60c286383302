import { effectiveChannelMode } from "../config/streamingConfig.js";
import {
  createDiagnostic,
  createEventBase,
  resolveScope,
  type Clock,
  type DiagnosticSink,
} from "../event/eventFactory.js";
import type { MessageReconciler } from "../messages/MessageReconciler.js";
import { parseGraphMessage } from "../types/index.js";
import type {
  ChannelConfig,
  ChannelMode,
  GraphMessage,
  StreamEvent,
  StreamingConfig,
  UpdatesFrame,
  ValuesFrame,
} from "../types/index.js";
import type { StreamLogger } from "../utils/logger.js";
import {
  calculateDelta,
  isEmptyValue,
  isStructurallyEqual,
  snapshotValue,
} from "../utils/values.js";

export interface ChannelMonitorOptions {
  config: StreamingConfig;
  reconciler: MessageReconciler;
  logger: StreamLogger;
  clock: Clock;
  onDiagnostic?: DiagnosticSink;
}

/**
 * 通道监控：按 (namespace, channel) 记录上一次的值，只在值发生结构性变化时产生事件。
 * 每个通道只在其有效模式（values 或 updates）下被处理。
 */
export class ChannelMonitor {
  private readonly options: ChannelMonitorOptions;

  private readonly channelsByMode: Record<ChannelMode, ChannelConfig[]>;

  // namespace:channel -> 上一次记录的值
  private previousValues = new Map<string, unknown>();

  constructor(options: ChannelMonitorOptions) {
    this.options = options;
    const { channels, preferUpdates } = options.config;
    this.channelsByMode = {
      values: channels.filter(
        (channel) => effectiveChannelMode(channel, preferUpdates) === "values"
      ),
      updates: channels.filter(
        (channel) => effectiveChannelMode(channel, preferUpdates) === "updates"
      ),
    };
  }

  public processValues(frame: ValuesFrame): StreamEvent[] {
    const events: StreamEvent[] = [];
    const scope = resolveScope(frame.namespace);

    for (const channel of this.channelsByMode.values) {
      if (!(channel.key in frame.values)) {
        continue;
      }
      const current = frame.values[channel.key];
      const change = this.recordChange(frame.namespace, channel, current);
      if (!change) {
        continue;
      }
      const { previous, hadPrevious } = change;

      switch (channel.kind) {
        case "message": {
          const previousCount = Array.isArray(previous) ? previous.length : 0;
          const items = asList(current);
          const fresh =
            items.length > previousCount
              ? this.toMessages(items.slice(previousCount), previousCount, channel.key, frame.namespace)
              : [];
          if (fresh.length === 0) {
            break;
          }
          const outcome = this.options.reconciler.reconcile(fresh, channel.key, scope);
          events.push({
            ...createEventBase(scope, this.options.clock),
            type: "channel.value",
            channel: channel.key,
            value: current,
            valueDelta: fresh,
            messages: outcome.reconciled,
          });
          events.push(...outcome.events);
          break;
        }
        case "artifact":
          if (isEmptyValue(current)) {
            break;
          }
          events.push({
            ...createEventBase(scope, this.options.clock),
            type: "artifact",
            channel: channel.key,
            artifactType: channel.artifactType ?? channel.key,
            artifactData: current,
            isUpdate: hadPrevious,
          });
          break;
        case "generic": {
          const valueDelta = calculateDelta(previous, current);
          events.push({
            ...createEventBase(scope, this.options.clock),
            type: "channel.value",
            channel: channel.key,
            value: current,
            ...(valueDelta !== undefined ? { valueDelta } : {}),
          });
          break;
        }
      }
    }

    return events;
  }

  /**
   * updates 帧形如 `{ nodeName: { channel: value } }`，按节点顺序逐一处理。
   */
  public processUpdates(frame: UpdatesFrame): StreamEvent[] {
    const events: StreamEvent[] = [];

    for (const [nodeName, stateUpdate] of Object.entries(frame.updates)) {
      if (!stateUpdate) {
        continue;
      }
      const scope = resolveScope(frame.namespace, nodeName);

      for (const channel of this.channelsByMode.updates) {
        if (!(channel.key in stateUpdate)) {
          continue;
        }
        const update = stateUpdate[channel.key];
        const change = this.recordChange(frame.namespace, channel, update);
        if (!change) {
          continue;
        }

        switch (channel.kind) {
          case "message": {
            const fresh = this.toMessages(asList(update), 0, channel.key, frame.namespace);
            if (fresh.length === 0) {
              break;
            }
            const outcome = this.options.reconciler.reconcile(fresh, channel.key, scope);
            events.push({
              ...createEventBase(scope, this.options.clock),
              type: "channel.update",
              channel: channel.key,
              nodeName,
              stateUpdate: { [channel.key]: update },
              messages: outcome.reconciled,
            });
            events.push(...outcome.events);
            break;
          }
          case "artifact":
            if (isEmptyValue(update)) {
              break;
            }
            events.push({
              ...createEventBase(scope, this.options.clock),
              type: "artifact",
              channel: channel.key,
              artifactType: channel.artifactType ?? channel.key,
              artifactData: update,
              isUpdate: change.hadPrevious,
            });
            break;
          case "generic":
            events.push({
              ...createEventBase(scope, this.options.clock),
              type: "channel.update",
              channel: channel.key,
              nodeName,
              stateUpdate: { [channel.key]: update },
            });
            break;
        }
      }
    }

    return events;
  }

  public getPreviousValue(namespace: string, channel: string): unknown {
    return this.previousValues.get(stateKey(namespace, channel));
  }

  public reset(): void {
    this.previousValues.clear();
  }

  /**
   * 比较并记录新值；值未变化或未通过过滤器时返回 null。
   * 过滤器在记录之后执行，被过滤掉的值同样会成为下一次比较的基准。
   */
  private recordChange(
    namespace: string,
    channel: ChannelConfig,
    current: unknown
  ): { previous: unknown; hadPrevious: boolean } | null {
    const key = stateKey(namespace, channel.key);
    const hadPrevious = this.previousValues.has(key);
    const previous = this.previousValues.get(key);
    const snapshot = snapshotValue(current);
    if (hadPrevious && isStructurallyEqual(previous, snapshot)) {
      return null;
    }
    this.previousValues.set(key, snapshot);

    if (!this.passesFilter(namespace, channel, current)) {
      return null;
    }
    return { previous, hadPrevious };
  }

  private passesFilter(namespace: string, channel: ChannelConfig, value: unknown): boolean {
    if (!channel.filter) {
      return true;
    }
    try {
      if (channel.filter(value)) {
        return true;
      }
      this.options.logger.debug(`Channel ${channel.key} value filtered out`, { namespace });
      return false;
    } catch (err) {
      // 过滤器抛错只影响本通道本帧，流继续
      const reason = err instanceof Error ? err.message : String(err);
      this.options.logger.warn(`Channel ${channel.key} filter threw: ${reason}`, { namespace });
      this.options.onDiagnostic?.(
        createDiagnostic("filter_error", `Channel ${channel.key} filter threw: ${reason}`, {
          namespace,
          detail: { channel: channel.key },
          clock: this.options.clock,
        })
      );
      return false;
    }
  }

  private toMessages(
    candidates: unknown[],
    offset: number,
    channel: string,
    namespace: string
  ): GraphMessage[] {
    const messages: GraphMessage[] = [];
    candidates.forEach((candidate, relative) => {
      const position = offset + relative;
      const message = parseGraphMessage(candidate);
      if (message) {
        messages.push(message);
        return;
      }
      const text = `Channel ${channel} holds a value that is not a message at position ${position}`;
      this.options.logger.warn(text, { namespace });
      this.options.onDiagnostic?.(
        createDiagnostic("invalid_message", text, {
          namespace,
          detail: { channel, position },
          clock: this.options.clock,
        })
      );
    });
    return messages;
  }
}

function stateKey(namespace: string, channel: string): string {
  return `${namespace}:${channel}`;
}

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === null || value === undefined ? [] : [value];
}
