import { nanoid } from "nanoid";
import { namespaceComponents } from "../namespace/namespaceResolver.js";
import type {
  StreamDiagnostic,
  StreamDiagnosticCode,
  StreamEventBase,
} from "../types/index.js";

/** 事件归属：命名空间及其解析出的任务/节点信息 */
export interface EventScope {
  namespace: string;
  taskId?: string;
  nodeName?: string;
}

export type Clock = () => number;

export type DiagnosticSink = (diagnostic: StreamDiagnostic) => void;

export const systemClock: Clock = () => Date.now();

export function createEventBase(
  scope: EventScope,
  clock: Clock = systemClock
): StreamEventBase {
  return {
    eventId: nanoid(),
    namespace: scope.namespace,
    ...(scope.taskId !== undefined ? { taskId: scope.taskId } : {}),
    ...(scope.nodeName !== undefined ? { nodeName: scope.nodeName } : {}),
    timestamp: clock(),
  };
}

export function createDiagnostic(
  code: StreamDiagnosticCode,
  message: string,
  options: {
    namespace?: string;
    detail?: Record<string, unknown>;
    clock?: Clock;
  } = {}
): StreamDiagnostic {
  return {
    code,
    message,
    ...(options.namespace !== undefined ? { namespace: options.namespace } : {}),
    ...(options.detail ? { detail: options.detail } : {}),
    timestamp: (options.clock ?? systemClock)(),
  };
}

/**
 * 根据命名空间推导事件归属；显式给出的节点名优先于命名空间中的节点路径。
 */
export function resolveScope(namespace: string, nodeName?: string): EventScope {
  const { nodePath, taskId } = namespaceComponents(namespace);
  return {
    namespace,
    ...(taskId !== undefined ? { taskId } : {}),
    nodeName: nodeName ?? nodePath,
  };
}
