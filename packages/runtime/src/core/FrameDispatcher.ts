import { UnrecognizedFrameShapeError } from "../errors/streamErrors.js";
import { formatNamespace, ROOT_NAMESPACE } from "../namespace/namespaceResolver.js";
import { parseGraphMessage } from "../types/index.js";
import type { RawFrame, StreamMode } from "../types/index.js";
import { isPlainRecord } from "../utils/values.js";

export type FrameClassification =
  | { ok: true; frame: RawFrame }
  | { ok: false; error: UnrecognizedFrameShapeError };

const STREAM_MODES: readonly StreamMode[] = ["values", "updates", "messages"];

function isStreamMode(value: unknown): value is StreamMode {
  return STREAM_MODES.some((mode) => mode === value);
}

function isNamespaceTuple(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((part) => typeof part === "string");
}

function soleMode(modes: readonly StreamMode[]): StreamMode | undefined {
  return modes.length === 1 ? modes[0] : undefined;
}

function reject(reason: string, raw: unknown): FrameClassification {
  return { ok: false, error: new UnrecognizedFrameShapeError(reason, raw) };
}

/**
 * 按模式校验负载并构造带标签的帧。
 */
function buildFrame(
  namespace: string,
  mode: StreamMode,
  chunk: unknown,
  raw: unknown
): FrameClassification {
  switch (mode) {
    case "messages": {
      if (!Array.isArray(chunk) || chunk.length !== 2) {
        return reject("messages payload must be a [message, metadata] pair", raw);
      }
      const [candidate, metadata]: unknown[] = chunk;
      const message = parseGraphMessage(candidate);
      if (!message) {
        return reject("messages payload does not contain a message", raw);
      }
      if (isPlainRecord(metadata)) {
        return { ok: true, frame: { kind: "token", namespace, message, metadata } };
      }
      if (metadata !== null && metadata !== undefined) {
        return reject("messages metadata must be an object", raw);
      }
      return { ok: true, frame: { kind: "token", namespace, message, metadata: {} } };
    }
    case "values":
      if (!isPlainRecord(chunk)) {
        return reject("values payload must be an object", raw);
      }
      return { ok: true, frame: { kind: "values", namespace, values: chunk } };
    case "updates": {
      if (!isPlainRecord(chunk)) {
        return reject("updates payload must be an object", raw);
      }
      const updates: Record<string, Record<string, unknown> | null> = {};
      for (const [node, update] of Object.entries(chunk)) {
        if (update === null || update === undefined) {
          updates[node] = null;
        } else if (isPlainRecord(update)) {
          updates[node] = update;
        } else {
          return reject(`update for node "${node}" must be an object`, raw);
        }
      }
      return { ok: true, frame: { kind: "updates", namespace, updates } };
    }
  }
}

/**
 * 把引擎输出的位置编码元组转换成带标签的帧。支持的形状：
 *
 * - `[namespaceTuple, mode, chunk]`：子图 + 多模式
 * - `[mode, chunk]`：多模式，根命名空间
 * - `[message, metadata]`：单一 messages 模式，根命名空间
 * - `[namespaceTuple, chunk]`：子图 + 单模式，模式取唯一请求的模式
 * - `chunk`：单模式，根命名空间
 */
export function classifyWireFrame(
  raw: unknown,
  modes: readonly StreamMode[]
): FrameClassification {
  if (Array.isArray(raw)) {
    if (raw.length === 3) {
      const [namespace, mode, chunk]: unknown[] = raw;
      if (!isNamespaceTuple(namespace)) {
        return reject("first element of a three-element frame must be a namespace tuple", raw);
      }
      if (!isStreamMode(mode)) {
        return reject(`unknown stream mode ${JSON.stringify(mode)}`, raw);
      }
      return buildFrame(formatNamespace(namespace), mode, chunk, raw);
    }

    if (raw.length === 2) {
      const [first, second]: unknown[] = raw;
      if (typeof first === "string") {
        if (!isStreamMode(first)) {
          return reject(`unknown stream mode ${JSON.stringify(first)}`, raw);
        }
        return buildFrame(ROOT_NAMESPACE, first, second, raw);
      }
      if (isNamespaceTuple(first)) {
        const mode = soleMode(modes);
        if (!mode) {
          return reject("namespaced frame carries no mode while several modes are active", raw);
        }
        return buildFrame(formatNamespace(first), mode, second, raw);
      }
      if (parseGraphMessage(first)) {
        return buildFrame(ROOT_NAMESPACE, "messages", raw, raw);
      }
      return reject("leading element is neither a mode, a namespace nor a message", raw);
    }

    return reject(`unexpected tuple of length ${raw.length}`, raw);
  }

  const mode = soleMode(modes);
  if (!mode) {
    return reject("bare payload while several modes are active", raw);
  }
  return buildFrame(ROOT_NAMESPACE, mode, raw, raw);
}
