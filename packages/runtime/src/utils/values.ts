import { isDeepStrictEqual } from "util";

export type PlainRecord = Record<string, unknown>;

export function isPlainRecord(value: unknown): value is PlainRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStructurallyEqual(left: unknown, right: unknown): boolean {
  return isDeepStrictEqual(snapshotValue(left), snapshotValue(right));
}

/**
 * 把值拷贝成只含自有可枚举数据的快照，类实例变为普通对象，函数原样保留。
 * 比较与缓存都基于快照：原型不参与相等性判断。
 */
export function snapshotValue(value: unknown): unknown {
  return snapshotInto(value, new WeakMap<object, unknown>());
}

function snapshotInto(value: unknown, seen: WeakMap<object, unknown>): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return seen.get(value);
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) copy.push(snapshotInto(item, seen));
    return copy;
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    value.forEach((entry: unknown, key: unknown) => {
      copy.set(snapshotInto(key, seen), snapshotInto(entry, seen));
    });
    return copy;
  }
  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    value.forEach((entry: unknown) => {
      copy.add(snapshotInto(entry, seen));
    });
    return copy;
  }
  const copy: PlainRecord = {};
  seen.set(value, copy);
  for (const [key, entry] of Object.entries(value)) {
    copy[key] = snapshotInto(entry, seen);
  }
  return copy;
}

/**
 * 判断值是否“为空”：null/undefined、空字符串、空数组、无键对象。
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * 计算两次通道值之间的增量：
 * - 无旧值：返回新值
 * - 列表增长：返回新增的尾部元素
 * - 对象：返回新增或变化的键，无变化时为 undefined
 * - 其他：返回新值
 */
export function calculateDelta(previous: unknown, current: unknown): unknown {
  if (previous === undefined) {
    return current;
  }

  if (Array.isArray(previous) && Array.isArray(current)) {
    if (current.length > previous.length) {
      return current.slice(previous.length);
    }
    return current;
  }

  if (isPlainRecord(previous) && isPlainRecord(current)) {
    const delta: PlainRecord = {};
    for (const [key, value] of Object.entries(current)) {
      if (!(key in previous) || !isStructurallyEqual(previous[key], value)) {
        delta[key] = value;
      }
    }
    return Object.keys(delta).length > 0 ? delta : undefined;
  }

  return current;
}
