export const ROOT_NAMESPACE = "main";

/** 匹配所有命名空间的哨兵值 */
export const ALL_NAMESPACES = "all";

const SEPARATOR = ":";

const WILDCARD = "*";

export interface NamespaceComponents {
  /** 去掉末尾任务 ID 后的节点路径 */
  nodePath: string;
  /** 末尾段视为任务 ID；根图与单段命名空间没有任务 ID */
  taskId?: string;
}

/**
 * 将引擎给出的命名空间元组格式化为字符串。
 *
 * - `[]` -> "main"
 * - `["parent:task1"]` -> "parent:task1"
 * - `["parent:task1", "child:task2"]` -> "parent:task1:child:task2"
 */
export function formatNamespace(segments: readonly string[]): string {
  if (segments.length === 0) {
    return ROOT_NAMESPACE;
  }
  return segments.join(SEPARATOR);
}

export function namespaceComponents(namespace: string): NamespaceComponents {
  if (namespace === ROOT_NAMESPACE) {
    return { nodePath: ROOT_NAMESPACE };
  }
  const parts = namespace.split(SEPARATOR);
  if (parts.length < 2) {
    return { nodePath: namespace };
  }
  return {
    nodePath: parts.slice(0, -1).join(SEPARATOR),
    taskId: parts[parts.length - 1],
  };
}

/**
 * 把命名空间归约为只含节点类型的模式：去掉交替出现的实例 ID 段。
 * "nodeA:123:nodeB:456" -> "nodeA:nodeB"
 */
export function namespacePattern(namespace: string): string {
  if (namespace === ROOT_NAMESPACE) {
    return ROOT_NAMESPACE;
  }
  return namespace
    .split(SEPARATOR)
    .filter((_, position) => position % 2 === 0)
    .join(SEPARATOR);
}

function matchesAny(patterns: ReadonlySet<string>, pattern: string): boolean {
  if (patterns.has(ALL_NAMESPACES) || patterns.has(pattern)) {
    return true;
  }
  for (const candidate of patterns) {
    if (!candidate.endsWith(WILDCARD)) {
      continue;
    }
    const prefix = candidate.slice(0, -WILDCARD.length);
    if (prefix === "") {
      return true;
    }
    // "nodeA:*" 的前缀为 "nodeA:"，需要在段边界上匹配
    const bare = prefix.endsWith(SEPARATOR) ? prefix.slice(0, -1) : prefix;
    if (pattern === bare || pattern.startsWith(`${bare}${SEPARATOR}`)) {
      return true;
    }
  }
  return false;
}

/**
 * 判断命名空间是否被订阅：命中任一 include 且未命中任何 exclude，排除总是优先。
 */
export function matchesNamespace(
  include: ReadonlySet<string>,
  exclude: ReadonlySet<string>,
  namespace: string
): boolean {
  const pattern = namespacePattern(namespace);
  if (exclude.size > 0 && matchesAny(exclude, pattern)) {
    return false;
  }
  return matchesAny(include, pattern);
}
