import { isPlainRecord } from "../utils/values.js";

export type ArgumentsOutcome =
  | { kind: "parsed"; args: Record<string, unknown> }
  | { kind: "partial" }
  | { kind: "invalid"; reason: string };

export type DelimiterState = "open" | "balanced" | "broken";

const CLOSERS: Record<string, string> = { "}": "{", "]": "[" };

/**
 * 扫描参数文本的括号平衡情况（忽略字符串内部的括号）：
 * - open：仍有未闭合的括号或字符串，或尚未出现任何括号
 * - balanced：至少出现过一次括号且全部闭合
 * - broken：出现多余或不匹配的闭括号
 */
export function scanDelimiters(buffer: string): DelimiterState {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  let opened = false;

  for (const char of buffer) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{" || char === "[") {
      stack.push(char);
      opened = true;
    } else if (char === "}" || char === "]") {
      if (stack.pop() !== CLOSERS[char]) {
        return "broken";
      }
    }
  }

  if (inString || stack.length > 0 || !opened) {
    return "open";
  }
  return "balanced";
}

/**
 * 尝试把累计的参数文本解析成 JSON 对象。
 */
export function evaluateArguments(buffer: string): ArgumentsOutcome {
  if (buffer.trim().length === 0) {
    return { kind: "partial" };
  }
  let value: unknown;
  try {
    value = JSON.parse(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return scanDelimiters(buffer) === "open"
      ? { kind: "partial" }
      : { kind: "invalid", reason };
  }
  if (!isPlainRecord(value)) {
    return { kind: "invalid", reason: "tool arguments must be a JSON object" };
  }
  return { kind: "parsed", args: value };
}
