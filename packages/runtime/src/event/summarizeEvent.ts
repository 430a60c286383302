import type { StreamEvent } from "../types/index.js";

function assertNever(value: never): never {
  throw new Error(`Unhandled stream event: ${JSON.stringify(value)}`);
}

function truncate(text: string, max = 60): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * 生成单行的事件摘要，供调试日志与终端渲染使用。
 */
export function summarizeEvent(event: StreamEvent): string {
  const where = event.namespace;
  switch (event.type) {
    case "token":
      return `[${where}] token ${JSON.stringify(event.contentDelta)}`;
    case "message":
      return `[${where}] message ${event.role}${
        event.messageId ? ` ${event.messageId}` : ""
      } ${JSON.stringify(truncate(event.content))}`;
    case "channel.value":
      return `[${where}] ${event.channel} value${
        event.messages ? ` (+${event.messages.length} messages)` : ""
      }`;
    case "channel.update":
      return `[${where}] ${event.channel} update from ${event.nodeName}`;
    case "artifact":
      return `[${where}] ${event.artifactType} artifact ${
        event.isUpdate ? "updated" : "created"
      } on ${event.channel}`;
    case "tool_call":
      return `[${where}] tool ${event.toolName} (${event.toolCallId}) ${event.status}${
        event.error ? `: ${event.error}` : ""
      }`;
    default:
      return assertNever(event);
  }
}
