interface TokenBuffer {
  messageId?: string;
  content: string;
}

/**
 * 按 (namespace, taskId) 累积 token 文本。
 * 同一键上出现新的消息 ID 视为新一轮输出，缓冲区从头开始。
 */
export class TokenAccumulator {
  private buffers = new Map<string, TokenBuffer>();

  public static keyOf(namespace: string, taskId?: string): string {
    return `${namespace}:${taskId ?? "default"}`;
  }

  /**
   * 追加片段并返回当前轮次的累计文本。
   */
  public append(
    namespace: string,
    taskId: string | undefined,
    messageId: string | undefined,
    fragment: string
  ): string {
    const key = TokenAccumulator.keyOf(namespace, taskId);
    const existing = this.buffers.get(key);
    const sameTurn =
      existing !== undefined &&
      (existing.messageId === undefined ||
        messageId === undefined ||
        existing.messageId === messageId);

    const content = sameTurn ? existing.content + fragment : fragment;
    const turnId = messageId ?? (sameTurn ? existing.messageId : undefined);
    this.buffers.set(key, turnId !== undefined ? { messageId: turnId, content } : { content });
    return content;
  }

  public get(namespace: string, taskId?: string): string | undefined {
    return this.buffers.get(TokenAccumulator.keyOf(namespace, taskId))?.content;
  }

  public get size(): number {
    return this.buffers.size;
  }

  public reset(): void {
    this.buffers.clear();
  }
}
