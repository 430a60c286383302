import { describe, expect, it } from "vitest";
import { createStreamingConfig } from "../../config/streamingConfig.js";
import { ToolCallTracker } from "../../tools/ToolCallTracker.js";
import type { GraphMessage, TokenFrame, TokenStreamingConfigInput } from "../../types/index.js";
import { createConsoleLogger } from "../../utils/logger.js";
import { MessageReconciler } from "../MessageReconciler.js";
import { TokenAccumulator } from "../TokenAccumulator.js";
import { TokenStreamHandler } from "../TokenStreamHandler.js";

function createHandler(tokenStreaming: TokenStreamingConfigInput = {}) {
  const logger = createConsoleLogger("test", "silent");
  const toolCallTracker = new ToolCallTracker({ logger });
  const reconciler = new MessageReconciler({ toolCallTracker, clock: () => 0 });
  const handler = new TokenStreamHandler({
    config: createStreamingConfig({ tokenStreaming }).tokenStreaming,
    accumulator: new TokenAccumulator(),
    reconciler,
    toolCallTracker,
    logger,
    clock: () => 0,
  });
  return { handler, reconciler, toolCallTracker };
}

function token(
  namespace: string,
  message: GraphMessage,
  metadata: Record<string, unknown> = {}
): TokenFrame {
  return { kind: "token", namespace, message, metadata };
}

describe("TokenStreamHandler", () => {
  it("emits token events with the accumulated text", () => {
    const { handler, reconciler } = createHandler();
    const metadata = { langgraph_node: "agent" };

    handler.handle(token("main", { type: "ai", id: "m1", content: "Hel" }, metadata));
    const [event] = handler.handle(
      token("main", { type: "ai", id: "m1", content: "lo" }, metadata)
    );

    expect(event).toMatchObject({
      type: "token",
      namespace: "main",
      nodeName: "agent",
      contentDelta: "lo",
      accumulatedContent: "Hello",
      messageId: "m1",
    });
    expect(reconciler.hasSeen("m1")).toBe(true);
  });

  it("ignores namespaces that are not enabled", () => {
    const { handler, reconciler } = createHandler();
    expect(
      handler.handle(token("researcher:t1", { type: "ai", id: "m2", content: "x" }))
    ).toEqual([]);
    expect(reconciler.hasSeen("m2")).toBe(false);
  });

  it("scopes accumulation to the task of the namespace", () => {
    const { handler } = createHandler({ enabledNamespaces: ["worker"] });
    handler.handle(token("worker:a", { type: "ai", id: "m1", content: "A" }));
    handler.handle(token("worker:b", { type: "ai", id: "m2", content: "B" }));
    const [event] = handler.handle(token("worker:a", { type: "ai", id: "m1", content: "A" }));

    expect(event).toMatchObject({
      namespace: "worker:a",
      taskId: "a",
      nodeName: "worker",
      accumulatedContent: "AA",
    });
  });

  it("requires one of the configured tags when tags are set", () => {
    const { handler } = createHandler({ messageTags: ["final"] });
    const message: GraphMessage = { type: "ai", id: "m1", content: "x" };

    expect(handler.handle(token("main", message, { tags: ["draft"] }))).toEqual([]);
    expect(handler.handle(token("main", message))).toEqual([]);
    expect(handler.handle(token("main", message, { tags: ["draft", "final"] }))).toHaveLength(1);
  });

  it("skips chunks that are neither AI nor tool messages", () => {
    const { handler } = createHandler();
    expect(handler.handle(token("main", { type: "human", id: "h1", content: "hi" }))).toEqual([]);
  });

  it("skips empty text deltas", () => {
    const { handler } = createHandler();
    expect(handler.handle(token("main", { type: "ai", id: "m1", content: "" }))).toEqual([]);
  });

  it("streams tool call chunks when enabled", () => {
    const { handler } = createHandler({ includeToolCalls: true });
    const events = handler.handle(
      token("main", {
        type: "ai",
        id: "m1",
        content: "",
        tool_call_chunks: [{ id: "call_1", name: "search", args: '{"q": 1}', index: 0 }],
      })
    );
    expect(events.map((event) => (event.type === "tool_call" ? event.status : event.type))).toEqual([
      "started",
      "completed",
    ]);
  });

  it("leaves tool call chunks alone when disabled", () => {
    const { handler, toolCallTracker } = createHandler();
    handler.handle(
      token("main", {
        type: "ai",
        id: "m1",
        content: "",
        tool_call_chunks: [{ id: "call_1", name: "search", args: "{}", index: 0 }],
      })
    );
    expect(toolCallTracker.hasToolCall("call_1")).toBe(false);
  });

  it("records streamed tool results when tool calls are tracked", () => {
    const { handler, reconciler } = createHandler({ includeToolCalls: true });
    const events = handler.handle(
      token("main", { type: "tool", id: "t1", content: "done", tool_call_id: "call_9" })
    );
    expect(events).toMatchObject([{ type: "tool_call", status: "result_success" }]);
    expect(reconciler.hasSeen("t1")).toBe(true);
  });
});
