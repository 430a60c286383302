import { describe, expect, it } from "vitest";
import { createStreamingConfig } from "../../config/streamingConfig.js";
import { SessionDisposedError } from "../../errors/streamErrors.js";
import { EventBus } from "../../event/EventBus.js";
import type { StreamDiagnostic, StreamEvent } from "../../types/index.js";
import { createConsoleLogger } from "../../utils/logger.js";
import { StreamSession } from "../StreamSession.js";

function createSession(bus = new EventBus()) {
  return new StreamSession({
    config: createStreamingConfig({
      channels: [{ key: "messages", kind: "message" }, { key: "plan" }],
      tokenStreaming: { includeToolCalls: true },
    }),
    eventBus: bus,
    logger: createConsoleLogger("test", "silent"),
    clock: () => 42,
    sessionId: "session-1",
  });
}

describe("StreamSession", () => {
  it("classifies wire frames before processing them", () => {
    const session = createSession();
    const events = session.processWireFrame(["values", { plan: { step: 1 } }]);
    expect(events).toMatchObject([
      { type: "channel.value", channel: "plan", value: { step: 1 }, timestamp: 42 },
    ]);
    expect(session.getPreviousChannelValue("main", "plan")).toEqual({ step: 1 });
  });

  it("reports unrecognized frames on the bus and keeps going", () => {
    const bus = new EventBus();
    const diagnostics: StreamDiagnostic[] = [];
    const subscription = bus.diagnostics().subscribe((diagnostic) => diagnostics.push(diagnostic));
    const session = createSession(bus);

    expect(session.processWireFrame({ plan: 1 })).toEqual([]);
    expect(session.processWireFrame(["values", { plan: 1 }])).toHaveLength(1);
    subscription.unsubscribe();

    expect(diagnostics).toEqual([
      {
        code: "unrecognized_frame_shape",
        message: "Unrecognized frame shape: bare payload while several modes are active",
        detail: { frame: { plan: 1 } },
        timestamp: 42,
      },
    ]);
  });

  it("forwards orphan argument chunks to the bus as diagnostics", () => {
    const bus = new EventBus();
    const diagnostics: StreamDiagnostic[] = [];
    bus.diagnostics().subscribe((diagnostic) => diagnostics.push(diagnostic));
    const session = createSession(bus);

    session.processWireFrame([
      "messages",
      [{ type: "ai", id: "m1", content: "", tool_call_chunks: [{ args: "{", index: 3 }] }, {}],
    ]);

    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["orphan_argument_chunk"]);
  });

  it("publishes every event it returns", () => {
    const bus = new EventBus();
    const published: StreamEvent[] = [];
    bus.events().subscribe((event) => published.push(event));
    const session = createSession(bus);

    const events = session.processFrame({
      kind: "values",
      namespace: "main",
      values: { messages: [{ type: "human", id: "h1", content: "hi" }] },
    });

    expect(published).toEqual(events);
    expect(events).toHaveLength(2);
  });

  it("resets all state", () => {
    const session = createSession();
    const frame = {
      kind: "values" as const,
      namespace: "main",
      values: { plan: "draft" },
    };
    session.processFrame(frame);
    expect(session.processFrame(frame)).toEqual([]);

    session.reset();

    expect(session.processFrame(frame)).toHaveLength(1);
  });

  it("rejects work after dispose", async () => {
    const session = createSession();
    session.dispose();
    session.dispose();

    expect(session.isDisposed).toBe(true);
    expect(() => session.processWireFrame(["values", {}])).toThrow(
      "Stream session session-1 has been disposed"
    );
    expect(() => session.reset()).toThrow(SessionDisposedError);
    expect(() => session.startNewToolCallIteration()).toThrow(SessionDisposedError);
    await expect(
      session.process([{ kind: "values", namespace: "main", values: {} }]).next()
    ).rejects.toThrow(SessionDisposedError);
  });
});
