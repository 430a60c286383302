import { describe, expect, it } from "vitest";
import type { StreamEvent, TokenStreamEvent } from "../../types/index.js";
import { EventBus } from "../EventBus.js";

const base = { namespace: "main", timestamp: 0 };

const token: TokenStreamEvent = {
  ...base,
  eventId: "e1",
  type: "token",
  contentDelta: "Hi",
  accumulatedContent: "Hi",
  message: { type: "ai", content: "Hi" },
};

const artifact: StreamEvent = {
  ...base,
  eventId: "e2",
  type: "artifact",
  channel: "notes",
  artifactType: "Document",
  artifactData: ["intro"],
  isUpdate: false,
};

describe("EventBus", () => {
  it("pushes events to active subscribers only", () => {
    const bus = new EventBus();
    const received: string[] = [];

    bus.emit(token);
    const subscription = bus.events().subscribe((event) => received.push(event.eventId));
    bus.emit(token);
    subscription.unsubscribe();
    bus.emit(artifact);

    expect(received).toEqual(["e1"]);
  });

  it("filters events by type", () => {
    const bus = new EventBus();
    const artifacts: string[] = [];
    bus.eventsOfType("artifact").subscribe((event) => artifacts.push(event.artifactType));

    bus.emit(token);
    bus.emit(artifact);

    expect(artifacts).toEqual(["Document"]);
  });

  it("maps events as they arrive", () => {
    const bus = new EventBus();
    const kinds: string[] = [];
    bus.mapEvents((event) => `${event.namespace}/${event.type}`).subscribe((kind) => kinds.push(kind));

    bus.emit(token);

    expect(kinds).toEqual(["main/token"]);
  });

  it("keeps diagnostics on their own stream", () => {
    const bus = new EventBus();
    const events: StreamEvent[] = [];
    const codes: string[] = [];
    bus.events().subscribe((event) => events.push(event));
    bus.diagnostics().subscribe((diagnostic) => codes.push(diagnostic.code));

    bus.reportDiagnostic({ code: "invalid_message", message: "bad", timestamp: 0 });

    expect(events).toEqual([]);
    expect(codes).toEqual(["invalid_message"]);
  });
});
