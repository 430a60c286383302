import { createActor } from "xstate";
import { describe, expect, it } from "vitest";
import { toolCallMachine, toolCallStatusOf } from "../toolCallMachine.js";

describe("toolCallMachine", () => {
  it("moves from initializing through streaming to completed", () => {
    const actor = createActor(toolCallMachine).start();
    expect(toolCallStatusOf(actor.getSnapshot())).toBe("initializing");

    actor.send({ type: "ARGS.PARTIAL", fragment: '{"a":' });
    expect(toolCallStatusOf(actor.getSnapshot())).toBe("streaming");

    actor.send({ type: "ARGS.PARSED", fragment: " 1}", args: { a: 1 } });
    const snapshot = actor.getSnapshot();
    expect(toolCallStatusOf(snapshot)).toBe("completed");
    expect(snapshot.status).toBe("done");
    expect(snapshot.context).toEqual({ accumulatedArgs: '{"a": 1}', parsedArgs: { a: 1 } });
  });

  it("can fail straight from initializing", () => {
    const actor = createActor(toolCallMachine).start();
    actor.send({ type: "ARGS.INVALID", fragment: "[]", reason: "not an object" });
    expect(toolCallStatusOf(actor.getSnapshot())).toBe("error");
    expect(actor.getSnapshot().context.errorMessage).toBe("not an object");
  });

  it("ignores input once final", () => {
    const actor = createActor(toolCallMachine).start();
    actor.send({ type: "ARGS.PARSED", fragment: "{}", args: {} });
    actor.send({ type: "ARGS.PARTIAL", fragment: "x" });
    expect(toolCallStatusOf(actor.getSnapshot())).toBe("completed");
    expect(actor.getSnapshot().context.accumulatedArgs).toBe("{}");
  });
});
