import { describe, expect, it } from "vitest";
import { TokenAccumulator } from "../TokenAccumulator.js";

describe("TokenAccumulator", () => {
  it("accumulates fragments per namespace and task", () => {
    const accumulator = new TokenAccumulator();
    expect(accumulator.append("main", undefined, "m1", "Hel")).toBe("Hel");
    expect(accumulator.append("main", undefined, "m1", "lo")).toBe("Hello");
    expect(accumulator.append("researcher:t1", "t1", "m2", "Hi")).toBe("Hi");

    expect(accumulator.get("main")).toBe("Hello");
    expect(accumulator.get("researcher:t1", "t1")).toBe("Hi");
    expect(accumulator.size).toBe(2);
  });

  it("keeps parallel tasks of one node apart", () => {
    const accumulator = new TokenAccumulator();
    accumulator.append("worker:a", "a", "m1", "one");
    accumulator.append("worker:b", "b", "m2", "two");
    accumulator.append("worker:a", "a", "m1", " more");

    expect(accumulator.get("worker:a", "a")).toBe("one more");
    expect(accumulator.get("worker:b", "b")).toBe("two");
  });

  it("starts over when a new message begins on the same key", () => {
    const accumulator = new TokenAccumulator();
    accumulator.append("main", undefined, "m1", "first answer");
    expect(accumulator.append("main", undefined, "m2", "second")).toBe("second");
  });

  it("continues the current turn for fragments without a message id", () => {
    const accumulator = new TokenAccumulator();
    accumulator.append("main", undefined, "m1", "a");
    expect(accumulator.append("main", undefined, undefined, "b")).toBe("ab");
    expect(accumulator.append("main", undefined, "m2", "c")).toBe("c");
  });

  it("forgets all buffers on reset", () => {
    const accumulator = new TokenAccumulator();
    accumulator.append("main", undefined, "m1", "a");
    accumulator.reset();
    expect(accumulator.get("main")).toBeUndefined();
    expect(accumulator.size).toBe(0);
  });
});
