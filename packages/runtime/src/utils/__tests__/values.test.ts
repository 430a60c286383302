import { describe, expect, it } from "vitest";
import {
  calculateDelta,
  isEmptyValue,
  isStructurallyEqual,
  snapshotValue,
} from "../values.js";

class Point {
  constructor(
    public x: number,
    public y: number
  ) {}

  norm(): number {
    return Math.hypot(this.x, this.y);
  }
}

describe("value helpers", () => {
  it("returns the current value when there is no previous value", () => {
    expect(calculateDelta(undefined, [1, 2])).toEqual([1, 2]);
    expect(calculateDelta(undefined, "text")).toBe("text");
  });

  it("returns only the appended suffix when a list grows", () => {
    expect(calculateDelta(["a"], ["a", "b", "c"])).toEqual(["b", "c"]);
  });

  it("returns the whole list when a list shrinks or is replaced", () => {
    expect(calculateDelta(["a", "b"], ["c"])).toEqual(["c"]);
  });

  it("returns changed and added keys for records", () => {
    expect(
      calculateDelta({ a: 1, b: { x: 1 } }, { a: 1, b: { x: 2 }, c: true })
    ).toEqual({ b: { x: 2 }, c: true });
    expect(calculateDelta({ a: 1 }, { a: 1 })).toBeUndefined();
  });

  it("returns the current value for scalars", () => {
    expect(calculateDelta(1, 2)).toBe(2);
    expect(calculateDelta("draft", { title: "t" })).toEqual({ title: "t" });
  });

  it("detects empty values", () => {
    expect(isEmptyValue(null)).toBe(true);
    expect(isEmptyValue(undefined)).toBe(true);
    expect(isEmptyValue("")).toBe(true);
    expect(isEmptyValue([])).toBe(true);
    expect(isEmptyValue({})).toBe(true);
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue(false)).toBe(false);
    expect(isEmptyValue(["x"])).toBe(false);
  });

  it("compares values structurally", () => {
    expect(isStructurallyEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(isStructurallyEqual({ a: 1 }, { a: "1" })).toBe(false);
  });

  it("ignores prototypes when comparing", () => {
    expect(isStructurallyEqual(new Point(1, 2), { x: 1, y: 2 })).toBe(true);
    expect(isStructurallyEqual(new Point(1, 2), new Point(1, 2))).toBe(true);
    expect(isStructurallyEqual(new Point(1, 2), new Point(2, 1))).toBe(false);
  });

  it("snapshots values so later mutation does not leak", () => {
    const original = { items: ["a"], nested: { tags: new Set(["x"]) } };
    const copy = snapshotValue(original);
    original.items.push("b");
    original.nested.tags.add("y");
    expect(copy).toEqual({ items: ["a"], nested: { tags: new Set(["x"]) } });
  });

  it("turns class instances into plain data", () => {
    const copy = snapshotValue({ point: new Point(3, 4) });
    expect(copy).toStrictEqual({ point: { x: 3, y: 4 } });
  });

  it("copies containers that hold functions instead of keeping a reference", () => {
    const fn = () => 1;
    const original = { handler: fn, steps: [1] };
    const copy = snapshotValue(original);
    original.steps.push(2);

    expect(copy).not.toBe(original);
    expect(copy).toEqual({ handler: fn, steps: [1] });
  });

  it("keeps cycles in the snapshot", () => {
    const node: { name: string; self?: unknown } = { name: "root" };
    node.self = node;
    const copy = snapshotValue(node);

    expect(copy).not.toBe(node);
    expect(isStructurallyEqual(copy, node)).toBe(true);
  });
});
