import { describe, it, expect } from "vitest";
import { describe as describeValue, formatMap, stableStringify } from "./format.js";

describe("stableStringify", () => {
  it("should stringify with stable alphabetical key order", () => {
    const obj = { z: 1, a: 2, m: 3 };
    const result = stableStringify(obj);
    expect(result).toBe('{\n  "a": 2,\n  "m": 3,\n  "z": 1\n}\n');
  });

  it("should sort nested objects", () => {
    const obj = { z: { b: 2, a: 1 }, a: [{ y: 2, x: 1 }] };
    expect(stableStringify(obj, 0)).toBe('{"a":[{"x":1,"y":2}],"z":{"a":1,"b":2}}\n');
  });

  it("should preserve array order", () => {
    const obj = { items: [3, 1, 2] };
    const result = stableStringify(obj);
    expect(result).toBe('{\n  "items": [\n    3,\n    1,\n    2\n  ]\n}\n');
  });

  it("should detect circular references", () => {
    const obj: Record<string, unknown> = { a: 1 };
    obj.self = obj;
    expect(() => stableStringify(obj)).toThrow("Circular reference");
  });

  it("should allow the same object twice outside a cycle", () => {
    const shared = { v: 1 };
    expect(stableStringify([shared, shared], 0)).toBe('[{"v":1},{"v":1}]\n');
  });
});

describe("describe", () => {
  it("should quote strings and leave other primitives bare", () => {
    expect(describeValue("a")).toBe("'a'");
    expect(describeValue(1)).toBe("1");
    expect(describeValue(null)).toBe("null");
    expect(describeValue(NaN)).toBe("NaN");
  });
});

describe("formatMap", () => {
  it("should render pairs in the given order", () => {
    expect(
      formatMap("Pairs", 2, [
        ["b", 2],
        ["a", [1]],
      ])
    ).toBe("Pairs(2) { 'b' => 2, 'a' => [ 1 ] }");
  });

  it("should render an empty map", () => {
    expect(formatMap("Pairs", 0, [])).toBe("Pairs(0) {}");
  });
});
