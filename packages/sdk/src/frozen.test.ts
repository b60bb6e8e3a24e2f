/**
 * Tests for frozen maps
 */

import { describe, it, expect } from "vitest";
import { BidiMap } from "./bidimap.js";
import { ImmutableMapError } from "./errors.js";
import { FrozenBidiMap, FrozenOrderedBidiMap } from "./frozen.js";
import { OrderedBidiMap } from "./ordered.js";

function mutators(map: FrozenBidiMap<string, number>): Array<[string, () => unknown]> {
  return [
    ["set", () => map.set("z", 26)],
    ["put", () => map.put("z", 26)],
    ["forceSet", () => map.forceSet("z", 26)],
    ["delete", () => map.delete("a")],
    ["pop", () => map.pop("a")],
    ["popItem", () => map.popItem()],
    ["update", () => map.update([["z", 26]])],
    ["forceUpdate", () => map.forceUpdate([["z", 26]])],
    ["putAll", () => map.putAll([["z", 26]])],
    ["clear", () => map.clear()],
    ["setDefault", () => map.setDefault("z", 26)],
  ];
}

describe("FrozenBidiMap", () => {
  it("should refuse every mutator and keep its content and hash", () => {
    const map = new FrozenBidiMap([
      ["a", 1],
      ["b", 2],
    ]);
    const before = map.hash();

    for (const [operation, call] of mutators(map)) {
      expect(call).toThrow(ImmutableMapError);
      expect(call).toThrow(`Cannot ${operation}: map is frozen`);
    }

    expect(map.toJSON()).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
    expect(map.hash()).toBe(before);
  });

  it("should refuse mutation through the inverse", () => {
    const map = new FrozenBidiMap([["a", 1]]);

    expect(() => map.inverse.set(2, "b")).toThrow(ImmutableMapError);
    expect(map.inverse.get(1)).toBe("a");
    expect(map.inverse.inverse).toBe(map);
  });

  it("should hash equal content equally, regardless of order or kind", () => {
    const pairs: Array<[string, number]> = [
      ["a", 1],
      ["b", 2],
    ];
    const hash = new FrozenBidiMap(pairs).hash();

    expect(new FrozenBidiMap([...pairs].reverse()).hash()).toBe(hash);
    expect(new FrozenOrderedBidiMap(pairs).hash()).toBe(hash);
    expect(new BidiMap(pairs).freeze().hash()).toBe(hash);
    expect(new FrozenBidiMap([["a", 1]]).hash()).not.toBe(hash);
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should hash strings and numbers apart", () => {
    expect(new FrozenBidiMap([["1", 1]]).hash()).not.toBe(new FrozenBidiMap([[1, 1]]).hash());
    expect(new FrozenBidiMap([[0, "x"]]).hash()).toBe(new FrozenBidiMap([[-0, "x"]]).hash());
  });

  it("should not see later changes to the map it was frozen from", () => {
    const source = new BidiMap([["a", 1]]);
    const frozen = source.freeze();
    const hash = frozen.hash();

    source.set("b", 2);

    expect(frozen.size).toBe(1);
    expect(frozen.hash()).toBe(hash);
  });

  it("should return itself from copy and freeze", () => {
    const map = new FrozenBidiMap([["a", 1]]);

    expect(map.copy()).toBe(map);
    expect(map.freeze()).toBe(map);
  });

  it("should build from a plain object", () => {
    const map = FrozenBidiMap.fromObject({ a: 1 });

    expect(map.getKey(1)).toBe("a");
    expect(map.toString()).toBe("FrozenBidiMap(1) { 'a' => 1 }");
  });
});

describe("FrozenOrderedBidiMap", () => {
  it("should keep order and read both ends", () => {
    const map = new FrozenOrderedBidiMap([
      ["b", 2],
      ["a", 1],
    ]);

    expect(map.first()).toEqual(["b", 2]);
    expect(map.last()).toEqual(["a", 1]);
    expect(Array.from(map.reversed())).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
    expect(map.inverse).toBeInstanceOf(FrozenOrderedBidiMap);
    expect(map.inverse.first()).toEqual([2, "b"]);
  });

  it("should refuse the ordered mutators", () => {
    const map = new FrozenOrderedBidiMap([["a", 1]]);

    expect(() => map.popFirst()).toThrow("Cannot popFirst: map is frozen");
    expect(() => map.popLast()).toThrow("Cannot popLast: map is frozen");
    expect(() => map.moveToFront("a")).toThrow("Cannot moveToFront: map is frozen");
    expect(() => map.moveToBack("a")).toThrow("Cannot moveToBack: map is frozen");
  });

  it("should compare as a sequence with ordered maps", () => {
    const frozen = new FrozenOrderedBidiMap([
      ["a", 1],
      ["b", 2],
    ]);

    expect(frozen.equals(new OrderedBidiMap([["a", 1], ["b", 2]]))).toBe(true);
    expect(frozen.equals(new OrderedBidiMap([["b", 2], ["a", 1]]))).toBe(false);
    expect(frozen.equals({ b: 2, a: 1 })).toBe(true);
  });
});
