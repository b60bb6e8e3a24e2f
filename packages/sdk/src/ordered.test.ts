/**
 * Tests for OrderedBidiMap
 */

import { describe, it, expect } from "vitest";
import { BidiMap } from "./bidimap.js";
import { EmptyMapError, KeyExistsError, KeyNotFoundError, ValueExistsError } from "./errors.js";
import { FrozenOrderedBidiMap } from "./frozen.js";
import { OrderedBidiMap } from "./ordered.js";

function abc(policy: "strict" | "overwrite" = "strict"): OrderedBidiMap<string, number> {
  return new OrderedBidiMap<string, number>(
    [
      ["a", 1],
      ["b", 2],
      ["c", 3],
    ],
    { policy }
  );
}

describe("OrderedBidiMap", () => {
  describe("position rules", () => {
    it("should keep a key's position when its value changes", () => {
      const map = abc();
      map.set("a", 10);

      expect(map.toJSON()).toEqual([
        ["a", 10],
        ["b", 2],
        ["c", 3],
      ]);
    });

    it("should keep the value's position when the inverse renames its key", () => {
      const map = new OrderedBidiMap([
        ["a", 1],
        ["b", 2],
      ]);

      map.inverse.set(1, "c");

      expect(map.toJSON()).toEqual([
        ["c", 1],
        ["b", 2],
      ]);
    });

    it("should keep the value's position when an overwrite moves it to a new key", () => {
      const map = abc("overwrite");
      map.set("z", 2);

      expect(map.toJSON()).toEqual([
        ["a", 1],
        ["z", 2],
        ["c", 3],
      ]);
    });

    it("should keep the written key's position when both sides collide", () => {
      const map = abc("overwrite");
      map.set("c", 1);

      expect(map.toJSON()).toEqual([
        ["b", 2],
        ["c", 1],
      ]);
    });

    it("should keep the written value's position when both sides collide through the inverse", () => {
      const map = abc("overwrite");
      map.inverse.set(1, "c");

      expect(map.toJSON()).toEqual([
        ["c", 1],
        ["b", 2],
      ]);
    });

    it("should not move anything on a repeated pair", () => {
      const map = abc();
      map.set("b", 2);

      expect(Array.from(map.keys())).toEqual(["a", "b", "c"]);
    });

    it("should append new associations", () => {
      const map = abc();
      map.set("d", 4);

      expect(map.last()).toEqual(["d", 4]);
    });

    it("should leave order untouched when a single write is rejected", () => {
      const map = abc();

      expect(() => map.set("a", 3)).toThrow(ValueExistsError);
      expect(map.toJSON()).toEqual([
        ["a", 1],
        ["b", 2],
        ["c", 3],
      ]);
    });
  });

  describe("ends", () => {
    it("should report the first and last pairs", () => {
      const map = abc();

      expect(map.first()).toEqual(["a", 1]);
      expect(map.last()).toEqual(["c", 3]);
      expect(new OrderedBidiMap().first()).toBeUndefined();
    });

    it("should pop from either end", () => {
      const map = abc();

      expect(map.popFirst()).toEqual(["a", 1]);
      expect(map.popLast()).toEqual(["c", 3]);
      expect(map.toJSON()).toEqual([["b", 2]]);
      expect(map.hasValue(1)).toBe(false);
      expect(map.hasValue(3)).toBe(false);
    });

    it("should refuse to pop an empty map", () => {
      const map = new OrderedBidiMap<string, number>();

      expect(() => map.popFirst()).toThrow(EmptyMapError);
      expect(() => map.popLast()).toThrow("Cannot popLast: map is empty");
    });

    it("should pop the oldest item with popItem", () => {
      const map = abc();
      map.moveToFront("c");

      expect(map.popItem()).toEqual(["c", 3]);
    });
  });

  describe("moves", () => {
    it("should move keys to either end", () => {
      const map = abc();

      map.moveToFront("c");
      expect(Array.from(map.keys())).toEqual(["c", "a", "b"]);

      map.moveToBack("c").moveToBack("a");
      expect(Array.from(map.keys())).toEqual(["b", "c", "a"]);
    });

    it("should move through the inverse by value", () => {
      const map = abc();

      map.inverse.moveToBack(1);

      expect(Array.from(map.values())).toEqual([2, 3, 1]);
    });

    it("should throw for a missing key", () => {
      const map = abc();

      expect(() => map.moveToFront("z")).toThrow(KeyNotFoundError);
      expect(() => map.inverse.moveToBack(9)).toThrow("Key not found: 9");
    });

    it("should iterate in reverse", () => {
      expect(Array.from(abc().reversed())).toEqual([
        ["c", 3],
        ["b", 2],
        ["a", 1],
      ]);
      expect(Array.from(abc().inverse.reversed())).toEqual([
        [3, "c"],
        [2, "b"],
        [1, "a"],
      ]);
    });
  });

  describe("atomic putAll", () => {
    it("should leave order untouched when a batch with evictions is rejected", () => {
      const map = abc("overwrite");
      const before = map.toJSON();

      expect(() =>
        map.putAll(
          [
            ["x", 2],
            ["y", 1],
            ["d", 4],
            ["c", 9],
          ],
          { policy: { onKeyCollision: "raise", onValueCollision: "overwrite" } }
        )
      ).toThrow(KeyExistsError);

      expect(map.toJSON()).toEqual(before);
      expect(map.inverse.toJSON()).toEqual([
        [1, "a"],
        [2, "b"],
        [3, "c"],
      ]);
    });

    it("should keep an association a rejected batch would have evicted", () => {
      const map = abc("overwrite");
      const broken: [string, number] = ["e", 5];
      broken.pop();
      broken.length = 2;

      expect(() =>
        map.putAll(
          [
            ["c", 1],
            ["d", 4],
            broken,
          ],
          { policy: "overwrite" }
        )
      ).toThrow("value must not be undefined");

      expect(map.toJSON()).toEqual([
        ["a", 1],
        ["b", 2],
        ["c", 3],
      ]);
      expect(map.getKey(1)).toBe("a");
      expect(map.getKey(3)).toBe("c");
    });
  });

  describe("equality", () => {
    it("should compare two ordered maps as sequences", () => {
      const forward = new OrderedBidiMap([
        [1, 1],
        [2, 2],
      ]);
      const backward = new OrderedBidiMap([
        [2, 2],
        [1, 1],
      ]);

      expect(forward.equals(backward)).toBe(false);
      expect(forward.equals(backward.copy().moveToBack(2))).toBe(true);
    });

    it("should compare with unordered collections as sets", () => {
      const backward = new OrderedBidiMap([
        [2, 2],
        [1, 1],
      ]);

      expect(backward.equals(new Map([[1, 1], [2, 2]]))).toBe(true);
      expect(backward.equals(new BidiMap([[1, 1], [2, 2]]))).toBe(true);
      expect(new BidiMap([[1, 1], [2, 2]]).equals(backward)).toBe(true);
    });
  });

  describe("copies", () => {
    it("should copy order and stay independent", () => {
      const map = abc();
      const copy = map.copy();

      copy.moveToFront("c");

      expect(copy).toBeInstanceOf(OrderedBidiMap);
      expect(Array.from(copy.keys())).toEqual(["c", "a", "b"]);
      expect(Array.from(map.keys())).toEqual(["a", "b", "c"]);
    });

    it("should freeze into an ordered frozen map", () => {
      const frozen = abc().freeze();

      expect(frozen).toBeInstanceOf(FrozenOrderedBidiMap);
      expect(frozen.last()).toEqual(["c", 3]);
    });

    it("should keep the kind through the inverse", () => {
      const map = abc();

      expect(map.inverse).toBeInstanceOf(OrderedBidiMap);
      expect(map.inverse.inverse).toBe(map);
      expect(map.inverse.toString()).toBe("OrderedBidiMap(3) { 1 => 'a', 2 => 'b', 3 => 'c' }");
    });

    it("should build from an object in property order", () => {
      const map = OrderedBidiMap.fromObject({ z: 26, a: 1 });

      expect(map).toBeInstanceOf(OrderedBidiMap);
      expect(map.first()).toEqual(["z", 26]);
      expect(map.last()).toEqual(["a", 1]);
    });
  });
});
