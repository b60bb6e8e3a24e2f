/**
 * Random operation sequences checked against the map invariants
 *
 * Every step either commits or throws; a throwing step must leave both
 * directions exactly as they were, iteration order included.
 */

import { describe, it, expect } from "vitest";
import { BidiMap } from "./bidimap.js";
import { BidiMapError } from "./errors.js";
import { OrderedBidiMap } from "./ordered.js";
import type { PolicyName } from "./policy.js";

// mulberry32
function random(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function checkConsistent(map: BidiMap<number, number>): void {
  const forward = map.toJSON();
  const backward = map.inverse.toJSON();

  expect(forward.length).toBe(map.size);
  expect(map.inverse.size).toBe(map.size);
  expect(new Set(map.keys()).size).toBe(map.size);
  expect(new Set(map.values()).size).toBe(map.size);
  for (const [key, value] of forward) {
    expect(map.inverse.get(value)).toBe(key);
  }
  for (const [value, key] of backward) {
    expect(map.get(key)).toBe(value);
  }
  if (map.ordered) {
    expect(backward.map(([value, key]) => [key, value])).toEqual(forward);
  }
}

type Step = (map: BidiMap<number, number>, pick: () => number) => unknown;

const STEPS: Step[] = [
  (map, pick) => map.set(pick(), pick()),
  (map, pick) => map.put(pick(), pick()),
  (map, pick) => map.forceSet(pick(), pick()),
  (map, pick) => map.inverse.set(pick(), pick()),
  (map, pick) => map.delete(pick()),
  (map, pick) => map.inverse.pop(pick()),
  (map, pick) =>
    map.update([
      [pick(), pick()],
      [pick(), pick()],
    ]),
  (map, pick) =>
    map.putAll(
      [
        [pick(), pick()],
        [pick(), pick()],
        [pick(), pick()],
      ],
      { policy: "overwrite" }
    ),
  (map, pick) =>
    map.putAll([
      [pick(), pick()],
      [pick(), pick()],
      [pick(), pick()],
    ]),
  (map) => map.popItem(),
  (map, pick) => (map instanceof OrderedBidiMap ? map.moveToFront(pick()) : map.setDefault(pick(), pick())),
  (map, pick) => (map instanceof OrderedBidiMap ? map.inverse.moveToBack(pick()) : map.copy()),
];

function run(map: BidiMap<number, number>, seed: number, steps: number): { failures: number } {
  const next = random(seed);
  const pick = (): number => Math.floor(next() * 8);
  let failures = 0;

  for (let i = 0; i < steps; i++) {
    const step = STEPS[Math.floor(next() * STEPS.length)];
    if (step === undefined) continue;

    const before = map.toJSON();
    const partial = step === STEPS[6];
    try {
      step(map, pick);
    } catch (err) {
      expect(err).toBeInstanceOf(BidiMapError);
      failures++;
      // `update` applies pairs one by one; every other step is all or nothing
      if (!partial) {
        expect(map.toJSON()).toEqual(before);
      }
    }
    checkConsistent(map);
  }
  return { failures };
}

describe("invariants under random operations", () => {
  const policies: PolicyName[] = ["strict", "overwrite", "raise", "ignore"];

  for (const policy of policies) {
    it(`should hold for BidiMap under ${policy}`, () => {
      const { failures } = run(new BidiMap<number, number>(null, { policy }), 7, 400);
      expect(failures).toBeGreaterThan(0);
    });

    it(`should hold for OrderedBidiMap under ${policy}`, () => {
      const { failures } = run(new OrderedBidiMap<number, number>(null, { policy }), 11, 400);
      expect(failures).toBeGreaterThan(0);
    });
  }

  it("should keep ordered maps in the order of an equivalent plain sequence", () => {
    const map = new OrderedBidiMap<number, number>(null, { policy: "overwrite" });
    const next = random(3);
    const pick = (): number => Math.floor(next() * 6);

    for (let i = 0; i < 300; i++) {
      const key = pick();
      const value = pick();
      const model = map.toJSON();
      const keyAt = model.findIndex(([k]) => k === key);
      const valueAt = model.findIndex(([, v]) => v === value);

      map.set(key, value);

      if (keyAt !== -1 && valueAt !== -1 && keyAt !== valueAt) {
        model[keyAt] = [key, value];
        model.splice(valueAt, 1);
      } else if (keyAt !== -1) {
        model[keyAt] = [key, value];
      } else if (valueAt !== -1) {
        model[valueAt] = [key, value];
      } else {
        model.push([key, value]);
      }
      expect(map.toJSON()).toEqual(model);
    }
  });
});
