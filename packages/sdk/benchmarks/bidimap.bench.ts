/**
 * Performance benchmarks against two hand-synced Maps
 * Run with: VITEST_PERF=1 npm test --workspace @bidimap/sdk
 */

import { describe, it, expect } from "vitest";
import { BidiMap } from "../src/bidimap.js";
import { OrderedBidiMap } from "../src/ordered.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

const COUNT = 100_000;

/**
 * The baseline: forward and inverse Maps updated by hand, overwrite semantics
 */
function handSynced(count: number): { forward: Map<number, string>; inverse: Map<string, number> } {
  const forward = new Map<number, string>();
  const inverse = new Map<string, number>();
  for (let i = 0; i < count; i++) {
    const value = `v${i % (count / 2)}`;
    const oldValue = forward.get(i);
    if (oldValue !== undefined) inverse.delete(oldValue);
    const oldKey = inverse.get(value);
    if (oldKey !== undefined) forward.delete(oldKey);
    forward.set(i, value);
    inverse.set(value, i);
  }
  return { forward, inverse };
}

function time(fn: () => void): number {
  const start = performance.now();
  fn();
  return performance.now() - start;
}

describeIf("BidiMap Performance Benchmarks", () => {
  it(`${COUNT} overwriting sets - within 25x of two Maps`, { timeout: 30000 }, () => {
    let baseline = { forward: new Map<number, string>(), inverse: new Map<string, number>() };
    const base = time(() => {
      baseline = handSynced(COUNT);
    });

    const map = new BidiMap<number, string>(null, { policy: "overwrite" });
    const duration = time(() => {
      for (let i = 0; i < COUNT; i++) {
        map.set(i, `v${i % (COUNT / 2)}`);
      }
    });

    console.log(`Overwriting sets: two Maps ${base.toFixed(1)}ms, BidiMap ${duration.toFixed(1)}ms`);
    expect(map.size).toBe(baseline.forward.size);
    expect(map.getKey("v0")).toBe(baseline.inverse.get("v0"));
    expect(duration).toBeLessThan(Math.max(base, 1) * 25);
  });

  it(`${COUNT} lookups each way - cold < 200ms`, { timeout: 30000 }, () => {
    const map = new BidiMap<number, string>();
    for (let i = 0; i < COUNT; i++) {
      map.set(i, `v${i}`);
    }

    let hits = 0;
    const duration = time(() => {
      for (let i = 0; i < COUNT; i++) {
        if (map.get(i) === `v${i}` && map.getKey(`v${i}`) === i) hits++;
      }
    });

    console.log(`Lookups: ${hits} hits in ${duration.toFixed(1)}ms`);
    expect(hits).toBe(COUNT);
    expect(duration).toBeLessThan(200);
  });

  it(`${COUNT} ordered sets and moves - within 40x of two Maps`, { timeout: 30000 }, () => {
    const base = time(() => {
      handSynced(COUNT);
    });

    const map = new OrderedBidiMap<number, string>(null, { policy: "overwrite" });
    const duration = time(() => {
      for (let i = 0; i < COUNT; i++) {
        map.set(i, `v${i % (COUNT / 2)}`);
        if (i % 10 === 0) map.moveToFront(i);
      }
    });

    console.log(`Ordered sets: two Maps ${base.toFixed(1)}ms, OrderedBidiMap ${duration.toFixed(1)}ms`);
    expect(map.size).toBe(COUNT / 2);
    expect(duration).toBeLessThan(Math.max(base, 1) * 40);
  });
});
