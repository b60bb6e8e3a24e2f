/**
 * Ordered and Frozen Maps Example
 *
 * Demonstrates insertion order, moves, freezing, hashing and persistence.
 * Run with: npx tsx examples/ordered-and-frozen.ts
 */

import { OrderedBidiMap, deserialize, serialize } from "@bidimap/sdk";

function main(): void {
  const queue = new OrderedBidiMap<string, number>([
    ["ann", 10],
    ["bob", 20],
    ["cy", 30],
  ]);

  queue.moveToFront("cy");
  queue.inverse.set(20, "dee"); // renames bob in place
  console.log("Order:", queue.toJSON());
  console.log("Reversed:", Array.from(queue.reversed()));
  console.log("First:", queue.first(), "| Last:", queue.last());

  // Frozen copies are hashable and compare by content
  const snapshot = queue.freeze();
  const lookup = new Map([[snapshot.hash(), "cached result"]]);
  console.log("Hash:", snapshot.hash());
  console.log("Cached:", lookup.get(queue.freeze().hash()));

  // Round trip through JSON
  const text = serialize(snapshot);
  console.log(text);
  const restored = deserialize(text);
  console.log("Restored equals snapshot:", restored.equals(snapshot));
}

main();
