/**
 * Basic Usage Example
 *
 * Demonstrates lookups in both directions and the collision policies.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { BidiMap, ValueExistsError, namedBidiMap } from "@bidimap/sdk";

function main(): void {
  // A strict map: a new key may replace a value, a taken value is an error
  const codes = new BidiMap([
    ["H", 1],
    ["He", 2],
  ]);
  console.log(`${codes}`);
  console.log("He ->", codes.get("He"), "| 1 ->", codes.getKey(1));

  try {
    codes.set("Li", 1);
  } catch (err) {
    if (err instanceof ValueExistsError) {
      console.log("Refused:", err.message);
    } else {
      throw err;
    }
  }

  // forceSet evicts whatever held the key or the value
  codes.forceSet("Li", 1);
  console.log("After forceSet:", codes.toJSON());

  // Writes through the inverse land in the same map
  codes.inverse.set(4, "Be");
  console.log("Be ->", codes.get("Be"));

  // Overwrite policy: every set resolves its collisions by eviction
  const seats = new BidiMap<string, number>(null, { policy: "overwrite" });
  seats.set("ann", 1).set("bob", 2).set("cy", 1);
  console.log("Seats:", seats.toJSON());

  // Named accessors
  const Capitals = namedBidiMap("CountryCapitals", "country", "capital", BidiMap);
  const capitals = Capitals.create([
    ["France", "Paris"],
    ["Peru", "Lima"],
  ]);
  console.log("Capital of Peru:", capitals.capitalFor.get("Peru"));
  console.log("Country of Paris:", capitals.countryFor.get("Paris"));
  console.log(`${capitals}`);
}

main();
