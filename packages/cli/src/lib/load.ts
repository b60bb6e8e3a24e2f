/**
 * Build a map from CLI input
 *
 * Accepted input: a bidimap document (as written by `serialize`), a JSON
 * array of `[key, value]` pairs, or a JSON object whose entries are the pairs.
 * Documents carry their own kind and policy; the other two take them from
 * the command line.
 */

import { z } from "zod";
import {
  BidiMap,
  OrderedBidiMap,
  ValidationError,
  entriesOf,
  formatIssues,
  fromDocument,
} from "@bidimap/sdk";
import type { Pair, PolicyName, Primitive, RestoredMap } from "@bidimap/sdk";
import { readJsonInput } from "./io.js";

const PrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const PairsSchema = z.array(z.tuple([PrimitiveSchema, PrimitiveSchema]));

const RecordSchema = z.record(PrimitiveSchema);

export interface LoadOptions {
  policy: PolicyName;
  ordered: boolean;
}

function isDocument(input: unknown): boolean {
  return typeof input === "object" && input !== null && !Array.isArray(input) && "format" in input;
}

function build(pairs: Array<Pair<Primitive, Primitive>>, options: LoadOptions): RestoredMap {
  if (options.ordered) {
    return new OrderedBidiMap<Primitive, Primitive>(pairs, { policy: options.policy });
  }
  return new BidiMap<Primitive, Primitive>(pairs, { policy: options.policy });
}

/**
 * Turn parsed JSON into a map
 * @throws ValidationError if the input has none of the accepted shapes
 * @throws CollisionError if the pairs collide under the policy
 * @throws SerializationError if a document is malformed or its pairs collide
 */
export function toMap(input: unknown, options: LoadOptions): RestoredMap {
  if (isDocument(input)) {
    return fromDocument(input);
  }

  if (Array.isArray(input)) {
    const result = PairsSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError("Invalid pairs", formatIssues(result.error));
    }
    return build(result.data, options);
  }

  const result = RecordSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      "Input must be a bidimap document, an array of [key, value] pairs or an object",
      formatIssues(result.error)
    );
  }
  return build(entriesOf(result.data), options);
}

/**
 * Read a file (or stdin for "-") and build a map from it
 */
export async function loadMap(file: string, options: LoadOptions): Promise<RestoredMap> {
  return toMap(await readJsonInput(file), options);
}
