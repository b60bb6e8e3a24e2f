/**
 * JSON persistence for maps
 *
 * A document records the map's kind, policy, display name and pairs in
 * stored order. Only JSON primitives can be persisted; objects are compared
 * by identity inside a map, so they could not be restored as the same keys.
 */

import { z } from "zod";
import type { BidiMapBase } from "./base.js";
import { BidiMap } from "./bidimap.js";
import { BidiMapError, SerializationError } from "./errors.js";
import { describe, stableStringify } from "./format.js";
import { FrozenBidiMap, FrozenOrderedBidiMap } from "./frozen.js";
import { OrderedBidiMap } from "./ordered.js";
import { CollisionPolicySchema, policyName, PolicyNameSchema } from "./policy.js";
import type { Defined, Pair } from "./types.js";
import { formatIssues, IdentifierSchema } from "./validation.js";

export const FORMAT = "bidimap@1";

export type Primitive = string | number | boolean | null;

const PrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const KindSchema = z.enum(["bidimap", "ordered", "frozen", "frozen-ordered"]);

export type MapKind = z.infer<typeof KindSchema>;

export const DocumentSchema = z
  .object({
    format: z.literal(FORMAT),
    kind: KindSchema,
    name: IdentifierSchema.optional(),
    policy: z.union([PolicyNameSchema, CollisionPolicySchema]),
    pairs: z.array(z.tuple([PrimitiveSchema, PrimitiveSchema])),
  })
  .strict();

export type BidiMapDocument = z.infer<typeof DocumentSchema>;

export type RestoredMap = BidiMap<Primitive, Primitive> | FrozenBidiMap<Primitive, Primitive>;

function isPrimitive(value: unknown): value is Primitive {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    default:
      return value === null;
  }
}

export function kindOf<K extends Defined, V extends Defined>(map: BidiMapBase<K, V>): MapKind {
  if (map instanceof FrozenOrderedBidiMap) return "frozen-ordered";
  if (map instanceof FrozenBidiMap) return "frozen";
  if (map instanceof OrderedBidiMap) return "ordered";
  return "bidimap";
}

/**
 * Describe a map as a plain document
 * @throws SerializationError if a key or value is not a JSON primitive
 */
export function toDocument<K extends Defined, V extends Defined>(map: BidiMapBase<K, V>): BidiMapDocument {
  const out: Array<Pair<Primitive, Primitive>> = [];
  let position = 0;
  for (const [key, value] of map.entries()) {
    if (!isPrimitive(key)) {
      throw new SerializationError(`Cannot serialize key ${describe(key)} at position ${position}`);
    }
    if (!isPrimitive(value)) {
      throw new SerializationError(`Cannot serialize value ${describe(value)} at position ${position}`);
    }
    out.push([key, value]);
    position++;
  }

  const doc: BidiMapDocument = {
    format: FORMAT,
    kind: kindOf(map),
    policy: policyName(map.policy) ?? { ...map.policy },
    pairs: out,
  };
  if (map.displayName !== map.constructor.name) {
    doc.name = map.displayName;
  }
  return doc;
}

/**
 * Canonical JSON text of a map, keys sorted, trailing newline
 */
export function serialize<K extends Defined, V extends Defined>(map: BidiMapBase<K, V>, indent = 2): string {
  return stableStringify(toDocument(map), indent);
}

function build(document: BidiMapDocument): RestoredMap {
  const { kind, name, policy, pairs } = document;
  const options = { policy, name };
  switch (kind) {
    case "bidimap":
      return new BidiMap<Primitive, Primitive>(pairs, options);
    case "ordered":
      return new OrderedBidiMap<Primitive, Primitive>(pairs, options);
    case "frozen":
      return new FrozenBidiMap<Primitive, Primitive>(pairs, options);
    case "frozen-ordered":
      return new FrozenOrderedBidiMap<Primitive, Primitive>(pairs, options);
  }
}

/**
 * Rebuild a map from a document
 *
 * @throws SerializationError if the document is malformed, or if its pairs
 *   collide under its own policy (the collision error is the `cause`)
 */
export function fromDocument(input: unknown): RestoredMap {
  const result = DocumentSchema.safeParse(input);
  if (!result.success) {
    throw new SerializationError("Invalid bidimap document", formatIssues(result.error));
  }

  try {
    return build(result.data);
  } catch (err) {
    if (err instanceof BidiMapError) {
      throw new SerializationError("Invalid bidimap document", [err.message], { cause: err });
    }
    throw err;
  }
}

/**
 * Parse JSON text produced by `serialize`
 * @throws SerializationError if the text is not JSON or not a valid document
 */
export function deserialize(text: string): RestoredMap {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SerializationError("Invalid JSON", [message], { cause: err });
  }
  return fromDocument(parsed);
}
