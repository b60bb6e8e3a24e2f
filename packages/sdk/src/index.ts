/**
 * bidimap SDK
 *
 * Bidirectional maps: a forward and an inverse index kept in step, with
 * configurable collision policies, an insertion-ordered variant and a frozen,
 * hashable variant
 */

// Re-export types
export type {
  Defined,
  Pair,
  PairSource,
  BidiMapOptions,
  PutAllOptions,
  Readable,
  Mutable,
  Ordered,
  Hashable,
} from "./types.js";

// Map types
export { BidiMapBase, isBidiMap } from "./base.js";
export { BidiMap } from "./bidimap.js";
export { OrderedBidiMap } from "./ordered.js";
export { FrozenBidiMap, FrozenOrderedBidiMap } from "./frozen.js";

// Collision policies
export type {
  CollisionBehavior,
  CollisionPolicy,
  CollisionDecision,
  CollisionState,
  PolicyInput,
  PolicyName,
} from "./policy.js";
export {
  STRICT,
  OVERWRITE,
  RAISE,
  IGNORE,
  POLICIES,
  decide,
  resolvePolicy,
  policyName,
  CollisionPolicySchema,
  PolicyNameSchema,
} from "./policy.js";
export { defaultPolicy, resolveOptions } from "./config.js";

// Helpers
export { pairs, inverted, entriesOf } from "./pairs.js";
export type { Invertible } from "./pairs.js";
export { namedBidiMap } from "./named.js";
export type { Named, NamedAccessors, NamedBase, NamedBidiMapType, Instance } from "./named.js";
export { contentHash, encodeElement } from "./hash.js";

// Persistence
export {
  FORMAT,
  DocumentSchema,
  kindOf,
  toDocument,
  serialize,
  fromDocument,
  deserialize,
} from "./serialize.js";
export type { BidiMapDocument, MapKind, Primitive, RestoredMap } from "./serialize.js";

// Utilities
export { stableStringify, describe, formatMap } from "./format.js";
export { validateIdentifier, assertDefined, formatIssues, IdentifierSchema } from "./validation.js";
export { logger, formatEntry } from "./observability/logs.js";
export type { LogEntry, LogLevel } from "./observability/logs.js";

// Re-export errors
export {
  BidiMapError,
  CollisionError,
  KeyExistsError,
  ValueExistsError,
  KeyNotFoundError,
  EmptyMapError,
  ImmutableMapError,
  ValidationError,
  SerializationError,
} from "./errors.js";
