/**
 * Error types for bidirectional map operations
 *
 * Invariants:
 * - A thrown error never leaves a map partially mutated
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import { describe } from "./format.js";

/**
 * Base class for all bidimap errors
 */
export abstract class BidiMapError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Base class for writes refused because they would break the one-to-one contract
 */
export abstract class CollisionError extends BidiMapError {
  constructor(
    public readonly key: unknown,
    public readonly value: unknown,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a key is already mapped and the policy says to raise
 *
 * `key` and `value` describe the existing association.
 */
export class KeyExistsError extends CollisionError {
  readonly code = "E_KEY_EXISTS";

  constructor(key: unknown, value: unknown, options?: ErrorOptions) {
    super(key, value, `Key ${describe(key)} exists with value ${describe(value)}`, options);
  }
}

/**
 * Thrown when a value is already owned by another key and the policy says to raise
 *
 * `key` and `value` describe the existing association.
 */
export class ValueExistsError extends CollisionError {
  readonly code = "E_VALUE_EXISTS";

  constructor(key: unknown, value: unknown, options?: ErrorOptions) {
    super(key, value, `Value ${describe(value)} exists with key ${describe(key)}`, options);
  }
}

/**
 * Thrown when a key (or, looking up the inverse, a value) is absent
 */
export class KeyNotFoundError extends BidiMapError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly key: unknown,
    public readonly side: "key" | "value" = "key",
    options?: ErrorOptions
  ) {
    super(`${side === "key" ? "Key" : "Value"} not found: ${describe(key)}`, options);
  }
}

/**
 * Thrown when removing from an empty map
 */
export class EmptyMapError extends BidiMapError {
  readonly code = "E_EMPTY";

  constructor(
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(`Cannot ${operation}: map is empty`, options);
  }
}

/**
 * Thrown by every mutating call on a frozen map
 */
export class ImmutableMapError extends BidiMapError {
  readonly code = "E_IMMUTABLE";

  constructor(
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(`Cannot ${operation}: map is frozen`, options);
  }
}

/**
 * Thrown when options, names or input pairs are structurally invalid
 */
export class ValidationError extends BidiMapError {
  readonly code = "E_VALIDATION";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}

/**
 * Thrown when a map cannot be written to or read from its persisted form
 */
export class SerializationError extends BidiMapError {
  readonly code = "E_SERIALIZE";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}
