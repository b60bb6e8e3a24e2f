/**
 * Validation utilities for options, names and elements
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { describe } from "./format.js";

/**
 * JavaScript identifier (ASCII subset), used for display names and accessor names
 */
const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const IdentifierSchema = z
  .string()
  .min(1, "must be a non-empty string")
  .regex(IDENTIFIER_PATTERN, "must start with a letter, _ or $ and contain only letters, digits, _ or $");

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate an identifier-like name
 * @param value - Name to validate
 * @param label - Label for error messages
 * @throws ValidationError if invalid
 */
export function validateIdentifier(value: unknown, label: string): string {
  const result = IdentifierSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label} ${describe(value)}`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Reject `undefined`, which the maps reserve for "absent"
 * @throws ValidationError if the element is undefined
 */
export function assertDefined<T>(value: T | undefined, label: "key" | "value"): asserts value is T {
  if (value === undefined) {
    throw new ValidationError(`${label} must not be undefined`);
  }
}
