/**
 * Domain validation: assertions and invariants.
 * Framework-independent. No game rules.
 */

import { InvariantViolation, type ErrorMetadata } from "./errors.js";

/** Throws if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

/** Same as assert, but raises InvariantViolation; use for state that must always hold. */
export function invariant(
  condition: unknown,
  message: string,
  metadata?: ErrorMetadata
): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}
