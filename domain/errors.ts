/**
 * Domain error model: base and concrete error types.
 * Framework-independent. No game rules.
 */

import type { Identifier } from "./core.js";
import type { Modification } from "./modification.js";

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an entity or resource is not found. */
export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when a stored version no longer matches the expected one. */
export class ConcurrencyError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/**
 * Thrown when a modification contradicts the authoritative star state in a way
 * a well-behaved client cannot produce: wrong owner, missing colony/fleet/build
 * request, shipyard or design mismatch. Aborts the rest of the batch; handlers
 * that already ran stay applied.
 */
export class SuspiciousModificationError extends DomainError {
  readonly starId: Identifier;
  readonly modification: Modification;
  readonly reason: string;

  constructor(starId: Identifier, modification: Modification, reason: string) {
    super(`Suspicious ${modification.type} at star #${starId}: ${reason}`, {
      starId,
      type: modification.type,
    });
    this.starId = starId;
    this.modification = modification;
    this.reason = reason;
  }
}
