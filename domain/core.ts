/**
 * Domain core: structural primitives only.
 * Framework-independent. No game rules.
 */

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Point in time (UTC epoch milliseconds). */
export type Timestamp = Brand<number, "TimestampMs">;

/** Span of time (milliseconds). */
export type Duration = Brand<number, "DurationMs">;

// --- Constructors (no validation yet) ---

export const asTimestamp = (ms: number) => ms as Timestamp;
export const asDuration = (ms: number) => ms as Duration;

export const MINUTE_MS = asDuration(60_000);
export const HOUR_MS = asDuration(3_600_000);

// --- Identity ---

/** Identifier issued by an IdentifierGenerator. Unique within a process. */
export type Identifier = number;

/** Empire identifier. `null` stands for the native (unowned) pseudo-empire. */
export type EmpireId = number | null;

/** Source of the current time. Injected so handlers stay deterministic under test. */
export interface Clock {
  now(): Timestamp;
}
