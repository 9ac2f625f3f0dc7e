/**
 * Domain utilities: pure helpers, no game rules.
 * Framework-independent.
 */

import type { Clock, Duration, Timestamp } from "./core.js";
import { asTimestamp } from "./core.js";

/** Current time as UTC epoch milliseconds. */
export function now(): Timestamp {
  return asTimestamp(Date.now());
}

/** Clock backed by the system time. */
export const systemClock: Clock = { now };

/** Clock that always answers the same instant. For tests and replays. */
export function fixedClock(at: Timestamp): Clock {
  return { now: () => at };
}

/** Add a duration to a timestamp. */
export function addDuration(ts: Timestamp, d: Duration): Timestamp {
  return asTimestamp(ts + d);
}

