/**
 * What every modification handler gets to work with.
 */

import type { Clock } from "./core.js";
import type { DesignCatalog } from "./designs.js";
import { SuspiciousModificationError } from "./errors.js";
import type { IdentifierGenerator } from "./identifiers.js";
import type { LogSink } from "./logSink.js";
import type { Modification, ModificationOf, ModificationType } from "./modification.js";
import type { Star, StarLocation } from "./star.js";

export interface HandlerContext {
  /** The star being modified, mutated in place. */
  readonly star: Star;
  /** Other stars the batch may refer to (MOVE_FLEET destinations). Never mutated. */
  readonly auxStars: readonly StarLocation[];
  readonly logSink: LogSink;
  readonly ids: IdentifierGenerator;
  readonly designs: DesignCatalog;
  readonly clock: Clock;
}

export type ModificationHandler<T extends ModificationType> = (
  ctx: HandlerContext,
  modification: ModificationOf<T>
) => void;

/** Build the error for a modification that should not have been sent. Caller throws it. */
export function suspicious(
  ctx: HandlerContext,
  modification: Modification,
  reason: string
): SuspiciousModificationError {
  return new SuspiciousModificationError(ctx.star.id, modification, reason);
}
