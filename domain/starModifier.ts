/**
 * Star modifier: applies batches of modifications to a star.
 *
 * The star is simulated up to now, each modification is handed to its handler
 * in order, and the star is simulated again. Handlers mutate the star in place.
 * An empty batch only runs the final simulation, bringing the star up to now.
 *
 * A SuspiciousModificationError from any handler stops the batch. Handlers that
 * ran before it are NOT rolled back: after a failed batch the star is partially
 * modified, and callers wanting all-or-nothing must work on a copy
 * (see StarModificationService).
 */

import type { Clock } from "./core.js";
import type { DesignCatalog } from "./designs.js";
import type { HandlerContext } from "./handlerContext.js";
import type { IdentifierGenerator } from "./identifiers.js";
import { EMPTY_LOG_SINK, type LogSink } from "./logSink.js";
import type { Modification } from "./modification.js";
import type { Simulation } from "./simulation.js";
import type { Star, StarLocation } from "./star.js";
import { systemClock } from "./utils.js";
import {
  applyAddBuildRequest,
  applyAdjustFocus,
  applyColonize,
  applyCreateBuilding,
  applyDeleteBuildRequest,
  applyEmptyNative,
} from "./colonyModifications.js";
import {
  applyCreateFleet,
  applyMergeFleet,
  applyMoveFleet,
  applySplitFleet,
} from "./fleetModifications.js";

export interface StarModifierDeps {
  readonly ids: IdentifierGenerator;
  readonly designs: DesignCatalog;
  readonly simulation: Simulation;
  readonly clock?: Clock;
  /** Process-level logger for things operators should see; the log sink is per call. */
  readonly logger?: { error: (...args: unknown[]) => void };
}

export interface ApplyOptions {
  /** Stars the batch refers to besides the one modified (MOVE_FLEET destinations). */
  readonly auxStars?: readonly StarLocation[];
  readonly logSink?: LogSink;
}

/** The `type` of an untyped value, without echoing the rest of it. */
function typeTag(value: unknown): string {
  if (typeof value === "object" && value !== null && "type" in value) {
    return String(value.type);
  }
  return String(value);
}

export class StarModifier {
  private readonly deps: StarModifierDeps;

  constructor(deps: StarModifierDeps) {
    this.deps = deps;
  }

  /** Apply a single modification. Throws SuspiciousModificationError. */
  applyOne(star: Star, modification: Modification, options: ApplyOptions = {}): void {
    this.apply(star, [modification], options);
  }

  /** Apply modifications in order. Throws SuspiciousModificationError; see the module doc on partial application. */
  apply(star: Star, modifications: readonly Modification[], options: ApplyOptions = {}): void {
    const logSink = options.logSink ?? EMPTY_LOG_SINK;
    logSink.setStarName(star.name);
    logSink.log(`Applying ${modifications.length} modifications.`);

    const ctx: HandlerContext = {
      star,
      auxStars: options.auxStars ?? [],
      logSink,
      ids: this.deps.ids,
      designs: this.deps.designs,
      clock: this.deps.clock ?? systemClock,
    };

    try {
      if (modifications.length > 0) {
        this.deps.simulation.simulate(star, EMPTY_LOG_SINK);
        for (const modification of modifications) {
          this.dispatch(ctx, modification);
        }
      }
    } finally {
      this.deps.simulation.simulate(star, logSink);
    }
  }

  private dispatch(ctx: HandlerContext, modification: Modification): void {
    switch (modification.type) {
      case "COLONIZE":
        return applyColonize(ctx, modification);
      case "CREATE_FLEET":
        return applyCreateFleet(ctx, modification);
      case "CREATE_BUILDING":
        return applyCreateBuilding(ctx, modification);
      case "ADJUST_FOCUS":
        return applyAdjustFocus(ctx, modification);
      case "ADD_BUILD_REQUEST":
        return applyAddBuildRequest(ctx, modification);
      case "DELETE_BUILD_REQUEST":
        return applyDeleteBuildRequest(ctx, modification);
      case "SPLIT_FLEET":
        return applySplitFleet(ctx, modification);
      case "MERGE_FLEET":
        return applyMergeFleet(ctx, modification);
      case "MOVE_FLEET":
        return applyMoveFleet(ctx, modification);
      case "EMPTY_NATIVE":
        return applyEmptyNative(ctx, modification);
      default: {
        // Reachable only from untyped callers.
        const unexpected: never = modification;
        const message = `Unknown or unexpected modification type: ${typeTag(unexpected)}`;
        ctx.logSink.log(message);
        this.deps.logger?.error(message);
      }
    }
  }
}
