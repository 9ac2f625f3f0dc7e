/**
 * Star modification service: the single writer in front of the store.
 *
 * Batches for one star run strictly one at a time. Each batch is applied to a
 * working copy, which is saved only when every modification went through, so a
 * suspicious batch leaves the stored star untouched.
 */

import type { Identifier } from "../domain/core.js";
import { NotFoundError, SuspiciousModificationError } from "../domain/errors.js";
import { createBufferedLogSink } from "../domain/logSink.js";
import { parseModifications, type Modification } from "../domain/modification.js";
import type { Star } from "../domain/star.js";
import { validateStar } from "../domain/starInvariants.js";
import type { StarModifier } from "../domain/starModifier.js";
import type { StarStore } from "../domain/starStore.js";
import type { Logger } from "./logger.js";
import { KeyedSerializer } from "./starLocks.js";

export interface StarServiceDeps {
  readonly store: StarStore;
  readonly modifier: StarModifier;
  readonly logger: Logger;
  readonly verifyInvariants: boolean;
}

export interface ModifyStarRequest {
  readonly starId: Identifier;
  readonly modifications: readonly Modification[];
}

export interface ModifyStarResult {
  readonly star: Star;
  readonly version: number;
  /** Lines the engine and simulation logged while applying the batch. */
  readonly log: readonly string[];
}

/** Destinations of every MOVE_FLEET in the batch, without duplicates. */
function destinationStarIds(modifications: readonly Modification[]): Identifier[] {
  const ids = new Set<Identifier>();
  for (const modification of modifications) {
    if (modification.type === "MOVE_FLEET") ids.add(modification.starId);
  }
  return [...ids];
}

export class StarModificationService {
  private readonly deps: StarServiceDeps;
  private readonly serializer = new KeyedSerializer<Identifier>();

  constructor(deps: StarServiceDeps) {
    this.deps = deps;
  }

  /**
   * Parse untrusted input, then modify. Throws ValidationError before touching the star.
   * Modification types this engine does not know are logged and skipped.
   */
  async modifyFromWire(starId: Identifier, input: unknown): Promise<ModifyStarResult> {
    const modifications = parseModifications(input, (type, index) => {
      this.deps.logger.error(`Unknown or unexpected modification type: ${type}`, { starId, index });
    });
    return await this.modify({ starId, modifications });
  }

  modify(request: ModifyStarRequest): Promise<ModifyStarResult> {
    return this.serializer.run(request.starId, () => this.modifyNow(request));
  }

  private async modifyNow(request: ModifyStarRequest): Promise<ModifyStarResult> {
    const { store, modifier, logger } = this.deps;
    const stored = await store.load(request.starId);
    if (!stored) {
      throw new NotFoundError(`Star #${request.starId} not found`, { starId: request.starId });
    }
    const auxStars = await store.loadMany(destinationStarIds(request.modifications));

    const working = structuredClone(stored.star);
    const logSink = createBufferedLogSink();
    try {
      modifier.apply(working, request.modifications, { auxStars, logSink });
    } catch (err) {
      if (err instanceof SuspiciousModificationError) {
        logger.warn(`Rejected batch for star #${err.starId}: ${err.reason}`, {
          modification: err.modification,
        });
      }
      throw err;
    }

    if (this.deps.verifyInvariants) {
      validateStar(working);
    }
    const version = await store.save(working, stored.version);
    for (const line of logSink.lines) {
      logger.debug(`[${working.name}] ${line}`);
    }
    logger.info(
      `Applied ${request.modifications.length} modifications to star #${working.id} (version ${version})`
    );
    return { star: working, version, log: logSink.lines };
  }
}
