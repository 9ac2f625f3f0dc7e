/**
 * Identifier allocation for colonies, fleets and build requests.
 */

import type { Identifier } from "./core.js";

export interface IdentifierGenerator {
  nextIdentifier(): Identifier;
}

/** Hands out start, start + 1, … Unique for the lifetime of the generator. */
export function createSequentialIdentifierGenerator(start = 1): IdentifierGenerator {
  let next = start;
  return {
    nextIdentifier(): Identifier {
      return next++;
    },
  };
}
