/**
 * Simulation boundary. The economy (production, consumption, build progress) is
 * advanced by an external simulation; the engine only calls it around each batch.
 */

import type { Clock } from "./core.js";
import type { LogSink } from "./logSink.js";
import type { Star } from "./star.js";

export interface Simulation {
  /** Bring the star up to the current instant, in place. */
  simulate(star: Star, logSink: LogSink): void;
}

/**
 * Records the simulation instant without touching the economy. Stands in where
 * the production simulation runs in another process.
 */
export function createTimestampSimulation(clock: Clock): Simulation {
  return {
    simulate(star: Star, logSink: LogSink): void {
      const at = clock.now();
      logSink.log(`Simulated to ${new Date(at).toISOString()}.`);
      star.lastSimulation = at;
    },
  };
}
