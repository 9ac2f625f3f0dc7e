/**
 * Builders for stars, fleets and colonies used across tests.
 */

import { asTimestamp, type EmpireId, type Identifier } from "./core.js";
import { createDesignCatalog } from "./designs.js";
import { createSequentialIdentifierGenerator } from "./identifiers.js";
import type { LogSink } from "./logSink.js";
import type { Simulation } from "./simulation.js";
import type { Colony, EmpireStorage, Fleet, Planet, Star } from "./star.js";
import { StarModifier } from "./starModifier.js";
import { fixedClock } from "./utils.js";

export const NOW = asTimestamp(1_700_000_000_000);
export const EARLIER = asTimestamp(1_600_000_000_000);
export const EMPIRE = 10;
export const OTHER_EMPIRE = 20;

export function makePlanets(count: number): Planet[] {
  return Array.from({ length: count }, (_, index) => ({ index, colony: null }));
}

export function makeStar(overrides: Partial<Star> = {}): Star {
  return {
    id: 1,
    name: "Sol",
    sectorX: 0,
    sectorY: 0,
    offsetX: 0,
    offsetY: 0,
    planets: makePlanets(5),
    fleets: [],
    empireStores: [],
    lastSimulation: null,
    ...overrides,
  };
}

export function makeFleet(id: Identifier, overrides: Partial<Fleet> = {}): Fleet {
  return {
    id,
    empireId: EMPIRE,
    designType: "FIGHTER",
    numShips: 10,
    stance: "AGGRESSIVE",
    state: "IDLE",
    stateStartTime: EARLIER,
    destinationStarId: null,
    eta: null,
    ...overrides,
  };
}

export function makeColony(id: Identifier, overrides: Partial<Colony> = {}): Colony {
  return {
    id,
    empireId: EMPIRE,
    population: 500,
    focus: { construction: 0.25, energy: 0.25, farming: 0.25, mining: 0.25 },
    cooldownEndTime: EARLIER,
    defenceBonus: 1,
    buildings: [],
    buildRequests: [],
    ...overrides,
  };
}

export function makeStorage(empireId: EmpireId, overrides: Partial<EmpireStorage> = {}): EmpireStorage {
  return {
    empireId,
    totalGoods: 50,
    totalMinerals: 50,
    totalEnergy: 500,
    maxGoods: 1000,
    maxMinerals: 1000,
    maxEnergy: 1000,
    ...overrides,
  };
}

/** Records each simulate call: which star, and whether it got a real sink. */
export interface RecordingSimulation extends Simulation {
  readonly calls: { starId: Identifier; fleetCount: number; logSink: LogSink }[];
}

export function createRecordingSimulation(): RecordingSimulation {
  const calls: RecordingSimulation["calls"] = [];
  return {
    calls,
    simulate(star: Star, logSink: LogSink): void {
      calls.push({ starId: star.id, fleetCount: star.fleets.length, logSink });
    },
  };
}

/** Modifier with a fixed clock, ids from 100, the default catalog, and a recording simulation. */
export function makeModifier(
  simulation: Simulation = createRecordingSimulation(),
  logger?: { error: (...args: unknown[]) => void }
): StarModifier {
  return new StarModifier({
    ids: createSequentialIdentifierGenerator(100),
    designs: createDesignCatalog(),
    simulation,
    clock: fixedClock(NOW),
    ...(logger != null && { logger }),
  });
}
