/**
 * Star aggregate: planets, colonies, fleets and empire storages of one star system.
 * Plain mutable records: the engine works on a working copy and mutates it in place.
 */

import type { EmpireId, Identifier, Timestamp } from "./core.js";
import type { DesignType } from "./designs.js";

export const FLEET_STATES = ["IDLE", "MOVING", "ATTACKING"] as const;
export type FleetState = (typeof FLEET_STATES)[number];

export const FLEET_STANCES = ["PASSIVE", "NEUTRAL", "AGGRESSIVE"] as const;
export type FleetStance = (typeof FLEET_STANCES)[number];

/** Share of a colony's workforce assigned to each sector. */
export interface ColonyFocus {
  construction: number;
  energy: number;
  farming: number;
  mining: number;
}

export interface Building {
  designType: DesignType;
  level: number;
}

export interface BuildRequest {
  id: Identifier;
  designType: DesignType;
  count: number;
  /** 0..1, advanced by the simulation. */
  progress: number;
  startTime: Timestamp;
}

export interface Colony {
  id: Identifier;
  empireId: EmpireId;
  population: number;
  focus: ColonyFocus;
  cooldownEndTime: Timestamp;
  defenceBonus: number;
  buildings: Building[];
  buildRequests: BuildRequest[];
}

export interface Planet {
  /** Slot within the star; equals the planet's position in `Star.planets`. */
  index: number;
  colony: Colony | null;
}

export interface Fleet {
  id: Identifier;
  empireId: EmpireId;
  designType: DesignType;
  numShips: number;
  stance: FleetStance;
  state: FleetState;
  stateStartTime: Timestamp;
  /** Set only while MOVING. */
  destinationStarId: Identifier | null;
  /** Set only while MOVING. */
  eta: Timestamp | null;
}

export interface EmpireStorage {
  empireId: EmpireId;
  totalGoods: number;
  totalMinerals: number;
  totalEnergy: number;
  maxGoods: number;
  maxMinerals: number;
  maxEnergy: number;
}

/** Where a star sits in the galaxy: a sector plus a pixel offset inside it. */
export interface StarLocation {
  readonly id: Identifier;
  readonly sectorX: number;
  readonly sectorY: number;
  readonly offsetX: number;
  readonly offsetY: number;
}

export interface Star extends StarLocation {
  name: string;
  planets: Planet[];
  fleets: Fleet[];
  empireStores: EmpireStorage[];
  lastSimulation: Timestamp | null;
}
