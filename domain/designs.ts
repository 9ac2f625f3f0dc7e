/**
 * Design catalog: static attributes of ship and building designs.
 * Pure lookup, no state.
 */

import { NotFoundError } from "./errors.js";

export const DESIGN_TYPES = [
  "COLONY_SHIP",
  "SCOUT",
  "FIGHTER",
  "TROOP_CARRIER",
  "TANKER",
  "SHIPYARD",
  "SILO",
  "RADAR",
  "GROUND_SHIELD",
  "BIOSPHERE",
  "HQ",
] as const;

export type DesignType = (typeof DESIGN_TYPES)[number];

export type DesignKind = "SHIP" | "BUILDING";

export interface Design {
  readonly type: DesignType;
  readonly kind: DesignKind;
  readonly displayName: string;
  /** Travel speed in pixels per hour. Zero for buildings. */
  readonly speedPxPerHour: number;
  /** Energy burned per ship per pixel travelled. Zero for buildings. */
  readonly fuelCostPerPx: number;
}

export interface DesignCatalog {
  /** Throws NotFoundError for a design the catalog does not know. */
  getDesign(type: DesignType): Design;
}

export const DEFAULT_DESIGNS: readonly Design[] = [
  { type: "COLONY_SHIP", kind: "SHIP", displayName: "Colony ship", speedPxPerHour: 32, fuelCostPerPx: 0.5 },
  { type: "SCOUT", kind: "SHIP", displayName: "Scout", speedPxPerHour: 160, fuelCostPerPx: 0.05 },
  { type: "FIGHTER", kind: "SHIP", displayName: "Fighter", speedPxPerHour: 80, fuelCostPerPx: 0.1 },
  { type: "TROOP_CARRIER", kind: "SHIP", displayName: "Troop carrier", speedPxPerHour: 48, fuelCostPerPx: 0.25 },
  { type: "TANKER", kind: "SHIP", displayName: "Tanker", speedPxPerHour: 40, fuelCostPerPx: 0.2 },
  { type: "SHIPYARD", kind: "BUILDING", displayName: "Shipyard", speedPxPerHour: 0, fuelCostPerPx: 0 },
  { type: "SILO", kind: "BUILDING", displayName: "Silo", speedPxPerHour: 0, fuelCostPerPx: 0 },
  { type: "RADAR", kind: "BUILDING", displayName: "Radar", speedPxPerHour: 0, fuelCostPerPx: 0 },
  { type: "GROUND_SHIELD", kind: "BUILDING", displayName: "Ground shield", speedPxPerHour: 0, fuelCostPerPx: 0 },
  { type: "BIOSPHERE", kind: "BUILDING", displayName: "Biosphere", speedPxPerHour: 0, fuelCostPerPx: 0 },
  { type: "HQ", kind: "BUILDING", displayName: "Headquarters", speedPxPerHour: 0, fuelCostPerPx: 0 },
];

/** Catalog over a fixed list of designs. Later entries replace earlier ones of the same type. */
export function createDesignCatalog(designs: readonly Design[] = DEFAULT_DESIGNS): DesignCatalog {
  const byType = new Map<DesignType, Design>();
  for (const design of designs) {
    byType.set(design.type, design);
  }
  return {
    getDesign(type: DesignType): Design {
      const design = byType.get(type);
      if (!design) {
        throw new NotFoundError(`Unknown design: ${type}`, { type });
      }
      return design;
    },
  };
}
