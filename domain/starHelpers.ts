/**
 * Lookups over a star, addressed by identity rather than by reference.
 */

import type { EmpireId, Identifier } from "./core.js";
import type { Fleet, Planet, Colony, Star, StarLocation } from "./star.js";

/** Width and height of a galaxy sector, in pixels. */
export const SECTOR_SIZE = 1024;

/** Natives (null) only match natives. */
export function isSameEmpire(a: EmpireId, b: EmpireId): boolean {
  return a === b;
}

/** A fleet is friendly to the empire that owns it. Alliances are not modelled yet. */
export function isFriendly(fleet: Fleet, empireId: EmpireId): boolean {
  return isSameEmpire(fleet.empireId, empireId);
}

/** Index of the fleet in `star.fleets`, or -1. */
export function findFleetIndex(star: Star, fleetId: Identifier): number {
  return star.fleets.findIndex((fleet) => fleet.id === fleetId);
}

/** Index of the empire's storage in `star.empireStores`, or -1. */
export function findStorageIndex(star: Star, empireId: EmpireId): number {
  return star.empireStores.findIndex((storage) => isSameEmpire(storage.empireId, empireId));
}

export interface ColonySite {
  readonly planet: Planet;
  readonly colony: Colony;
}

/** The colony with the given id and the planet holding it, or null. */
export function findColony(star: Star, colonyId: Identifier): ColonySite | null {
  for (const planet of star.planets) {
    const colony = planet.colony;
    if (colony !== null && colony.id === colonyId) {
      return { planet, colony };
    }
  }
  return null;
}

/** The star with the given id, or null. */
export function findStar<S extends StarLocation>(stars: readonly S[], starId: Identifier): S | null {
  return stars.find((s) => s.id === starId) ?? null;
}

/** Straight-line distance between two stars, in pixels. */
export function distanceBetween(a: StarLocation, b: StarLocation): number {
  const dx = (b.sectorX - a.sectorX) * SECTOR_SIZE + (b.offsetX - a.offsetX);
  const dy = (b.sectorY - a.sectorY) * SECTOR_SIZE + (b.offsetY - a.offsetY);
  return Math.sqrt(dx * dx + dy * dy);
}
