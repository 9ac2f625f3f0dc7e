/**
 * Cross-entity invariants of a star. Throws InvariantViolation on the first broken one.
 */

import type { EmpireId, Identifier } from "./core.js";
import type { Star } from "./star.js";
import { invariant } from "./validation.js";

function assertUnique(kind: string, ids: readonly Identifier[], starId: Identifier): void {
  const seen = new Set<Identifier>();
  for (const id of ids) {
    invariant(!seen.has(id), `Duplicate ${kind} id ${id} at star #${starId}`, { starId, kind, id });
    seen.add(id);
  }
}

export function validateStar(star: Star): void {
  star.planets.forEach((planet, slot) => {
    invariant(planet.index === slot, `Planet in slot ${slot} claims index ${planet.index}`, {
      starId: star.id,
      slot,
    });
  });

  const colonies = star.planets.flatMap((planet) => (planet.colony ? [planet.colony] : []));
  assertUnique("fleet", star.fleets.map((f) => f.id), star.id);
  assertUnique("colony", colonies.map((c) => c.id), star.id);
  assertUnique("build request", colonies.flatMap((c) => c.buildRequests.map((br) => br.id)), star.id);

  const storageOwners = new Set<EmpireId>();
  for (const storage of star.empireStores) {
    invariant(
      !storageOwners.has(storage.empireId),
      `More than one storage for empire ${storage.empireId} at star #${star.id}`,
      { starId: star.id, empireId: storage.empireId }
    );
    storageOwners.add(storage.empireId);
    invariant(
      storage.totalGoods >= 0 && storage.totalMinerals >= 0 && storage.totalEnergy >= 0,
      `Negative storage for empire ${storage.empireId} at star #${star.id}`,
      { starId: star.id, empireId: storage.empireId }
    );
  }

  for (const fleet of star.fleets) {
    const hasRoute = fleet.destinationStarId !== null || fleet.eta !== null;
    if (fleet.state === "MOVING") {
      invariant(
        fleet.destinationStarId !== null && fleet.eta !== null,
        `Moving fleet #${fleet.id} has no destination or ETA`,
        { starId: star.id, fleetId: fleet.id }
      );
    } else if (fleet.state === "IDLE") {
      invariant(!hasRoute, `Idle fleet #${fleet.id} still has a destination or ETA`, {
        starId: star.id,
        fleetId: fleet.id,
      });
    }
  }
}
