/**
 * Colony-side handlers: colonize, buildings, focus, build queue, native clean-up.
 */

import { addDuration } from "./utils.js";
import { asDuration, MINUTE_MS, type EmpireId } from "./core.js";
import type { HandlerContext, ModificationHandler } from "./handlerContext.js";
import { suspicious } from "./handlerContext.js";
import type { AddBuildRequest, AdjustFocus, CreateBuilding } from "./modification.js";
import type { Colony, ColonyFocus, EmpireStorage } from "./star.js";
import { findColony, findStorageIndex, isSameEmpire, type ColonySite } from "./starHelpers.js";

export const NEW_COLONY_POPULATION = 100;
export const NEW_COLONY_COOLDOWN = asDuration(15 * MINUTE_MS);

export const DEFAULT_COLONY_FOCUS: Readonly<ColonyFocus> = {
  construction: 0.1,
  energy: 0.3,
  farming: 0.3,
  mining: 0.3,
};

/** Storage an empire starts with at a star it has just colonized. */
export function newEmpireStorage(empireId: EmpireId): EmpireStorage {
  return {
    empireId,
    totalGoods: 100,
    totalMinerals: 100,
    totalEnergy: 1000,
    maxGoods: 1000,
    maxMinerals: 1000,
    maxEnergy: 1000,
  };
}

/**
 * Consume one colony ship of the empire. Returns false when the empire has none
 * here: the client may have raced a battle or another order, so this is not suspicious.
 */
function consumeColonyShip(ctx: HandlerContext, empireId: number): boolean {
  const { fleets } = ctx.star;
  const index = fleets.findIndex(
    (fleet) => fleet.designType === "COLONY_SHIP" && fleet.empireId === empireId
  );
  const fleet = fleets[index];
  if (!fleet) return false;

  if (Math.ceil(fleet.numShips) <= 1) {
    fleets.splice(index, 1);
  } else {
    fleets[index] = { ...fleet, numShips: fleet.numShips - 1 };
  }
  return true;
}

/** Benign failure: the modification is skipped and the batch goes on. */
function logSkip(ctx: HandlerContext, message: string): void {
  ctx.logSink.log(`  ${message}`);
}

export const applyColonize: ModificationHandler<"COLONIZE"> = (ctx, modification) => {
  const { star, logSink } = ctx;
  logSink.log(`- colonizing planet #${modification.planetIndex}`);

  const planet = star.planets[modification.planetIndex];
  if (!planet) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to colonize planet that does not exist. planetIndex=${modification.planetIndex}`
    );
  }
  if (planet.colony !== null) {
    logSkip(ctx, `planet already colonized (colonyId=${planet.colony.id}), cannot colonize.`);
    return;
  }

  // Natives colonize without a colony ship.
  if (modification.empireId !== null && !consumeColonyShip(ctx, modification.empireId)) {
    logSkip(ctx, "no colonyship, cannot colonize.");
    return;
  }

  const now = ctx.clock.now();
  const colony: Colony = {
    id: ctx.ids.nextIdentifier(),
    empireId: modification.empireId,
    population: NEW_COLONY_POPULATION,
    focus: { ...DEFAULT_COLONY_FOCUS },
    cooldownEndTime: addDuration(now, NEW_COLONY_COOLDOWN),
    defenceBonus: 1,
    buildings: [],
    buildRequests: [],
  };
  planet.colony = colony;
  logSink.log(`  colonized: colonyId=${colony.id}`);

  if (findStorageIndex(star, modification.empireId) < 0) {
    star.empireStores.push(newEmpireStorage(modification.empireId));
  }
};

/** Resolve the colony a modification targets; it must exist and belong to the requester. */
function requireOwnColony(
  ctx: HandlerContext,
  modification: CreateBuilding | AdjustFocus | AddBuildRequest,
  action: string
): ColonySite {
  const site = findColony(ctx.star, modification.colonyId);
  if (!site) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to ${action} on colony that does not exist. colonyId=${modification.colonyId}`
    );
  }
  if (!isSameEmpire(site.colony.empireId, modification.empireId)) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to ${action} on colony of a different empire. colony.empireId=${site.colony.empireId}`
    );
  }
  return site;
}

export const applyCreateBuilding: ModificationHandler<"CREATE_BUILDING"> = (ctx, modification) => {
  const { colony } = requireOwnColony(ctx, modification, "create building");
  ctx.logSink.log(`- creating building, colonyId=${colony.id}`);
  colony.buildings.push({ designType: modification.designType, level: 1 });
};

// Focus is taken as given: weights are neither clamped nor normalized here.
export const applyAdjustFocus: ModificationHandler<"ADJUST_FOCUS"> = (ctx, modification) => {
  const { colony } = requireOwnColony(ctx, modification, "adjust focus");
  ctx.logSink.log("- adjusting focus.");
  colony.focus = { ...modification.focus };
};

export const applyAddBuildRequest: ModificationHandler<"ADD_BUILD_REQUEST"> = (ctx, modification) => {
  const { colony } = requireOwnColony(ctx, modification, "add build request");

  const design = ctx.designs.getDesign(modification.designType);
  if (design.kind === "SHIP" && !colony.buildings.some((b) => b.designType === "SHIPYARD")) {
    throw suspicious(ctx, modification, "Attempt to build ship with no shipyard present.");
  }

  ctx.logSink.log("- adding build request");
  colony.buildRequests.push({
    id: ctx.ids.nextIdentifier(),
    designType: modification.designType,
    count: modification.count,
    progress: 0,
    startTime: ctx.clock.now(),
  });
};

export const applyDeleteBuildRequest: ModificationHandler<"DELETE_BUILD_REQUEST"> = (
  ctx,
  modification
) => {
  const colony = ctx.star.planets
    .map((planet) => planet.colony)
    .find(
      (c): c is Colony =>
        c !== null && c.buildRequests.some((br) => br.id === modification.buildRequestId)
    );
  if (!colony) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to delete build request that does not exist. buildRequestId=${modification.buildRequestId}`
    );
  }
  if (!isSameEmpire(colony.empireId, modification.empireId)) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to delete build request for different empire. colony.empireId=${colony.empireId}`
    );
  }

  ctx.logSink.log("- deleting build request");
  colony.buildRequests = colony.buildRequests.filter((br) => br.id !== modification.buildRequestId);
};

export const applyEmptyNative: ModificationHandler<"EMPTY_NATIVE"> = (ctx) => {
  const { star } = ctx;
  ctx.logSink.log("- emptying native colonies");

  for (const planet of star.planets) {
    if (planet.colony !== null && planet.colony.empireId === null) {
      planet.colony = null;
    }
  }
  star.empireStores = star.empireStores.filter((storage) => storage.empireId !== null);
  star.fleets = star.fleets.filter((fleet) => fleet.empireId !== null);
};
