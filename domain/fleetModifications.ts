/**
 * Fleet-side handlers: create, split, merge, move.
 */

import { addDuration } from "./utils.js";
import { asDuration, HOUR_MS } from "./core.js";
import type { HandlerContext, ModificationHandler } from "./handlerContext.js";
import { suspicious } from "./handlerContext.js";
import type { Fleet, FleetState } from "./star.js";
import {
  distanceBetween,
  findFleetIndex,
  findStar,
  findStorageIndex,
  isFriendly,
  isSameEmpire,
} from "./starHelpers.js";
import { assert } from "./validation.js";

function logSkip(ctx: HandlerContext, message: string): void {
  ctx.logSink.log(`  ${message}`);
}

export const applyCreateFleet: ModificationHandler<"CREATE_FLEET"> = (ctx, modification) => {
  const { star } = ctx;
  const template = modification.fleet;
  const base = template ?? {
    empireId: modification.empireId,
    designType: modification.designType,
    numShips: modification.count,
    stance: "AGGRESSIVE" as const,
  };
  if (ctx.designs.getDesign(base.designType).kind !== "SHIP") {
    throw suspicious(
      ctx,
      modification,
      `Attempt to create fleet of a design that is not a ship. designType=${base.designType}`
    );
  }
  const now = ctx.clock.now();

  let attack = false;
  if (!template || template.stance === "AGGRESSIVE") {
    attack = star.fleets.some((fleet) => !isFriendly(fleet, modification.empireId));
  }

  // Aggressive fleets of other empires engage the newcomer.
  let numAttacking = 0;
  star.fleets = star.fleets.map((fleet): Fleet => {
    if (isFriendly(fleet, modification.empireId) || fleet.stance !== "AGGRESSIVE") return fleet;
    numAttacking++;
    return { ...fleet, state: "ATTACKING", stateStartTime: now };
  });

  ctx.logSink.log(
    `- creating fleet (${attack ? "attacking" : "not attacking"}) numAttacking=${numAttacking}`
  );
  const state: FleetState = attack ? "ATTACKING" : "IDLE";
  star.fleets.push({
    id: ctx.ids.nextIdentifier(),
    empireId: base.empireId,
    designType: base.designType,
    numShips: base.numShips,
    stance: base.stance,
    state,
    stateStartTime: now,
    destinationStarId: null,
    eta: null,
  });
};

export const applySplitFleet: ModificationHandler<"SPLIT_FLEET"> = (ctx, modification) => {
  const { star } = ctx;
  const index = findFleetIndex(star, modification.fleetId);
  const fleet = star.fleets[index];
  if (!fleet) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to split fleet that does not exist. fleetId=${modification.fleetId}`
    );
  }
  if (!isSameEmpire(fleet.empireId, modification.empireId)) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to split fleet of different empire. fleet.empireId=${fleet.empireId}`
    );
  }
  // Both halves must keep at least part of a ship.
  if (modification.count <= 0 || modification.count >= fleet.numShips) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to split ${modification.count} ships off a fleet of ${fleet.numShips}. fleetId=${fleet.id}`
    );
  }

  ctx.logSink.log("- splitting fleet");
  const remaining: Fleet = { ...fleet, numShips: fleet.numShips - modification.count };
  star.fleets[index] = remaining;
  star.fleets.push({ ...remaining, id: ctx.ids.nextIdentifier(), numShips: modification.count });
};

export const applyMergeFleet: ModificationHandler<"MERGE_FLEET"> = (ctx, modification) => {
  const { star, logSink } = ctx;
  const primary = star.fleets[findFleetIndex(star, modification.fleetId)];
  if (!primary) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to merge fleet that does not exist. fleetId=${modification.fleetId}`
    );
  }
  if (primary.state !== "IDLE") {
    // Logged only; the merge still goes ahead.
    logSkip(ctx, `main fleet ${primary.id} is ${primary.state}, cannot merge.`);
  }
  if (!isSameEmpire(primary.empireId, modification.empireId)) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to merge fleet owned by a different empire. fleet.empireId=${primary.empireId}`
    );
  }

  const additional = new Set(modification.additionalFleetIds);
  let numShips = primary.numShips;
  for (let i = 0; i < star.fleets.length; i++) {
    const other = star.fleets[i];
    if (!other || other.id === primary.id || !additional.has(other.id)) continue;

    if (other.designType !== primary.designType) {
      throw suspicious(
        ctx,
        modification,
        `Fleet #${other.id} not the same designType as #${primary.id} (${other.designType} vs. ${primary.designType})`
      );
    }
    if (!isSameEmpire(other.empireId, modification.empireId)) {
      throw suspicious(
        ctx,
        modification,
        `Attempt to merge fleet owned by a different empire. fleet.empireId=${other.empireId}`
      );
    }
    if (other.state !== "IDLE") {
      logSkip(ctx, `fleet ${other.id} is ${other.state}, cannot merge.`);
      continue;
    }

    numShips += other.numShips;
    logSink.log(`  removing fleet ${other.id} (numShips=${other.numShips.toFixed(2)})`);
    star.fleets.splice(i, 1);
    i--;
  }

  // Removals above shift indices; locate the primary again.
  logSink.log(`  updated fleet count of main fleet: ${numShips.toFixed(2)}`);
  const index = findFleetIndex(star, primary.id);
  assert(index >= 0, `Main fleet #${primary.id} vanished while merging`);
  star.fleets[index] = { ...primary, numShips };
};

export const applyMoveFleet: ModificationHandler<"MOVE_FLEET"> = (ctx, modification) => {
  const { star, logSink } = ctx;
  logSink.log("- moving fleet");

  const target = findStar(ctx.auxStars, modification.starId);
  if (!target) {
    // The caller forgot to load the destination; not the player's doing.
    logSkip(ctx, `target star #${modification.starId} was not included in the auxiliary star list.`);
    return;
  }

  const fleetIndex = findFleetIndex(star, modification.fleetId);
  const fleet = star.fleets[fleetIndex];
  if (!fleet) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to move fleet that does not exist. fleetId=${modification.fleetId}`
    );
  }
  if (fleet.empireId !== modification.empireId) {
    throw suspicious(
      ctx,
      modification,
      `Attempt to move fleet owned by a different empire. fleet.empireId=${fleet.empireId}`
    );
  }
  if (fleet.state !== "IDLE") {
    logSkip(ctx, "fleet is not idle, can't move.");
    return;
  }

  const design = ctx.designs.getDesign(fleet.designType);
  const distance = distanceBetween(star, target);
  const timeInHours = distance / design.speedPxPerHour;
  const fuel = design.fuelCostPerPx * distance * fleet.numShips;

  const storageIndex = findStorageIndex(star, fleet.empireId);
  const storage = star.empireStores[storageIndex];
  if (!storage) {
    logSkip(ctx, "no storages on this star.");
    return;
  }
  if (storage.totalEnergy < fuel) {
    logSkip(
      ctx,
      `not enough energy for move (${storage.totalEnergy.toFixed(2)} < ${fuel.toFixed(2)})`
    );
    return;
  }

  logSink.log(`  cost=${fuel.toFixed(2)}`);
  const now = ctx.clock.now();
  star.empireStores[storageIndex] = { ...storage, totalEnergy: storage.totalEnergy - fuel };
  star.fleets[fleetIndex] = {
    ...fleet,
    destinationStarId: target.id,
    state: "MOVING",
    stateStartTime: now,
    eta: addDuration(now, asDuration(Math.trunc(timeInHours * HOUR_MS))),
  };
};
