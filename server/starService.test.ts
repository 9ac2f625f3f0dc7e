import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Identifier } from "../domain/core.js";
import {
  ConcurrencyError,
  InvariantViolation,
  NotFoundError,
  SuspiciousModificationError,
  ValidationError,
} from "../domain/errors.js";
import type { Star } from "../domain/star.js";
import { InMemoryStarStore } from "../domain/starStore.js";
import { EMPIRE, makeFleet, makeModifier, makeStar, makeStorage } from "../domain/testFixtures.js";
import { StarModificationService } from "./starService.js";

function fakeLogger() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe("StarModificationService", () => {
  let store: InMemoryStarStore;
  let logger: ReturnType<typeof fakeLogger>;
  let service: StarModificationService;

  beforeEach(async () => {
    store = new InMemoryStarStore();
    logger = fakeLogger();
    service = new StarModificationService({
      store,
      modifier: makeModifier(),
      logger,
      verifyInvariants: true,
    });
    await store.save(
      makeStar({ fleets: [makeFleet(1, { numShips: 2 })], empireStores: [makeStorage(EMPIRE)] }),
      0
    );
  });

  it("commits a successful batch and bumps the version", async () => {
    const result = await service.modify({
      starId: 1,
      modifications: [{ type: "SPLIT_FLEET", empireId: EMPIRE, fleetId: 1, count: 1 }],
    });

    expect(result.version).toBe(2);
    expect(result.log[0]).toBe("Applying 1 modifications.");
    const stored = await store.load(1);
    expect(stored?.version).toBe(2);
    expect(stored?.star.fleets.map((f) => [f.id, f.numShips])).toEqual([
      [1, 1],
      [100, 1],
    ]);
    expect(logger.info).toHaveBeenCalledWith("Applied 1 modifications to star #1 (version 2)");
    expect(logger.debug).toHaveBeenCalledWith("[Sol] Applying 1 modifications.");
  });

  it("leaves the stored star untouched when a batch is rejected", async () => {
    await expect(
      service.modify({
        starId: 1,
        modifications: [
          { type: "SPLIT_FLEET", empireId: EMPIRE, fleetId: 1, count: 1 },
          { type: "SPLIT_FLEET", empireId: EMPIRE, fleetId: 42, count: 1 },
        ],
      })
    ).rejects.toBeInstanceOf(SuspiciousModificationError);

    const stored = await store.load(1);
    expect(stored?.version).toBe(1);
    expect(stored?.star.fleets).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Rejected batch for star #1: Attempt to split fleet that does not exist. fleetId=42",
      { modification: { type: "SPLIT_FLEET", empireId: EMPIRE, fleetId: 42, count: 1 } }
    );
  });

  it("throws NotFoundError for an unknown star", async () => {
    await expect(service.modify({ starId: 99, modifications: [] })).rejects.toThrow(NotFoundError);
    await expect(service.modify({ starId: 99, modifications: [] })).rejects.toThrow("Star #99 not found");
  });

  it("loads move destinations from the store", async () => {
    await store.save(makeStar({ id: 2, name: "Vega", offsetX: 300, offsetY: 400 }), 0);

    const result = await service.modify({
      starId: 1,
      modifications: [{ type: "MOVE_FLEET", empireId: EMPIRE, fleetId: 1, starId: 2 }],
    });

    const fleet = result.star.fleets[0];
    expect(fleet?.state).toBe("MOVING");
    expect(fleet?.destinationStarId).toBe(2);
    expect(result.star.empireStores[0]?.totalEnergy).toBe(400);
    expect(result.log).toContain("  cost=100.00");
  });

  it("skips a move whose destination does not exist", async () => {
    const result = await service.modify({
      starId: 1,
      modifications: [{ type: "MOVE_FLEET", empireId: EMPIRE, fleetId: 1, starId: 3 }],
    });

    expect(result.version).toBe(2);
    expect(result.star.fleets[0]?.state).toBe("IDLE");
    expect(result.log).toContain("  target star #3 was not included in the auxiliary star list.");
  });

  it("runs concurrent batches for one star one after another", async () => {
    const split = { type: "SPLIT_FLEET", empireId: EMPIRE, fleetId: 1, count: 0.5 } as const;
    const [first, second] = await Promise.all([
      service.modify({ starId: 1, modifications: [split] }),
      service.modify({ starId: 1, modifications: [split] }),
    ]);

    expect([first.version, second.version]).toEqual([2, 3]);
    expect(second.star.fleets.map((f) => f.numShips)).toEqual([1, 0.5, 0.5]);
  });

  it("rejects wire input before touching the star", async () => {
    await expect(service.modifyFromWire(1, [{ type: "SPLIT_FLEET", fleetId: 1 }])).rejects.toThrow(
      ValidationError
    );
    expect((await store.load(1))?.version).toBe(1);
  });

  it("applies parsed wire input", async () => {
    const result = await service.modifyFromWire(1, [{ type: "EMPTY_NATIVE" }]);
    expect(result.log).toEqual(["Applying 1 modifications.", "- emptying native colonies"]);
  });

  it("skips unknown wire types and applies the rest", async () => {
    const result = await service.modifyFromWire(1, [{ type: "TERRAFORM" }, { type: "EMPTY_NATIVE" }]);

    expect(result.version).toBe(2);
    expect(result.log).toEqual(["Applying 1 modifications.", "- emptying native colonies"]);
    expect(logger.error).toHaveBeenCalledWith("Unknown or unexpected modification type: TERRAFORM", {
      starId: 1,
      index: 0,
    });
  });

  it("surfaces a write that raced it", async () => {
    class RacingStore extends InMemoryStarStore {
      async loadMany(starIds: readonly Identifier[]): Promise<Star[]> {
        const current = await this.load(1);
        if (current) await this.save(current.star, current.version);
        return super.loadMany(starIds);
      }
    }
    const racing = new RacingStore();
    await racing.save(makeStar(), 0);
    const racingService = new StarModificationService({
      store: racing,
      modifier: makeModifier(),
      logger,
      verifyInvariants: true,
    });

    await expect(
      racingService.modify({ starId: 1, modifications: [{ type: "EMPTY_NATIVE" }] })
    ).rejects.toBeInstanceOf(ConcurrencyError);
  });

  it("refuses to save a star that breaks an invariant", async () => {
    await store.save(makeStar({ id: 5, fleets: [makeFleet(1, { destinationStarId: 3 })] }), 0);

    await expect(
      service.modify({ starId: 5, modifications: [{ type: "EMPTY_NATIVE" }] })
    ).rejects.toBeInstanceOf(InvariantViolation);
    expect((await store.load(5))?.version).toBe(1);
  });

  it("skips the invariant check when disabled", async () => {
    await store.save(makeStar({ id: 5, fleets: [makeFleet(1, { destinationStarId: 3 })] }), 0);
    const lenient = new StarModificationService({
      store,
      modifier: makeModifier(),
      logger,
      verifyInvariants: false,
    });

    const result = await lenient.modify({ starId: 5, modifications: [{ type: "EMPTY_NATIVE" }] });
    expect(result.version).toBe(2);
  });
});
