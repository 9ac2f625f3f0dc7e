import { describe, expect, it } from "vitest";
import { createDesignCatalog, DEFAULT_DESIGNS, DESIGN_TYPES } from "./designs.js";
import { NotFoundError } from "./errors.js";

describe("createDesignCatalog()", () => {
  it("knows every design type by default", () => {
    const catalog = createDesignCatalog();
    for (const type of DESIGN_TYPES) {
      expect(catalog.getDesign(type).type).toBe(type);
    }
  });

  it("tells ships from buildings", () => {
    const catalog = createDesignCatalog();
    expect(catalog.getDesign("COLONY_SHIP").kind).toBe("SHIP");
    expect(catalog.getDesign("SHIPYARD").kind).toBe("BUILDING");
  });

  it("lets later designs replace earlier ones", () => {
    const catalog = createDesignCatalog([
      ...DEFAULT_DESIGNS,
      { type: "SCOUT", kind: "SHIP", displayName: "Fast scout", speedPxPerHour: 999, fuelCostPerPx: 0 },
    ]);
    expect(catalog.getDesign("SCOUT").speedPxPerHour).toBe(999);
  });

  it("throws for a design it does not have", () => {
    const catalog = createDesignCatalog([]);
    expect(() => catalog.getDesign("SCOUT")).toThrow(NotFoundError);
  });
});
