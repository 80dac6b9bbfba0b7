import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { InMemoryCityCatalog } from "../services/catalog/city-catalog.js";
import { buildSelectionPlan } from "../services/selection/selection.plan.js";
import { runSelection, selectCities } from "../services/selection/selection.service.js";
import { CatalogSchemaError } from "../services/selection/stages/pool.stage.js";
import type { RawCityRow } from "../services/selection/types.js";
import { A, B, C, FAR, ISOLATED, K1, K2, K3, K4, equatorRing, recordingSink, toRow } from "./fixtures.js";

const sampleRows: RawCityRow[] = JSON.parse(
  readFileSync(new URL("../data/sample-cities.json", import.meta.url), "utf8")
);

describe("selectCities", () => {
  it("seeds with the most populous city and adds the farthest one", async () => {
    const catalog = new InMemoryCityCatalog([A, B, C].map(toRow));
    const result = await selectCities({ nCities: 2, minDistanceKm: 500 }, { catalog });

    expect(result.cities.map((c) => c.id)).toEqual(["A", "C"]);
    expect(result.repair.status).toBe("converged");
    expect(result.warnings).toEqual([]);
  });

  it("keeps at most one member of a tight cluster", async () => {
    const cluster = [K1, K2, K3, K4];
    const catalog = new InMemoryCityCatalog([...cluster, ISOLATED, FAR].map(toRow));
    const result = await selectCities({ nCities: 3, minDistanceKm: 500 }, { catalog });

    const ids = result.cities.map((c) => c.id);
    expect(ids.filter((id) => cluster.some((k) => k.id === id))).toHaveLength(1);
    expect(ids).toContain("I");
    expect(result.repair.status).toBe("converged");
  });

  it("returns every candidate with a warning when fewer are available than requested", async () => {
    const { notices, sink } = recordingSink();
    const catalog = new InMemoryCityCatalog(equatorRing());
    const result = await selectCities({ nCities: 50, minDistanceKm: 500 }, { catalog, sink });

    expect(result.cities).toHaveLength(10);
    expect(new Set(result.cities.map((c) => c.id)).size).toBe(10);
    expect(result.warnings).toEqual([{ kind: "insufficient-candidates", level: "warn", requested: 50, available: 10 }]);
    expect(notices[0]).toEqual(result.warnings[0]);
  });

  it("fails before any selection work when coordinates are absent", async () => {
    const { notices, sink } = recordingSink();
    const catalog = new InMemoryCityCatalog([
      { id: "a", city: "A", population: 10 },
      { id: "b", city: "B", population: 20 },
    ]);

    await expect(selectCities({ nCities: 2 }, { catalog, sink })).rejects.toBeInstanceOf(CatalogSchemaError);
    expect(notices).toEqual([]);
  });

  it("applies the population floor through the catalog", async () => {
    const catalog = new InMemoryCityCatalog([A, B, C].map(toRow));
    const result = await selectCities({ nCities: 2, populationMin: 50 }, { catalog });

    expect(result.cities.map((c) => c.id)).toEqual(["A", "B"]);
    expect(result.poolSize).toBe(2);
  });

  it("surfaces an unresolved violation as a warning", async () => {
    const catalog = new InMemoryCityCatalog([K1, K2, K3].map(toRow));
    const result = await selectCities({ nCities: 2, minDistanceKm: 500 }, { catalog });

    expect(result.repair.status).toBe("stalled");
    expect(result.cities).toHaveLength(2);
    expect(result.warnings.map((w) => w.kind)).toEqual(["unresolved-violation"]);
  });
});

describe("runSelection", () => {
  it.each([1, 5, 10, 26, 40])("returns min(n, valid candidates) distinct pool members for n=%i", (n) => {
    const plan = buildSelectionPlan({ nCities: n, minDistanceKm: 500 });
    const result = runSelection(sampleRows, plan);

    const validIds = new Set(sampleRows.filter((r) => r.lat !== null).map((r) => String(r.id)));
    const ids = result.cities.map((c) => c.id);
    expect(ids).toHaveLength(Math.min(n, 26));
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids.every((id) => validIds.has(id))).toBe(true);
  });
});
