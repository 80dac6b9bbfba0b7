import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { haversineKm } from "../services/selection/geo/distance.js";
import { selectDispersed } from "../services/selection/stages/dispersion.stage.js";
import { buildCandidatePool } from "../services/selection/stages/pool.stage.js";
import type { RawCityRow } from "../services/selection/types.js";
import { A, B, C, record, recordingSink } from "./fixtures.js";

const sampleRows: RawCityRow[] = JSON.parse(
  readFileSync(new URL("../data/sample-cities.json", import.meta.url), "utf8")
);

describe("selectDispersed", () => {
  it("seeds with the most populous city, then takes the farthest", () => {
    const { sink } = recordingSink();
    const { selection, picks } = selectDispersed([A, B, C], 2, sink);
    expect(selection.ids()).toEqual(["A", "C"]);
    expect(picks[0]).toEqual({ id: "A", isolationKm: Infinity });
    expect(picks[1].id).toBe("C");
    expect(picks[1].isolationKm).toBeCloseTo(1111.9493, 3);
  });

  it("maximises the distance to every pick, not just the latest", () => {
    // After A and C, B is 111 km from A; D sits ~556 km from both.
    const D = record("D", 0, 5, 1);
    const { sink } = recordingSink();
    const { selection } = selectDispersed([A, B, C, D], 3, sink);
    expect(selection.ids()).toEqual(["A", "C", "D"]);
  });

  it("breaks isolation ties by pool order", () => {
    const seed = record("S", 0, 0, 100);
    const x = record("x", 0, 10, 5);
    const y = record("y", 0, -10, 5);
    const { sink } = recordingSink();
    expect(selectDispersed([seed, x, y], 2, sink).selection.ids()).toEqual(["S", "x"]);

    const heavierY = record("y", 0, -10, 6);
    expect(selectDispersed([seed, heavierY, x], 2, sink).selection.ids()).toEqual(["S", "y"]);
  });

  it("shrinks the target and warns when the pool is too small", () => {
    const { notices, sink } = recordingSink();
    const { selection } = selectDispersed([A, B], 5, sink);
    expect(selection.ids()).toEqual(["A", "B"]);
    expect(notices).toEqual([{ kind: "insufficient-candidates", level: "warn", requested: 5, available: 2 }]);
  });

  it("returns an empty selection for an empty pool", () => {
    const { notices, sink } = recordingSink();
    const { selection, picks } = selectDispersed([], 3, sink);
    expect(selection.size).toBe(0);
    expect(picks).toEqual([]);
    expect(notices).toHaveLength(1);
  });

  it("picks the best isolation score each round (brute-force check)", () => {
    const { pool } = buildCandidatePool(sampleRows);
    const { sink } = recordingSink();
    const { picks } = selectDispersed(pool, 12, sink);

    for (let round = 1; round < picks.length; round++) {
      const chosen = pool.filter((c) => picks.slice(0, round).some((p) => p.id === c.id));
      const scores = pool
        .filter((c) => !chosen.includes(c))
        .map((c) => Math.min(...chosen.map((s) => haversineKm(c, s))));
      expect(picks[round].isolationKm).toBeCloseTo(Math.max(...scores), 9);
    }
  });
});
