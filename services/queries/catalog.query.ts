/**
 * Catalog query: fetch city rows from the database.
 *
 * Applies the population floor in SQL and returns rows with the catalog column names
 * (id, city, lat, lng, population). Every row at the floor is returned; the pool is the whole
 * qualifying catalog. Rows with NULL coordinates are left in; the pool stage drops them.
 *
 * Index for the floor: CREATE INDEX idx_cities_population ON cities (population);
 */

import type { Kysely } from "kysely";
import type { Database } from "../../src/config/db.js";
import type { CityCatalog } from "../catalog/city-catalog.js";
import type { RawCityRow } from "../selection/types.js";

// ─── Public API ─────────────────────────────────────────────────────────────

export class PostgresCityCatalog implements CityCatalog {
  constructor(private readonly db: Kysely<Database>) {}

  async load(populationMin: number): Promise<RawCityRow[]> {
    let q = this.db.selectFrom("cities").select(["id", "city", "lat", "lng", "population"]).orderBy("id");

    if (populationMin > 0) {
      q = q.where("population", ">=", populationMin);
    }

    const rows = await q.execute();
    return rows.map((r) => ({ ...r }));
  }
}
