/**
 * City catalogs: where candidate rows come from.
 *
 * A catalog only loads rows and applies the population floor. Coordinate and schema validation
 * happen later in the pool stage, so every catalog hands back rows untouched.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { toFiniteNumber } from "../selection/stages/pool.stage.js";
import type { RawCityRow } from "../selection/types.js";

export interface CityCatalog {
  /** Rows whose population is at least `populationMin`. */
  load(populationMin: number): Promise<RawCityRow[]>;
}

const CatalogFileSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Population floor over raw rows. A row without a numeric population only passes a zero floor.
 */
export function filterByPopulation(rows: readonly RawCityRow[], populationMin: number): RawCityRow[] {
  if (populationMin <= 0) return [...rows];
  return rows.filter((row) => {
    const population = toFiniteNumber(row.population);
    return population !== null && population >= populationMin;
  });
}

export class InMemoryCityCatalog implements CityCatalog {
  constructor(private readonly rows: readonly RawCityRow[]) {}

  async load(populationMin: number): Promise<RawCityRow[]> {
    return filterByPopulation(this.rows, populationMin);
  }
}

/** Reads a JSON array of row objects. The file is re-read on every load. */
export class JsonFileCityCatalog implements CityCatalog {
  constructor(private readonly path: string) {}

  async load(populationMin: number): Promise<RawCityRow[]> {
    const text = await readFile(this.path, "utf8");
    const parsed = CatalogFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`City catalog ${this.path} must be a JSON array of objects: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return filterByPopulation(parsed.data, populationMin);
  }
}

/**
 * Reads a CSV file with a header row (`city,lat,lng,population`, optionally `id`).
 * Cells stay text for the pool stage to coerce; an empty cell becomes null.
 */
export class CsvFileCityCatalog implements CityCatalog {
  constructor(private readonly path: string) {}

  async load(populationMin: number): Promise<RawCityRow[]> {
    const text = await readFile(this.path, "utf8");
    const records: unknown = parse(text, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true,
      cast: (value: string) => (value === "" ? null : value),
    });
    const parsed = CatalogFileSchema.safeParse(records);
    if (!parsed.success) {
      throw new Error(`City catalog ${this.path} must be a CSV file with a header row: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return filterByPopulation(parsed.data, populationMin);
  }
}

/** File catalog by extension: `.csv` is read as CSV, anything else as JSON. */
export function fileCityCatalog(path: string): CityCatalog {
  return extname(path).toLowerCase() === ".csv" ? new CsvFileCityCatalog(path) : new JsonFileCityCatalog(path);
}
