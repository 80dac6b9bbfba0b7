import type { CityCatalog } from "../../catalog/city-catalog.js";
import type { RawCityRow, SelectionPlan } from "../types.js";

/** Catalog stage: resolve plan → raw city rows at or above the population floor. */
export async function catalog(plan: SelectionPlan, source: CityCatalog): Promise<RawCityRow[]> {
  return source.load(plan.populationMin);
}
