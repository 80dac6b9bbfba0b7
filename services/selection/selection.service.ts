/**
 * Selection Service: Table of contents
 *
 * Orchestrates the selection pipeline: plan → catalog → pool → dispersion → repair.
 * Returns the final SelectionResult. Everything after the catalog stage is synchronous.
 */

import type { CityCatalog } from "../catalog/city-catalog.js";
import { isWarning, teeSinks } from "./notices.js";
import { buildSelectionPlan, type SelectionDefaults } from "./selection.plan.js";
import type { NoticeSink, RawCityRow, SelectionInput, SelectionPlan, SelectionResult, SelectionWarning } from "./types.js";

// ─── Stages (table of contents) ─────────────────────────────────────────────

import { catalog } from "./stages/catalog.stage.js";
import { buildCandidatePool } from "./stages/pool.stage.js";
import { selectDispersed } from "./stages/dispersion.stage.js";
import { repairSelection } from "./stages/repair.stage.js";

// ─── Public API ─────────────────────────────────────────────────────────────

export interface SelectionDeps {
  catalog: CityCatalog;
  /** Receives every notice (e.g. a pino-backed sink from createLoggerSink). */
  sink?: NoticeSink;
  defaults?: SelectionDefaults;
}

/**
 * Run the pool → dispersion → repair stages over rows that are already loaded.
 * Throws CatalogSchemaError when the rows lack coordinate or population fields.
 */
export function runSelection(rows: readonly RawCityRow[], plan: SelectionPlan, sink?: NoticeSink): SelectionResult {
  const warnings: SelectionWarning[] = [];
  const collect: NoticeSink = (notice) => {
    if (isWarning(notice)) warnings.push(notice);
  };
  const notify = sink ? teeSinks(collect, sink) : collect;

  // 1. Pool: schema check, coordinate validation, pool order
  const { pool } = buildCandidatePool(rows, notify);

  // 2. Dispersion: greedy farthest-point selection
  const { selection } = selectDispersed(pool, plan.nCities, notify);

  // 3. Repair: enforce the separation floor by swapping members
  const repair = repairSelection(
    selection,
    pool,
    { minDistanceKm: plan.minDistanceKm, maxIterations: plan.maxRepairIterations },
    notify
  );

  return {
    cities: selection.toArray(),
    requested: plan.nCities,
    poolSize: pool.length,
    warnings,
    repair,
  };
}

/**
 * Run the full selection pipeline and return a result.
 */
export async function selectCities(input: SelectionInput, deps: SelectionDeps): Promise<SelectionResult> {
  // 1. Build plan (validates input, fills defaults)
  const plan = buildSelectionPlan(input, deps.defaults);

  // 2. Catalog: rows at or above the population floor
  const rows = await catalog(plan, deps.catalog);

  // 3-5. Pool, dispersion, repair
  return runSelection(rows, plan, deps.sink);
}
