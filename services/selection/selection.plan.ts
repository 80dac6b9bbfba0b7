import type { SelectionInput, SelectionPlan } from "./types.js";

// ─── Domain validation errors ───────────────────────────────────────────────

export const SelectionPlanErrorCode = {
  INVALID_N_CITIES: "INVALID_N_CITIES",
  INVALID_MIN_DISTANCE: "INVALID_MIN_DISTANCE",
  INVALID_POPULATION_MIN: "INVALID_POPULATION_MIN",
  INVALID_MAX_ITERATIONS: "INVALID_MAX_ITERATIONS",
} as const;

export type SelectionPlanErrorCode =
  (typeof SelectionPlanErrorCode)[keyof typeof SelectionPlanErrorCode];

export class SelectionPlanValidationError extends Error {
  readonly code: SelectionPlanErrorCode;

  constructor(code: SelectionPlanErrorCode, message: string) {
    super(message);
    this.name = "SelectionPlanValidationError";
    this.code = code;
    Object.setPrototypeOf(this, SelectionPlanValidationError.prototype);
  }
}

// ─── Defaults ───────────────────────────────────────────────────────────────

export interface SelectionDefaults {
  nCities: number;
  minDistanceKm: number;
  populationMin: number;
  maxRepairIterations: number;
}

export const SELECTION_DEFAULTS: Readonly<SelectionDefaults> = Object.freeze({
  nCities: 200,
  minDistanceKm: 500,
  populationMin: 0,
  maxRepairIterations: 1_000,
});

// ─── Helpers ───────────────────────────────────────────────────────────────

function positiveInteger(value: number | undefined, fallback: number, code: SelectionPlanErrorCode, field: string): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new SelectionPlanValidationError(code, `${field} must be a positive integer`);
  }
  return value;
}

/** Separation floor: finite and strictly positive. */
function parseMinDistance(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new SelectionPlanValidationError(
      SelectionPlanErrorCode.INVALID_MIN_DISTANCE,
      "minDistanceKm must be a positive number"
    );
  }
  return value;
}

function parsePopulationMin(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 0) {
    throw new SelectionPlanValidationError(
      SelectionPlanErrorCode.INVALID_POPULATION_MIN,
      "populationMin must be a non-negative integer"
    );
  }
  return value;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Build an immutable SelectionPlan from SelectionInput, filling gaps from `defaults`. */
export function buildSelectionPlan(
  input: SelectionInput,
  defaults: SelectionDefaults = SELECTION_DEFAULTS
): SelectionPlan {
  const plan: SelectionPlan = {
    input,
    nCities: positiveInteger(input.nCities, defaults.nCities, SelectionPlanErrorCode.INVALID_N_CITIES, "nCities"),
    minDistanceKm: parseMinDistance(input.minDistanceKm, defaults.minDistanceKm),
    populationMin: parsePopulationMin(input.populationMin, defaults.populationMin),
    maxRepairIterations: positiveInteger(
      input.maxRepairIterations,
      defaults.maxRepairIterations,
      SelectionPlanErrorCode.INVALID_MAX_ITERATIONS,
      "maxRepairIterations"
    ),
  };

  return Object.freeze(plan);
}
