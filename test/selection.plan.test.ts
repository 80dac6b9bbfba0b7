import { describe, it, expect } from "vitest";
import {
  buildSelectionPlan,
  SELECTION_DEFAULTS,
  SelectionPlanErrorCode,
  SelectionPlanValidationError,
} from "../services/selection/selection.plan.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof SelectionPlanValidationError) return err.code;
    throw err;
  }
  return undefined;
}

describe("buildSelectionPlan", () => {
  it("fills every option from the defaults", () => {
    const plan = buildSelectionPlan({});
    expect(plan).toEqual({
      input: {},
      nCities: 200,
      minDistanceKm: 500,
      populationMin: 0,
      maxRepairIterations: 1000,
    });
    expect(Object.isFrozen(plan)).toBe(true);
  });

  it("prefers explicit values and custom defaults", () => {
    const plan = buildSelectionPlan({ minDistanceKm: 250.5 }, { ...SELECTION_DEFAULTS, nCities: 12 });
    expect(plan.nCities).toBe(12);
    expect(plan.minDistanceKm).toBe(250.5);
  });

  it.each([0, -3, 2.5, Number.NaN])("rejects nCities=%s", (nCities) => {
    expect(codeOf(() => buildSelectionPlan({ nCities }))).toBe(SelectionPlanErrorCode.INVALID_N_CITIES);
  });

  it.each([0, -1, Number.POSITIVE_INFINITY])("rejects minDistanceKm=%s", (minDistanceKm) => {
    expect(codeOf(() => buildSelectionPlan({ minDistanceKm }))).toBe(SelectionPlanErrorCode.INVALID_MIN_DISTANCE);
  });

  it("rejects a negative population floor and a zero iteration budget", () => {
    expect(codeOf(() => buildSelectionPlan({ populationMin: -1 }))).toBe(SelectionPlanErrorCode.INVALID_POPULATION_MIN);
    expect(codeOf(() => buildSelectionPlan({ maxRepairIterations: 0 }))).toBe(SelectionPlanErrorCode.INVALID_MAX_ITERATIONS);
  });

  it.each([-1, 0.5, Number.NaN])("rejects populationMin=%s", (populationMin) => {
    expect(codeOf(() => buildSelectionPlan({ populationMin }))).toBe(SelectionPlanErrorCode.INVALID_POPULATION_MIN);
  });

  it("carries the message for the offending field", () => {
    expect(() => buildSelectionPlan({ nCities: 0 })).toThrow("nCities must be a positive integer");
  });
});
