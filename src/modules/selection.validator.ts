import { z } from "zod";

/** Max rows accepted inline on POST /selection. */
const INLINE_CITIES_MAX = 10_000;

/**
 * Selection options. All optional; missing values fall back to configured defaults in the plan.
 * Query strings arrive as text, so numbers are coerced; an empty value fails rather than becoming 0.
 */
const blankToNaN = (value: unknown) => (typeof value === "string" && value.trim() === "" ? Number.NaN : value);

const selectionOptions = {
  nCities: z.preprocess(blankToNaN, z.coerce.number().int().positive()).optional(),
  minDistanceKm: z.preprocess(blankToNaN, z.coerce.number().positive().finite()).optional(),
  populationMin: z.preprocess(blankToNaN, z.coerce.number().int().min(0)).optional(),
  maxRepairIterations: z.preprocess(blankToNaN, z.coerce.number().int().positive()).optional(),
};

export const SelectionQuerySchema = z.object(selectionOptions).strict();

export const SelectionBodySchema = z
  .object({
    ...selectionOptions,
    cities: z.array(z.record(z.string(), z.unknown())).max(INLINE_CITIES_MAX),
  })
  .strict();

export type SelectionQuery = z.infer<typeof SelectionQuerySchema>;
export type SelectionBody = z.infer<typeof SelectionBodySchema>;

/** "path: message; path: message" for a failed parse. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.length ? e.path.join(".") : "value";
      return `${path}: ${e.message}`;
    })
    .join("; ");
}
