import "dotenv/config";
import { z } from "zod";
import { SELECTION_DEFAULTS, type SelectionDefaults } from "../../services/selection/selection.plan.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  /** Postgres catalog; used when CITY_CATALOG_FILE is not set. */
  DATABASE_URL: optionalString,
  /** File catalog: `.csv` with a header row, otherwise a JSON array of { id, city, lat, lng, population }. */
  CITY_CATALOG_FILE: optionalString,

  DEFAULT_N_CITIES: z.coerce.number().int().positive().default(SELECTION_DEFAULTS.nCities),
  DEFAULT_MIN_DISTANCE_KM: z.coerce.number().positive().default(SELECTION_DEFAULTS.minDistanceKm),
  DEFAULT_POPULATION_MIN: z.coerce.number().int().min(0).default(SELECTION_DEFAULTS.populationMin),
  MAX_REPAIR_ITERATIONS: z.coerce.number().int().positive().default(SELECTION_DEFAULTS.maxRepairIterations),
});

export type Env = z.infer<typeof EnvSchema>;

/** Parse an environment map; throws with every offending variable listed. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((e) => `${e.path.join(".") || "env"}: ${e.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  return parsed.data;
}

export function selectionDefaults(config: Env): SelectionDefaults {
  return {
    nCities: config.DEFAULT_N_CITIES,
    minDistanceKm: config.DEFAULT_MIN_DISTANCE_KM,
    populationMin: config.DEFAULT_POPULATION_MIN,
    maxRepairIterations: config.MAX_REPAIR_ITERATIONS,
  };
}

export const env = loadEnv();
