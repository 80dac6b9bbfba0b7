import type { CandidatePool, CandidateRecord, NoticeSink, RawCityRow } from "../types.js";

// ─── Schema errors ──────────────────────────────────────────────────────────

export const CatalogSchemaErrorCode = {
  MISSING_COORDINATE_FIELDS: "MISSING_COORDINATE_FIELDS",
  MISSING_POPULATION_FIELD: "MISSING_POPULATION_FIELD",
} as const;

export type CatalogSchemaErrorCode =
  (typeof CatalogSchemaErrorCode)[keyof typeof CatalogSchemaErrorCode];

export class CatalogSchemaError extends Error {
  readonly code: CatalogSchemaErrorCode;

  constructor(code: CatalogSchemaErrorCode, message: string) {
    super(message);
    this.name = "CatalogSchemaError";
    this.code = code;
    Object.setPrototypeOf(this, CatalogSchemaError.prototype);
  }
}

// ─── Constants ──────────────────────────────────────────────────────────────

const LAT_MIN = -90;
const LAT_MAX = 90;
const LON_MIN = -180;
const LON_MAX = 180;

// ─── Helpers ───────────────────────────────────────────────────────────────

/** Number or numeric string → finite number; anything else → null. pg hands numeric/bigint back as strings. */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function hasField(rows: readonly RawCityRow[], field: string): boolean {
  return rows.some((row) => Object.hasOwn(row, field));
}

function assertSchema(rows: readonly RawCityRow[]): void {
  if (rows.length === 0) return;
  const missing = ["lat", "lng"].filter((f) => !hasField(rows, f));
  if (missing.length > 0) {
    throw new CatalogSchemaError(
      CatalogSchemaErrorCode.MISSING_COORDINATE_FIELDS,
      `City data must contain 'lat' and 'lng' fields (missing: ${missing.join(", ")})`
    );
  }
  if (!hasField(rows, "population")) {
    throw new CatalogSchemaError(
      CatalogSchemaErrorCode.MISSING_POPULATION_FIELD,
      "City data must contain a 'population' field"
    );
  }
}

function toRecord(row: RawCityRow, index: number): CandidateRecord | null {
  const latitude = toFiniteNumber(row.lat);
  const longitude = toFiniteNumber(row.lng);
  if (latitude === null || latitude < LAT_MIN || latitude > LAT_MAX) return null;
  if (longitude === null || longitude < LON_MIN || longitude > LON_MAX) return null;

  let population = 0;
  if (row.population !== undefined && row.population !== null) {
    const p = toFiniteNumber(row.population);
    if (p === null || p < 0) return null;
    population = p;
  }

  const id = typeof row.id === "string" || typeof row.id === "number" ? String(row.id) : String(index);
  const name = typeof row.city === "string" && row.city !== "" ? row.city : id;

  return Object.freeze({ id, name, latitude, longitude, population });
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Plain code-unit comparison, so id order never depends on locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Pool order: most populous first, ties by ascending id. */
export function comparePoolOrder(a: CandidateRecord, b: CandidateRecord): number {
  return b.population - a.population || compareIds(a.id, b.id);
}

/**
 * Pool stage: raw catalog rows → validated, frozen candidates in pool order.
 * Throws CatalogSchemaError before doing anything else when coordinate or population fields are absent
 * from every row. Rows with unusable values or a repeated id are dropped and counted.
 */
export function buildCandidatePool(
  rows: readonly RawCityRow[],
  sink?: NoticeSink
): { pool: CandidatePool; dropped: number } {
  assertSchema(rows);

  const seen = new Set<string>();
  const records: CandidateRecord[] = [];
  rows.forEach((row, index) => {
    const record = toRecord(row, index);
    if (!record || seen.has(record.id)) return;
    seen.add(record.id);
    records.push(record);
  });

  records.sort(comparePoolOrder);
  const dropped = rows.length - records.length;
  if (dropped > 0) {
    sink?.({ kind: "rows-dropped", level: "info", dropped, kept: records.length });
  }

  return { pool: Object.freeze(records), dropped };
}
