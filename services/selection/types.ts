// ─── SelectionInput ──────────────────────────────────────────────────────────
/** Caller-provided selection request. Every field is optional; missing values fall back to configured defaults. */
export interface SelectionInput {
  nCities?: number;
  minDistanceKm?: number;
  populationMin?: number;
  maxRepairIterations?: number;
}

// ─── SelectionPlan ───────────────────────────────────────────────────────────
/**
 * Resolved execution plan from SelectionInput. Immutable; used by all downstream selection stages.
 * - nCities: target selection size (reduced later if the pool is smaller)
 * - minDistanceKm: separation floor enforced by the repair stage
 * - populationMin: floor applied by the catalog before the pool is built
 * - maxRepairIterations: replacement budget before the repair stage gives up
 */
export interface SelectionPlan {
  input: SelectionInput;
  nCities: number;
  minDistanceKm: number;
  populationMin: number;
  maxRepairIterations: number;
}

// ─── Catalog rows ────────────────────────────────────────────────────────────
/** A catalog row as loaded (columns id, city, lat, lng, population). Nothing is validated yet. */
export type RawCityRow = Record<string, unknown>;

// ─── CandidateRecord ─────────────────────────────────────────────────────────
/** A validated, frozen city with usable coordinates. */
export interface CandidateRecord {
  readonly id: string;
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly population: number;
}

/** Validated candidates ordered by population (descending), ties by ascending id. */
export type CandidatePool = readonly CandidateRecord[];

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// ─── Dispersion ──────────────────────────────────────────────────────────────
/** One greedy round: the picked id and its isolation score at pick time (Infinity for the seed). */
export interface DispersionPick {
  id: string;
  isolationKm: number;
}

// ─── Repair ──────────────────────────────────────────────────────────────────
export type RepairState = "scanning" | "replacing" | "converged" | "stalled";

export type RepairStatus = Extract<RepairState, "converged" | "stalled">;

export type StallReason = "no-improving-candidate" | "iteration-budget";

export interface ClosestPair {
  ids: [string, string];
  distanceKm: number;
}

export interface RepairOptions {
  minDistanceKm: number;
  maxIterations: number;
}

/** Terminal state of one repair run. `closestPair` is null when the selection has fewer than two members. */
export interface RepairOutcome {
  status: RepairStatus;
  iterations: number;
  closestPair: ClosestPair | null;
  reason?: StallReason;
}

// ─── SelectionResult ─────────────────────────────────────────────────────────
/** Final pipeline output: selected cities in selection order, plus the warnings raised on the way. */
export interface SelectionResult {
  cities: CandidateRecord[];
  requested: number;
  poolSize: number;
  warnings: SelectionWarning[];
  repair: RepairOutcome;
}

// ─── Notices ─────────────────────────────────────────────────────────────────
export interface InsufficientCandidatesNotice {
  kind: "insufficient-candidates";
  level: "warn";
  requested: number;
  available: number;
}

export interface RowsDroppedNotice {
  kind: "rows-dropped";
  level: "info";
  dropped: number;
  kept: number;
}

export interface ViolationFoundNotice {
  kind: "violation-found";
  level: "info";
  iteration: number;
  pair: [CandidateRecord, CandidateRecord];
  distanceKm: number;
}

export interface MemberReplacedNotice {
  kind: "member-replaced";
  level: "info";
  iteration: number;
  removed: CandidateRecord;
  added: CandidateRecord;
  isolationKm: number;
}

export interface ConvergedNotice {
  kind: "converged";
  level: "info";
  iterations: number;
  minDistanceKm: number;
  closestKm: number | null;
}

export interface UnresolvedViolationNotice {
  kind: "unresolved-violation";
  level: "warn";
  reason: StallReason;
  iterations: number;
  pair: [CandidateRecord, CandidateRecord];
  distanceKm: number;
}

export type SelectionNotice =
  | InsufficientCandidatesNotice
  | RowsDroppedNotice
  | ViolationFoundNotice
  | MemberReplacedNotice
  | ConvergedNotice
  | UnresolvedViolationNotice;

export type SelectionWarning = Extract<SelectionNotice, { level: "warn" }>;

/** Receives notices as they happen. Core stages never log on their own. */
export type NoticeSink = (notice: SelectionNotice) => void;
