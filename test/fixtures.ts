import type { CandidateRecord, RawCityRow, SelectionNotice } from "../services/selection/types.js";

export function row(id: string, lat: number | null, lng: number | null, population: number): RawCityRow {
  return { id, city: id, lat, lng, population };
}

export function record(id: string, latitude: number, longitude: number, population: number): CandidateRecord {
  return Object.freeze({ id, name: id, latitude, longitude, population });
}

/** Sink that keeps every notice for later assertions. */
export function recordingSink(): { notices: SelectionNotice[]; sink: (n: SelectionNotice) => void } {
  const notices: SelectionNotice[] = [];
  return { notices, sink: (n) => notices.push(n) };
}

// Equator fixtures: 1° of longitude ≈ 111.19 km.
export const A = record("A", 0, 0, 100);
export const B = record("B", 0, 1, 50);
export const C = record("C", 0, 10, 10);

// Four cities mutually within 50 km, plus two far away.
export const K1 = record("K1", 0, 0, 1000);
export const K2 = record("K2", 0, 0.2, 900);
export const K3 = record("K3", 0.2, 0, 800);
export const K4 = record("K4", 0.2, 0.2, 700);
export const ISOLATED = record("I", 0, 18, 10);
export const FAR = record("F", 0, -36, 5);

export function toRow(r: CandidateRecord): RawCityRow {
  return row(r.id, r.latitude, r.longitude, r.population);
}

/** Ten cities spread 36° apart along the equator. */
export function equatorRing(): RawCityRow[] {
  return Array.from({ length: 10 }, (_, i) => row(`r${i}`, 0, i * 36 - 162, (i + 1) * 10));
}
