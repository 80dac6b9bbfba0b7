import { haversineKm } from "../geo/distance.js";
import { SelectionSet } from "../selection-set.js";
import type { CandidatePool, DispersionPick, NoticeSink } from "../types.js";

export interface DispersionResult {
  selection: SelectionSet;
  picks: DispersionPick[];
}

/**
 * Dispersion stage: greedy farthest-point (max-min) selection.
 *
 * Seeds with the first pool record (the most populous), then repeatedly appends the unselected
 * candidate whose minimum distance to the current selection is largest. Ties go to the candidate
 * earliest in pool order. Each candidate's minimum distance is kept as running state and only
 * compared against the newest pick per round.
 *
 * When the pool holds fewer than `n` records the target shrinks to the pool size and an
 * `insufficient-candidates` warning is emitted.
 */
export function selectDispersed(pool: CandidatePool, n: number, sink: NoticeSink): DispersionResult {
  let target = n;
  if (pool.length < n) {
    sink({ kind: "insufficient-candidates", level: "warn", requested: n, available: pool.length });
    target = pool.length;
  }

  const selection = new SelectionSet();
  const picks: DispersionPick[] = [];
  if (target === 0) return { selection, picks };

  const isolation = new Array<number>(pool.length).fill(Infinity);
  const taken = new Array<boolean>(pool.length).fill(false);

  let pickIndex = 0;
  let pickScore = Infinity;

  while (true) {
    const picked = pool[pickIndex];
    selection.add(picked);
    picks.push({ id: picked.id, isolationKm: pickScore });
    taken[pickIndex] = true;
    if (selection.size === target) break;

    let bestIndex = -1;
    let bestScore = -Infinity;
    for (let i = 0; i < pool.length; i++) {
      if (taken[i]) continue;
      const d = haversineKm(pool[i], picked);
      if (d < isolation[i]) isolation[i] = d;
      if (isolation[i] > bestScore) {
        bestScore = isolation[i];
        bestIndex = i;
      }
    }

    pickIndex = bestIndex;
    pickScore = bestScore;
  }

  return { selection, picks };
}
