import { haversineKm } from "../geo/distance.js";
import type { SelectionSet } from "../selection-set.js";
import type {
  CandidatePool,
  CandidateRecord,
  NoticeSink,
  RepairOptions,
  RepairOutcome,
  StallReason,
} from "../types.js";
import { compareIds } from "./pool.stage.js";

interface PairScan {
  first: number;
  second: number;
  distanceKm: number;
}

interface Replacement {
  candidate: CandidateRecord;
  isolationKm: number;
}

/** Closest pair by position order (i < j); the first strictly-smallest pair wins. Null below two members. */
function findClosestPair(selection: SelectionSet): PairScan | null {
  let closest: PairScan | null = null;
  for (let i = 0; i < selection.size; i++) {
    const a = selection.at(i);
    for (let j = i + 1; j < selection.size; j++) {
      const d = haversineKm(a, selection.at(j));
      if (closest === null || d < closest.distanceKm) {
        closest = { first: i, second: j, distanceKm: d };
      }
    }
  }
  return closest;
}

/** Position to give up: the less populous member; on equal population, the one whose id sorts first. */
function pickRemovalTarget(selection: SelectionSet, pair: PairScan): number {
  const a = selection.at(pair.first);
  const b = selection.at(pair.second);
  if (a.population !== b.population) {
    return a.population < b.population ? pair.first : pair.second;
  }
  return compareIds(a.id, b.id) <= 0 ? pair.first : pair.second;
}

/**
 * Best unselected candidate for the slot at `position`: the one whose minimum distance to every
 * other member is largest. Ties keep the earliest in pool order.
 */
function findReplacement(selection: SelectionSet, pool: CandidatePool, position: number): Replacement | null {
  const others: CandidateRecord[] = [];
  for (let i = 0; i < selection.size; i++) {
    if (i !== position) others.push(selection.at(i));
  }

  let best: Replacement | null = null;
  for (const candidate of pool) {
    if (selection.has(candidate.id)) continue;
    let isolationKm = Infinity;
    for (const member of others) {
      const d = haversineKm(candidate, member);
      if (d < isolationKm) isolationKm = d;
    }
    if (best === null || isolationKm > best.isolationKm) {
      best = { candidate, isolationKm };
    }
  }
  return best;
}

function closestPairOf(selection: SelectionSet, pair: PairScan | null): RepairOutcome["closestPair"] {
  if (!pair) return null;
  return {
    ids: [selection.at(pair.first).id, selection.at(pair.second).id],
    distanceKm: pair.distanceKm,
  };
}

/**
 * Repair stage: swap members of too-close pairs for better separated candidates until every pair is at
 * least `minDistanceKm` apart (converged), no swap improves the closest pair (stalled), or the iteration
 * budget runs out (stalled). Mutates `selection` in place; its size never changes.
 */
export function repairSelection(
  selection: SelectionSet,
  pool: CandidatePool,
  options: RepairOptions,
  sink: NoticeSink
): RepairOutcome {
  const { minDistanceKm, maxIterations } = options;
  let iterations = 0;

  while (true) {
    // scanning
    const pair = findClosestPair(selection);
    if (pair === null || pair.distanceKm >= minDistanceKm) {
      sink({ kind: "converged", level: "info", iterations, minDistanceKm, closestKm: pair?.distanceKm ?? null });
      return { status: "converged", iterations, closestPair: closestPairOf(selection, pair) };
    }

    const members: [CandidateRecord, CandidateRecord] = [selection.at(pair.first), selection.at(pair.second)];
    const stall = (reason: StallReason): RepairOutcome => {
      sink({ kind: "unresolved-violation", level: "warn", reason, iterations, pair: members, distanceKm: pair.distanceKm });
      return { status: "stalled", iterations, closestPair: closestPairOf(selection, pair), reason };
    };

    if (iterations >= maxIterations) return stall("iteration-budget");
    sink({ kind: "violation-found", level: "info", iteration: iterations + 1, pair: members, distanceKm: pair.distanceKm });

    // replacing
    const position = pickRemovalTarget(selection, pair);
    const replacement = findReplacement(selection, pool, position);
    if (replacement === null || replacement.isolationKm <= pair.distanceKm) {
      return stall("no-improving-candidate");
    }

    const removed = selection.replaceAt(position, replacement.candidate);
    iterations++;
    sink({
      kind: "member-replaced",
      level: "info",
      iteration: iterations,
      removed,
      added: replacement.candidate,
      isolationKm: replacement.isolationKm,
    });
  }
}
