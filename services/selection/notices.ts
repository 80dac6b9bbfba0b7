import type { BaseLogger } from "pino";
import type { NoticeSink, SelectionNotice, SelectionWarning } from "./types.js";

export type NoticeLogger = Pick<BaseLogger, "info" | "warn">;

const km = (value: number) => `${value.toFixed(1)} km`;

export function isWarning(notice: SelectionNotice): notice is SelectionWarning {
  return notice.level === "warn";
}

/** Human-readable one-liner for a notice. */
export function describeNotice(notice: SelectionNotice): string {
  switch (notice.kind) {
    case "insufficient-candidates":
      return `Only ${notice.available} cities available, less than requested ${notice.requested}`;
    case "rows-dropped":
      return `Dropped ${notice.dropped} catalog rows with unusable values or repeated ids, kept ${notice.kept}`;
    case "violation-found":
      return `Iteration ${notice.iteration}: ${notice.pair[0].name} and ${notice.pair[1].name} are only ${km(notice.distanceKm)} apart`;
    case "member-replaced":
      return `Iteration ${notice.iteration}: replaced ${notice.removed.name} (pop: ${notice.removed.population}) with ${notice.added.name} (min distance: ${km(notice.isolationKm)})`;
    case "converged":
      return notice.closestKm === null
        ? `Fewer than two cities selected; nothing to separate`
        : `All cities are at least ${km(notice.minDistanceKm)} apart (closest: ${km(notice.closestKm)}) after ${notice.iterations} replacements`;
    case "unresolved-violation":
      return notice.reason === "iteration-budget"
        ? `Stopped after ${notice.iterations} replacements; ${notice.pair[0].name} and ${notice.pair[1].name} remain ${km(notice.distanceKm)} apart`
        : `No better replacement found; keeping ${notice.pair[0].name} and ${notice.pair[1].name} ${km(notice.distanceKm)} apart`;
  }
}

/** Sink that writes every notice to a pino logger at its own level. */
export function createLoggerSink(logger: NoticeLogger): NoticeSink {
  return (notice) => {
    const fields = { notice: notice.kind };
    if (isWarning(notice)) logger.warn(fields, describeNotice(notice));
    else logger.info(fields, describeNotice(notice));
  };
}

/** Fan a notice out to several sinks, in order. */
export function teeSinks(...sinks: NoticeSink[]): NoticeSink {
  return (notice) => {
    for (const sink of sinks) sink(notice);
  };
}
