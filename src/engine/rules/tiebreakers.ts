import type { ID } from "@/models";
import { compareIds } from "@/engine/util";

export interface TiebreakerRow {
  participantId: ID;
  matchPoints: number;
  vpDiff: number;
}

/** Match points `a` earned against `b` across their meetings. */
export type HeadToHead = (a: ID, b: ID) => number;

function compareScore(a: TiebreakerRow, b: TiebreakerRow): number {
  if (a.matchPoints !== b.matchPoints) {
    return b.matchPoints - a.matchPoints;
  }
  return b.vpDiff - a.vpDiff;
}

/**
 * Orders rows by match points, then VP differential. Rows still level are
 * ranked by a mini-league of their meetings with each other, then by id.
 */
export function sortWithTiebreakers<T extends TiebreakerRow>(rows: T[], headToHead: HeadToHead): T[] {
  const sorted = [...rows].sort((a, b) => compareScore(a, b) || compareIds(a.participantId, b.participantId));
  const out: T[] = [];

  let start = 0;
  while (start < sorted.length) {
    let end = start + 1;
    while (end < sorted.length && compareScore(sorted[start], sorted[end]) === 0) {
      end += 1;
    }
    const group = sorted.slice(start, end);
    if (group.length > 1) {
      const mini = new Map(
        group.map((row) => [
          row.participantId,
          group.reduce((sum, other) => (other === row ? sum : sum + headToHead(row.participantId, other.participantId)), 0),
        ]),
      );
      group.sort((a, b) => (mini.get(b.participantId) ?? 0) - (mini.get(a.participantId) ?? 0) || compareIds(a.participantId, b.participantId));
    }
    out.push(...group);
    start = end;
  }

  return out;
}
