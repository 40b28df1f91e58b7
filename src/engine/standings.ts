import type { Game, ID, Standing, TournamentEvent } from "@/models";
import { deriveMatchHistory, type MatchRecord } from "@/engine/formats";
import { sortWithTiebreakers } from "@/engine/rules/tiebreakers";
import { compareIds } from "@/engine/util";

type StandingDraft = Omit<Standing, "rank" | "opponents"> & { opponents: Set<ID> };

function emptyDraft(participantId: ID): StandingDraft {
  return {
    participantId,
    played: 0,
    wins: 0,
    losses: 0,
    draws: 0,
    byes: 0,
    matchPoints: 0,
    vpFor: 0,
    vpAgainst: 0,
    vpDiff: 0,
    opponents: new Set(),
  };
}

/**
 * Standings over confirmed and locked games. Team events are ranked per team
 * from the board-majority result of each meeting.
 *
 * `roster` lists everyone who should appear, including dropped participants
 * that still have results.
 */
export function computeStandings(event: Pick<TournamentEvent, "format" | "scoring">, games: Game[], roster: ID[]): Standing[] {
  const { scoring } = event;
  const drafts = new Map<ID, StandingDraft>();
  const draftFor = (id: ID): StandingDraft => {
    const existing = drafts.get(id);
    if (existing) {
      return existing;
    }
    const created = emptyDraft(id);
    drafts.set(id, created);
    return created;
  };
  roster.forEach(draftFor);

  const h2h = new Map<string, number>();
  const records = deriveMatchHistory(games, event.format).filter((record): record is MatchRecord & { result: "a" | "b" | "draw" } =>
    Boolean(record.result),
  );

  for (const record of records) {
    const [a, b] = record.sides;
    const vp = record.vp ?? [0, 0];
    const rowA = draftFor(a);
    rowA.played += 1;
    rowA.vpFor += vp[0];

    if (record.isBye || b === null) {
      rowA.byes += 1;
      if (scoring.byeResult === "win") {
        rowA.wins += 1;
        rowA.matchPoints += scoring.win;
      } else {
        rowA.draws += 1;
        rowA.matchPoints += scoring.draw;
      }
      continue;
    }

    const rowB = draftFor(b);
    rowB.played += 1;
    rowB.vpFor += vp[1];
    rowA.vpAgainst += vp[1];
    rowB.vpAgainst += vp[0];
    rowA.opponents.add(b);
    rowB.opponents.add(a);

    let pointsA = scoring.draw;
    let pointsB = scoring.draw;
    if (record.result === "draw") {
      rowA.draws += 1;
      rowB.draws += 1;
    } else if (record.result === "a") {
      rowA.wins += 1;
      rowB.losses += 1;
      pointsA = scoring.win;
      pointsB = scoring.loss;
    } else {
      rowA.losses += 1;
      rowB.wins += 1;
      pointsA = scoring.loss;
      pointsB = scoring.win;
    }
    rowA.matchPoints += pointsA;
    rowB.matchPoints += pointsB;
    h2h.set(`${a}>${b}`, (h2h.get(`${a}>${b}`) ?? 0) + pointsA);
    h2h.set(`${b}>${a}`, (h2h.get(`${b}>${a}`) ?? 0) + pointsB);
  }

  const rows = [...drafts.values()].map((draft) => ({ ...draft, vpDiff: draft.vpFor - draft.vpAgainst }));
  const ordered = sortWithTiebreakers(rows, (a, b) => h2h.get(`${a}>${b}`) ?? 0);

  return ordered.map((row, idx) => ({
    ...row,
    rank: idx + 1,
    opponents: [...row.opponents].sort(compareIds),
  }));
}

