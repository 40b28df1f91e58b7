import { describe, expect, it } from "vitest";

import { computeStandings, sortWithTiebreakers } from "@/engine";
import type { ScoringRules } from "@/models";
import { makeGame } from "@/tests/fixtures";

const scoring: ScoringRules = { win: 3, draw: 1, loss: 0, byeResult: "win" };

describe("standings", () => {
  it("returns the same table on every call, whatever the game order", () => {
    const games = [
      makeGame({ participants: ["A", "B"], state: "locked", vp: [9, 9] }),
      makeGame({ participants: ["C", "D"], state: "locked", vp: [12, 4] }),
      makeGame({ roundNumber: 2, participants: ["A", "C"], state: "locked", vp: [6, 11] }),
      makeGame({ roundNumber: 2, participants: ["B", "D"], state: "confirmed", vp: [7, 7] }),
      makeGame({ roundNumber: 3, participants: ["A", "D"], state: "confirmed", vp: [10, 2] }),
      makeGame({ roundNumber: 3, participants: ["B", "C"], state: "reported", vp: [5, 5] }),
    ];
    const roster = ["D", "C", "B", "A"];
    const first = computeStandings({ format: "singles", scoring }, games, roster);

    for (let run = 0; run < 5; run += 1) {
      const shuffled = [...games.slice(run), ...games.slice(0, run)];
      expect(computeStandings({ format: "singles", scoring }, shuffled, roster)).toEqual(first);
      expect(computeStandings({ format: "singles", scoring }, [...shuffled].reverse(), [...roster].reverse())).toEqual(first);
    }
  });

  it("ranks by match points, then VP differential", () => {
    const games = [
      makeGame({ participants: ["A", "B"], state: "locked", vp: [10, 5] }),
      makeGame({ participants: ["C", "D"], state: "locked", vp: [8, 8] }),
      makeGame({ participants: ["E", null], state: "locked", vp: [7, 0] }),
      makeGame({ roundNumber: 2, participants: ["A", "C"], state: "confirmed", vp: [3, 12] }),
      makeGame({ roundNumber: 2, participants: ["B", "E"], state: "unplayed" }),
      makeGame({ roundNumber: 2, participants: ["D", null], state: "confirmed" }),
    ];

    const standings = computeStandings({ format: "singles", scoring }, games, ["A", "B", "C", "D", "E"]);

    expect(standings.map((row) => row.participantId)).toEqual(["C", "E", "A", "D", "B"]);
    expect(standings[0]).toEqual({
      participantId: "C",
      rank: 1,
      played: 2,
      wins: 1,
      losses: 0,
      draws: 1,
      byes: 0,
      matchPoints: 4,
      vpFor: 20,
      vpAgainst: 11,
      vpDiff: 9,
      opponents: ["A", "D"],
    });
    expect(standings[1]).toMatchObject({ participantId: "E", played: 1, byes: 1, wins: 1, matchPoints: 3, vpDiff: 7 });
    expect(standings[3]).toMatchObject({ participantId: "D", played: 1, byes: 0, matchPoints: 1 });
  });

  it("counts a bye as a draw when the event says so", () => {
    const games = [makeGame({ participants: ["A", null], state: "locked", vp: [6, 0] })];

    const [row] = computeStandings({ format: "singles", scoring: { ...scoring, byeResult: "draw" } }, games, ["A"]);

    expect(row).toMatchObject({ draws: 1, wins: 0, matchPoints: 1, vpFor: 6 });
  });

  it("separates level rows by their meetings with each other", () => {
    const games = [
      makeGame({ participants: ["A", "B"], state: "locked", vp: [5, 10] }),
      makeGame({ participants: ["C", "D"], state: "locked", vp: [10, 10] }),
      makeGame({ roundNumber: 2, participants: ["A", "C"], state: "locked", vp: [12, 7] }),
      makeGame({ roundNumber: 2, participants: ["B", "D"], state: "locked", vp: [7, 12] }),
    ];

    const standings = computeStandings({ format: "singles", scoring }, games, ["A", "B", "C", "D"]);

    expect(standings.map((row) => [row.participantId, row.rank])).toEqual([
      ["D", 1],
      ["B", 2],
      ["A", 3],
      ["C", 4],
    ]);
  });

  it("scores team meetings by board majority", () => {
    const games = [
      makeGame({ roundId: "r1", participants: ["a1", "b1"], teams: ["T1", "T2"], slot: 1, state: "locked", vp: [10, 5] }),
      makeGame({ roundId: "r1", participants: ["a2", "b2"], teams: ["T1", "T2"], slot: 2, state: "locked", vp: [9, 4] }),
    ];

    const [first, second] = computeStandings({ format: "teams", scoring }, games, ["T1", "T2"]);

    expect(first).toMatchObject({ participantId: "T1", matchPoints: 3, wins: 1, vpFor: 19, vpAgainst: 9 });
    expect(second).toMatchObject({ participantId: "T2", matchPoints: 0, losses: 1 });
  });

  it("lists every rostered participant even without games", () => {
    const standings = computeStandings({ format: "singles", scoring }, [], ["B", "A"]);

    expect(standings.map((row) => [row.participantId, row.rank, row.played])).toEqual([
      ["A", 1, 0],
      ["B", 2, 0],
    ]);
  });
});

describe("tiebreakers", () => {
  it("falls back to id order when the mini-league is level", () => {
    const rows = [
      { participantId: "Z", matchPoints: 3, vpDiff: 0 },
      { participantId: "M", matchPoints: 3, vpDiff: 0 },
      { participantId: "Q", matchPoints: 6, vpDiff: -4 },
    ];

    expect(sortWithTiebreakers(rows, () => 0).map((row) => row.participantId)).toEqual(["Q", "M", "Z"]);
  });
});
