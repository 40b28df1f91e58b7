import { describe, expect, it } from "vitest";

import { EngineError } from "@/engine";
import { deriveMatchHistory, expandTeamPairings, pair, recommendedRoundCount } from "@/engine/formats";
import type { MatchRecord, PairingOptions } from "@/engine/formats";
import { compareIds, mulberry32, pairKey } from "@/engine/util";
import type { Participant } from "@/models";
import { makeGame } from "@/tests/fixtures";

const options: PairingOptions = {
  roundNumber: 2,
  scoring: { win: 3, draw: 1, loss: 0, byeResult: "win" },
};

function played(roundNumber: number, a: string, b: string, result: "a" | "b" | "draw"): MatchRecord {
  return { roundNumber, sides: [a, b], isBye: false, result };
}

function bye(roundNumber: number, id: string): MatchRecord {
  return { roundNumber, sides: [id, null], isBye: true, result: "a" };
}

const roundRobin: MatchRecord[] = [
  played(1, "A", "B", "draw"),
  played(1, "C", "D", "draw"),
  played(2, "A", "C", "draw"),
  played(2, "B", "D", "draw"),
  played(3, "A", "D", "draw"),
  played(3, "B", "C", "draw"),
];

function expectEngineError(fn: () => unknown, kind: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(EngineError);
    expect(error instanceof EngineError ? error.kind : undefined).toBe(kind);
    return;
  }
  throw new Error(`expected ${kind}`);
}

describe("swiss pairing", () => {
  it("pairs a fresh odd roster in id order and gives the bye to the lowest id", () => {
    const result = pair(["E", "C", "A", "D", "B"], [], { ...options, roundNumber: 1 });

    expect(result.bye).toBe("A");
    expect(result.byeContenders).toEqual(["A", "B", "C", "D", "E"]);
    expect(result.pairings).toEqual([
      ["B", "C"],
      ["D", "E"],
    ]);
    expect(result.repeats).toEqual([]);
  });

  it("gives the bye to the lowest score among participants without one", () => {
    const history = [bye(1, "A"), played(1, "B", "C", "a"), played(1, "D", "E", "a")];
    const result = pair(["A", "B", "C", "D", "E"], history, options);

    expect(result.byeContenders).toEqual(["C", "E"]);
    expect(result.bye).toBe("C");
    expect(result.pairings).toEqual([
      ["A", "D"],
      ["B", "E"],
    ]);
  });

  it("honours a bye resolution only when it names a contender", () => {
    const history = [bye(1, "A"), played(1, "B", "C", "a"), played(1, "D", "E", "a")];

    expect(pair(["A", "B", "C", "D", "E"], history, { ...options, byeResolution: "E" }).bye).toBe("E");
    expect(pair(["A", "B", "C", "D", "E"], history, { ...options, byeResolution: "A" }).bye).toBe("C");
  });

  it("skips participants who already had a bye", () => {
    const result = pair(["A", "B", "C"], [bye(1, "A"), bye(2, "C")], { ...options, roundNumber: 3 });

    expect(result.byeContenders).toEqual(["B"]);
    expect(result.bye).toBe("B");
    expect(result.pairings).toEqual([["A", "C"]]);
  });

  it("avoids rematches when a fresh matching exists", () => {
    const history = roundRobin.slice(0, 4);
    const result = pair(["A", "B", "C", "D"], history, { ...options, roundNumber: 3 });

    expect(result.pairings).toEqual([
      ["A", "D"],
      ["B", "C"],
    ]);
    expect(result.repeats).toEqual([]);
  });

  it("backtracks past a dead end", () => {
    const history = [played(1, "A", "B", "draw"), played(1, "C", "D", "draw"), played(1, "E", "F", "draw")];
    const result = pair(["A", "B", "C", "D", "E", "F"], history, options);

    expect(result.pairings).toEqual([
      ["A", "C"],
      ["B", "E"],
      ["D", "F"],
    ]);
  });

  it("allows the fewest rematches once every pairing has been played", () => {
    const result = pair(["A", "B", "C", "D"], roundRobin, { ...options, roundNumber: 4 });

    expect(result.pairings).toEqual([
      ["A", "B"],
      ["C", "D"],
    ]);
    expect(result.repeats).toHaveLength(2);
  });

  it("falls back to a greedy pass when the search budget runs out", () => {
    const result = pair(["A", "B", "C", "D"], roundRobin, { ...options, roundNumber: 4, searchBudget: 1, exclusions: [["A", "B"]] });

    expect(result.pairings).toEqual([
      ["A", "C"],
      ["B", "D"],
    ]);
  });

  it("keeps avoiding rematches after the search budget runs out", () => {
    const field = ["A", "B", "C", "D", "E", "F", "G", "H", "I", "J", "K", "L", "M"];
    const history = [...field.map((id, idx) => played(idx + 1, id, "N", "a")), played(1, "B", "C", "draw")];

    const result = pair([...field, "N"], history, { ...options, roundNumber: 14 });

    expect(result.pairings).toEqual([
      ["B", "A"],
      ["C", "D"],
      ["E", "F"],
      ["G", "H"],
      ["I", "J"],
      ["K", "L"],
      ["M", "N"],
    ]);
    expect(result.repeats).toEqual([["M", "N"]]);
  });

  it("moves the bye when the exclusions leave no matching around the first choice", () => {
    const result = pair(["A", "B", "C"], [], { ...options, roundNumber: 1, exclusions: [["B", "C"]] });

    expect(result.bye).toBe("B");
    expect(result.byeContenders).toEqual(["A", "B", "C"]);
    expect(result.pairings).toEqual([["A", "C"]]);
  });

  it("orders ids by code unit", () => {
    const result = pair(["b", "B", "a"], [], { ...options, roundNumber: 1 });

    expect(["b", "B", "a", "_"].sort(compareIds)).toEqual(["B", "_", "a", "b"]);
    expect(result.byeContenders).toEqual(["B", "a", "b"]);
    expect(result.bye).toBe("B");
    expect(result.pairings).toEqual([["a", "b"]]);
  });

  it("rejects rosters that cannot be paired", () => {
    expectEngineError(() => pair(["A"], [], options), "InvalidRoster");
    expectEngineError(() => pair(["A", "B"], [], { ...options, exclusions: [["B", "A"]] }), "InfeasiblePairing");
  });

  it("breaks score ties with a stable seeded order", () => {
    const roster = ["A", "B", "C", "D", "E", "F", "G", "H"];
    const seeded = { ...options, rngSeed: "spring-open" };

    const first = pair(roster, [], seeded);
    const second = pair([...roster].reverse(), [], seeded);

    expect(second.pairings).toEqual(first.pairings);
    expect(first.pairings.flat().sort()).toEqual(roster);
  });

  it("recommends a round count from the roster size", () => {
    expect(recommendedRoundCount(4)).toBe(2);
    expect(recommendedRoundCount(8)).toBe(3);
    expect(recommendedRoundCount(9)).toBe(4);
    expect(recommendedRoundCount(32)).toBe(5);
    expect(recommendedRoundCount(40)).toBe(6);
  });
});

function randomHistory(roster: string[], rounds: number, seed: number): MatchRecord[] {
  const rng = mulberry32(seed);
  const records: MatchRecord[] = [];
  for (let round = 1; round <= rounds; round += 1) {
    const order = [...roster];
    for (let i = order.length - 1; i > 0; i -= 1) {
      const j = Math.floor(rng() * (i + 1));
      [order[i], order[j]] = [order[j], order[i]];
    }
    if (order.length % 2 === 1) {
      const last = order.pop();
      if (last !== undefined) records.push(bye(round, last));
    }
    for (let i = 0; i < order.length; i += 2) {
      const roll = rng();
      records.push(played(round, order[i], order[i + 1], roll < 0.4 ? "a" : roll < 0.8 ? "b" : "draw"));
    }
  }
  return records;
}

function fewestRepeats(ids: string[], met: Set<string>): number {
  if (ids.length === 0) {
    return 0;
  }
  const [first, ...rest] = ids;
  return Math.min(
    ...rest.map((other) => (met.has(pairKey(first, other)) ? 1 : 0) + fewestRepeats(rest.filter((id) => id !== other), met)),
  );
}

describe("swiss pairing properties", () => {
  const everyone = ["A", "B", "C", "D", "E", "F", "G", "H", "I"];

  for (let size = 2; size <= everyone.length; size += 1) {
    it(`pairs ${size} participants completely with the fewest rematches`, () => {
      for (let seed = 1; seed <= 12; seed += 1) {
        const roster = everyone.slice(0, size);
        const history = randomHistory(roster, 1 + (seed % 4), seed * 7919 + size);
        const met = new Set(history.filter((record) => !record.isBye).map((record) => pairKey(record.sides[0], record.sides[1] ?? "")));
        const hadBye = new Set(history.filter((record) => record.isBye).map((record) => record.sides[0]));

        const result = pair(roster, history, { ...options, roundNumber: 6 });

        const seated = [...result.pairings.flat(), ...(result.bye === null ? [] : [result.bye])];
        expect(seated.sort(compareIds)).toEqual(roster);
        expect(result.bye === null).toBe(size % 2 === 0);
        if (result.bye !== null && hadBye.has(result.bye)) {
          expect(roster.every((id) => hadBye.has(id))).toBe(true);
        }
        const remaining = roster.filter((id) => id !== result.bye);
        expect(result.repeats).toHaveLength(fewestRepeats(remaining, met));
      }
    });
  }
});

describe("match history", () => {
  it("scores a bye only once it has been credited", () => {
    const uncredited = makeGame({ participants: ["A", null], state: "confirmed" });
    const credited = makeGame({ participants: ["B", null], state: "locked", vp: [7, 0] });

    const [first, second] = deriveMatchHistory([uncredited, credited], "singles");

    expect(first.result).toBeUndefined();
    expect(second.result).toBe("a");
    expect(second.vp).toEqual([7, 0]);
  });

  it("applies adjustments and ignores unconfirmed reports", () => {
    const adjusted = makeGame({ participants: ["A", "B"], state: "confirmed", vp: [10, 10], adjustment: [0, 2] });
    const reported = makeGame({ participants: ["C", "D"], state: "reported", vp: [10, 0] });

    const [first, second] = deriveMatchHistory([adjusted, reported], "singles");

    expect(first.result).toBe("b");
    expect(first.vp).toEqual([10, 12]);
    expect(second.result).toBeUndefined();
  });

  it("folds team boards into one meeting decided by board wins", () => {
    const boards = [
      makeGame({ roundId: "r1", participants: ["a1", "b1"], teams: ["TA", "TB"], slot: 1, state: "locked", vp: [3, 12] }),
      makeGame({ roundId: "r1", participants: ["a2", "b2"], teams: ["TA", "TB"], slot: 2, state: "locked", vp: [9, 4] }),
      makeGame({ roundId: "r1", participants: ["a3", "b3"], teams: ["TA", "TB"], slot: 3, state: "locked", vp: [8, 6] }),
    ];

    expect(deriveMatchHistory(boards, "teams")).toEqual([{ roundNumber: 1, sides: ["TA", "TB"], isBye: false, result: "a", vp: [20, 22] }]);
  });
});

describe("team boards", () => {
  const teams = new Map<string, Participant>([
    ["TA", { id: "TA", name: "Team A", kind: "team", members: ["a1", "a2", "a3"] }],
    ["TB", { id: "TB", name: "Team B", kind: "team", members: ["b1", "b2"] }],
    ["solo", { id: "solo", name: "Solo", kind: "player" }],
  ]);

  it("seats member N against member N", () => {
    expect(expandTeamPairings([["TA", "TB"]], teams, 2)).toEqual([
      { teams: ["TA", "TB"], slot: 1, players: ["a1", "b1"] },
      { teams: ["TA", "TB"], slot: 2, players: ["a2", "b2"] },
    ]);
  });

  it("rejects short teams and non-teams", () => {
    expectEngineError(() => expandTeamPairings([["TA", "TB"]], teams, 3), "InvalidRoster");
    expectEngineError(() => expandTeamPairings([["TA", "solo"]], teams, 1), "InvalidRoster");
  });
});
