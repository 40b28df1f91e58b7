import { describe, expect, it } from "vitest";

import { selectors, type EventView } from "@/engine";
import type { RosterEntry, TournamentEvent } from "@/models";
import { T0, makeGame } from "@/tests/fixtures";

const event: TournamentEvent = {
  id: "evt",
  name: "Spring Open",
  format: "singles",
  phase: "active",
  roundCount: 3,
  currentRound: 2,
  scoring: { win: 3, draw: 1, loss: 0, byeResult: "win" },
  settings: { byeRitual: false },
  createdAt: T0,
  updatedAt: T0,
  version: 1,
};

function entry(id: string, name: string): RosterEntry {
  return {
    participant: { id, name, kind: "player" },
    registration: { eventId: "evt", participantId: id, status: "active", registeredAt: T0, version: 1 },
  };
}

const reported = makeGame({
  roundId: "r2",
  roundNumber: 2,
  orderKey: 2,
  participants: ["ana", "bo"],
  room: "Royal Blue",
  state: "reported",
  report: { vp: [9, 3], reporterId: "ana", at: T0 },
});
const disputed = makeGame({ roundId: "r2", roundNumber: 2, orderKey: 1, participants: ["cy", "dee"], room: "Crimson", state: "disputed" });
const earlier = makeGame({ roundId: "r1", roundNumber: 1, participants: ["ana", "cy"], room: "Crimson", state: "locked", vp: [10, 2] });

const view: EventView = {
  event,
  roster: [entry("ana", "Ana Reyes"), entry("bo", "Bo Lind"), entry("cy", "Cy Park"), entry("dee", "Dee Stone")],
  rounds: [
    { id: "r1", eventId: "evt", number: 1, state: "complete", deadlineAt: T0, gameIds: [earlier.id], repairCount: 0, createdAt: T0, version: 3 },
    { id: "r2", eventId: "evt", number: 2, state: "active", deadlineAt: T0, gameIds: [disputed.id, reported.id], repairCount: 0, createdAt: T0, version: 2 },
  ],
  games: [earlier, reported, disputed],
  rituals: [],
};

describe("selectors", () => {
  it("finds the current round and its games in board order", () => {
    expect(selectors.getCurrentRound(view)?.id).toBe("r2");
    expect(selectors.getRoundGames(view, 2).map((game) => game.id)).toEqual([disputed.id, reported.id]);
  });

  it("lists games waiting on a participant's acknowledgement", () => {
    expect(selectors.getGamesAwaitingConfirmation(view, "bo").map((game) => game.id)).toEqual([reported.id]);
    expect(selectors.getGamesAwaitingConfirmation(view, "ana")).toEqual([]);
    expect(selectors.getDisputedGames(view).map((game) => game.id)).toEqual([disputed.id]);
  });

  it("searches the roster by name or id", () => {
    expect(selectors.searchParticipants(view, "  PARK ").map((participant) => participant.id)).toEqual(["cy"]);
    expect(selectors.searchParticipants(view, "")).toHaveLength(4);
  });

  it("builds the dashboard for the current round", () => {
    const dashboard = selectors.getDashboard(view);

    expect(dashboard.tables.map((table) => [table.room, table.sides, table.state])).toEqual([
      ["Crimson", ["Cy Park", "Dee Stone"], "disputed"],
      ["Royal Blue", ["Ana Reyes", "Bo Lind"], "reported"],
    ]);
    expect(dashboard.counts).toEqual({ unplayed: 0, reported: 1, disputed: 1, confirmed: 0, locked: 0 });
    expect(dashboard.standings.map((row) => [row.participantId, row.matchPoints])).toEqual([
      ["ana", 3],
      ["bo", 0],
      ["dee", 0],
      ["cy", 0],
    ]);
  });
});
