import type { Game, GameState, ID, Participant, RitualSession, RosterEntry, Round, Standing, TournamentEvent } from "@/models";
import { computeStandings } from "@/engine/standings";

/** Everything one event's read models derive from. */
export interface EventView {
  event: TournamentEvent;
  roster: RosterEntry[];
  rounds: Round[];
  games: Game[];
  rituals: RitualSession[];
}

export interface DashboardTable {
  gameId: ID;
  room: string | null;
  slot?: number;
  state: GameState;
  sides: [string, string | null];
  teams?: [string, string | null];
  vp?: [number, number];
}

export interface Dashboard {
  event: Pick<TournamentEvent, "id" | "name" | "format" | "phase" | "currentRound" | "roundCount">;
  round?: Pick<Round, "id" | "number" | "state" | "deadlineAt" | "warnedAt">;
  tables: DashboardTable[];
  counts: Record<GameState, number>;
  openRituals: Pick<RitualSession, "id" | "kind" | "participants" | "awaiting" | "expiresAt">[];
  standings: Standing[];
}

export interface EngineSelectors {
  getCurrentRound(view: EventView): Round | undefined;
  getRoundGames(view: EventView, roundNumber: number): Game[];
  getGamesAwaitingConfirmation(view: EventView, participantId: ID): Game[];
  getDisputedGames(view: EventView): Game[];
  searchParticipants(view: EventView, query: string): Participant[];
  getDashboard(view: EventView): Dashboard;
}

function displayName(names: Map<ID, string>, id: ID | null): string | null {
  if (id === null) {
    return null;
  }
  return names.get(id) ?? id;
}

function standingRoster(view: EventView): ID[] {
  const kind = view.event.format === "teams" ? "team" : "player";
  return view.roster.filter((entry) => entry.participant.kind === kind).map((entry) => entry.participant.id);
}

export const selectors: EngineSelectors = {
  getCurrentRound(view) {
    return view.rounds.find((round) => round.number === view.event.currentRound);
  },

  getRoundGames(view, roundNumber) {
    return view.games.filter((game) => game.roundNumber === roundNumber).sort((a, b) => a.orderKey - b.orderKey);
  },

  getGamesAwaitingConfirmation(view, participantId) {
    return view.games.filter(
      (game) => game.state === "reported" && game.participants.includes(participantId) && game.report?.reporterId !== participantId,
    );
  },

  getDisputedGames(view) {
    return view.games.filter((game) => game.state === "disputed");
  },

  searchParticipants(view, query) {
    const q = query.trim().toLowerCase();
    if (!q) {
      return view.roster.map((entry) => entry.participant);
    }
    return view.roster
      .map((entry) => entry.participant)
      .filter((participant) => participant.name.toLowerCase().includes(q) || participant.id.toLowerCase().includes(q));
  },

  getDashboard(view) {
    const names = new Map<ID, string>(view.roster.map((entry) => [entry.participant.id, entry.participant.name]));
    const round = selectors.getCurrentRound(view);
    const games = round ? selectors.getRoundGames(view, round.number) : [];

    const counts: Record<GameState, number> = { unplayed: 0, reported: 0, disputed: 0, confirmed: 0, locked: 0 };
    games.forEach((game) => {
      counts[game.state] += 1;
    });

    const tables = games.map((game): DashboardTable => {
      const [a, b] = game.participants;
      return {
        gameId: game.id,
        room: game.room,
        slot: game.slot,
        state: game.state,
        sides: [displayName(names, a) ?? a, displayName(names, b)],
        teams: game.teams ? [displayName(names, game.teams[0]) ?? game.teams[0], displayName(names, game.teams[1])] : undefined,
        vp: game.vp,
      };
    });

    return {
      event: {
        id: view.event.id,
        name: view.event.name,
        format: view.event.format,
        phase: view.event.phase,
        currentRound: view.event.currentRound,
        roundCount: view.event.roundCount,
      },
      round: round
        ? { id: round.id, number: round.number, state: round.state, deadlineAt: round.deadlineAt, warnedAt: round.warnedAt }
        : undefined,
      tables,
      counts,
      openRituals: view.rituals
        .filter((ritual) => ritual.state === "open")
        .map((ritual) => ({ id: ritual.id, kind: ritual.kind, participants: ritual.participants, awaiting: ritual.awaiting, expiresAt: ritual.expiresAt })),
      standings: computeStandings(view.event, view.games, standingRoster(view)),
    };
  },
};
