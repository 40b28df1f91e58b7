import type { AnnouncedPairing, DomainEvent, Game, ID, ISODateTime, RitualSession, RosterEntry, Round, TournamentEvent } from "@/models";
import { SYSTEM_ACTOR_ID, TERMINAL_GAME_STATES } from "@/models";
import type { EngineConfig } from "@/engine/config";
import { dieSidesFor } from "@/engine/config";
import { EngineError } from "@/engine/errors";
import { deriveMatchHistory, effectiveVp, expandTeamPairings, meetingKey, pair } from "@/engine/formats";
import { creditBye, lockGame } from "@/engine/machines/gameMachine";
import { isRoundSettled, transitionRound } from "@/engine/machines/roundMachine";
import { consumeRitual, openRitual } from "@/engine/ritual";
import { assignRooms, roomsByParticipant } from "@/engine/rooms";
import { computeStandings } from "@/engine/standings";
import { compareIds, type IdGenerator } from "@/engine/util";
import { validateRound } from "@/engine/validation";
import type { StorageTx } from "@/storage/Storage";

/** What every round-level step needs: the open transaction and the event sink. */
export interface FlowContext {
  tx: StorageTx;
  at: ISODateTime;
  events: DomainEvent[];
  config: EngineConfig;
  ids: IdGenerator;
}

export interface PairRoundOptions {
  /** Games of this round kept through a repair. */
  preserved?: Game[];
  byeResolution?: ID;
  allowByeRitual?: boolean;
}

function activeEntries(roster: RosterEntry[], event: TournamentEvent): RosterEntry[] {
  const kind = event.format === "teams" ? "team" : "player";
  return roster.filter((entry) => entry.registration.status === "active" && entry.participant.kind === kind);
}

/** Ids a round's games may reference: registered participants plus team members. */
function knownIds(roster: RosterEntry[]): Set<ID> {
  const ids = new Set<ID>();
  roster.forEach(({ participant }) => {
    ids.add(participant.id);
    participant.members?.forEach((member) => ids.add(member));
  });
  return ids;
}

/** Only registrations carrying an approved list may be paired. */
export function assertListsApproved(entries: RosterEntry[]): void {
  const missing = entries.filter((entry) => !entry.registration.listRef).map((entry) => `'${entry.participant.id}'`);
  if (missing.length > 0) {
    throw new EngineError("InvalidRoster", `unapproved lists: ${missing.join(", ")} ha${missing.length === 1 ? "s" : "ve"} no approved list`);
  }
}

function exclusionsFor(entries: RosterEntry[]): [ID, ID][] {
  return entries.flatMap(({ registration }) =>
    (registration.excludedOpponents ?? []).map((other): [ID, ID] => [registration.participantId, other]),
  );
}

function toPairing(game: Game): AnnouncedPairing {
  return { gameId: game.id, participants: game.participants, teams: game.teams, slot: game.slot, room: game.room };
}

export function standingsScores(event: TournamentEvent, roster: RosterEntry[], history: Game[]): Map<ID, number> {
  const ids = roster.filter((entry) => entry.participant.kind === (event.format === "teams" ? "team" : "player")).map((entry) => entry.participant.id);
  return new Map(computeStandings(event, history, ids).map((standing) => [standing.participantId, standing.matchPoints]));
}

function isSettled(game: Game): boolean {
  return !game.isBye && (game.state === "confirmed" || game.state === "locked");
}

/**
 * Games a repair keeps: every settled game and, in team events, every board of
 * a meeting with at least one settled board. A meeting is never split.
 */
export function gamesKeptByRepair(games: Game[]): Game[] {
  const meetings = new Set(games.filter((game) => game.teams && isSettled(game)).map(meetingKey));
  return games.filter((game) => isSettled(game) || (game.teams !== undefined && !game.isBye && meetings.has(meetingKey(game))));
}

/**
 * Pairs a drafting round, assigns rooms and announces it. When the bye is tied
 * and the event resolves byes by dice, the round stays in drafting behind a
 * `bye-decision` ritual instead.
 */
export async function pairAndAnnounce(ctx: FlowContext, event: TournamentEvent, draft: Round, options: PairRoundOptions = {}): Promise<Round> {
  const { tx, at, config } = ctx;
  const preserved = options.preserved ?? [];
  const roster = await tx.loadRoster(event.id);
  const entries = activeEntries(roster, event);
  assertListsApproved(entries);
  const history = await tx.loadHistory(event.id);
  const previous = history.filter((game) => game.roundNumber < draft.number);

  const held = new Set<ID>();
  preserved.forEach((game) => {
    (game.teams ?? game.participants).forEach((id) => {
      if (id !== null) held.add(id);
    });
  });
  const candidates = entries.map((entry) => entry.participant.id).filter((id) => !held.has(id));

  let pairings: [ID, ID][] = [];
  let bye: ID | null = null;
  if (candidates.length === 1 && preserved.length > 0) {
    bye = candidates[0];
  } else if (candidates.length > 0 || preserved.length === 0) {
    const result = pair(candidates, deriveMatchHistory(previous, event.format), {
      roundNumber: draft.number,
      scoring: event.scoring,
      rngSeed: event.settings.rngSeed,
      byeResolution: options.byeResolution,
      exclusions: exclusionsFor(entries),
      searchBudget: config.pairingSearchBudget,
    });

    const ritualWanted =
      (options.allowByeRitual ?? true) &&
      options.byeResolution === undefined &&
      event.format === "singles" &&
      event.settings.byeRitual &&
      result.byeContenders.length > 1;
    if (ritualWanted) {
      const ritual = openRitual({
        id: ctx.ids("ritual"),
        eventId: event.id,
        roundId: draft.id,
        kind: "bye-decision",
        participants: result.byeContenders,
        dieSides: dieSidesFor(config, "bye-decision"),
        at,
        windowMinutes: config.ritualWindowMinutes,
      });
      tx.saveRitual(ritual);
      ctx.events.push({ type: "RITUAL_OPENED", eventId: event.id, ritualId: ritual.id, kind: ritual.kind, participants: ritual.participants, at });
      return tx.saveRound({ ...draft, state: "drafting", pendingRitualId: ritual.id, gameIds: preserved.map((game) => game.id) });
    }

    pairings = result.pairings;
    bye = result.bye;
  }

  let orderKey = preserved.reduce((max, game) => Math.max(max, game.orderKey), 0);
  const base = { eventId: event.id, roundId: draft.id, roundNumber: draft.number, createdAt: at, version: 0 };
  const created: Game[] = [];

  if (event.format === "teams") {
    const teams = new Map(roster.map((entry) => [entry.participant.id, entry.participant]));
    expandTeamPairings(pairings, teams, event.teamSize ?? 1).forEach((board) => {
      orderKey += 1;
      created.push({
        ...base,
        id: ctx.ids("game"),
        orderKey,
        participants: board.players,
        teams: board.teams,
        slot: board.slot,
        room: null,
        state: "unplayed",
        isBye: false,
      });
    });
  } else {
    pairings.forEach((pairing) => {
      orderKey += 1;
      created.push({ ...base, id: ctx.ids("game"), orderKey, participants: pairing, room: null, state: "unplayed", isBye: false });
    });
  }

  const priorRooms = roomsByParticipant(previous.filter((game) => game.roundNumber === draft.number - 1));
  const heldRooms = preserved.map((game) => game.room).filter((room): room is string => room !== null);
  const rooms = assignRooms(
    created.map((game) => ({ participants: [game.participants[0], game.participants[1] ?? game.participants[0]] })),
    config.rooms,
    priorRooms,
    heldRooms,
  );
  created.forEach((game, idx) => {
    game.room = rooms[idx];
  });

  if (bye !== null) {
    orderKey += 1;
    created.push({
      ...base,
      id: ctx.ids("game"),
      orderKey,
      participants: [bye, null],
      teams: event.format === "teams" ? [bye, null] : undefined,
      room: null,
      state: "confirmed",
      isBye: true,
      confirmation: { actorId: SYSTEM_ACTOR_ID, at, automatic: true },
    });
  }

  const games = [...preserved, ...created];
  const announced = transitionRound(
    { ...draft, gameIds: games.map((game) => game.id), pendingRitualId: undefined, state: "drafting" },
    "announced",
    at,
  );

  const validation = validateRound(announced, games, knownIds(roster), config.rooms.length);
  if (!validation.ok) {
    const first = validation.issues.find((issue) => issue.level === "error");
    throw new EngineError("InvalidRoster", first?.message ?? `round ${draft.number} failed validation`, validation.issues);
  }

  created.forEach((game) => tx.saveGame(game));
  const saved = tx.saveRound(announced);
  ctx.events.push({
    type: "ROUND_ANNOUNCED",
    eventId: event.id,
    roundId: saved.id,
    roundNumber: saved.number,
    deadlineAt: saved.deadlineAt,
    pairings: games.map(toPairing),
    at,
  });
  return saved;
}

/** Rounded average VP per side over the round's scored games. */
export function averageVp(games: Game[]): number {
  const values = games.filter((game) => !game.isBye && TERMINAL_GAME_STATES.has(game.state)).flatMap((game) => effectiveVp(game) ?? []);
  if (values.length === 0) {
    return 0;
  }
  return Math.round(values.reduce((sum, value) => sum + value, 0) / values.length);
}

/**
 * Credits byes, locks every game and closes the round. Standings are derived
 * from locked games, so they are current once this commits.
 *
 * The bye credit is per board; a team bye counts `teamSize` boards, like a
 * played meeting.
 */
export async function finalizeRound(ctx: FlowContext, event: TournamentEvent, round: Round, games: Game[]): Promise<Round> {
  const { tx, at } = ctx;
  const boards = event.format === "teams" ? event.teamSize ?? 1 : 1;
  const byeVp = (event.scoring.byeVp ?? averageVp(games)) * boards;

  games.forEach((game) => {
    const credited = game.isBye && !game.vp ? creditBye(game, byeVp) : game;
    tx.saveGame(lockGame(credited, at));
  });

  const completed = tx.saveRound(transitionRound(round, "complete", at));
  ctx.events.push({ type: "STANDINGS_UPDATED", eventId: event.id, at });
  ctx.events.push({ type: "ROUND_COMPLETED", eventId: event.id, roundId: round.id, roundNumber: round.number, at });
  return completed;
}

/** Closes the round when its last game just settled. */
export async function completeIfSettled(ctx: FlowContext, roundId: ID): Promise<boolean> {
  const round = await ctx.tx.loadRoundById(roundId);
  const games = await ctx.tx.listGames(roundId);
  if (!isRoundSettled(round, games)) {
    return false;
  }
  const event = await ctx.tx.loadEvent(round.eventId);
  await finalizeRound(ctx, event, round, games);
  return true;
}

/** Bye-decision rituals still count every tied participant; later attempts only the leaders. */
export function ritualContenders(session: RitualSession): ID[] {
  if (session.attempt === 0) {
    return session.participants;
  }
  const current = session.rolls.filter((roll) => roll.attempt === session.attempt).map((roll) => roll.participantId);
  return [...new Set([...session.awaiting, ...current])].sort(compareIds);
}

/** Hands a closed ritual's winner to whatever was waiting on it. */
export async function applyRitualOutcome(ctx: FlowContext, session: RitualSession): Promise<void> {
  const { tx, at } = ctx;
  if (session.kind === "seat-roll" && session.gameId) {
    const game = await tx.loadGame(session.gameId);
    const consumed = consumeRitual(session, at);
    tx.saveRitual(consumed.session);
    tx.saveGame({ ...game, seat: { winnerId: consumed.winnerId, ritualId: session.id, method: session.outcome?.method ?? "fallback" } });
    return;
  }

  if (session.kind === "bye-decision") {
    const round = await tx.loadRoundById(session.roundId);
    if (round.state !== "drafting" || round.pendingRitualId !== session.id) {
      return;
    }
    const consumed = consumeRitual(session, at);
    tx.saveRitual(consumed.session);
    const event = await tx.loadEvent(round.eventId);
    const preserved = (await tx.listGames(round.id)).filter((game) => round.gameIds.includes(game.id));
    await pairAndAnnounce(ctx, event, round, { preserved, byeResolution: consumed.winnerId, allowByeRitual: false });
  }
}
