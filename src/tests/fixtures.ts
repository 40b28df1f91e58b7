import { createRoundEngine, createSequentialIds, type RoundEngine, silentLogger, type Actor, type CommandResult, type EngineConfigInput } from "@/engine";
import type { Game, ID, TournamentEvent } from "@/models";
import { MockAdapter } from "@/realtime/MockAdapter";
import { MemoryStorage } from "@/storage/MemoryStorage";

export const T0 = "2026-03-07T09:00:00.000Z";

export const organizer: Actor = { id: "to", name: "Organizer", role: "staff" };

export function player(id: ID): Actor {
  return { id, role: "player" };
}

export function minutesAfter(iso: string, minutes: number): string {
  return new Date(Date.parse(iso) + minutes * 60_000).toISOString();
}

/** Returns the given values in turn, then repeats the last one. */
export function sequenceRandom(values: number[]): () => number {
  let idx = 0;
  return () => {
    const value = values[Math.min(idx, values.length - 1)];
    idx += 1;
    return value;
  };
}

export function unwrap<T>(result: CommandResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

export function errorKind<T>(result: CommandResult<T>): string | undefined {
  return result.ok ? undefined : result.error.kind;
}

export interface Harness {
  engine: RoundEngine;
  storage: MemoryStorage;
  adapter: MockAdapter;
  setNow(iso: string): void;
}

export function createHarness(options: { random?: () => number; config?: EngineConfigInput } = {}): Harness {
  let current = new Date(T0);
  const storage = new MemoryStorage();
  const adapter = new MockAdapter();
  const engine = createRoundEngine({
    storage,
    adapter,
    config: options.config,
    logger: silentLogger,
    ids: createSequentialIds(),
    random: options.random ?? (() => 0.5),
    now: () => current,
  });
  return {
    engine,
    storage,
    adapter,
    setNow(iso) {
      current = new Date(iso);
    },
  };
}

export async function seedSinglesEvent(
  h: Harness,
  playerIds: ID[],
  options: { byeRitual?: boolean; roundCount?: number } = {},
): Promise<TournamentEvent> {
  unwrap(
    await h.engine.createEvent(
      { id: "evt", name: "Spring Open", roundCount: options.roundCount ?? 3, settings: { byeRitual: options.byeRitual ?? false } },
      organizer,
    ),
  );
  unwrap(await h.engine.advanceEventPhase({ eventId: "evt", phase: "registration" }, organizer));
  for (const id of playerIds) {
    unwrap(await h.engine.registerParticipant({ eventId: "evt", participant: { id, name: `Player ${id}` }, listRef: `list-${id}` }, organizer));
  }
  return unwrap(await h.engine.advanceEventPhase({ eventId: "evt", phase: "active" }, organizer));
}

export async function gamesOfRound(h: Harness, roundNumber: number): Promise<Game[]> {
  return h.storage.transaction(async (tx) => {
    const round = await tx.loadRound("evt", roundNumber);
    return tx.listGames(round.id);
  });
}

export function gameOf(games: Game[], participantId: ID): Game {
  const game = games.find((candidate) => candidate.participants.includes(participantId));
  if (!game) {
    throw new Error(`no game for ${participantId}`);
  }
  return game;
}

let serial = 0;

export function makeGame(overrides: Partial<Game> & Pick<Game, "participants">): Game {
  serial += 1;
  return {
    id: `g${serial}`,
    eventId: "evt",
    roundId: `r${overrides.roundNumber ?? 1}`,
    roundNumber: 1,
    orderKey: serial,
    room: null,
    state: "unplayed",
    isBye: overrides.participants[1] === null,
    createdAt: T0,
    version: 0,
    ...overrides,
  };
}

/** First seat reports, second seat acknowledges the same score. */
export async function playGame(h: Harness, game: Game, vp: [number, number]): Promise<Game> {
  const [a, b] = game.participants;
  if (b === null) {
    throw new Error(`game ${game.id} is a bye`);
  }
  unwrap(await h.engine.reportResult({ gameId: game.id, vp }, player(a)));
  return unwrap(await h.engine.confirmResult({ gameId: game.id, vp }, player(b)));
}
