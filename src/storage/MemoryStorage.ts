import { createStore, type StoreApi } from "zustand/vanilla";

import type { AuditEntry, Game, ID, Participant, Registration, RitualSession, RosterEntry, Round, TournamentEvent } from "@/models";
import { conflict, notFound } from "@/engine/errors";
import { LATEST_SNAPSHOT_SCHEMA_VERSION, fromJSON, toJSON, type StoreSnapshot } from "@/engine/serialization";
import { compareIds } from "@/engine/util";
import type { StorageTx, TournamentStorage } from "@/storage/Storage";

export type StoreState = Omit<StoreSnapshot, "schemaVersion">;

type Versioned = { version: number };

type Table = "events" | "registrations" | "rounds" | "games" | "rituals";

interface PendingWrite<T extends Versioned> {
  expected: number;
  value: T | null;
}

export function emptyStoreState(): StoreState {
  return { events: {}, participants: {}, registrations: {}, rounds: {}, games: {}, rituals: {}, audit: [] };
}

function registrationKey(eventId: ID, participantId: ID): string {
  return `${eventId}:${participantId}`;
}

class WriteSet<T extends Versioned> {
  readonly pending = new Map<string, PendingWrite<T>>();

  put(key: string, value: T): T {
    const expected = this.pending.get(key)?.expected ?? value.version;
    const stored = { ...value, version: expected + 1 };
    this.pending.set(key, { expected, value: stored });
    return stored;
  }

  remove(key: string, value: T): void {
    const expected = this.pending.get(key)?.expected ?? value.version;
    this.pending.set(key, { expected, value: null });
  }

  /** Overlays pending writes on a committed table. */
  view(base: Record<string, T>): Record<string, T> {
    if (this.pending.size === 0) {
      return base;
    }
    const out = { ...base };
    this.pending.forEach((write, key) => {
      if (write.value) {
        out[key] = write.value;
      } else {
        delete out[key];
      }
    });
    return out;
  }
}

class MemoryTx implements StorageTx {
  readonly events = new WriteSet<TournamentEvent>();
  readonly registrations = new WriteSet<Registration>();
  readonly rounds = new WriteSet<Round>();
  readonly games = new WriteSet<Game>();
  readonly rituals = new WriteSet<RitualSession>();
  readonly participants = new Map<ID, Participant>();
  readonly audit: AuditEntry[] = [];

  constructor(private readonly base: StoreState) {}

  async findEvent(eventId: ID): Promise<TournamentEvent | undefined> {
    return this.events.view(this.base.events)[eventId];
  }

  async loadEvent(eventId: ID): Promise<TournamentEvent> {
    const event = await this.findEvent(eventId);
    if (!event) {
      throw notFound("event", eventId);
    }
    return event;
  }

  saveEvent(event: TournamentEvent): TournamentEvent {
    return this.events.put(event.id, event);
  }

  async findParticipant(participantId: ID): Promise<Participant | undefined> {
    return this.participants.get(participantId) ?? this.base.participants[participantId];
  }

  async loadParticipant(participantId: ID): Promise<Participant> {
    const participant = await this.findParticipant(participantId);
    if (!participant) {
      throw notFound("participant", participantId);
    }
    return participant;
  }

  saveParticipant(participant: Participant): Participant {
    this.participants.set(participant.id, participant);
    return participant;
  }

  async loadRoster(eventId: ID): Promise<RosterEntry[]> {
    const registrations = Object.values(this.registrations.view(this.base.registrations))
      .filter((registration) => registration.eventId === eventId)
      .sort((a, b) => compareIds(a.registeredAt, b.registeredAt) || compareIds(a.participantId, b.participantId));

    const roster: RosterEntry[] = [];
    for (const registration of registrations) {
      roster.push({ participant: await this.loadParticipant(registration.participantId), registration });
    }
    return roster;
  }

  async findRegistration(eventId: ID, participantId: ID): Promise<Registration | undefined> {
    return this.registrations.view(this.base.registrations)[registrationKey(eventId, participantId)];
  }

  saveRegistration(registration: Registration): Registration {
    return this.registrations.put(registrationKey(registration.eventId, registration.participantId), registration);
  }

  async listRounds(eventId: ID): Promise<Round[]> {
    return Object.values(this.rounds.view(this.base.rounds))
      .filter((round) => round.eventId === eventId)
      .sort((a, b) => a.number - b.number);
  }

  async findRound(eventId: ID, roundNumber: number): Promise<Round | undefined> {
    return (await this.listRounds(eventId)).find((round) => round.number === roundNumber);
  }

  async loadRound(eventId: ID, roundNumber: number): Promise<Round> {
    const round = await this.findRound(eventId, roundNumber);
    if (!round) {
      throw notFound("round", `${eventId}#${roundNumber}`);
    }
    return round;
  }

  async loadRoundById(roundId: ID): Promise<Round> {
    const round = this.rounds.view(this.base.rounds)[roundId];
    if (!round) {
      throw notFound("round", roundId);
    }
    return round;
  }

  saveRound(round: Round): Round {
    return this.rounds.put(round.id, round);
  }

  async loadHistory(eventId: ID): Promise<Game[]> {
    return Object.values(this.games.view(this.base.games))
      .filter((game) => game.eventId === eventId)
      .sort((a, b) => a.roundNumber - b.roundNumber || a.orderKey - b.orderKey);
  }

  async loadGame(gameId: ID): Promise<Game> {
    const game = this.games.view(this.base.games)[gameId];
    if (!game) {
      throw notFound("game", gameId);
    }
    return game;
  }

  async listGames(roundId: ID): Promise<Game[]> {
    return Object.values(this.games.view(this.base.games))
      .filter((game) => game.roundId === roundId)
      .sort((a, b) => a.orderKey - b.orderKey);
  }

  saveGame(game: Game): Game {
    return this.games.put(game.id, game);
  }

  deleteGame(game: Game): void {
    this.games.remove(game.id, game);
  }

  async loadRitual(ritualId: ID): Promise<RitualSession> {
    const ritual = this.rituals.view(this.base.rituals)[ritualId];
    if (!ritual) {
      throw notFound("ritual", ritualId);
    }
    return ritual;
  }

  async listRituals(eventId: ID): Promise<RitualSession[]> {
    return Object.values(this.rituals.view(this.base.rituals))
      .filter((ritual) => ritual.eventId === eventId)
      .sort((a, b) => compareIds(a.openedAt, b.openedAt) || compareIds(a.id, b.id));
  }

  saveRitual(ritual: RitualSession): RitualSession {
    return this.rituals.put(ritual.id, ritual);
  }

  appendAudit(entry: AuditEntry): void {
    this.audit.push(entry);
  }

  async listAudit(eventId: ID): Promise<AuditEntry[]> {
    return [...this.base.audit, ...this.audit].filter((entry) => entry.eventId === eventId);
  }
}

function checkVersions<T extends Versioned>(table: Table, writes: WriteSet<T>, current: Record<string, T>): void {
  writes.pending.forEach((write, key) => {
    const stored = current[key]?.version ?? 0;
    if (stored !== write.expected) {
      throw conflict(`${table.slice(0, -1)} '${key}' was modified concurrently (expected version ${write.expected}, found ${stored})`);
    }
  });
}

function checkRoundNumbers(rounds: Record<string, Round>): void {
  const seen = new Map<string, ID>();
  Object.values(rounds).forEach((round) => {
    const key = `${round.eventId}#${round.number}`;
    const other = seen.get(key);
    if (other !== undefined && other !== round.id) {
      throw conflict(`round ${round.number} of event '${round.eventId}' already exists`);
    }
    seen.set(key, round.id);
  });
}

/**
 * In-process storage on a zustand vanilla store. Commits are atomic: all
 * version checks pass before the single `setState`, or nothing is written.
 */
export class MemoryStorage implements TournamentStorage {
  readonly store: StoreApi<StoreState>;

  constructor(initial: StoreState = emptyStoreState()) {
    this.store = createStore<StoreState>()(() => initial);
  }

  async transaction<T>(fn: (tx: StorageTx) => Promise<T>): Promise<T> {
    const tx = new MemoryTx(this.store.getState());
    const result = await fn(tx);
    this.commit(tx);
    return result;
  }

  async listEvents(): Promise<TournamentEvent[]> {
    return Object.values(this.store.getState().events).sort((a, b) => compareIds(a.createdAt, b.createdAt) || compareIds(a.id, b.id));
  }

  snapshot(): string {
    return toJSON({ schemaVersion: LATEST_SNAPSHOT_SCHEMA_VERSION, ...this.store.getState() });
  }

  static fromSnapshot(json: string): MemoryStorage {
    const { schemaVersion: _schemaVersion, ...state } = fromJSON(json);
    return new MemoryStorage(state);
  }

  private commit(tx: MemoryTx): void {
    const current = this.store.getState();
    checkVersions("events", tx.events, current.events);
    checkVersions("registrations", tx.registrations, current.registrations);
    checkVersions("rounds", tx.rounds, current.rounds);
    checkVersions("games", tx.games, current.games);
    checkVersions("rituals", tx.rituals, current.rituals);

    const rounds = tx.rounds.view(current.rounds);
    checkRoundNumbers(rounds);

    const participants = { ...current.participants };
    tx.participants.forEach((participant, participantId) => {
      participants[participantId] = participant;
    });

    this.store.setState({
      events: tx.events.view(current.events),
      participants,
      registrations: tx.registrations.view(current.registrations),
      rounds,
      games: tx.games.view(current.games),
      rituals: tx.rituals.view(current.rituals),
      audit: tx.audit.length > 0 ? [...current.audit, ...tx.audit] : current.audit,
    });
  }
}
