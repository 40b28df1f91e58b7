import type { AuditEntry, Game, ID, Participant, Registration, RitualSession, RosterEntry, Round, TournamentEvent } from "@/models";

/**
 * Unit of work against the persistence layer. Reads see the snapshot the
 * transaction started from plus its own writes; writes become visible to
 * others only when the transaction commits.
 *
 * Missing records raise `NotFound`. A write whose entity `version` no longer
 * matches the stored one fails the commit with `Conflict`.
 */
export interface StorageTx {
  loadEvent(eventId: ID): Promise<TournamentEvent>;
  findEvent(eventId: ID): Promise<TournamentEvent | undefined>;
  saveEvent(event: TournamentEvent): TournamentEvent;

  loadParticipant(participantId: ID): Promise<Participant>;
  findParticipant(participantId: ID): Promise<Participant | undefined>;
  saveParticipant(participant: Participant): Participant;

  /** Registrations of an event joined with their participants, in registration order. */
  loadRoster(eventId: ID): Promise<RosterEntry[]>;
  findRegistration(eventId: ID, participantId: ID): Promise<Registration | undefined>;
  saveRegistration(registration: Registration): Registration;

  loadRound(eventId: ID, roundNumber: number): Promise<Round>;
  findRound(eventId: ID, roundNumber: number): Promise<Round | undefined>;
  loadRoundById(roundId: ID): Promise<Round>;
  listRounds(eventId: ID): Promise<Round[]>;
  saveRound(round: Round): Round;

  /** Every game of the event, ordered by round then board. */
  loadHistory(eventId: ID): Promise<Game[]>;
  loadGame(gameId: ID): Promise<Game>;
  listGames(roundId: ID): Promise<Game[]>;
  saveGame(game: Game): Game;
  deleteGame(game: Game): void;

  loadRitual(ritualId: ID): Promise<RitualSession>;
  listRituals(eventId: ID): Promise<RitualSession[]>;
  saveRitual(ritual: RitualSession): RitualSession;

  appendAudit(entry: AuditEntry): void;
  listAudit(eventId: ID): Promise<AuditEntry[]>;
}

export interface TournamentStorage {
  transaction<T>(fn: (tx: StorageTx) => Promise<T>): Promise<T>;
  listEvents(): Promise<TournamentEvent[]>;
}
