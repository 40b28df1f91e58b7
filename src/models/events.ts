import type { ID, ISODateTime, VpPair } from "@/models/base";
import type { EventPhase } from "@/models/tournament";

export interface AnnouncedPairing {
  gameId: ID;
  participants: [ID, ID | null];
  teams?: [ID, ID | null];
  slot?: number;
  room: string | null;
}

export type DomainEvent =
  | { type: "EVENT_CREATED"; eventId: ID; at: ISODateTime }
  | { type: "EVENT_PHASE_CHANGED"; eventId: ID; phase: EventPhase; at: ISODateTime }
  | { type: "PARTICIPANT_REGISTERED"; eventId: ID; participantId: ID; at: ISODateTime }
  | { type: "LIST_APPROVED"; eventId: ID; participantId: ID; listRef: string; at: ISODateTime }
  | { type: "PARTICIPANT_DROPPED"; eventId: ID; participantId: ID; at: ISODateTime }
  | { type: "ROUND_ANNOUNCED"; eventId: ID; roundId: ID; roundNumber: number; deadlineAt: ISODateTime; pairings: AnnouncedPairing[]; at: ISODateTime }
  | { type: "ROUND_ACTIVE"; eventId: ID; roundId: ID; at: ISODateTime }
  | { type: "ROUND_REPAIRED"; eventId: ID; roundId: ID; discardedGameIds: ID[]; at: ISODateTime }
  | { type: "DEADLINE_WARNING"; eventId: ID; roundId: ID; roundNumber: number; deadlineAt: ISODateTime; at: ISODateTime }
  | { type: "ROUND_COMPLETED"; eventId: ID; roundId: ID; roundNumber: number; at: ISODateTime }
  | { type: "GAME_REPORTED"; eventId: ID; gameId: ID; reporterId: ID; vp: VpPair; at: ISODateTime }
  | { type: "GAME_CONFIRMED"; eventId: ID; gameId: ID; actorId: ID; automatic: boolean; at: ISODateTime }
  | { type: "GAME_DISPUTED"; eventId: ID; gameId: ID; at: ISODateTime }
  | { type: "GAME_OVERRIDDEN"; eventId: ID; gameId: ID; actorId: ID; at: ISODateTime }
  | { type: "STANDINGS_UPDATED"; eventId: ID; at: ISODateTime }
  | { type: "RITUAL_OPENED"; eventId: ID; ritualId: ID; kind: string; participants: ID[]; at: ISODateTime }
  | { type: "RITUAL_ROLLED"; eventId: ID; ritualId: ID; participantId: ID; value: number; at: ISODateTime }
  | { type: "RITUAL_RESOLVED"; eventId: ID; ritualId: ID; winnerId: ID; method: "roll" | "fallback"; at: ISODateTime }
  | { type: "RITUAL_EXPIRED"; eventId: ID; ritualId: ID; at: ISODateTime };
