import type { ID, ISODateTime } from "@/models/base";

export type RitualKind = "bye-decision" | "seat-roll";

export type RitualState = "open" | "resolved" | "expired";

export interface RitualRoll {
  participantId: ID;
  value: number;
  attempt: number;
  at: ISODateTime;
}

export interface RitualOutcome {
  winnerId: ID;
  method: "roll" | "fallback";
}

export interface RitualSession {
  id: ID;
  eventId: ID;
  roundId: ID;
  gameId?: ID;
  kind: RitualKind;
  participants: ID[];
  dieSides: number;
  rolls: RitualRoll[];
  attempt: number;
  awaiting: ID[];
  state: RitualState;
  outcome?: RitualOutcome;
  openedAt: ISODateTime;
  expiresAt: ISODateTime;
  closedAt?: ISODateTime;
  closedReason?: "resolved" | "timeout" | "abandoned";
  consumedAt?: ISODateTime;
  version: number;
}
