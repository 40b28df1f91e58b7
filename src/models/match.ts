import type { ID, ISODateTime, VpPair } from "@/models/base";

export type GameState = "unplayed" | "reported" | "disputed" | "confirmed" | "locked";

export const TERMINAL_GAME_STATES: ReadonlySet<GameState> = new Set(["confirmed", "locked"]);

export interface GameReport {
  vp: VpPair;
  reporterId: ID;
  at: ISODateTime;
}

export interface GameConfirmation {
  actorId: ID;
  at: ISODateTime;
  automatic: boolean;
}

export interface GameDispute {
  vp: VpPair;
  actorId: ID;
  at: ISODateTime;
}

export interface SeatDecision {
  winnerId: ID;
  ritualId: ID;
  method: "roll" | "fallback";
}

/**
 * One pairing of a round. `participants[1] === null` marks a bye; team events
 * store the players of one board in `participants` and the teams in `teams`.
 */
export interface Game {
  id: ID;
  eventId: ID;
  roundId: ID;
  roundNumber: number;
  orderKey: number;
  participants: [ID, ID | null];
  teams?: [ID, ID | null];
  slot?: number;
  room: string | null;
  state: GameState;
  isBye: boolean;
  vp?: VpPair;
  adjustment?: VpPair;
  report?: GameReport;
  confirmation?: GameConfirmation;
  dispute?: GameDispute;
  seat?: SeatDecision;
  createdAt: ISODateTime;
  lockedAt?: ISODateTime;
  version: number;
}
