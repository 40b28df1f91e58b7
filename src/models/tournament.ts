import type { ID, ISODateTime } from "@/models/base";

export type EventFormat = "singles" | "teams";

export type EventPhase = "interest" | "registration" | "listslock" | "active" | "finished";

export const EVENT_PHASE_ORDER: readonly EventPhase[] = ["interest", "registration", "listslock", "active", "finished"];

export interface ScoringRules {
  win: number;
  draw: number;
  loss: number;
  /** Result a bye counts as in the standings. */
  byeResult: "win" | "draw";
  /** Fixed VP credited for a bye; round average of confirmed games when absent. */
  byeVp?: number;
}

export interface EventSettings {
  /** Resolve a tied bye with a dice ritual instead of the lowest-id fallback (singles only). */
  byeRitual: boolean;
  /** Seed for the stable shuffle used to break score ties when ordering the roster. */
  rngSeed?: string;
}

export interface TournamentEvent {
  id: ID;
  name: string;
  format: EventFormat;
  teamSize?: number;
  phase: EventPhase;
  roundCount: number;
  currentRound: number;
  scoring: ScoringRules;
  settings: EventSettings;
  createdAt: ISODateTime;
  updatedAt: ISODateTime;
  version: number;
}

export interface AuditChange {
  gameId: ID;
  before: { vp?: [number, number]; adjustment?: [number, number]; state: string };
  after: { vp?: [number, number]; adjustment?: [number, number]; state: string };
}

export interface AuditEntry {
  id: ID;
  eventId: ID;
  at: ISODateTime;
  actor?: { id?: string; name?: string; role?: string };
  commandType: string;
  summary: string;
  payload?: Record<string, unknown>;
  change?: AuditChange;
}
