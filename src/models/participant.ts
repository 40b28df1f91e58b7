import type { ID } from "@/models/base";

export type ParticipantKind = "player" | "team";

export interface Participant {
  id: ID;
  name: string;
  kind: ParticipantKind;
  /** Ordered roster slots of a team; board N pairs member N against member N. */
  members?: ID[];
  metadata?: Record<string, unknown>;
}

export type RegistrationStatus = "active" | "dropped";

export interface Registration {
  eventId: ID;
  participantId: ID;
  status: RegistrationStatus;
  listRef?: string;
  /** Players or teams that must never be paired against this participant. */
  excludedOpponents?: ID[];
  registeredAt: string;
  droppedAt?: string;
  version: number;
}

export interface RosterEntry {
  participant: Participant;
  registration: Registration;
}
