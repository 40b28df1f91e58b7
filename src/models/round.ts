import type { ID, ISODateTime } from "@/models/base";

export type RoundState = "drafting" | "announced" | "active" | "deadline-warned" | "complete";

export interface Round {
  id: ID;
  eventId: ID;
  number: number;
  state: RoundState;
  deadlineAt: ISODateTime;
  warnedAt?: ISODateTime;
  gameIds: ID[];
  /** Open ritual the round is waiting on before it can be paired. */
  pendingRitualId?: ID;
  repairCount: number;
  createdAt: ISODateTime;
  announcedAt?: ISODateTime;
  completedAt?: ISODateTime;
  version: number;
}
