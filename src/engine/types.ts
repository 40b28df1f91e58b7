import type { EngineFailure } from "@/engine/errors";
import type { DomainEvent, ID } from "@/models";

export type ActorRole = "player" | "staff" | "admin";

export interface Actor {
  id: ID;
  name?: string;
  role: ActorRole;
}

export type CommandResult<T> =
  | { ok: true; data: T; events: DomainEvent[] }
  | { ok: false; error: EngineFailure };

export function isOrganizer(actor: Actor): boolean {
  return actor.role === "staff" || actor.role === "admin";
}
