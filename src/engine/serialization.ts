import { z } from "zod";

import type { AuditEntry, Game, Participant, Registration, RitualSession, Round, TournamentEvent } from "@/models";
import { EngineError } from "@/engine/errors";

export const LATEST_SNAPSHOT_SCHEMA_VERSION = 1;

const vpPair = z.tuple([z.number(), z.number()]);
const id = z.string().min(1);
const iso = z.string();

const eventSchema: z.ZodType<TournamentEvent> = z.object({
  id,
  name: z.string(),
  format: z.enum(["singles", "teams"]),
  teamSize: z.number().int().positive().optional(),
  phase: z.enum(["interest", "registration", "listslock", "active", "finished"]),
  roundCount: z.number().int().min(0),
  currentRound: z.number().int().min(0),
  scoring: z.object({
    win: z.number(),
    draw: z.number(),
    loss: z.number(),
    byeResult: z.enum(["win", "draw"]),
    byeVp: z.number().optional(),
  }),
  settings: z.object({ byeRitual: z.boolean(), rngSeed: z.string().optional() }),
  createdAt: iso,
  updatedAt: iso,
  version: z.number().int(),
});

const participantSchema: z.ZodType<Participant> = z.object({
  id,
  name: z.string(),
  kind: z.enum(["player", "team"]),
  members: z.array(id).optional(),
  metadata: z.record(z.unknown()).optional(),
});

const registrationSchema: z.ZodType<Registration> = z.object({
  eventId: id,
  participantId: id,
  status: z.enum(["active", "dropped"]),
  listRef: z.string().optional(),
  excludedOpponents: z.array(id).optional(),
  registeredAt: iso,
  droppedAt: iso.optional(),
  version: z.number().int(),
});

const roundSchema: z.ZodType<Round> = z.object({
  id,
  eventId: id,
  number: z.number().int().positive(),
  state: z.enum(["drafting", "announced", "active", "deadline-warned", "complete"]),
  deadlineAt: iso,
  warnedAt: iso.optional(),
  gameIds: z.array(id),
  pendingRitualId: id.optional(),
  repairCount: z.number().int().min(0),
  createdAt: iso,
  announcedAt: iso.optional(),
  completedAt: iso.optional(),
  version: z.number().int(),
});

const gameSchema: z.ZodType<Game> = z.object({
  id,
  eventId: id,
  roundId: id,
  roundNumber: z.number().int().positive(),
  orderKey: z.number().int(),
  participants: z.tuple([id, id.nullable()]),
  teams: z.tuple([id, id.nullable()]).optional(),
  slot: z.number().int().positive().optional(),
  room: z.string().nullable(),
  state: z.enum(["unplayed", "reported", "disputed", "confirmed", "locked"]),
  isBye: z.boolean(),
  vp: vpPair.optional(),
  adjustment: vpPair.optional(),
  report: z.object({ vp: vpPair, reporterId: id, at: iso }).optional(),
  confirmation: z.object({ actorId: id, at: iso, automatic: z.boolean() }).optional(),
  dispute: z.object({ vp: vpPair, actorId: id, at: iso }).optional(),
  seat: z.object({ winnerId: id, ritualId: id, method: z.enum(["roll", "fallback"]) }).optional(),
  createdAt: iso,
  lockedAt: iso.optional(),
  version: z.number().int(),
});

const ritualSchema: z.ZodType<RitualSession> = z.object({
  id,
  eventId: id,
  roundId: id,
  gameId: id.optional(),
  kind: z.enum(["bye-decision", "seat-roll"]),
  participants: z.array(id),
  dieSides: z.number().int().min(2),
  rolls: z.array(z.object({ participantId: id, value: z.number().int(), attempt: z.number().int(), at: iso })),
  attempt: z.number().int().min(0),
  awaiting: z.array(id),
  state: z.enum(["open", "resolved", "expired"]),
  outcome: z.object({ winnerId: id, method: z.enum(["roll", "fallback"]) }).optional(),
  openedAt: iso,
  expiresAt: iso,
  closedAt: iso.optional(),
  closedReason: z.enum(["resolved", "timeout", "abandoned"]).optional(),
  consumedAt: iso.optional(),
  version: z.number().int(),
});

const auditSnapshot = z.object({ vp: vpPair.optional(), adjustment: vpPair.optional(), state: z.string() });

const auditSchema: z.ZodType<AuditEntry> = z.object({
  id,
  eventId: id,
  at: iso,
  actor: z.object({ id: z.string().optional(), name: z.string().optional(), role: z.string().optional() }).optional(),
  commandType: z.string(),
  summary: z.string(),
  payload: z.record(z.unknown()).optional(),
  change: z.object({ gameId: id, before: auditSnapshot, after: auditSnapshot }).optional(),
});

export const storeSnapshotSchema = z.object({
  schemaVersion: z.literal(LATEST_SNAPSHOT_SCHEMA_VERSION),
  events: z.record(eventSchema),
  participants: z.record(participantSchema),
  registrations: z.record(registrationSchema),
  rounds: z.record(roundSchema),
  games: z.record(gameSchema),
  rituals: z.record(ritualSchema),
  audit: z.array(auditSchema),
});

export type StoreSnapshot = z.infer<typeof storeSnapshotSchema>;

export function toJSON(snapshot: StoreSnapshot): string {
  return JSON.stringify(snapshot);
}

const versionHeader = z.object({ schemaVersion: z.number().int() }).passthrough();

export function fromJSON(json: string): StoreSnapshot {
  const raw: unknown = JSON.parse(json);
  const { schemaVersion } = versionHeader.parse(raw);
  if (schemaVersion !== LATEST_SNAPSHOT_SCHEMA_VERSION) {
    throw new EngineError("InvalidInput", `snapshot schema version ${schemaVersion} is not supported, expected ${LATEST_SNAPSHOT_SCHEMA_VERSION}`);
  }
  return storeSnapshotSchema.parse(raw);
}
