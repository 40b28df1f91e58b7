import { z } from "zod";

const id = z.string().min(1);
const vpPair = z.tuple([z.number(), z.number()]);
const isoDateTime = z.string().datetime({ offset: true });

export const createEventSchema = z
  .object({
    id: id.optional(),
    name: z.string().min(1),
    format: z.enum(["singles", "teams"]).default("singles"),
    teamSize: z.number().int().min(1).max(10).optional(),
    /** Zero derives the count from the roster when the event goes active. */
    roundCount: z.number().int().min(0).max(20).default(0),
    scoring: z
      .object({
        win: z.number().default(3),
        draw: z.number().default(1),
        loss: z.number().default(0),
        byeResult: z.enum(["win", "draw"]).default("win"),
        byeVp: z.number().int().min(0).optional(),
      })
      .default({}),
    settings: z
      .object({
        byeRitual: z.boolean().default(false),
        rngSeed: z.string().optional(),
      })
      .default({}),
  })
  .refine((payload) => payload.format === "singles" || payload.teamSize !== undefined, {
    message: "team events need a teamSize",
    path: ["teamSize"],
  });

export const registerParticipantSchema = z.object({
  eventId: id,
  participant: z.object({
    id,
    name: z.string().min(1),
    kind: z.enum(["player", "team"]).default("player"),
    members: z.array(id).optional(),
  }),
  listRef: z.string().optional(),
  excludedOpponents: z.array(id).optional(),
});

/** Records the outcome of an external list review on a registration. */
export const approveListSchema = z.object({
  eventId: id,
  participantId: id,
  listRef: z.string().min(1),
});

export const advanceEventPhaseSchema = z.object({
  eventId: id,
  phase: z.enum(["registration", "listslock", "active", "finished"]),
});

export const startRoundSchema = z.object({
  eventId: id,
  deadlineAt: isoDateTime.optional(),
  roundMinutes: z.number().int().positive().optional(),
});

export const roundRefSchema = z.object({
  eventId: id,
  roundNumber: z.number().int().positive(),
});

export const repairRoundSchema = roundRefSchema.extend({
  deadlineAt: isoDateTime.optional(),
});

export const resultSchema = z.object({
  gameId: id,
  vp: vpPair,
});

export const overrideResultSchema = z
  .object({
    gameId: id,
    vp: vpPair.optional(),
    adjustment: vpPair.optional(),
    reason: z.string().optional(),
  })
  .refine((payload) => payload.vp !== undefined || payload.adjustment !== undefined, {
    message: "an override needs vp or adjustment",
  });

export const dropParticipantSchema = z.object({
  eventId: id,
  participantId: id,
});

export const openRitualSchema = z.object({
  gameId: id,
});

export const submitRollSchema = z.object({
  ritualId: id,
});

export const eventRefSchema = z.object({
  eventId: id,
});

export const commandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("CREATE_EVENT"), payload: createEventSchema }),
  z.object({ type: z.literal("REGISTER_PARTICIPANT"), payload: registerParticipantSchema }),
  z.object({ type: z.literal("APPROVE_LIST"), payload: approveListSchema }),
  z.object({ type: z.literal("ADVANCE_EVENT_PHASE"), payload: advanceEventPhaseSchema }),
  z.object({ type: z.literal("START_ROUND"), payload: startRoundSchema }),
  z.object({ type: z.literal("ACKNOWLEDGE_ROUND"), payload: roundRefSchema }),
  z.object({ type: z.literal("REPAIR_ROUND"), payload: repairRoundSchema }),
  z.object({ type: z.literal("COMPLETE_ROUND"), payload: roundRefSchema }),
  z.object({ type: z.literal("REPORT_RESULT"), payload: resultSchema }),
  z.object({ type: z.literal("CONFIRM_RESULT"), payload: resultSchema }),
  z.object({ type: z.literal("OVERRIDE_RESULT"), payload: overrideResultSchema }),
  z.object({ type: z.literal("DROP_PARTICIPANT"), payload: dropParticipantSchema }),
  z.object({ type: z.literal("OPEN_RITUAL"), payload: openRitualSchema }),
  z.object({ type: z.literal("SUBMIT_ROLL"), payload: submitRollSchema }),
  z.object({ type: z.literal("FINISH_EVENT"), payload: eventRefSchema }),
]);

export type Command = z.input<typeof commandSchema>;
export type CommandType = Command["type"];

export type CreateEventInput = z.input<typeof createEventSchema>;
export type RegisterParticipantInput = z.input<typeof registerParticipantSchema>;
export type ApproveListInput = z.input<typeof approveListSchema>;
export type AdvanceEventPhaseInput = z.input<typeof advanceEventPhaseSchema>;
export type StartRoundInput = z.input<typeof startRoundSchema>;
export type RoundRef = z.input<typeof roundRefSchema>;
export type RepairRoundInput = z.input<typeof repairRoundSchema>;
export type ResultInput = z.input<typeof resultSchema>;
export type OverrideResultInput = z.input<typeof overrideResultSchema>;
export type DropParticipantInput = z.input<typeof dropParticipantSchema>;
export type OpenSeatRollInput = z.input<typeof openRitualSchema>;
export type SubmitRollInput = z.input<typeof submitRollSchema>;
export type EventRef = z.input<typeof eventRefSchema>;

/** Commands written to the audit trail. Rolls are kept on the ritual itself. */
export const auditedCommands: ReadonlySet<CommandType> = new Set<CommandType>([
  "CREATE_EVENT",
  "REGISTER_PARTICIPANT",
  "APPROVE_LIST",
  "ADVANCE_EVENT_PHASE",
  "START_ROUND",
  "ACKNOWLEDGE_ROUND",
  "REPAIR_ROUND",
  "COMPLETE_ROUND",
  "REPORT_RESULT",
  "CONFIRM_RESULT",
  "OVERRIDE_RESULT",
  "DROP_PARTICIPANT",
  "OPEN_RITUAL",
  "FINISH_EVENT",
]);

/** Commands only organizers may issue. */
export const organizerCommands: ReadonlySet<CommandType> = new Set<CommandType>([
  "CREATE_EVENT",
  "APPROVE_LIST",
  "ADVANCE_EVENT_PHASE",
  "START_ROUND",
  "ACKNOWLEDGE_ROUND",
  "REPAIR_ROUND",
  "COMPLETE_ROUND",
  "OVERRIDE_RESULT",
  "FINISH_EVENT",
]);
