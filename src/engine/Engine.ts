import { ZodError } from "zod";

import type { AuditChange, AuditEntry, DomainEvent, Game, ID, ISODateTime, Registration, RitualSession, Round, Standing, TournamentEvent } from "@/models";
import { EVENT_PHASE_ORDER, SYSTEM_ACTOR_ID } from "@/models";
import { createAuditEntry, sortAudit } from "@/admin/audit";
import {
  advanceEventPhaseSchema,
  approveListSchema,
  auditedCommands,
  commandSchema,
  createEventSchema,
  dropParticipantSchema,
  eventRefSchema,
  openRitualSchema,
  organizerCommands,
  overrideResultSchema,
  registerParticipantSchema,
  repairRoundSchema,
  resultSchema,
  roundRefSchema,
  startRoundSchema,
  submitRollSchema,
  type AdvanceEventPhaseInput,
  type ApproveListInput,
  type Command,
  type CreateEventInput,
  type DropParticipantInput,
  type EventRef,
  type OpenSeatRollInput,
  type OverrideResultInput,
  type RegisterParticipantInput,
  type RepairRoundInput,
  type ResultInput,
  type RoundRef,
  type StartRoundInput,
  type SubmitRollInput,
} from "@/engine/commands";
import { dieSidesFor, resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "@/engine/config";
import { EngineError, invalidTransition, isEngineError, unauthorized, type EngineFailure } from "@/engine/errors";
import { recommendedRoundCount } from "@/engine/formats";
import { createConsoleLogger, describeError, type Logger } from "@/engine/logger";
import * as gameMachine from "@/engine/machines/gameMachine";
import { REPAIRABLE_ROUND_STATES, PLAYABLE_ROUND_STATES, isDeadlineWarningDue, isRoundSettled, transitionRound } from "@/engine/machines/roundMachine";
import { abandonRitual, expireRitual, isRitualExpired, openRitual, recordRoll, ritualFallbackWinner } from "@/engine/ritual";
import {
  applyRitualOutcome,
  assertListsApproved,
  completeIfSettled,
  finalizeRound,
  gamesKeptByRepair,
  pairAndAnnounce,
  ritualContenders,
  standingsScores,
  type FlowContext,
} from "@/engine/roundFlow";
import { selectors, type Dashboard } from "@/engine/selectors";
import { computeStandings } from "@/engine/standings";
import type { Actor, CommandResult } from "@/engine/types";
import { isOrganizer } from "@/engine/types";
import { addMinutes, createRandomIds, rollDie, type IdGenerator } from "@/engine/util";
import { LoggingAdapter } from "@/realtime/LoggingAdapter";
import type { RealtimeAdapter } from "@/realtime/RealtimeAdapter";
import type { StorageTx, TournamentStorage } from "@/storage/Storage";

export interface RoundEngineOptions {
  storage: TournamentStorage;
  config?: EngineConfigInput;
  logger?: Logger;
  adapter?: RealtimeAdapter;
  ids?: IdGenerator;
  /** Uniform [0, 1) source for dice. */
  random?: () => number;
  now?: () => Date;
}

export interface SweepReport {
  changed: number;
  failed: number;
}

interface CommandContext extends FlowContext {
  actor: Actor;
  change?: AuditChange;
}

interface HandlerOutput<T> {
  eventId: ID;
  data: T;
}

function failureFrom(error: unknown): EngineFailure | undefined {
  if (isEngineError(error)) {
    return { kind: error.kind, message: error.message, details: error.details };
  }
  if (error instanceof ZodError) {
    const message = error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
    return { kind: "InvalidInput", message, details: error.issues };
  }
  return undefined;
}

function assertPlayable(round: Round): void {
  if (!PLAYABLE_ROUND_STATES.has(round.state)) {
    throw invalidTransition(`round ${round.number} is ${round.state}, results are not open`);
  }
}

function sameMembers(a: ID[] | undefined, b: ID[] | undefined): boolean {
  const left = a ?? [];
  const right = b ?? [];
  return left.length === right.length && left.every((member, idx) => member === right[idx]);
}

function assertSelfOrOrganizer(actor: Actor, participantIds: ID[], message: string): void {
  if (!isOrganizer(actor) && !participantIds.includes(actor.id)) {
    throw unauthorized(message);
  }
}

/**
 * Command surface of the round engine. Every command runs in one storage
 * transaction, is retried once on `Conflict`, and publishes its events only
 * after commit. No state is cached between calls.
 */
export class RoundEngine {
  readonly config: EngineConfig;
  private readonly storage: TournamentStorage;
  private readonly logger: Logger;
  private readonly adapter: RealtimeAdapter;
  private readonly ids: IdGenerator;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: RoundEngineOptions) {
    this.storage = options.storage;
    this.config = resolveEngineConfig(options.config);
    this.logger = options.logger ?? createConsoleLogger("round-engine");
    this.adapter = options.adapter ?? new LoggingAdapter(this.logger.child("events"));
    this.ids = options.ids ?? createRandomIds();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  private timestamp(): ISODateTime {
    return this.now().toISOString();
  }

  private publish(events: DomainEvent[]): void {
    events.forEach((event) => {
      try {
        this.adapter.broadcast(event);
      } catch (error) {
        this.logger.warn(`event delivery failed for ${event.type}`, { error: describeError(error) });
      }
    });
  }

  private async run<T>(command: Command, actor: Actor, handler: (ctx: CommandContext) => Promise<HandlerOutput<T>>): Promise<CommandResult<T>> {
    if (organizerCommands.has(command.type) && !isOrganizer(actor)) {
      return { ok: false, error: { kind: "Unauthorized", message: `${command.type} requires an organizer, '${actor.id}' is a ${actor.role}` } };
    }

    for (let attempt = 0; ; attempt += 1) {
      try {
        const committed = await this.storage.transaction(async (tx) => {
          const ctx: CommandContext = { tx, at: this.timestamp(), events: [], config: this.config, ids: this.ids, actor };
          const output = await handler(ctx);
          if (auditedCommands.has(command.type)) {
            tx.appendAudit(
              createAuditEntry({ id: this.ids("audit"), eventId: output.eventId, command, at: ctx.at, actor, change: ctx.change }),
            );
          }
          return { output, events: ctx.events };
        });
        this.publish(committed.events);
        return { ok: true, data: committed.output.data, events: committed.events };
      } catch (error) {
        if (isEngineError(error) && error.kind === "Conflict" && attempt === 0) {
          this.logger.warn(`${command.type} hit a write conflict, retrying`, { error: error.message });
          continue;
        }
        const failure = failureFrom(error);
        if (!failure) {
          this.logger.error(`${command.type} failed`, { error: describeError(error) });
          throw error;
        }
        this.logger.debug(`${command.type} rejected`, { kind: failure.kind, message: failure.message });
        return { ok: false, error: failure };
      }
    }
  }

  private async query<T>(fn: (tx: StorageTx) => Promise<T>): Promise<CommandResult<T>> {
    try {
      const data = await this.storage.transaction(fn);
      return { ok: true, data, events: [] };
    } catch (error) {
      const failure = failureFrom(error);
      if (!failure) {
        this.logger.error("query failed", { error: describeError(error) });
        throw error;
      }
      return { ok: false, error: failure };
    }
  }

  /** Parses an untrusted command and dispatches it. */
  async execute(input: unknown, actor: Actor): Promise<CommandResult<unknown>> {
    const parsed = commandSchema.safeParse(input);
    if (!parsed.success) {
      return { ok: false, error: failureFrom(parsed.error) ?? { kind: "InvalidInput", message: "malformed command" } };
    }
    const command = parsed.data;
    switch (command.type) {
      case "CREATE_EVENT":
        return this.createEvent(command.payload, actor);
      case "REGISTER_PARTICIPANT":
        return this.registerParticipant(command.payload, actor);
      case "APPROVE_LIST":
        return this.approveList(command.payload, actor);
      case "ADVANCE_EVENT_PHASE":
        return this.advanceEventPhase(command.payload, actor);
      case "START_ROUND":
        return this.startRound(command.payload, actor);
      case "ACKNOWLEDGE_ROUND":
        return this.acknowledgeRound(command.payload, actor);
      case "REPAIR_ROUND":
        return this.repairRound(command.payload, actor);
      case "COMPLETE_ROUND":
        return this.completeRound(command.payload, actor);
      case "REPORT_RESULT":
        return this.reportResult(command.payload, actor);
      case "CONFIRM_RESULT":
        return this.confirmResult(command.payload, actor);
      case "OVERRIDE_RESULT":
        return this.overrideResult(command.payload, actor);
      case "DROP_PARTICIPANT":
        return this.dropParticipant(command.payload, actor);
      case "OPEN_RITUAL":
        return this.openSeatRoll(command.payload, actor);
      case "SUBMIT_ROLL":
        return this.submitRoll(command.payload, actor);
      case "FINISH_EVENT":
        return this.finishEvent(command.payload, actor);
    }
  }

  createEvent(input: CreateEventInput, actor: Actor): Promise<CommandResult<TournamentEvent>> {
    return this.run({ type: "CREATE_EVENT", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = createEventSchema.parse(input);
      const id = payload.id ?? this.ids("event");
      if (await tx.findEvent(id)) {
        throw invalidTransition(`event '${id}' already exists`);
      }
      const event = tx.saveEvent({
        id,
        name: payload.name,
        format: payload.format,
        teamSize: payload.format === "teams" ? payload.teamSize : undefined,
        phase: "interest",
        roundCount: payload.roundCount,
        currentRound: 0,
        scoring: payload.scoring,
        settings: payload.settings,
        createdAt: at,
        updatedAt: at,
        version: 0,
      });
      events.push({ type: "EVENT_CREATED", eventId: id, at });
      return { eventId: id, data: event };
    });
  }

  registerParticipant(input: RegisterParticipantInput, actor: Actor): Promise<CommandResult<Registration>> {
    return this.run({ type: "REGISTER_PARTICIPANT", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = registerParticipantSchema.parse(input);
      const { participant } = payload;
      const event = await tx.loadEvent(payload.eventId);
      if (event.phase !== "interest" && event.phase !== "registration") {
        throw invalidTransition(`event '${event.id}' is ${event.phase}, registration is closed`);
      }
      assertSelfOrOrganizer(actor, [participant.id, ...(participant.members ?? [])], `'${actor.id}' cannot register '${participant.id}'`);
      if (payload.listRef !== undefined && !isOrganizer(actor)) {
        throw unauthorized(`only an organizer can attach an approved list to '${participant.id}'`);
      }

      const expectedKind = event.format === "teams" ? "team" : "player";
      if (participant.kind !== expectedKind) {
        throw new EngineError("InvalidRoster", `event '${event.id}' takes ${expectedKind}s, '${participant.id}' is a ${participant.kind}`);
      }
      if (participant.kind === "team") {
        const members = participant.members ?? [];
        const size = event.teamSize ?? 1;
        if (members.length < size || new Set(members).size !== members.length) {
          throw new EngineError("InvalidRoster", `team '${participant.id}' needs ${size} distinct members, got ${members.length}`);
        }
      }
      if (await tx.findRegistration(event.id, participant.id)) {
        throw invalidTransition(`participant '${participant.id}' already registered for event '${event.id}'`);
      }

      const known = await tx.findParticipant(participant.id);
      if (!known) {
        tx.saveParticipant({ id: participant.id, name: participant.name, kind: participant.kind, members: participant.members });
      } else if (known.kind !== participant.kind || !sameMembers(known.members, participant.members)) {
        throw new EngineError("InvalidRoster", `participant '${participant.id}' is already registered elsewhere as a ${known.kind} with other members`);
      }
      const registration = tx.saveRegistration({
        eventId: event.id,
        participantId: participant.id,
        status: "active",
        listRef: payload.listRef,
        excludedOpponents: payload.excludedOpponents,
        registeredAt: at,
        version: 0,
      });
      events.push({ type: "PARTICIPANT_REGISTERED", eventId: event.id, participantId: participant.id, at });
      return { eventId: event.id, data: registration };
    });
  }

  approveList(input: ApproveListInput, actor: Actor): Promise<CommandResult<Registration>> {
    return this.run({ type: "APPROVE_LIST", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = approveListSchema.parse(input);
      const event = await tx.loadEvent(payload.eventId);
      if (event.phase === "active" || event.phase === "finished") {
        throw invalidTransition(`event '${event.id}' is ${event.phase}, lists are locked`);
      }
      const registration = await tx.findRegistration(event.id, payload.participantId);
      if (!registration) {
        throw new EngineError("NotFound", `registration of '${payload.participantId}' in event '${event.id}' not found`);
      }
      if (registration.status === "dropped") {
        throw invalidTransition(`participant '${payload.participantId}' already dropped`);
      }
      const approved = tx.saveRegistration({ ...registration, listRef: payload.listRef });
      events.push({ type: "LIST_APPROVED", eventId: event.id, participantId: payload.participantId, listRef: payload.listRef, at });
      return { eventId: event.id, data: approved };
    });
  }

  advanceEventPhase(input: AdvanceEventPhaseInput, actor: Actor): Promise<CommandResult<TournamentEvent>> {
    return this.run({ type: "ADVANCE_EVENT_PHASE", payload: input }, actor, async (ctx) => {
      const payload = advanceEventPhaseSchema.parse(input);
      const event = await ctx.tx.loadEvent(payload.eventId);
      return { eventId: event.id, data: await this.moveEventPhase(ctx, event, payload.phase) };
    });
  }

  finishEvent(input: EventRef, actor: Actor): Promise<CommandResult<TournamentEvent>> {
    return this.run({ type: "FINISH_EVENT", payload: input }, actor, async (ctx) => {
      const payload = eventRefSchema.parse(input);
      const event = await ctx.tx.loadEvent(payload.eventId);
      return { eventId: event.id, data: await this.moveEventPhase(ctx, event, "finished") };
    });
  }

  private async moveEventPhase(ctx: CommandContext, event: TournamentEvent, phase: TournamentEvent["phase"]): Promise<TournamentEvent> {
    const { tx, at } = ctx;
    if (EVENT_PHASE_ORDER.indexOf(phase) <= EVENT_PHASE_ORDER.indexOf(event.phase)) {
      throw invalidTransition(`event '${event.id}' is already ${event.phase}, it cannot move to ${phase}`);
    }

    let roundCount = event.roundCount;
    if (phase === "active") {
      const kind = event.format === "teams" ? "team" : "player";
      const active = (await tx.loadRoster(event.id)).filter((entry) => entry.registration.status === "active" && entry.participant.kind === kind);
      if (active.length < 2) {
        throw new EngineError("InvalidRoster", `insufficient roster: event '${event.id}' has ${active.length} active participant(s)`);
      }
      assertListsApproved(active);
      if (roundCount === 0) {
        roundCount = recommendedRoundCount(active.length);
      }
    }
    if (phase === "finished") {
      const open = (await tx.listRounds(event.id)).find((round) => round.state !== "complete");
      if (open) {
        throw invalidTransition(`round ${open.number} is still ${open.state}`);
      }
    }

    const next = tx.saveEvent({ ...event, phase, roundCount, updatedAt: at });
    ctx.events.push({ type: "EVENT_PHASE_CHANGED", eventId: event.id, phase, at });
    return next;
  }

  startRound(input: StartRoundInput, actor: Actor): Promise<CommandResult<Round>> {
    return this.run({ type: "START_ROUND", payload: input }, actor, async (ctx) => {
      const payload = startRoundSchema.parse(input);
      const { tx, at } = ctx;
      const event = await tx.loadEvent(payload.eventId);
      if (event.phase !== "active") {
        throw invalidTransition(`event '${event.id}' is ${event.phase}, rounds start only while active`);
      }
      const rounds = await tx.listRounds(event.id);
      const last = rounds[rounds.length - 1];
      if (last && last.state !== "complete") {
        throw invalidTransition(`round ${last.number} already ${last.state}`);
      }
      const number = event.currentRound + 1;
      if (number > event.roundCount) {
        throw invalidTransition(`event '${event.id}' already played all ${event.roundCount} rounds`);
      }

      const savedEvent = tx.saveEvent({ ...event, currentRound: number, updatedAt: at });
      const draft: Round = {
        id: this.ids("round"),
        eventId: event.id,
        number,
        state: "drafting",
        deadlineAt: payload.deadlineAt ?? addMinutes(at, payload.roundMinutes ?? this.config.defaultRoundMinutes),
        gameIds: [],
        repairCount: 0,
        createdAt: at,
        version: 0,
      };
      const round = await pairAndAnnounce(ctx, savedEvent, draft);
      this.logger.info(`round ${round.number} of '${event.id}' ${round.state}`, { games: round.gameIds.length });
      return { eventId: event.id, data: round };
    });
  }

  acknowledgeRound(input: RoundRef, actor: Actor): Promise<CommandResult<Round>> {
    return this.run({ type: "ACKNOWLEDGE_ROUND", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = roundRefSchema.parse(input);
      const round = await tx.loadRound(payload.eventId, payload.roundNumber);
      const active = tx.saveRound(transitionRound(round, "active", at));
      events.push({ type: "ROUND_ACTIVE", eventId: round.eventId, roundId: round.id, at });
      return { eventId: round.eventId, data: active };
    });
  }

  repairRound(input: RepairRoundInput, actor: Actor): Promise<CommandResult<Round>> {
    return this.run({ type: "REPAIR_ROUND", payload: input }, actor, async (ctx) => {
      const payload = repairRoundSchema.parse(input);
      const { tx, at } = ctx;
      const event = await tx.loadEvent(payload.eventId);
      const round = await tx.loadRound(payload.eventId, payload.roundNumber);
      if (!REPAIRABLE_ROUND_STATES.has(round.state)) {
        throw invalidTransition(`round ${round.number} is ${round.state} and cannot be repaired`);
      }

      const roundGames = await tx.listGames(round.id);
      const preserved = gamesKeptByRepair(roundGames);
      const discarded = roundGames.filter((game) => !preserved.includes(game));
      discarded.forEach((game) => tx.deleteGame(game));

      const rituals = (await tx.listRituals(event.id)).filter((ritual) => ritual.roundId === round.id && ritual.state === "open");
      rituals.forEach((ritual) => {
        tx.saveRitual(abandonRitual(ritual, at));
        ctx.events.push({ type: "RITUAL_EXPIRED", eventId: event.id, ritualId: ritual.id, at });
      });

      const drafting = transitionRound(round, "drafting", at);
      const deadlineAt = payload.deadlineAt ?? round.deadlineAt;
      ctx.events.push({ type: "ROUND_REPAIRED", eventId: event.id, roundId: round.id, discardedGameIds: discarded.map((game) => game.id), at });
      const repaired = await pairAndAnnounce(
        ctx,
        event,
        {
          ...drafting,
          deadlineAt,
          warnedAt: deadlineAt === round.deadlineAt ? round.warnedAt : undefined,
          pendingRitualId: undefined,
          repairCount: round.repairCount + 1,
        },
        { preserved },
      );
      this.logger.info(`round ${round.number} of '${event.id}' repaired`, { discarded: discarded.length, preserved: preserved.length });
      return { eventId: event.id, data: repaired };
    });
  }

  completeRound(input: RoundRef, actor: Actor): Promise<CommandResult<Round>> {
    return this.run({ type: "COMPLETE_ROUND", payload: input }, actor, async (ctx) => {
      const payload = roundRefSchema.parse(input);
      const event = await ctx.tx.loadEvent(payload.eventId);
      const round = await ctx.tx.loadRound(payload.eventId, payload.roundNumber);
      const roundGames = await ctx.tx.listGames(round.id);
      if (!isRoundSettled(round, roundGames)) {
        assertPlayable(round);
        const open = roundGames.filter((game) => game.state !== "confirmed" && game.state !== "locked").length;
        throw invalidTransition(`round ${round.number} still has ${open} unsettled game(s)`);
      }
      return { eventId: event.id, data: await finalizeRound(ctx, event, round, roundGames) };
    });
  }

  reportResult(input: ResultInput, actor: Actor): Promise<CommandResult<Game>> {
    return this.run({ type: "REPORT_RESULT", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = resultSchema.parse(input);
      const game = await tx.loadGame(payload.gameId);
      assertPlayable(await tx.loadRoundById(game.roundId));
      const reported = tx.saveGame(gameMachine.reportResult(game, actor.id, payload.vp, at, this.config.maxVp));
      events.push({ type: "GAME_REPORTED", eventId: game.eventId, gameId: game.id, reporterId: actor.id, vp: payload.vp, at });
      return { eventId: game.eventId, data: reported };
    });
  }

  confirmResult(input: ResultInput, actor: Actor): Promise<CommandResult<Game>> {
    return this.run({ type: "CONFIRM_RESULT", payload: input }, actor, async (ctx) => {
      const payload = resultSchema.parse(input);
      const { tx, at, events } = ctx;
      const game = await tx.loadGame(payload.gameId);
      assertPlayable(await tx.loadRoundById(game.roundId));
      const next = tx.saveGame(gameMachine.confirmResult(game, actor.id, payload.vp, at, this.config.maxVp));
      if (next.state === "disputed") {
        events.push({ type: "GAME_DISPUTED", eventId: game.eventId, gameId: game.id, at });
        this.logger.warn(`game '${game.id}' disputed`, { reported: game.report?.vp, acknowledged: payload.vp });
      } else {
        events.push({ type: "GAME_CONFIRMED", eventId: game.eventId, gameId: game.id, actorId: actor.id, automatic: false, at });
        await completeIfSettled(ctx, game.roundId);
      }
      return { eventId: game.eventId, data: next };
    });
  }

  overrideResult(input: OverrideResultInput, actor: Actor): Promise<CommandResult<Game>> {
    return this.run({ type: "OVERRIDE_RESULT", payload: input }, actor, async (ctx) => {
      const payload = overrideResultSchema.parse(input);
      const { tx, at, events } = ctx;
      const game = await tx.loadGame(payload.gameId);
      const round = await tx.loadRoundById(game.roundId);
      const { game: overridden, change } = gameMachine.overrideResult(game, actor.id, payload, at, this.config.maxVp);
      const saved = tx.saveGame(overridden);
      ctx.change = change;
      events.push({ type: "GAME_OVERRIDDEN", eventId: game.eventId, gameId: game.id, actorId: actor.id, at });

      const completed = PLAYABLE_ROUND_STATES.has(round.state) && (await completeIfSettled(ctx, round.id));
      if (!completed) {
        events.push({ type: "STANDINGS_UPDATED", eventId: game.eventId, at });
      }
      return { eventId: game.eventId, data: saved };
    });
  }

  dropParticipant(input: DropParticipantInput, actor: Actor): Promise<CommandResult<Registration>> {
    return this.run({ type: "DROP_PARTICIPANT", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = dropParticipantSchema.parse(input);
      const participant = await tx.loadParticipant(payload.participantId);
      assertSelfOrOrganizer(actor, [participant.id, ...(participant.members ?? [])], `'${actor.id}' cannot drop '${participant.id}'`);
      const registration = await tx.findRegistration(payload.eventId, payload.participantId);
      if (!registration) {
        throw new EngineError("NotFound", `registration of '${payload.participantId}' in event '${payload.eventId}' not found`);
      }
      if (registration.status === "dropped") {
        throw invalidTransition(`participant '${payload.participantId}' already dropped`);
      }
      const dropped = tx.saveRegistration({ ...registration, status: "dropped", droppedAt: at });
      events.push({ type: "PARTICIPANT_DROPPED", eventId: payload.eventId, participantId: payload.participantId, at });
      return { eventId: payload.eventId, data: dropped };
    });
  }

  /** Seat roll for a seating dispute; either player of an unplayed game may open it. */
  openSeatRoll(input: OpenSeatRollInput, actor: Actor): Promise<CommandResult<RitualSession>> {
    return this.run({ type: "OPEN_RITUAL", payload: input }, actor, async ({ tx, at, events }) => {
      const payload = openRitualSchema.parse(input);
      const game = await tx.loadGame(payload.gameId);
      const players = game.participants.filter((id): id is ID => id !== null);
      assertSelfOrOrganizer(actor, players, `'${actor.id}' is not playing in game '${game.id}'`);
      if (game.isBye || game.state !== "unplayed") {
        throw invalidTransition(`game '${game.id}' is ${game.isBye ? "a bye" : game.state}, seats are already settled`);
      }
      const round = await tx.loadRoundById(game.roundId);
      if (!REPAIRABLE_ROUND_STATES.has(round.state)) {
        throw invalidTransition(`round ${round.number} is ${round.state}, seats cannot be rolled`);
      }
      if (game.seat) {
        throw invalidTransition(`game '${game.id}' seating was already decided by ritual '${game.seat.ritualId}'`);
      }
      const existing = (await tx.listRituals(game.eventId)).find((ritual) => ritual.gameId === game.id && ritual.state === "open");
      if (existing) {
        throw invalidTransition(`game '${game.id}' already has an open seat roll '${existing.id}'`);
      }

      const ritual = tx.saveRitual(
        openRitual({
          id: this.ids("ritual"),
          eventId: game.eventId,
          roundId: game.roundId,
          gameId: game.id,
          kind: "seat-roll",
          participants: players,
          dieSides: dieSidesFor(this.config, "seat-roll"),
          at,
          windowMinutes: this.config.ritualWindowMinutes,
        }),
      );
      events.push({ type: "RITUAL_OPENED", eventId: game.eventId, ritualId: ritual.id, kind: ritual.kind, participants: ritual.participants, at });
      return { eventId: game.eventId, data: ritual };
    });
  }

  /** Rolls the actor's die in an open ritual. The engine generates the value. */
  submitRoll(input: SubmitRollInput, actor: Actor): Promise<CommandResult<RitualSession>> {
    return this.run({ type: "SUBMIT_ROLL", payload: input }, actor, async (ctx) => {
      const payload = submitRollSchema.parse(input);
      const { tx, at, events } = ctx;
      const ritual = await tx.loadRitual(payload.ritualId);
      if (isRitualExpired(ritual, at)) {
        throw invalidTransition(`ritual '${ritual.id}' expired at ${ritual.expiresAt}`);
      }
      if (!ritual.participants.includes(actor.id)) {
        throw unauthorized(`'${actor.id}' is not part of ritual '${ritual.id}'`);
      }
      const value = rollDie(ritual.dieSides, this.random);
      const next = tx.saveRitual(recordRoll(ritual, actor.id, value, at, this.config.ritualMaxRerolls));
      events.push({ type: "RITUAL_ROLLED", eventId: ritual.eventId, ritualId: ritual.id, participantId: actor.id, value, at });
      if (next.state === "resolved" && next.outcome) {
        events.push({ type: "RITUAL_RESOLVED", eventId: ritual.eventId, ritualId: ritual.id, winnerId: next.outcome.winnerId, method: next.outcome.method, at });
        await applyRitualOutcome(ctx, next);
      }
      return { eventId: ritual.eventId, data: next };
    });
  }

  getStandings(eventId: ID): Promise<CommandResult<Standing[]>> {
    return this.query(async (tx) => {
      const event = await tx.loadEvent(eventId);
      const roster = await tx.loadRoster(eventId);
      const kind = event.format === "teams" ? "team" : "player";
      const ids = roster.filter((entry) => entry.participant.kind === kind).map((entry) => entry.participant.id);
      return computeStandings(event, await tx.loadHistory(eventId), ids);
    });
  }

  getDashboard(eventId: ID): Promise<CommandResult<Dashboard>> {
    return this.query(async (tx) => {
      const event = await tx.loadEvent(eventId);
      return selectors.getDashboard({
        event,
        roster: await tx.loadRoster(eventId),
        rounds: await tx.listRounds(eventId),
        games: await tx.loadHistory(eventId),
        rituals: await tx.listRituals(eventId),
      });
    });
  }

  getAuditLog(eventId: ID): Promise<CommandResult<AuditEntry[]>> {
    return this.query(async (tx) => {
      await tx.loadEvent(eventId);
      return sortAudit(await tx.listAudit(eventId));
    });
  }

  private async activeEvents(): Promise<TournamentEvent[]> {
    return (await this.storage.listEvents()).filter((event) => event.phase === "active");
  }

  /**
   * Runs `step` for each target in its own transaction. A failing target is
   * logged and skipped; the sweep carries on.
   */
  private async sweep<T>(name: string, targets: T[], describe: (target: T) => string, step: (ctx: FlowContext, target: T) => Promise<boolean>, now: ISODateTime): Promise<SweepReport> {
    const report: SweepReport = { changed: 0, failed: 0 };
    for (const target of targets) {
      try {
        const committed = await this.storage.transaction(async (tx) => {
          const ctx: FlowContext = { tx, at: now, events: [], config: this.config, ids: this.ids };
          const changed = await step(ctx, target);
          return { changed, events: ctx.events };
        });
        if (committed.changed) {
          report.changed += 1;
          this.publish(committed.events);
        }
      } catch (error) {
        report.failed += 1;
        this.logger.error(`${name} failed for ${describe(target)}`, { error: describeError(error) });
      }
    }
    if (report.changed > 0 || report.failed > 0) {
      this.logger.info(`${name} sweep finished`, { changed: report.changed, failed: report.failed });
    }
    return report;
  }

  /** Warns every active round whose deadline is inside the warning window. Idempotent. */
  async checkDeadlines(now: ISODateTime = this.timestamp()): Promise<SweepReport> {
    const due: Round[] = [];
    for (const event of await this.activeEvents()) {
      const rounds = await this.storage.transaction((tx) => tx.listRounds(event.id));
      due.push(...rounds.filter((round) => isDeadlineWarningDue(round, now, this.config.deadlineWarningMinutes)));
    }

    return this.sweep(
      "checkDeadlines",
      due,
      (round) => `round '${round.id}'`,
      async ({ tx, events }, target) => {
        const round = await tx.loadRoundById(target.id);
        if (!isDeadlineWarningDue(round, now, this.config.deadlineWarningMinutes)) {
          return false;
        }
        const warned = tx.saveRound(transitionRound(round, "deadline-warned", now));
        events.push({ type: "DEADLINE_WARNING", eventId: round.eventId, roundId: round.id, roundNumber: round.number, deadlineAt: warned.deadlineAt, at: now });
        return true;
      },
      now,
    );
  }

  /** Confirms reports left unacknowledged past the auto-confirm window. Idempotent. */
  async checkAutoConfirm(now: ISODateTime = this.timestamp()): Promise<SweepReport> {
    const due: Game[] = [];
    for (const event of await this.activeEvents()) {
      const history = await this.storage.transaction((tx) => tx.loadHistory(event.id));
      due.push(...history.filter((game) => gameMachine.isAutoConfirmDue(game, now, this.config.autoConfirmHours)));
    }

    return this.sweep(
      "checkAutoConfirm",
      due,
      (game) => `game '${game.id}'`,
      async (ctx, target) => {
        const game = await ctx.tx.loadGame(target.id);
        if (!gameMachine.isAutoConfirmDue(game, now, this.config.autoConfirmHours)) {
          return false;
        }
        ctx.tx.saveGame(gameMachine.autoConfirm(game, now));
        ctx.events.push({ type: "GAME_CONFIRMED", eventId: game.eventId, gameId: game.id, actorId: SYSTEM_ACTOR_ID, automatic: true, at: now });
        await completeIfSettled(ctx, game.roundId);
        return true;
      },
      now,
    );
  }

  /** Expires rituals past their window and applies the deterministic fallback. */
  async checkRitualExpiry(now: ISODateTime = this.timestamp()): Promise<SweepReport> {
    const due: RitualSession[] = [];
    for (const event of await this.activeEvents()) {
      const rituals = await this.storage.transaction((tx) => tx.listRituals(event.id));
      due.push(...rituals.filter((ritual) => isRitualExpired(ritual, now)));
    }

    return this.sweep(
      "checkRitualExpiry",
      due,
      (ritual) => `ritual '${ritual.id}'`,
      async (ctx, target) => {
        const ritual = await ctx.tx.loadRitual(target.id);
        if (!isRitualExpired(ritual, now)) {
          return false;
        }
        const event = await ctx.tx.loadEvent(ritual.eventId);
        const scores = standingsScores(event, await ctx.tx.loadRoster(event.id), await ctx.tx.loadHistory(event.id));
        const expired = ctx.tx.saveRitual(expireRitual(ritual, ritualFallbackWinner(ritualContenders(ritual), scores), now));
        ctx.events.push({ type: "RITUAL_EXPIRED", eventId: ritual.eventId, ritualId: ritual.id, at: now });
        if (expired.outcome) {
          ctx.events.push({ type: "RITUAL_RESOLVED", eventId: ritual.eventId, ritualId: ritual.id, winnerId: expired.outcome.winnerId, method: "fallback", at: now });
        }
        await applyRitualOutcome(ctx, expired);
        return true;
      },
      now,
    );
  }
}

export function createRoundEngine(options: RoundEngineOptions): RoundEngine {
  return new RoundEngine(options);
}
