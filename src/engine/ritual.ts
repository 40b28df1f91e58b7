import type { ID, ISODateTime, RitualKind, RitualSession } from "@/models";
import { EngineError, invalidTransition, unauthorized } from "@/engine/errors";
import { addMinutes, compareIds, isAtOrAfter } from "@/engine/util";

export interface OpenSessionInput {
  id: ID;
  eventId: ID;
  roundId: ID;
  gameId?: ID;
  kind: RitualKind;
  participants: ID[];
  dieSides: number;
  at: ISODateTime;
  windowMinutes: number;
}

export function openRitual(input: OpenSessionInput): RitualSession {
  const participants = [...new Set(input.participants)].sort(compareIds);
  if (participants.length < 2) {
    throw new EngineError("InvalidInput", `a ${input.kind} ritual needs at least 2 participants`);
  }
  return {
    id: input.id,
    eventId: input.eventId,
    roundId: input.roundId,
    gameId: input.gameId,
    kind: input.kind,
    participants,
    dieSides: input.dieSides,
    rolls: [],
    attempt: 0,
    awaiting: participants,
    state: "open",
    openedAt: input.at,
    expiresAt: addMinutes(input.at, input.windowMinutes),
    version: 0,
  };
}

/**
 * Records one roll. When the attempt is complete the highest roll wins; tied
 * leaders roll again, and after `maxRerolls` re-rolls the lowest id among them
 * takes it.
 */
export function recordRoll(session: RitualSession, participantId: ID, value: number, at: ISODateTime, maxRerolls: number): RitualSession {
  if (session.state !== "open") {
    throw invalidTransition(`ritual '${session.id}' already ${session.state}`);
  }
  if (!session.participants.includes(participantId)) {
    throw unauthorized(`'${participantId}' is not part of ritual '${session.id}'`);
  }
  if (!session.awaiting.includes(participantId)) {
    throw invalidTransition(`'${participantId}' already rolled in attempt ${session.attempt + 1} of ritual '${session.id}'`);
  }

  const next: RitualSession = {
    ...session,
    rolls: [...session.rolls, { participantId, value, attempt: session.attempt, at }],
    awaiting: session.awaiting.filter((id) => id !== participantId),
  };
  if (next.awaiting.length > 0) {
    return next;
  }

  const current = next.rolls.filter((roll) => roll.attempt === session.attempt);
  const best = Math.max(...current.map((roll) => roll.value));
  const leaders = current
    .filter((roll) => roll.value === best)
    .map((roll) => roll.participantId)
    .sort(compareIds);

  if (leaders.length === 1) {
    return { ...next, state: "resolved", outcome: { winnerId: leaders[0], method: "roll" }, closedAt: at, closedReason: "resolved" };
  }
  if (session.attempt >= maxRerolls) {
    return { ...next, state: "resolved", outcome: { winnerId: leaders[0], method: "fallback" }, closedAt: at, closedReason: "resolved" };
  }
  return { ...next, attempt: session.attempt + 1, awaiting: leaders };
}

export function isRitualExpired(session: RitualSession, now: ISODateTime): boolean {
  return session.state === "open" && isAtOrAfter(now, session.expiresAt);
}

/** Lowest score first, then lowest id. */
export function ritualFallbackWinner(candidates: ID[], scores: ReadonlyMap<ID, number>): ID {
  const [winner] = [...candidates].sort((a, b) => (scores.get(a) ?? 0) - (scores.get(b) ?? 0) || compareIds(a, b));
  if (winner === undefined) {
    throw new EngineError("InvalidInput", "ritual fallback needs at least one candidate");
  }
  return winner;
}

export function expireRitual(session: RitualSession, winnerId: ID, at: ISODateTime): RitualSession {
  if (session.state !== "open") {
    throw invalidTransition(`ritual '${session.id}' already ${session.state}`);
  }
  return { ...session, state: "expired", outcome: { winnerId, method: "fallback" }, awaiting: [], closedAt: at, closedReason: "timeout" };
}

export function abandonRitual(session: RitualSession, at: ISODateTime): RitualSession {
  if (session.state !== "open") {
    return session;
  }
  return { ...session, state: "expired", awaiting: [], closedAt: at, closedReason: "abandoned" };
}

/** Marks the outcome as used; a second consumption is rejected. */
export function consumeRitual(session: RitualSession, at: ISODateTime): { session: RitualSession; winnerId: ID } {
  if (!session.outcome || session.state === "open") {
    throw invalidTransition(`ritual '${session.id}' has no outcome yet`);
  }
  if (session.consumedAt) {
    throw invalidTransition(`ritual '${session.id}' outcome already consumed`);
  }
  return { session: { ...session, consumedAt: at }, winnerId: session.outcome.winnerId };
}
