import type { Game, ISODateTime, Round, RoundState } from "@/models";
import { TERMINAL_GAME_STATES } from "@/models";
import { invalidTransition } from "@/engine/errors";
import { addMinutes, isAtOrAfter } from "@/engine/util";

const ROUND_TRANSITIONS: Record<RoundState, readonly RoundState[]> = {
  drafting: ["announced"],
  announced: ["active", "drafting"],
  active: ["deadline-warned", "complete", "drafting"],
  "deadline-warned": ["complete", "drafting"],
  complete: [],
};

export const REPAIRABLE_ROUND_STATES: ReadonlySet<RoundState> = new Set(["announced", "active", "deadline-warned"]);

export const PLAYABLE_ROUND_STATES: ReadonlySet<RoundState> = new Set(["active", "deadline-warned"]);

export function canTransitionRound(from: RoundState, to: RoundState): boolean {
  return ROUND_TRANSITIONS[from].includes(to);
}

export function transitionRound(round: Round, to: RoundState, at: ISODateTime): Round {
  if (!canTransitionRound(round.state, to)) {
    throw invalidTransition(
      round.state === to ? `round ${round.number} already ${to}` : `round ${round.number} is ${round.state} and cannot become ${to}`,
    );
  }
  const next: Round = { ...round, state: to };
  if (to === "announced") next.announcedAt = at;
  if (to === "deadline-warned") next.warnedAt = at;
  if (to === "complete") next.completedAt = at;
  return next;
}

export function isDeadlineWarningDue(round: Round, now: ISODateTime, warningMinutes: number): boolean {
  return round.state === "active" && isAtOrAfter(now, addMinutes(round.deadlineAt, -warningMinutes));
}

/** A round can close once it is being played and every one of its games is settled. */
export function isRoundSettled(round: Round, games: Game[]): boolean {
  return PLAYABLE_ROUND_STATES.has(round.state) && games.length > 0 && games.every((game) => TERMINAL_GAME_STATES.has(game.state));
}
