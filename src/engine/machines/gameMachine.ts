import type { AuditChange, Game, GameState, ID, ISODateTime, VpPair } from "@/models";
import { SYSTEM_ACTOR_ID } from "@/models";
import { EngineError, invalidTransition, unauthorized } from "@/engine/errors";
import { addHours, isAtOrAfter } from "@/engine/util";

function assertVp(vp: VpPair, maxVp: number): void {
  const valid = vp.every((value) => Number.isInteger(value) && value >= 0 && value <= maxVp);
  if (!valid) {
    throw new EngineError("InvalidInput", `VP must be whole numbers between 0 and ${maxVp}, got ${vp[0]}-${vp[1]}`);
  }
}

function assertNotDisputed(game: Game): void {
  if (game.state === "disputed") {
    throw new EngineError("Disputed", `game '${game.id}' is disputed and needs an organizer override`);
  }
}

function seatOf(game: Game, participantId: ID): 0 | 1 | null {
  if (game.participants[0] === participantId) return 0;
  if (game.participants[1] === participantId) return 1;
  return null;
}

export function reportResult(game: Game, reporterId: ID, vp: VpPair, at: ISODateTime, maxVp: number): Game {
  assertNotDisputed(game);
  if (game.isBye) {
    throw invalidTransition(`game '${game.id}' is a bye and takes no report`);
  }
  if (game.state !== "unplayed") {
    throw invalidTransition(`game '${game.id}' already ${game.state}`);
  }
  if (seatOf(game, reporterId) === null) {
    throw unauthorized(`'${reporterId}' is not playing in game '${game.id}'`);
  }
  assertVp(vp, maxVp);
  return { ...game, state: "reported", report: { vp, reporterId, at } };
}

/**
 * The opponent's acknowledgement. Matching VPs confirm the game; anything else
 * parks it as disputed.
 */
export function confirmResult(game: Game, actorId: ID, vp: VpPair, at: ISODateTime, maxVp: number): Game {
  assertNotDisputed(game);
  if (game.state !== "reported" || !game.report) {
    throw invalidTransition(`game '${game.id}' is ${game.state}, only reported games can be confirmed`);
  }
  if (seatOf(game, actorId) === null) {
    throw unauthorized(`'${actorId}' is not playing in game '${game.id}'`);
  }
  if (actorId === game.report.reporterId) {
    throw unauthorized(`'${actorId}' reported game '${game.id}' and cannot confirm it`);
  }
  assertVp(vp, maxVp);

  if (vp[0] !== game.report.vp[0] || vp[1] !== game.report.vp[1]) {
    return { ...game, state: "disputed", dispute: { vp, actorId, at } };
  }
  return {
    ...game,
    state: "confirmed",
    vp: game.report.vp,
    confirmation: { actorId, at, automatic: false },
  };
}

export function isAutoConfirmDue(game: Game, now: ISODateTime, autoConfirmHours: number): boolean {
  return game.state === "reported" && game.report !== undefined && isAtOrAfter(now, addHours(game.report.at, autoConfirmHours));
}

export function autoConfirm(game: Game, at: ISODateTime): Game {
  if (game.state !== "reported" || !game.report) {
    throw invalidTransition(`game '${game.id}' is ${game.state}, only reported games can be confirmed`);
  }
  return {
    ...game,
    state: "confirmed",
    vp: game.report.vp,
    confirmation: { actorId: SYSTEM_ACTOR_ID, at, automatic: true },
  };
}

export function lockGame(game: Game, at: ISODateTime): Game {
  if (game.state === "locked") {
    return game;
  }
  if (game.state !== "confirmed") {
    throw invalidTransition(`game '${game.id}' is ${game.state} and cannot be locked`);
  }
  return { ...game, state: "locked", lockedAt: at };
}

/** Sets a bye's credited VP; the game stays confirmed until the round locks it. */
export function creditBye(game: Game, vp: number): Game {
  if (!game.isBye) {
    throw invalidTransition(`game '${game.id}' is not a bye`);
  }
  return { ...game, vp: [vp, 0] };
}

export interface OverrideInput {
  vp?: VpPair;
  adjustment?: VpPair;
}

const OVERRIDE_CONFIRMS: ReadonlySet<GameState> = new Set(["unplayed", "reported", "disputed"]);

/**
 * Organizer correction. Open games are confirmed with the given VPs; confirmed
 * and locked games keep their state and only change score.
 */
export function overrideResult(
  game: Game,
  actorId: ID,
  input: OverrideInput,
  at: ISODateTime,
  maxVp: number,
): { game: Game; change: AuditChange } {
  if (game.isBye) {
    throw invalidTransition(`game '${game.id}' is a bye and cannot be overridden`);
  }
  if (!input.vp && !input.adjustment) {
    throw new EngineError("InvalidInput", `override of game '${game.id}' needs a VP pair or an adjustment`);
  }
  if (input.vp) {
    assertVp(input.vp, maxVp);
  }

  const vp = input.vp ?? game.vp ?? game.report?.vp;
  if (!vp) {
    throw new EngineError("InvalidInput", `game '${game.id}' has no result yet, the override must set VPs`);
  }

  const next: Game = {
    ...game,
    vp,
    adjustment: input.adjustment ?? game.adjustment,
  };
  if (OVERRIDE_CONFIRMS.has(game.state)) {
    next.state = "confirmed";
    next.confirmation = { actorId, at, automatic: false };
  }

  return {
    game: next,
    change: {
      gameId: game.id,
      before: { vp: game.vp, adjustment: game.adjustment, state: game.state },
      after: { vp: next.vp, adjustment: next.adjustment, state: next.state },
    },
  };
}
