import type { Game, ID, Round } from "@/models";
import { TERMINAL_GAME_STATES } from "@/models";

export interface ValidationIssue {
  level: "error" | "warning" | "info";
  code: string;
  message: string;
  entity?: { kind: "game" | "round" | "participant"; id: ID };
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

function duplicateIssues(kind: "game" | "participant", ids: string[], code: string): ValidationIssue[] {
  const seen = new Set<string>();
  const dup = new Set<string>();
  ids.forEach((id) => {
    if (seen.has(id)) {
      dup.add(id);
    }
    seen.add(id);
  });
  return [...dup].map((id) => ({
    level: "error",
    code,
    message: `${kind} '${id}' appears more than once in the round`,
    entity: { kind, id },
  }));
}

function validateGame(round: Round, game: Game, roster: ReadonlySet<ID>): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const entity = { kind: "game" as const, id: game.id };

  if (game.roundId !== round.id || game.roundNumber !== round.number) {
    issues.push({ level: "error", code: "GAME_ROUND_MISMATCH", message: `Game '${game.id}' does not belong to round ${round.number}`, entity });
  }

  const [a, b] = game.participants;
  if (a === b) {
    issues.push({ level: "error", code: "GAME_SELF_PAIRING", message: `Game '${game.id}' pairs '${a}' against itself`, entity });
  }
  if (game.isBye !== (b === null)) {
    issues.push({ level: "error", code: "GAME_BYE_SHAPE", message: `Game '${game.id}' bye flag does not match its sides`, entity });
  }
  if (game.isBye && game.room !== null) {
    issues.push({ level: "warning", code: "BYE_WITH_ROOM", message: `Bye '${game.id}' holds room ${game.room}`, entity });
  }

  game.participants.forEach((participantId) => {
    if (participantId !== null && !roster.has(participantId)) {
      issues.push({
        level: "error",
        code: "GAME_PARTICIPANT_MISSING",
        message: `Game participant '${participantId}' is not registered for the event`,
        entity,
      });
    }
  });

  if (TERMINAL_GAME_STATES.has(game.state) && !game.vp && !game.isBye) {
    issues.push({ level: "error", code: "GAME_CONFIRMED_WITHOUT_SCORE", message: `Game '${game.id}' is ${game.state} without VPs`, entity });
  }

  return issues;
}

/**
 * Round-level invariants checked before a round and its games are committed:
 * unique game ids, no participant in two games, every participant registered
 * and no two games in one room unless the room list ran out.
 */
export function validateRound(round: Round, games: Game[], roster: ReadonlySet<ID>, roomCount: number): ValidationResult {
  const issues: ValidationIssue[] = [];

  issues.push(...duplicateIssues("game", games.map((game) => game.id), "DUPLICATE_ID"));
  issues.push(
    ...duplicateIssues(
      "participant",
      games.flatMap((game) => game.participants.filter((id): id is ID => id !== null)),
      "PARTICIPANT_DOUBLE_BOOKED",
    ),
  );

  const known = new Set(games.map((game) => game.id));
  round.gameIds.forEach((gameId) => {
    if (!known.has(gameId)) {
      issues.push({
        level: "error",
        code: "ROUND_GAME_REFERENCE_MISSING",
        message: `Round ${round.number} references unknown game '${gameId}'`,
        entity: { kind: "round", id: round.id },
      });
    }
  });

  games.forEach((game) => {
    issues.push(...validateGame(round, game, roster));
  });

  const rooms = games.map((game) => game.room).filter((room): room is string => room !== null);
  if (rooms.length <= roomCount && new Set(rooms).size !== rooms.length) {
    issues.push({
      level: "error",
      code: "ROOM_DOUBLE_BOOKED",
      message: `Round ${round.number} seats two games in one room`,
      entity: { kind: "round", id: round.id },
    });
  }

  return {
    ok: !issues.some((issue) => issue.level === "error"),
    issues,
  };
}
