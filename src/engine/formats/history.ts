import type { EventFormat, Game, VpPair } from "@/models";
import { TERMINAL_GAME_STATES } from "@/models";
import type { MatchRecord } from "@/engine/formats/types";

export function effectiveVp(game: Game): VpPair | undefined {
  if (!game.vp) {
    return undefined;
  }
  const adjustment = game.adjustment ?? [0, 0];
  return [game.vp[0] + adjustment[0], game.vp[1] + adjustment[1]];
}

function resultFromVp(vp: VpPair): "a" | "b" | "draw" {
  if (vp[0] === vp[1]) {
    return "draw";
  }
  return vp[0] > vp[1] ? "a" : "b";
}

/** Groups the boards of one team meeting within a round. */
export function meetingKey(game: Game): string {
  return `${game.roundId}:${game.teams?.[0] ?? game.participants[0]}:${game.teams?.[1] ?? "bye"}`;
}

function singlesRecord(game: Game): MatchRecord {
  const scored = TERMINAL_GAME_STATES.has(game.state);
  const vp = scored ? effectiveVp(game) : undefined;
  if (game.isBye) {
    return { roundNumber: game.roundNumber, sides: game.participants, isBye: true, result: vp ? "a" : undefined, vp };
  }
  return {
    roundNumber: game.roundNumber,
    sides: game.participants,
    isBye: false,
    result: vp ? resultFromVp(vp) : undefined,
    vp,
  };
}

/**
 * Folds board games into one record per team meeting. A meeting is scored when
 * every board is terminal; the side with more board wins takes it.
 */
function teamRecords(games: Game[]): MatchRecord[] {
  const grouped = new Map<string, Game[]>();
  for (const game of games) {
    if (!game.teams) {
      continue;
    }
    const key = meetingKey(game);
    const list = grouped.get(key) ?? [];
    list.push(game);
    grouped.set(key, list);
  }

  const records: MatchRecord[] = [];
  grouped.forEach((boards) => {
    const first = boards[0];
    if (!first?.teams) {
      return;
    }
    const allScored = boards.every((board) => TERMINAL_GAME_STATES.has(board.state));
    if (first.isBye) {
      const vp = allScored ? effectiveVp(first) : undefined;
      records.push({ roundNumber: first.roundNumber, sides: first.teams, isBye: true, result: vp ? "a" : undefined, vp });
      return;
    }

    let winsA = 0;
    let winsB = 0;
    const total: VpPair = [0, 0];
    let complete = allScored;
    for (const board of boards) {
      const vp = effectiveVp(board);
      if (!vp) {
        complete = false;
        continue;
      }
      total[0] += vp[0];
      total[1] += vp[1];
      const result = resultFromVp(vp);
      if (result === "a") {
        winsA += 1;
      } else if (result === "b") {
        winsB += 1;
      }
    }

    records.push({
      roundNumber: first.roundNumber,
      sides: first.teams,
      isBye: false,
      result: complete ? (winsA === winsB ? "draw" : winsA > winsB ? "a" : "b") : undefined,
      vp: complete ? total : undefined,
    });
  });

  return records.sort((a, b) => a.roundNumber - b.roundNumber);
}

export function deriveMatchHistory(games: Game[], format: EventFormat): MatchRecord[] {
  if (format === "teams") {
    return teamRecords(games);
  }
  return games.map(singlesRecord).sort((a, b) => a.roundNumber - b.roundNumber);
}
