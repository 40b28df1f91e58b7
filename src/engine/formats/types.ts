import type { ID, ScoringRules, VpPair } from "@/models";

/**
 * One scored or unscored meeting between two sides. In team events the sides
 * are teams and the VPs are summed across boards.
 */
export interface MatchRecord {
  roundNumber: number;
  sides: [ID, ID | null];
  isBye: boolean;
  /** Set once every game behind the record is confirmed or locked (and, for a bye, credited). */
  result?: "a" | "b" | "draw";
  vp?: VpPair;
}

export interface PairingOptions {
  roundNumber: number;
  scoring: Pick<ScoringRules, "win" | "draw" | "loss" | "byeResult">;
  rngSeed?: string;
  /** Winner of a bye-decision ritual; honoured only when it is among the tied contenders. */
  byeResolution?: ID;
  /** Pairs that must never meet. */
  exclusions?: [ID, ID][];
  searchBudget?: number;
}

export interface PairingResult {
  pairings: [ID, ID][];
  bye: ID | null;
  /** Bye candidates tied after the prior-bye and score rules. */
  byeContenders: ID[];
  /** Rematches the matching could not avoid. */
  repeats: [ID, ID][];
}

export interface BoardPairing {
  teams: [ID, ID];
  slot: number;
  players: [ID, ID];
}
