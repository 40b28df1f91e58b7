import type { ID } from "@/models/base";

export interface Standing {
  participantId: ID;
  rank: number;
  played: number;
  wins: number;
  losses: number;
  draws: number;
  byes: number;
  matchPoints: number;
  vpFor: number;
  vpAgainst: number;
  vpDiff: number;
  opponents: ID[];
}
