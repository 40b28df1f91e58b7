import type { ID, Participant } from "@/models";
import { EngineError } from "@/engine/errors";
import type { BoardPairing } from "@/engine/formats/types";

/**
 * Expands team pairings into boards. Board N seats member N of each team, in
 * roster order; the slots are never reshuffled.
 */
export function expandTeamPairings(pairings: [ID, ID][], teams: Map<ID, Participant>, teamSize: number): BoardPairing[] {
  const boards: BoardPairing[] = [];
  for (const [teamA, teamB] of pairings) {
    const membersA = teamMembers(teams, teamA, teamSize);
    const membersB = teamMembers(teams, teamB, teamSize);
    for (let slot = 0; slot < teamSize; slot += 1) {
      const a = membersA[slot];
      const b = membersB[slot];
      if (a === undefined || b === undefined) {
        continue;
      }
      boards.push({ teams: [teamA, teamB], slot: slot + 1, players: [a, b] });
    }
  }
  return boards;
}

function teamMembers(teams: Map<ID, Participant>, teamId: ID, teamSize: number): ID[] {
  const team = teams.get(teamId);
  if (!team || team.kind !== "team") {
    throw new EngineError("InvalidRoster", `team '${teamId}' is not registered as a team`);
  }
  const members = team.members ?? [];
  if (members.length < teamSize) {
    throw new EngineError("InvalidRoster", `team '${teamId}' has ${members.length} member(s), ${teamSize} required`);
  }
  return members.slice(0, teamSize);
}
