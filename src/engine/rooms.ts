import type { ID } from "@/models";

export interface RoomRequest {
  participants: [ID, ID];
}

/**
 * Assigns one room per pairing, in pairing order. A pairing takes the first
 * free room neither participant sat in last round, then any free room; once the
 * list runs out rooms are reused round-robin.
 *
 * `held` are rooms already taken this round (by games a repair preserved).
 */
export function assignRooms(
  pairings: RoomRequest[],
  rooms: readonly string[],
  priorRooms: ReadonlyMap<ID, string>,
  held: Iterable<string> = [],
): string[] {
  const used = new Set(held);
  let overflow = 0;

  return pairings.map(({ participants: [a, b] }) => {
    const recent = new Set([priorRooms.get(a), priorRooms.get(b)]);
    const fresh = rooms.find((room) => !used.has(room) && !recent.has(room)) ?? rooms.find((room) => !used.has(room));
    if (fresh !== undefined) {
      used.add(fresh);
      return fresh;
    }
    const reused = rooms[overflow % rooms.length];
    overflow += 1;
    return reused;
  });
}

/** Room each participant sat in, from one round's games. */
export function roomsByParticipant(games: { participants: [ID, ID | null]; room: string | null }[]): Map<ID, string> {
  const out = new Map<ID, string>();
  games.forEach((game) => {
    if (!game.room) {
      return;
    }
    game.participants.forEach((participantId) => {
      if (participantId && game.room) {
        out.set(participantId, game.room);
      }
    });
  });
  return out;
}
