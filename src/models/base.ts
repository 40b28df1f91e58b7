export type ID = string;
export type ISODateTime = string;

/** VP pair in the order of a game's `participants` tuple. */
export type VpPair = [number, number];

export const SYSTEM_ACTOR_ID = "system";
