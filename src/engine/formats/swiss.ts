import type { ID } from "@/models";
import { EngineError } from "@/engine/errors";
import type { MatchRecord, PairingOptions, PairingResult } from "@/engine/formats/types";
import { compareIds, pairKey, stableShuffled } from "@/engine/util";

interface SwissStat {
  participantId: ID;
  points: number;
  hadBye: boolean;
  opponents: Set<ID>;
}

const DEFAULT_SEARCH_BUDGET = 50_000;

function computeStats(roster: ID[], history: MatchRecord[], scoring: PairingOptions["scoring"]): Map<ID, SwissStat> {
  const stats = new Map<ID, SwissStat>();
  roster.forEach((participantId) => {
    stats.set(participantId, { participantId, points: 0, hadBye: false, opponents: new Set() });
  });

  for (const record of history) {
    const [a, b] = record.sides;
    const statA = stats.get(a);
    const statB = b ? stats.get(b) : undefined;
    if (record.isBye) {
      if (statA) {
        statA.hadBye = true;
        if (record.result) {
          statA.points += scoring.byeResult === "win" ? scoring.win : scoring.draw;
        }
      }
      continue;
    }
    if (b) {
      statA?.opponents.add(b);
      statB?.opponents.add(a);
    }
    if (record.result === "draw") {
      if (statA) statA.points += scoring.draw;
      if (statB) statB.points += scoring.draw;
    } else if (record.result === "a") {
      if (statA) statA.points += scoring.win;
      if (statB) statB.points += scoring.loss;
    } else if (record.result === "b") {
      if (statA) statA.points += scoring.loss;
      if (statB) statB.points += scoring.win;
    }
  }

  return stats;
}

function rankParticipants(roster: ID[], stats: Map<ID, SwissStat>, options: PairingOptions): ID[] {
  const base = [...roster].sort(compareIds);
  const tiebreakOrder = options.rngSeed ? stableShuffled(base, `${options.rngSeed}:${options.roundNumber}`) : base;
  const position = new Map(tiebreakOrder.map((id, idx) => [id, idx] as const));

  return [...roster].sort((a, b) => {
    const pointsA = stats.get(a)?.points ?? 0;
    const pointsB = stats.get(b)?.points ?? 0;
    if (pointsA !== pointsB) {
      return pointsB - pointsA;
    }
    return (position.get(a) ?? 0) - (position.get(b) ?? 0);
  });
}

/**
 * Bye candidates: participants without a previous bye (everyone when all have
 * had one), narrowed to the lowest score.
 */
function findByeContenders(ranked: ID[], stats: Map<ID, SwissStat>): ID[] {
  const fresh = ranked.filter((id) => !stats.get(id)?.hadBye);
  const pool = fresh.length > 0 ? fresh : ranked;
  const lowest = Math.min(...pool.map((id) => stats.get(id)?.points ?? 0));
  return pool.filter((id) => (stats.get(id)?.points ?? 0) === lowest).sort(compareIds);
}

type SearchOutcome = { kind: "found"; pairs: [ID, ID][] } | { kind: "none" } | { kind: "budget" };

/**
 * Depth-first perfect matching in rank order. Each participant takes the
 * highest-ranked partner still free; rematches are allowed up to `maxRepeats`.
 */
function searchMatching(
  ordered: ID[],
  repeats: Set<string>,
  excluded: Set<string>,
  maxRepeats: number,
  budget: number,
): SearchOutcome {
  let nodes = 0;
  const used = new Set<ID>();
  const pairs: [ID, ID][] = [];

  const visit = (repeatsLeft: number): "found" | "none" | "budget" => {
    nodes += 1;
    if (nodes > budget) {
      return "budget";
    }
    const first = ordered.find((id) => !used.has(id));
    if (first === undefined) {
      return "found";
    }
    used.add(first);
    for (const candidate of ordered) {
      if (used.has(candidate)) {
        continue;
      }
      const key = pairKey(first, candidate);
      if (excluded.has(key)) {
        continue;
      }
      const isRepeat = repeats.has(key);
      if (isRepeat && repeatsLeft === 0) {
        continue;
      }
      used.add(candidate);
      pairs.push([first, candidate]);
      const outcome = visit(isRepeat ? repeatsLeft - 1 : repeatsLeft);
      if (outcome !== "none") {
        return outcome;
      }
      pairs.pop();
      used.delete(candidate);
    }
    used.delete(first);
    return "none";
  };

  const outcome = visit(maxRepeats);
  return outcome === "found" ? { kind: "found", pairs: [...pairs] } : { kind: outcome };
}

/**
 * Rank-order pass used once the search budget is spent. Each participant takes
 * the first free partner they have not met; a rematch is forced only when every
 * remaining partner is one.
 */
function greedyMatching(ordered: ID[], repeats: Set<string>, excluded: Set<string>): [ID, ID][] | null {
  const unpaired = [...ordered];
  const pairs: [ID, ID][] = [];
  while (unpaired.length > 0) {
    const a = unpaired.shift();
    if (a === undefined) {
      break;
    }
    const allowed = (candidate: ID) => !excluded.has(pairKey(a, candidate));
    let idx = unpaired.findIndex((candidate) => allowed(candidate) && !repeats.has(pairKey(a, candidate)));
    if (idx < 0) {
      idx = unpaired.findIndex(allowed);
    }
    if (idx < 0) {
      return null;
    }
    const [b] = unpaired.splice(idx, 1);
    if (b === undefined) {
      return null;
    }
    pairs.push([a, b]);
  }
  return pairs;
}

/** Fewest-rematch matching of `ordered`, or null when the exclusions leave none. */
function matchAll(ordered: ID[], repeats: Set<string>, excluded: Set<string>, budget: number): [ID, ID][] | null {
  for (let maxRepeats = 0; maxRepeats <= ordered.length / 2; maxRepeats += 1) {
    const outcome = searchMatching(ordered, repeats, excluded, maxRepeats, budget);
    if (outcome.kind === "found") {
      return outcome.pairs;
    }
    if (outcome.kind === "budget") {
      return greedyMatching(ordered, repeats, excluded);
    }
  }
  return null;
}

/**
 * Bye candidates in the order they are tried: a ritual winner, the tied
 * contenders, then everyone else by (no previous bye, lowest score, id).
 */
function byeOrder(ranked: ID[], stats: Map<ID, SwissStat>, contenders: ID[], resolution: ID | undefined): ID[] {
  const preferred = resolution !== undefined && contenders.includes(resolution) ? [resolution] : [];
  const rest = ranked
    .filter((id) => !contenders.includes(id))
    .sort((a, b) => {
      const statA = stats.get(a);
      const statB = stats.get(b);
      return (
        Number(statA?.hadBye ?? false) - Number(statB?.hadBye ?? false) ||
        (statA?.points ?? 0) - (statB?.points ?? 0) ||
        compareIds(a, b)
      );
    });
  return [...new Set([...preferred, ...contenders, ...rest])];
}

/**
 * Swiss pairing for one round.
 *
 * Ranks by match points, gives an odd roster's bye to the lowest-scoring
 * participant without a previous bye, then builds the matching with the fewest
 * rematches the search can prove. When the exclusions leave no matching around
 * that bye, the next candidate takes it. When the search budget runs out a
 * greedy pass takes over, still preferring partners not met before.
 */
export function pair(roster: ID[], history: MatchRecord[], options: PairingOptions): PairingResult {
  const unique = [...new Set(roster)];
  if (unique.length < 2) {
    throw new EngineError("InvalidRoster", `insufficient roster: ${unique.length} active participant(s), at least 2 required`);
  }

  const stats = computeStats(unique, history, options.scoring);
  const ranked = rankParticipants(unique, stats, options);
  const repeats = new Set<string>();
  stats.forEach((stat) => {
    stat.opponents.forEach((opponent) => repeats.add(pairKey(stat.participantId, opponent)));
  });
  const excluded = new Set((options.exclusions ?? []).map(([a, b]) => pairKey(a, b)));
  const budget = options.searchBudget ?? DEFAULT_SEARCH_BUDGET;

  let bye: ID | null = null;
  let byeContenders: ID[] = [];
  let pairs: [ID, ID][] | null = null;
  if (ranked.length % 2 === 0) {
    pairs = matchAll(ranked, repeats, excluded, budget);
  } else {
    byeContenders = findByeContenders(ranked, stats);
    for (const candidate of byeOrder(ranked, stats, byeContenders, options.byeResolution)) {
      pairs = matchAll(
        ranked.filter((id) => id !== candidate),
        repeats,
        excluded,
        budget,
      );
      if (pairs) {
        bye = candidate;
        break;
      }
    }
  }

  if (!pairs) {
    throw new EngineError("InfeasiblePairing", `infeasible pairing: no complete matching of ${ranked.length} participant(s) satisfies the exclusions`);
  }

  return {
    pairings: pairs,
    bye,
    byeContenders,
    repeats: pairs.filter(([a, b]) => repeats.has(pairKey(a, b))),
  };
}

/** Recommended round count for a roster size. */
export function recommendedRoundCount(participantCount: number): number {
  if (participantCount <= 4) return 2;
  if (participantCount <= 8) return 3;
  if (participantCount <= 16) return 4;
  if (participantCount <= 32) return 5;
  return 6;
}
