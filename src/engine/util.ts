import { randomUUID } from "node:crypto";

import type { ID } from "@/models";

export type IdGenerator = (prefix: string) => ID;

/** Monotonic ids, unique within one generator. Tests use it for stable ids. */
export function createSequentialIds(start = 1): IdGenerator {
  let serial = start;
  return (prefix) => {
    const id = `${prefix}_${serial}`;
    serial += 1;
    return id;
  };
}

export function createRandomIds(): IdGenerator {
  return (prefix) => `${prefix}_${randomUUID()}`;
}

/** Code-unit order, independent of the host locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function pairKey(a: ID, b: ID): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export function addMinutes(iso: string, minutes: number): string {
  return new Date(Date.parse(iso) + minutes * 60_000).toISOString();
}

export function addHours(iso: string, hours: number): string {
  return addMinutes(iso, hours * 60);
}

export function isAtOrAfter(iso: string, reference: string): boolean {
  return Date.parse(iso) >= Date.parse(reference);
}

export function mulberry32(seed: number): () => number {
  return function rand() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (let i = 0; i < seed.length; i += 1) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function stableShuffled<T>(items: T[], seed: string): T[] {
  const rng = mulberry32(hashSeed(seed));
  const out = [...items];
  for (let i = out.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function rollDie(sides: number, random: () => number): number {
  return Math.min(sides, Math.floor(random() * sides) + 1);
}
