import { z } from "zod";

import type { RitualKind } from "@/models";

export const DEFAULT_ROOMS = [
  "Crimson",
  "Royal Blue",
  "Forest Green",
  "Burnt Orange",
  "Deep Purple",
  "Teal",
  "Gold",
  "Slate",
  "Magenta",
  "Olive",
] as const;

const dieSidesSchema = z.number().int().min(2).max(100);

export const engineConfigSchema = z.object({
  deadlineWarningMinutes: z.number().int().min(0).default(10),
  autoConfirmHours: z.number().positive().default(24),
  ritualWindowMinutes: z.number().positive().default(10),
  ritualMaxRerolls: z.number().int().min(0).default(3),
  dieSides: z
    .object({
      "bye-decision": dieSidesSchema.default(6),
      "seat-roll": dieSidesSchema.default(6),
    })
    .default({}),
  maxVp: z.number().int().positive().default(200),
  defaultRoundMinutes: z.number().int().positive().default(120),
  rooms: z.array(z.string().min(1)).min(1).default([...DEFAULT_ROOMS]),
  pairingSearchBudget: z.number().int().positive().default(50_000),
  cadence: z
    .object({
      deadlinesMs: z.number().int().positive().default(60_000),
      autoConfirmMs: z.number().int().positive().default(15 * 60_000),
      ritualExpiryMs: z.number().int().positive().default(60_000),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return engineConfigSchema.parse(input);
}

export function dieSidesFor(config: EngineConfig, kind: RitualKind): number {
  return config.dieSides[kind];
}

const envNumber = z.coerce.number().finite();

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return envNumber.parse(raw);
}

/**
 * Reads `TOURNEY_*` variables. Unset variables fall back to the schema
 * defaults; malformed ones throw a ZodError.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const rooms = env.TOURNEY_ROOMS
    ?.split(",")
    .map((room) => room.trim())
    .filter((room) => room.length > 0);

  return resolveEngineConfig({
    deadlineWarningMinutes: readNumber(env, "TOURNEY_DEADLINE_WARNING_MINUTES"),
    autoConfirmHours: readNumber(env, "TOURNEY_AUTO_CONFIRM_HOURS"),
    ritualWindowMinutes: readNumber(env, "TOURNEY_RITUAL_WINDOW_MINUTES"),
    ritualMaxRerolls: readNumber(env, "TOURNEY_RITUAL_MAX_REROLLS"),
    maxVp: readNumber(env, "TOURNEY_MAX_VP"),
    defaultRoundMinutes: readNumber(env, "TOURNEY_ROUND_MINUTES"),
    rooms: rooms && rooms.length > 0 ? rooms : undefined,
  });
}
