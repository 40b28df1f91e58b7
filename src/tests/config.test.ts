import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { DEFAULT_ROOMS, configFromEnv, dieSidesFor, resolveEngineConfig } from "@/engine";

describe("engine config", () => {
  it("fills every default", () => {
    const config = resolveEngineConfig();

    expect(config).toMatchObject({
      deadlineWarningMinutes: 10,
      autoConfirmHours: 24,
      ritualWindowMinutes: 10,
      ritualMaxRerolls: 3,
      maxVp: 200,
      defaultRoundMinutes: 120,
      pairingSearchBudget: 50_000,
      cadence: { deadlinesMs: 60_000, autoConfirmMs: 900_000, ritualExpiryMs: 60_000 },
    });
    expect(config.rooms).toEqual([...DEFAULT_ROOMS]);
    expect(config.dieSides).toEqual({ "bye-decision": 6, "seat-roll": 6 });
    expect(dieSidesFor(config, "seat-roll")).toBe(6);
  });

  it("keeps overrides and rejects nonsense", () => {
    expect(dieSidesFor(resolveEngineConfig({ dieSides: { "bye-decision": 20 } }), "bye-decision")).toBe(20);
    expect(() => resolveEngineConfig({ rooms: [] })).toThrow(ZodError);
    expect(() => resolveEngineConfig({ dieSides: { "seat-roll": 1 } })).toThrow(ZodError);
  });

  it("reads TOURNEY_ variables", () => {
    const config = configFromEnv({
      TOURNEY_MAX_VP: "150",
      TOURNEY_AUTO_CONFIRM_HOURS: "12",
      TOURNEY_ROUND_MINUTES: " ",
      TOURNEY_ROOMS: "North, South ,,",
    });

    expect(config.maxVp).toBe(150);
    expect(config.autoConfirmHours).toBe(12);
    expect(config.defaultRoundMinutes).toBe(120);
    expect(config.rooms).toEqual(["North", "South"]);
  });

  it("throws on malformed variables", () => {
    expect(() => configFromEnv({ TOURNEY_MAX_VP: "lots" })).toThrow(ZodError);
    expect(() => configFromEnv({ TOURNEY_RITUAL_MAX_REROLLS: "-1" })).toThrow(ZodError);
  });
});
