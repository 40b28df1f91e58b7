import { describe, expect, it } from "vitest";

import { EngineError, fromJSON } from "@/engine";
import type { Round, TournamentEvent } from "@/models";
import { MemoryStorage } from "@/storage/MemoryStorage";
import { T0, makeGame } from "@/tests/fixtures";

function sampleEvent(): TournamentEvent {
  return {
    id: "evt",
    name: "Spring Open",
    format: "singles",
    phase: "active",
    roundCount: 3,
    currentRound: 0,
    scoring: { win: 3, draw: 1, loss: 0, byeResult: "win" },
    settings: { byeRitual: false },
    createdAt: T0,
    updatedAt: T0,
    version: 0,
  };
}

function sampleRound(id: string, number: number): Round {
  return { id, eventId: "evt", number, state: "drafting", deadlineAt: T0, gameIds: [], repairCount: 0, createdAt: T0, version: 0 };
}

async function seeded(): Promise<MemoryStorage> {
  const storage = new MemoryStorage();
  await storage.transaction(async (tx) => {
    tx.saveEvent(sampleEvent());
  });
  return storage;
}

describe("memory storage", () => {
  it("bumps versions on save", async () => {
    const storage = await seeded();

    const saved = await storage.transaction(async (tx) => {
      const event = await tx.loadEvent("evt");
      return tx.saveEvent({ ...event, name: "Renamed" });
    });

    expect(saved.version).toBe(2);
    expect(storage.store.getState().events.evt).toMatchObject({ name: "Renamed", version: 2 });
  });

  it("fails the later of two writers that read the same version", async () => {
    const storage = await seeded();
    const rename = (name: string) =>
      storage.transaction(async (tx) => {
        const event = await tx.loadEvent("evt");
        tx.saveEvent({ ...event, name });
        return name;
      });

    const [first, second] = await Promise.allSettled([rename("One"), rename("Two")]);

    expect(first).toEqual({ status: "fulfilled", value: "One" });
    expect(second.status).toBe("rejected");
    expect(second.status === "rejected" && second.reason).toMatchObject({ kind: "Conflict" });
    expect(storage.store.getState().events.evt.name).toBe("One");
  });

  it("writes nothing when the transaction throws", async () => {
    const storage = await seeded();

    await expect(
      storage.transaction(async (tx) => {
        tx.saveRound(sampleRound("r1", 1));
        throw new EngineError("InvalidRoster", "no");
      }),
    ).rejects.toThrow("no");

    expect(storage.store.getState().rounds).toEqual({});
  });

  it("shows a transaction its own writes and hides them from others until commit", async () => {
    const storage = await seeded();
    const game = makeGame({ eventId: "evt", roundId: "r1", participants: ["A", "B"] });

    await storage.transaction(async (tx) => {
      tx.saveGame(game);
      expect(await tx.loadGame(game.id)).toMatchObject({ id: game.id, version: 1 });
      const outside = await storage.transaction(async (other) => other.listGames("r1"));
      expect(outside).toEqual([]);
    });

    const removed = await storage.transaction(async (tx) => {
      tx.deleteGame(await tx.loadGame(game.id));
      return tx.listGames("r1");
    });
    expect(removed).toEqual([]);
    expect(storage.store.getState().games).toEqual({});
  });

  it("keeps round numbers unique per event", async () => {
    const storage = await seeded();
    await storage.transaction(async (tx) => {
      tx.saveRound(sampleRound("r1", 1));
    });

    await expect(
      storage.transaction(async (tx) => {
        tx.saveRound(sampleRound("r1-again", 1));
      }),
    ).rejects.toMatchObject({ kind: "Conflict", message: "round 1 of event 'evt' already exists" });
  });

  it("raises NotFound for missing records", async () => {
    const storage = new MemoryStorage();

    await expect(storage.transaction((tx) => tx.loadEvent("nope"))).rejects.toMatchObject({ kind: "NotFound", message: "event 'nope' not found" });
    expect(await storage.transaction((tx) => tx.findEvent("nope"))).toBeUndefined();
  });

  it("round-trips through a snapshot", async () => {
    const storage = await seeded();
    await storage.transaction(async (tx) => {
      tx.saveRound(sampleRound("r1", 1));
      tx.saveParticipant({ id: "A", name: "Player A", kind: "player" });
      tx.saveRegistration({ eventId: "evt", participantId: "A", status: "active", registeredAt: T0, version: 0 });
    });

    const restored = MemoryStorage.fromSnapshot(storage.snapshot());

    expect(restored.store.getState()).toEqual(storage.store.getState());
    const roster = await restored.transaction((tx) => tx.loadRoster("evt"));
    expect(roster.map((entry) => entry.participant.name)).toEqual(["Player A"]);
  });

  it("refuses snapshots of another schema version", () => {
    const future = JSON.stringify({ schemaVersion: 2, events: {}, participants: {}, registrations: {}, rounds: {}, games: {}, rituals: {}, audit: [] });

    expect(() => fromJSON(future)).toThrow(EngineError);
    expect(() => fromJSON(future)).toThrow("snapshot schema version 2 is not supported, expected 1");
  });
});
