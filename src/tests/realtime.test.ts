import { describe, expect, it } from "vitest";

import { LoggingAdapter, MockAdapter, RoundEngine, type DomainEvent, type Logger, type RealtimeAdapter } from "@/index";
import { MemoryStorage } from "@/storage/MemoryStorage";
import { T0, organizer } from "@/tests/fixtures";

interface LogLine {
  level: string;
  message: string;
  context?: Record<string, unknown>;
}

function recordingLogger(lines: LogLine[]): Logger {
  const logger: Logger = {
    debug: (message, context) => lines.push({ level: "debug", message, context }),
    info: (message, context) => lines.push({ level: "info", message, context }),
    warn: (message, context) => lines.push({ level: "warn", message, context }),
    error: (message, context) => lines.push({ level: "error", message, context }),
    child: () => logger,
  };
  return logger;
}

const created: DomainEvent = { type: "EVENT_CREATED", eventId: "evt", at: T0 };

describe("event adapters", () => {
  it("queues until connected, then delivers in order", () => {
    const adapter = new MockAdapter({ autoConnect: false });
    const seen: string[] = [];
    adapter.onEvent((event) => seen.push(event.type));

    adapter.broadcast(created);
    adapter.broadcast({ type: "STANDINGS_UPDATED", eventId: "evt", at: T0 });
    expect(adapter.delivered).toEqual([]);

    adapter.connect();
    expect(seen).toEqual(["EVENT_CREATED", "STANDINGS_UPDATED"]);
    expect(adapter.ofType("STANDINGS_UPDATED")).toHaveLength(1);
  });

  it("logs each event and fans out to listeners", () => {
    const lines: LogLine[] = [];
    const adapter = new LoggingAdapter(recordingLogger(lines));
    const seen: DomainEvent[] = [];
    adapter.onEvent((event) => seen.push(event));

    adapter.broadcast(created);

    expect(lines).toEqual([{ level: "info", message: "EVENT_CREATED", context: { eventId: "evt", at: T0 } }]);
    expect(seen).toEqual([created]);
  });

  it("commits the command even when delivery throws", async () => {
    const lines: LogLine[] = [];
    const broken: RealtimeAdapter = {
      connect: () => undefined,
      disconnect: () => undefined,
      onEvent: () => undefined,
      broadcast: () => {
        throw new Error("socket closed");
      },
    };
    const storage = new MemoryStorage();
    const engine = new RoundEngine({ storage, adapter: broken, logger: recordingLogger(lines), now: () => new Date(T0) });

    const result = await engine.createEvent({ id: "evt", name: "Club Night" }, organizer);

    expect(result.ok).toBe(true);
    expect(Object.keys(storage.store.getState().events)).toEqual(["evt"]);
    expect(lines.filter((line) => line.level === "warn")).toEqual([
      { level: "warn", message: "event delivery failed for EVENT_CREATED", context: { error: "Error: socket closed" } },
    ]);
  });
});
