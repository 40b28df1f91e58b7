import type { Logger } from "@/engine/logger";
import type { DomainEvent } from "@/models";
import type { RealtimeAdapter } from "@/realtime/RealtimeAdapter";

/** Default sink: writes each event as a log line and fans out to local listeners. */
export class LoggingAdapter implements RealtimeAdapter {
  private readonly listeners = new Set<(ev: DomainEvent) => void>();

  constructor(private readonly logger: Logger) {}

  connect(): void {
    this.logger.debug("event delivery connected");
  }

  disconnect(): void {
    this.logger.debug("event delivery disconnected");
  }

  onEvent(cb: (ev: DomainEvent) => void): void {
    this.listeners.add(cb);
  }

  broadcast(ev: DomainEvent): void {
    this.logger.info(ev.type, { eventId: ev.eventId, at: ev.at });
    this.listeners.forEach((listener) => listener(ev));
  }
}
