import type { DomainEvent } from "@/models";
import type { RealtimeAdapter } from "@/realtime/RealtimeAdapter";

/** In-process adapter that queues until connected. Tests read `delivered`. */
export class MockAdapter implements RealtimeAdapter {
  private connected = false;
  private readonly listeners = new Set<(ev: DomainEvent) => void>();
  private queue: DomainEvent[] = [];
  readonly delivered: DomainEvent[] = [];

  constructor(options: { autoConnect?: boolean } = {}) {
    if (options.autoConnect ?? true) {
      this.connected = true;
    }
  }

  connect(): void {
    this.connected = true;
    this.flush();
  }

  disconnect(): void {
    this.connected = false;
  }

  onEvent(cb: (ev: DomainEvent) => void): void {
    this.listeners.add(cb);
  }

  broadcast(ev: DomainEvent): void {
    this.queue.push(ev);
    this.flush();
  }

  ofType<K extends DomainEvent["type"]>(type: K): Extract<DomainEvent, { type: K }>[] {
    return this.delivered.filter((ev): ev is Extract<DomainEvent, { type: K }> => ev.type === type);
  }

  private flush(): void {
    if (!this.connected || this.queue.length === 0) {
      return;
    }

    const pending = [...this.queue];
    this.queue = [];
    pending.forEach((event) => {
      this.delivered.push(event);
      this.listeners.forEach((listener) => listener(event));
    });
  }
}
