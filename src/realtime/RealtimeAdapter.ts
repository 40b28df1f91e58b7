import type { DomainEvent } from "@/models";

/**
 * Delivery of committed domain events to renderers (chat bots, dashboards).
 * `broadcast` must not block; the engine never awaits it.
 */
export interface RealtimeAdapter {
  connect(): void;
  disconnect(): void;
  onEvent(cb: (ev: DomainEvent) => void): void;
  broadcast(ev: DomainEvent): void;
}
