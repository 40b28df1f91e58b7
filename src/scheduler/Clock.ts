import type { EngineConfig } from "@/engine/config";
import type { SweepReport } from "@/engine/Engine";
import { describeError, type Logger } from "@/engine/logger";

/** The sweeps a clock drives. `RoundEngine` satisfies it. */
export interface SweepTarget {
  checkDeadlines(now?: string): Promise<SweepReport>;
  checkAutoConfirm(now?: string): Promise<SweepReport>;
  checkRitualExpiry(now?: string): Promise<SweepReport>;
}

type SweepName = keyof SweepTarget;

/**
 * Fires the engine sweeps on fixed intervals. A sweep still running when its
 * next tick arrives is skipped for that tick.
 */
export class SweepClock {
  private readonly timers: ReturnType<typeof setInterval>[] = [];
  private readonly running = new Set<SweepName>();

  constructor(
    private readonly target: SweepTarget,
    private readonly cadence: EngineConfig["cadence"],
    private readonly logger: Logger,
  ) {}

  get started(): boolean {
    return this.timers.length > 0;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.timers.push(
      setInterval(() => this.fire("checkDeadlines"), this.cadence.deadlinesMs),
      setInterval(() => this.fire("checkAutoConfirm"), this.cadence.autoConfirmMs),
      setInterval(() => this.fire("checkRitualExpiry"), this.cadence.ritualExpiryMs),
    );
    this.logger.info("sweep clock started", { ...this.cadence });
  }

  stop(): void {
    this.timers.splice(0).forEach((timer) => clearInterval(timer));
    this.logger.info("sweep clock stopped");
  }

  /** Runs every sweep once, in order. */
  async tick(now?: string): Promise<Record<SweepName, SweepReport>> {
    return {
      checkDeadlines: await this.target.checkDeadlines(now),
      checkAutoConfirm: await this.target.checkAutoConfirm(now),
      checkRitualExpiry: await this.target.checkRitualExpiry(now),
    };
  }

  private fire(name: SweepName): void {
    if (this.running.has(name)) {
      this.logger.debug(`${name} still running, tick skipped`);
      return;
    }
    this.running.add(name);
    void this.target[name]()
      .catch((error: unknown) => {
        this.logger.error(`${name} sweep crashed`, { error: describeError(error) });
      })
      .finally(() => {
        this.running.delete(name);
      });
  }
}
