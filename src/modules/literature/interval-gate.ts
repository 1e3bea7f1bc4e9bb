import { delay, type Sleep } from "../../clients/request-control.js";

export interface GateClock {
  now: () => number;
  sleep: Sleep;
}

export const systemClock: GateClock = {
  now: Date.now,
  sleep: delay
};

/**
 * Process-wide pacing gate for one external service. Slots are reserved
 * synchronously, so concurrent callers are serialized at `minIntervalMs`
 * apart; a caller is delayed until its slot, never rejected.
 */
export class IntervalGate {
  readonly minIntervalMs: number;

  private readonly clock: GateClock;

  private nextSlotAt = Number.NEGATIVE_INFINITY;

  constructor(minIntervalMs: number, clock: GateClock = systemClock) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.clock = clock;
  }

  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();
    return operation();
  }
}
