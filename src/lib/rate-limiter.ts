// Shared pacing for calls to the verification provider.
// Every caller reserves the next free slot synchronously, so concurrent
// lookups never land two requests closer than minIntervalMs apart.

import { sleep as defaultSleep } from './retry';

/**
 * Anything that hands out request slots
 */
export interface SlotLimiter {
  acquire(): Promise<void>;
}

export interface RateLimiterOptions {
  /** Minimum gap between two granted slots */
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStats {
  granted: number;
  totalWaitMs: number;
  minIntervalMs: number;
}

export class RateLimiter implements SlotLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private nextSlot = 0;
  private granted = 0;
  private totalWaitMs = 0;

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolve once the caller may issue its request
   */
  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    this.granted++;

    const wait = slot - now;
    if (wait > 0) {
      this.totalWaitMs += wait;
      await this.sleep(wait);
    }
  }

  getStats(): RateLimiterStats {
    return {
      granted: this.granted,
      totalWaitMs: this.totalWaitMs,
      minIntervalMs: this.minIntervalMs,
    };
  }
}
