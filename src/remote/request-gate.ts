/**
 * Process-wide admission control for tracker requests.
 *
 * Caps the number of requests in flight and spaces request starts so that parallel branches
 * together stay under the tracker's rate limit. Waiters are served in arrival order.
 *
 * @example
 * ```ts
 * const gate = new RequestGate({ maxConcurrent: 4, requestsPerSecond: 5 });
 * const response = await gate.run(() => fetch(url));
 * ```
 */

import { delay } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RequestGateOptions = {
  /** Requests allowed in flight at once. Default: 4. */
  maxConcurrent?: number;
  /** Upper bound on request starts per second; 0 disables spacing. Default: 0. */
  requestsPerSecond?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

// =============================================================================
// GATE
// =============================================================================

export class RequestGate {
  private readonly maxConcurrent: number;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly waiters: Array<() => void> = [];
  private active = 0;
  private nextStartAt = 0;

  constructor(options: RequestGateOptions = {}) {
    this.maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent ?? 4));
    const rps = options.requestsPerSecond ?? 0;
    this.minIntervalMs = rps > 0 ? 1000 / rps : 0;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  async run<T>(execute: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      await this.pace();
      return await execute();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter; `active` stays the same.
      next();
      return;
    }
    this.active -= 1;
  }

  private async pace(): Promise<void> {
    if (this.minIntervalMs === 0) return;

    const now = this.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.minIntervalMs;

    const wait = startAt - now;
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}
