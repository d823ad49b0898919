/**
 * HTTP helpers for subgap plugins
 */

import type { Clock, Sleep } from './types.js';

export class HttpError extends Error {
  status: number;
  response: unknown;

  constructor(status: number, message: string, response?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.response = response;
  }
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RequestPacerOptions {
  now?: Clock;
  sleep?: Sleep;
}

/**
 * Spaces outbound requests so that consecutive starts are at least
 * `minIntervalMs` apart. Callers are served in arrival order.
 */
export class RequestPacer {
  private minIntervalMs: number;
  private now: Clock;
  private sleep: Sleep;
  private lastStart: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(minIntervalMs: number, options: RequestPacerOptions = {}) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // The next caller queues behind this one whether it resolved or failed.
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    return task();
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastStart !== null) {
      const elapsed = this.now() - this.lastStart;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastStart = this.now();
  }
}

/**
 * Reads a Retry-After header given in whole seconds.
 * Returns the wait in milliseconds, or null when absent or not a number.
 */
export function parseRetryAfter(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.round(value * 1000) : null;
  }
  if (typeof value !== 'string' || !/^\s*\d+\s*$/.test(value)) {
    return null;
  }
  return parseInt(value, 10) * 1000;
}
