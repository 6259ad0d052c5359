/**
 * Backoff & pacing helpers
 */

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface BackoffOptions {
  baseDelay: number;
  maxDelay: number;
}

/**
 * Exponential delay for a zero-based retry number: base, 2x base, 4x base...
 * never above maxDelay
 */
export function exponentialDelay(
  retry: number,
  { baseDelay, maxDelay }: BackoffOptions,
): number {
  return Math.min(maxDelay, baseDelay * Math.pow(2, retry));
}

/**
 * Exponential delay spread over [delay * (1 - jitter), delay]
 */
export function jitteredDelay(
  retry: number,
  options: BackoffOptions,
  jitter: number,
  random: () => number = Math.random,
): number {
  const delay = exponentialDelay(retry, options);
  return Math.round(delay * (1 - jitter * random()));
}

/**
 * Enforces a minimum interval between consecutive calls to wait()
 */
export class Pacer {
  private last: number | null = null;

  constructor(
    private interval: number,
    private clock: Clock = Date.now,
    private pause: Sleep = sleep,
  ) {}

  /**
   * Interval derived from an hourly request quota
   */
  static perHour(
    requestsPerHour: number,
    clock?: Clock,
    pause?: Sleep,
  ): Pacer {
    return new Pacer(Math.ceil(3_600_000 / requestsPerHour), clock, pause);
  }

  async wait(): Promise<void> {
    if (this.last !== null) {
      const remaining = this.last + this.interval - this.clock();
      if (remaining > 0) {
        await this.pause(remaining);
      }
    }
    this.last = this.clock();
  }
}
