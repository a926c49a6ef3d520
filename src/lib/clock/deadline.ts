import { setTimeout as delay } from 'node:timers/promises';

/**
 * Monotonic time source. Every wait in the broker goes through `sleep` so a
 * test can substitute a clock it advances by hand.
 */
export interface Clock {
  /** Milliseconds on a monotonic timeline; only differences are meaningful. */
  now(): number;
  /** Resolves after `ms`, or as soon as `signal` aborts. Never rejects on abort. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export const systemClock: Clock = {
  now: () => performance.now(),
  async sleep(ms, signal) {
    if (signal?.aborted) return;
    try {
      await delay(Math.max(0, ms), undefined, { signal });
    } catch (error) {
      if (!isAbortError(error)) throw error;
    }
  },
};

export class Deadline {
  private constructor(
    private readonly clock: Clock,
    readonly startedAt: number,
    readonly at: number
  ) {}

  static after(clock: Clock, ms: number): Deadline {
    const now = clock.now();
    return new Deadline(clock, now, now + Math.max(0, ms));
  }

  remainingMs(): number {
    return Math.max(0, this.at - this.clock.now());
  }

  elapsedMs(): number {
    return this.clock.now() - this.startedAt;
  }

  expired(): boolean {
    return this.remainingMs() === 0;
  }
}
