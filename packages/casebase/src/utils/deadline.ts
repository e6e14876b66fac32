/**
 * Deadlines
 *
 * Bounds an awaited operation by a timeout. The underlying promise is not
 * cancelled (JavaScript has no general cancellation), but the caller stops
 * waiting and receives a DeadlineExceededError naming the operation.
 */

import { DeadlineExceededError, type ErrorContext } from '../errors.js';

/** Largest delay Node timers honour; anything above fires after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Await `work` for at most `timeoutMs` milliseconds.
 * A non-positive or infinite timeout waits indefinitely.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  context: ErrorContext
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DeadlineExceededError(timeoutMs, context)),
      Math.min(timeoutMs, MAX_TIMER_DELAY_MS)
    );
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Absolute deadline shared by the steps of a longer job
 */
export class Deadline {
  private readonly expiresAt: number;

  constructor(
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = Number.isFinite(timeoutMs) && timeoutMs > 0 ? now() + timeoutMs : Infinity;
  }

  /** Milliseconds left, Infinity when unbounded */
  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  get expired(): boolean {
    return this.remaining() === 0;
  }

  /** Throw if the deadline has passed */
  check(context: ErrorContext): void {
    if (this.expired) {
      throw new DeadlineExceededError(this.timeoutMs, context);
    }
  }

  /**
   * Start `work` and await it for whatever time is left.
   * Nothing is started once the deadline has passed.
   */
  async race<T>(work: () => Promise<T>, context: ErrorContext): Promise<T> {
    this.check(context);
    const remaining = this.remaining();
    if (remaining === Infinity) return work();

    try {
      return await withDeadline(work(), remaining, context);
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        throw new DeadlineExceededError(this.timeoutMs, context);
      }
      throw err;
    }
  }
}
