/**
 * Deadline Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DeadlineExceededError } from '../../errors.js';
import { Deadline, withDeadline } from '../../utils/deadline.js';
import { sleep } from '../helpers.js';

describe('withDeadline', () => {
  it('should resolve with the work result when it finishes in time', async () => {
    await expect(withDeadline(Promise.resolve(42), 1000, { operation: 'test' })).resolves.toBe(42);
  });

  it('should reject with DeadlineExceededError when the work is too slow', async () => {
    const slow = sleep(200).then(() => 'late');

    const error = await withDeadline(slow, 20, { operation: 'slow.op' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({ code: 'DEADLINE_EXCEEDED', operation: 'slow.op', timeoutMs: 20 });
  });

  it('should not fire early for a timeout beyond the timer range', async () => {
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;

    await expect(withDeadline(sleep(20).then(() => 'done'), thirtyDays, {})).resolves.toBe('done');
  });

  it('should wait indefinitely for a non-positive timeout', async () => {
    await expect(withDeadline(sleep(5).then(() => 'done'), 0, {})).resolves.toBe('done');
  });
});

describe('Deadline', () => {
  it('should count down against its clock', () => {
    let now = 1000;
    const deadline = new Deadline(100, () => now);

    expect(deadline.remaining()).toBe(100);
    expect(deadline.expired).toBe(false);

    now = 1150;
    expect(deadline.remaining()).toBe(0);
    expect(deadline.expired).toBe(true);
    expect(() => deadline.check({ operation: 'job' })).toThrow(DeadlineExceededError);
  });

  it('should be unbounded for a zero timeout', () => {
    const deadline = new Deadline(0);

    expect(deadline.remaining()).toBe(Infinity);
    expect(deadline.expired).toBe(false);
  });

  it('should not start work once expired', async () => {
    let now = 0;
    const deadline = new Deadline(10, () => now);
    now = 50;
    const work = vi.fn(async () => 1);

    await expect(deadline.race(work, { operation: 'late' })).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(work).not.toHaveBeenCalled();
  });

  it('should report the full timeout when racing out of time', async () => {
    const deadline = new Deadline(20);

    const error = await deadline.race(() => sleep(200), { operation: 'race' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({ timeoutMs: 20 });
  });
});
