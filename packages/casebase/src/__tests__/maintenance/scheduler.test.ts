/**
 * Maintenance Scheduler Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { MaintenanceScheduler, type MaintenanceRunners } from '../../maintenance/scheduler.js';
import type { Logger } from '../../utils/logger.js';
import { deferred, sleep } from '../helpers.js';

const intervals = { consolidationIntervalMs: 5000, decayIntervalMs: 1000 };

function runners(overrides: Partial<MaintenanceRunners> = {}): MaintenanceRunners {
  return {
    consolidation: vi.fn(async () => undefined),
    decay: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('MaintenanceScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run a job on demand', async () => {
    const jobs = runners();
    const scheduler = new MaintenanceScheduler(jobs, intervals);

    expect(await scheduler.tick('decay')).toBe(true);

    expect(jobs.decay).toHaveBeenCalledTimes(1);
    expect(jobs.consolidation).not.toHaveBeenCalled();
    const status = scheduler.stats().decay;
    expect(status.runs).toBe(1);
    expect(status.lastRunAt).toBeInstanceOf(Date);
  });

  it('should skip a tick while the previous run is in progress', async () => {
    const gate = deferred();
    const scheduler = new MaintenanceScheduler(runners({ decay: () => gate.promise }), intervals);

    const first = scheduler.tick('decay');
    expect(await scheduler.tick('decay')).toBe(false);
    expect(scheduler.stats().decay).toMatchObject({ skipped: 1, running: true });

    gate.resolve();
    expect(await first).toBe(true);
    expect(scheduler.stats().decay).toMatchObject({ runs: 1, running: false });
  });

  it('should contain job failures', async () => {
    const logger: Logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const scheduler = new MaintenanceScheduler(
      runners({ consolidation: async () => Promise.reject(new Error('boom')) }),
      intervals,
      logger
    );

    expect(await scheduler.tick('consolidation')).toBe(true);

    expect(scheduler.stats().consolidation).toMatchObject({ runs: 0, errors: 1, lastError: 'boom' });
    expect(logger.error).toHaveBeenCalledWith('Maintenance job consolidation failed: boom');
    expect(await scheduler.tick('consolidation')).toBe(true);
    expect(scheduler.stats().consolidation.errors).toBe(2);
  });

  it('should wait for in-flight runs when stopping', async () => {
    const gate = deferred();
    const scheduler = new MaintenanceScheduler(runners({ decay: () => gate.promise }), intervals);
    const run = scheduler.tick('decay');

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await sleep(10);
    expect(stopped).toBe(false);

    gate.resolve();
    await stopping;
    await run;
    expect(stopped).toBe(true);
  });

  it('should run each job on its own interval', async () => {
    vi.useFakeTimers();
    const jobs = runners();
    const scheduler = new MaintenanceScheduler(jobs, intervals);

    scheduler.start();
    expect(scheduler.started).toBe(true);
    await vi.advanceTimersByTimeAsync(3000);

    expect(jobs.decay).toHaveBeenCalledTimes(3);
    expect(jobs.consolidation).not.toHaveBeenCalled();

    await scheduler.stop();
    expect(scheduler.started).toBe(false);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(jobs.decay).toHaveBeenCalledTimes(3);
  });

  it('should not spin on an interval beyond the timer range', async () => {
    vi.useFakeTimers();
    const jobs = runners();
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    const scheduler = new MaintenanceScheduler(jobs, { consolidationIntervalMs: thirtyDays, decayIntervalMs: thirtyDays });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(100);

    expect(jobs.decay).not.toHaveBeenCalled();
    expect(jobs.consolidation).not.toHaveBeenCalled();
    await scheduler.stop();
  });
});
