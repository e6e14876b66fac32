/**
 * Maintenance Scheduler
 *
 * Runs consolidation and decay on independent timers. A job never overlaps
 * with itself: a tick arriving while the previous run is still going is
 * skipped. Failures are logged and counted, and the job simply runs again
 * on its next tick. `tick()` runs a job immediately for manual control and
 * tests; `stop()` waits for in-flight runs.
 */

import type { MaintenanceJob } from '../types/index.js';
import { MAX_TIMER_DELAY_MS } from '../utils/deadline.js';
import { errorMessage, silentLogger, type Logger } from '../utils/logger.js';

/**
 * Scheduler configuration
 */
export interface SchedulerConfig {
  /** Interval in ms between consolidation runs */
  consolidationIntervalMs: number;
  /** Interval in ms between decay runs */
  decayIntervalMs: number;
}

/**
 * The work behind each job
 */
export type MaintenanceRunners = Record<MaintenanceJob, () => Promise<unknown>>;

/**
 * Per-job bookkeeping
 */
export interface JobStatus {
  runs: number;
  errors: number;
  /** Ticks dropped because the previous run was still going */
  skipped: number;
  running: boolean;
  lastRunAt: Date | null;
  lastError: string | null;
}

const JOBS: readonly MaintenanceJob[] = ['consolidation', 'decay'];

/**
 * Maintenance scheduler
 */
export class MaintenanceScheduler {
  private readonly timers = new Map<MaintenanceJob, ReturnType<typeof setInterval>>();
  private readonly inFlight = new Map<MaintenanceJob, Promise<void>>();
  private readonly status: Record<MaintenanceJob, JobStatus> = {
    consolidation: emptyStatus(),
    decay: emptyStatus(),
  };

  constructor(
    private readonly runners: MaintenanceRunners,
    private readonly config: SchedulerConfig,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Start the timers; no-op when already started
   */
  start(): void {
    if (this.timers.size > 0) return;

    for (const job of JOBS) {
      const timer = setInterval(() => {
        void this.tick(job);
      }, this.intervalFor(job));
      // Timers must not keep the process alive on their own
      timer.unref();
      this.timers.set(job, timer);
    }

    this.logger.debug(
      `Maintenance started (consolidation every ${this.config.consolidationIntervalMs}ms, decay every ${this.config.decayIntervalMs}ms)`
    );
  }

  /**
   * Stop the timers and wait for in-flight runs
   */
  async stop(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
    await Promise.all(this.inFlight.values());
  }

  /** Whether the timers are running */
  get started(): boolean {
    return this.timers.size > 0;
  }

  /**
   * Run a job now. Resolves to false when the job was already running.
   */
  async tick(job: MaintenanceJob): Promise<boolean> {
    if (this.inFlight.has(job)) {
      this.status[job].skipped++;
      this.logger.debug(`Skipping ${job} tick; previous run still in progress`);
      return false;
    }

    const run = this.execute(job);
    this.inFlight.set(job, run);
    try {
      await run;
    } finally {
      this.inFlight.delete(job);
    }
    return true;
  }

  /**
   * Snapshot of the per-job bookkeeping
   */
  stats(): Record<MaintenanceJob, JobStatus> {
    return {
      consolidation: { ...this.status.consolidation, running: this.inFlight.has('consolidation') },
      decay: { ...this.status.decay, running: this.inFlight.has('decay') },
    };
  }

  private async execute(job: MaintenanceJob): Promise<void> {
    const status = this.status[job];
    try {
      await this.runners[job]();
      status.runs++;
      status.lastRunAt = new Date();
    } catch (err) {
      status.errors++;
      status.lastError = errorMessage(err);
      this.logger.error(`Maintenance job ${job} failed: ${status.lastError}`);
    }
  }

  private intervalFor(job: MaintenanceJob): number {
    const interval = job === 'consolidation' ? this.config.consolidationIntervalMs : this.config.decayIntervalMs;
    return Math.min(interval, MAX_TIMER_DELAY_MS);
  }
}

function emptyStatus(): JobStatus {
  return { runs: 0, errors: 0, skipped: 0, running: false, lastRunAt: null, lastError: null };
}
