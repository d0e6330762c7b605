import type { WorkerStatus } from '../types/pipeline.js';

/**
 * Process-lifetime status of the pipeline, owned by the pipeline instance.
 *
 * `tryBeginRun` tests and sets the running flag in one synchronous step, so
 * two triggers landing in the same tick cannot both start a run.
 */
export class RunState {
  private readonly startedAt: Date;
  private running = false;
  private lastRun: Date | null = null;
  private lastRefresh: Date | null = null;
  private betsToday = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.startedAt = clock();
  }

  tryBeginRun(): boolean {
    if (this.running) return false;
    this.running = true;
    return true;
  }

  /** Records a finished run. The running flag is released by `endRun`. */
  completeRun(betCount: number): void {
    this.lastRun = this.clock();
    this.betsToday = betCount;
  }

  endRun(): void {
    this.running = false;
  }

  markRefreshed(): void {
    this.lastRefresh = this.clock();
  }

  isRunning(): boolean {
    return this.running;
  }

  snapshot(): WorkerStatus {
    return {
      startedAt: this.startedAt,
      lastRun: this.lastRun,
      lastRefresh: this.lastRefresh,
      betsToday: this.betsToday,
      running: this.running,
    };
  }
}
