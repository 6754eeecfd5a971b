import logger from './logger';

type AsyncTask = () => Promise<void>;

/**
 * Fixed-cadence task that never overlaps itself: a tick arriving while the
 * previous run is still going is skipped, not queued.
 */
export class PeriodicTask {
  private intervalHandle: NodeJS.Timeout | null = null;
  private isRunning = false;
  private skippedTicks = 0;
  private completedRuns = 0;

  constructor(
    readonly name: string,
    readonly intervalMs: number,
    private readonly task: AsyncTask
  ) {}

  start(): void {
    if (this.intervalHandle) {
      logger.warn(`[SCHEDULER] ${this.name} already running.`);
      return;
    }

    this.intervalHandle = setInterval(() => {
      void this.runNow();
    }, this.intervalMs);

    logger.info(`[SCHEDULER] ${this.name} started with interval ${this.intervalMs}ms.`);
  }

  /**
   * Run one tick now. Resolves false when a previous run is still in flight.
   * Never rejects: task failures are logged.
   */
  async runNow(): Promise<boolean> {
    if (this.isRunning) {
      this.skippedTicks++;
      logger.debug(`[SCHEDULER] ${this.name} still running, skipping interval tick.`);
      return false;
    }

    this.isRunning = true;

    try {
      await this.task();
      this.completedRuns++;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`[SCHEDULER] ${this.name} failed: ${reason}`);
    } finally {
      this.isRunning = false;
    }

    return true;
  }

  stop(): void {
    if (!this.intervalHandle) {
      return;
    }

    clearInterval(this.intervalHandle);
    this.intervalHandle = null;
    logger.info(`[SCHEDULER] ${this.name} stopped.`);
  }

  get running(): boolean {
    return this.isRunning;
  }

  get active(): boolean {
    return this.intervalHandle !== null;
  }

  get skipped(): number {
    return this.skippedTicks;
  }

  get runs(): number {
    return this.completedRuns;
  }
}
