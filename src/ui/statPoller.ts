import { MIN_STAT_INTERVAL_MS } from "../protocol/constants";

/** Step applied by the dialog's interval keys. */
export const STAT_INTERVAL_STEP_MS = 100;

/** New poll interval after a step, never below the 100 ms floor. */
export function adjustStatInterval(currentMs: number, deltaMs: number): number {
  return Math.max(MIN_STAT_INTERVAL_MS, currentMs + deltaMs);
}

/**
 * Fires the STAT callback on a fixed interval. A tick that lands while the
 * previous run is still in flight is skipped, so transactions never overlap.
 */
export class StatPoller {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private interval: number;

  constructor(
    private readonly run: () => Promise<void>,
    intervalMs: number,
    private readonly onError?: (error: unknown) => void
  ) {
    this.interval = Math.max(MIN_STAT_INTERVAL_MS, intervalMs);
  }

  get active(): boolean {
    return this.timer !== null;
  }

  get intervalMs(): number {
    return this.interval;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.interval);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Intervals below 100 ms are raised to 100 ms; an active poller restarts at the new rate. */
  setInterval(intervalMs: number): void {
    this.interval = Math.max(MIN_STAT_INTERVAL_MS, intervalMs);
    if (this.timer) {
      this.stop();
      this.start();
    }
  }

  private async tick(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      await this.run();
    } catch (error) {
      this.onError?.(error);
    } finally {
      this.running = false;
    }
  }
}
