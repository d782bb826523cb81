import type { Logger } from './logger.js';

/**
 * Self-rescheduling timer loop. A tick never overlaps the previous one; the
 * next delay is asked for after each tick completes.
 */
export class PollLoop {
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private inFlight: Promise<void> | null = null;

  constructor(
    private params: {
      name: string;
      tick: () => Promise<void>;
      nextDelayMs: () => number;
      logger: Logger;
    }
  ) {}

  isRunning(): boolean {
    return !this.stopped;
  }

  start(initialDelayMs = 0): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.scheduleNext(initialDelayMs);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private scheduleNext(delayMs: number): void {
    if (this.stopped) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.params
        .tick()
        .catch((err) => this.params.logger.error(`${this.params.name} tick failed`, err))
        .finally(() => {
          this.inFlight = null;
          this.scheduleNext(Math.max(0, this.params.nextDelayMs()));
        });
    }, Math.max(0, delayMs));
  }
}
