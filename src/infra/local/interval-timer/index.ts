import type { IntervalTimerPort } from '../../../ports/interval-timer.port.js';

/**
 * `setInterval` adapter. The handle is unref'd so a forgotten session never
 * keeps the process alive.
 */
export class NodeIntervalTimer implements IntervalTimerPort {
  private timer: NodeJS.Timeout | null = null;

  get running(): boolean {
    return this.timer !== null;
  }

  start(intervalMs: number, tick: () => void): void {
    this.stop();
    this.timer = setInterval(tick, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
