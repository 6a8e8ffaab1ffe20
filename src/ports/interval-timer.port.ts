/**
 * Port: a repeating timer owned by exactly one session.
 *
 * `start` while running replaces the previous schedule. `stop` is idempotent.
 */
export interface IntervalTimerPort {
  start(intervalMs: number, tick: () => void): void;
  stop(): void;
  readonly running: boolean;
}
