export type CancelScheduled = () => void;

/** Time source shared by the heartbeat and the scheduler; both run on the same event loop. */
export interface Clock {
  now(): number;
  schedule(callback: () => void, delayMs: number): CancelScheduled;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(callback, delayMs) {
    const timeout = setTimeout(callback, Math.max(delayMs, 0));
    return () => clearTimeout(timeout);
  }
};
