export type FrameClockConfig = {
  maxFrameDtSec: number;
};

/**
 * Turns rAF timestamps (seconds) into clamped frame deltas.
 * Pure and unit-testable.
 */
export function createFrameClock(config: FrameClockConfig) {
  const maxFrameDtSec = config.maxFrameDtSec;
  let lastNowSec = NaN;

  return {
    /** First call primes the clock and returns 0. */
    advance(nowSec: number): number {
      if (!Number.isFinite(lastNowSec)) {
        lastNowSec = nowSec;
        return 0;
      }
      const rawDt = nowSec - lastNowSec;
      lastNowSec = nowSec;
      return Math.max(0, Math.min(maxFrameDtSec, rawDt));
    },

    reset(nowSec: number) {
      lastNowSec = nowSec;
    },
  };
}
