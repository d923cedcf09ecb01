import { TICK_ZERO, incrementTick, type Tick } from "../types/tick";

import type { FrameClock } from "../device/types";

export type MutableFrameClock = FrameClock & {
  /** Begin the next tick at the given frame time. */
  advance: (timeMs: number) => Tick;
};

/**
 * Frame clock owned by the tick driver. Tick 0 means no tick has run yet;
 * the first advance() starts tick 1.
 */
export function createFrameClock(startTimeMs = 0): MutableFrameClock {
  let tick = TICK_ZERO;
  let timeMs = startTimeMs;
  return {
    advance: (nextTimeMs: number): Tick => {
      if (!Number.isFinite(nextTimeMs) || nextTimeMs < timeMs) {
        throw new Error("Frame time must be finite and must not go backwards");
      }
      tick = incrementTick(tick);
      timeMs = nextTimeMs;
      return tick;
    },
    get tick(): Tick {
      return tick;
    },
    get timeMs(): number {
      return timeMs;
    },
  };
}
