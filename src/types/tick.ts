export type Tick = number & { readonly brand: "Tick" };

/**
 * Type-safe utilities for working with branded Tick values.
 * Ticks are the only clock the sampler compares against, so these are the
 * only operations allowed on them.
 */

/**
 * Converts a raw number to a branded Tick.
 * Should only be used at system boundaries (clock initialization, tests).
 */
export function asTick(n: number): Tick {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error("Tick must be a non-negative integer");
  }
  return n as Tick;
}

/**
 * Increments a tick by 1. Used by the frame clock when a new tick begins.
 */
export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}

export function isSameTick(a: Tick, b: Tick): boolean {
  return a === b;
}

/** Frame index before the first tick has run. */
export const TICK_ZERO = 0 as Tick;
