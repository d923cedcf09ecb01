import type { KeyCode } from "../types/brands";
import type { Tick } from "../types/tick";

/*
 * Host-facing contracts the sampler reads from. Device adapters normalize
 * concrete events into per-tick edges; the sampler only ever asks about
 * "this tick".
 */

export type EdgeType = "down" | "up";

/** 0 is the primary (left) button. */
export type PointerButton = 0 | 1 | 2;

/** Edges of the primary touch; a canceled touch records neither. */
export type TouchPhase = "began" | "ended";

export type DeviceQuery = {
  /** Key became pressed this tick. */
  isKeyDown(code: KeyCode): boolean;
  /** Key became released this tick. */
  isKeyUp(code: KeyCode): boolean;
  isPointerDown(button: PointerButton): boolean;
  isPointerUp(button: PointerButton): boolean;
  /** Primary touch began this tick. */
  isTouchBegan(): boolean;
  /** Primary touch ended this tick. Can be true together with isTouchBegan(). */
  isTouchEnded(): boolean;
  /** Last reported value of a named analog axis; 0 when never reported. */
  axisValue(name: string): number;
};

export type HitTester<TTarget> = {
  /** Object currently under the pointer, if any. */
  hoveredObject(): TTarget | undefined;
};

/** Read-only view of the host's frame clock. */
export type FrameClock = {
  readonly tick: Tick;
  /** Time of the current frame in milliseconds. */
  readonly timeMs: number;
};
