import { debugLog } from "../utils/debug";

import type {
  DeviceQuery,
  EdgeType,
  PointerButton,
  TouchPhase,
} from "./types";
import type { KeyCode } from "../types/brands";

type FrameEdges = {
  keyDown: Set<KeyCode>;
  keyUp: Set<KeyCode>;
  pointerDown: Set<PointerButton>;
  pointerUp: Set<PointerButton>;
  touchBegan: boolean;
  touchEnded: boolean;
};

export type BufferedDevice = DeviceQuery & {
  /** Record raw events between ticks (impure, called by host listeners). */
  recordKey: (code: KeyCode, type: EdgeType) => void;
  recordPointer: (button: PointerButton, type: EdgeType) => void;
  recordTouch: (phase: TouchPhase) => void;
  setAxis: (name: string, value: number) => void;
  /**
   * Publish everything recorded since the last call as the current frame and
   * start a fresh buffer. Called once per tick by the driver, before sampling.
   */
  advance: () => void;
  /** Number of edges waiting for the next advance(). */
  readonly pendingEdgeCount: number;
};

function makeFrameEdges(): FrameEdges {
  return {
    keyDown: new Set(),
    keyUp: new Set(),
    pointerDown: new Set(),
    pointerUp: new Set(),
    touchBegan: false,
    touchEnded: false,
  };
}

function countEdges(frame: FrameEdges): number {
  return (
    frame.keyDown.size +
    frame.keyUp.size +
    frame.pointerDown.size +
    frame.pointerUp.size +
    (frame.touchBegan ? 1 : 0) +
    (frame.touchEnded ? 1 : 0)
  );
}

/**
 * Device query backed by an edge buffer.
 * Host events are buffered as they arrive and become visible to samplers
 * only after advance(), so every sampler in a tick sees the same frame.
 */
export function createBufferedDevice(): BufferedDevice {
  let pending = makeFrameEdges();
  let current = makeFrameEdges();
  const pendingAxes = new Map<string, number>();
  const axes = new Map<string, number>();

  return {
    advance: (): void => {
      const count = countEdges(pending);
      if (count > 0) {
        debugLog("device", `publishing ${String(count)} edge(s)`);
      }
      current = pending;
      pending = makeFrameEdges();
      for (const [name, value] of pendingAxes) {
        axes.set(name, value);
      }
      pendingAxes.clear();
    },
    axisValue: (name: string): number => axes.get(name) ?? 0,
    isKeyDown: (code: KeyCode): boolean => current.keyDown.has(code),
    isKeyUp: (code: KeyCode): boolean => current.keyUp.has(code),
    isPointerDown: (button: PointerButton): boolean =>
      current.pointerDown.has(button),
    isPointerUp: (button: PointerButton): boolean =>
      current.pointerUp.has(button),
    get pendingEdgeCount(): number {
      return countEdges(pending);
    },
    isTouchBegan: (): boolean => current.touchBegan,
    isTouchEnded: (): boolean => current.touchEnded,
    recordKey: (code: KeyCode, type: EdgeType): void => {
      (type === "down" ? pending.keyDown : pending.keyUp).add(code);
    },
    recordPointer: (button: PointerButton, type: EdgeType): void => {
      (type === "down" ? pending.pointerDown : pending.pointerUp).add(button);
    },
    recordTouch: (phase: TouchPhase): void => {
      if (phase === "began") pending.touchBegan = true;
      else pending.touchEnded = true;
    },
    setAxis: (name: string, value: number): void => {
      pendingAxes.set(name, value);
    },
  };
}
