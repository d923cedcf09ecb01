import { createKeyCode } from "../types/brands";

import type { BufferedDevice } from "./buffered-device";
import type { HitTester, PointerButton, TouchPhase } from "./types";

function toPointerButton(button: number): PointerButton | null {
  if (button === 0 || button === 1 || button === 2) return button;
  return null;
}

function touchPhaseOf(type: string): TouchPhase | null {
  switch (type) {
    case "touchstart":
      return "began";
    case "touchend":
      return "ended";
    default:
      return null;
  }
}

/**
 * Bind DOM keyboard, mouse and touch events to a buffered device.
 * Key auto-repeat is ignored so only physical press/release edges are recorded.
 * @returns Cleanup function removing all listeners
 */
export function attachDomInput(
  target: EventTarget,
  device: BufferedDevice,
): () => void {
  // Pre-bound handlers so removeEventListener works reliably
  const onKey = (event: Event): void => {
    if (!(event instanceof KeyboardEvent)) return;
    if (event.repeat || event.code.length === 0) return;
    device.recordKey(
      createKeyCode(event.code),
      event.type === "keydown" ? "down" : "up",
    );
  };
  const onMouse = (event: Event): void => {
    if (!(event instanceof MouseEvent)) return;
    const button = toPointerButton(event.button);
    if (button === null) return;
    device.recordPointer(button, event.type === "mousedown" ? "down" : "up");
  };
  const onTouch = (event: Event): void => {
    const phase = touchPhaseOf(event.type);
    if (phase === null) return;
    device.recordTouch(phase);
  };

  const bindings: ReadonlyArray<[string, (event: Event) => void]> = [
    ["keydown", onKey],
    ["keyup", onKey],
    ["mousedown", onMouse],
    ["mouseup", onMouse],
    ["touchstart", onTouch],
    ["touchend", onTouch],
  ];
  for (const [type, handler] of bindings) {
    target.addEventListener(type, handler);
  }

  return () => {
    for (const [type, handler] of bindings) {
      target.removeEventListener(type, handler);
    }
  };
}

/**
 * Hit tester reporting the element most recently under the pointer.
 * Tracks mouseover, mousedown and touchstart targets on the given root.
 */
export function createDomHitTester(root: EventTarget): {
  hitTester: HitTester<EventTarget>;
  detach: () => void;
} {
  let hovered: EventTarget | undefined;
  const onHover = (event: Event): void => {
    hovered = event.target ?? undefined;
  };
  const onLeave = (event: Event): void => {
    if (event.target === root) hovered = undefined;
  };

  const types = ["mouseover", "mousedown", "touchstart"] as const;
  for (const type of types) root.addEventListener(type, onHover);
  root.addEventListener("mouseleave", onLeave);

  return {
    detach: (): void => {
      for (const type of types) root.removeEventListener(type, onHover);
      root.removeEventListener("mouseleave", onLeave);
      hovered = undefined;
    },
    hitTester: {
      hoveredObject: (): EventTarget | undefined => hovered,
    },
  };
}
