import type { MutableFrameClock } from "./clock";
import type { BufferedDevice } from "../device/buffered-device";
import type { InputManager } from "../input/manager";
import type { Tick } from "../types/tick";

export type TickDriverDeps<TTarget> = Readonly<{
  clock: MutableFrameClock;
  device: BufferedDevice;
  manager: InputManager<TTarget>;
}>;

export type TickDriver = Readonly<{
  /**
   * One tick:
   *  - advances the clock to the new frame time,
   *  - publishes device edges recorded since the previous tick,
   *  - samples every registered sampler.
   */
  step: (timeMs: number) => Tick;
}>;

export function createTickDriver<TTarget>(
  deps: TickDriverDeps<TTarget>,
): TickDriver {
  const { clock, device, manager } = deps;
  return {
    step: (timeMs: number): Tick => {
      const tick = clock.advance(timeMs);
      device.advance();
      manager.sampleAll();
      return tick;
    },
  };
}
