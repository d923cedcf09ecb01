export { createConstantAxis, createDeviceAxis } from "./input/axes";
export type {
  AxisSource,
  AxisTriggerMode,
  DeviceAxisOptions,
} from "./input/axes";
export { createInputBinding, EMPTY_BINDING, isEmptyBinding } from "./input/binding";
export type { InputBinding } from "./input/binding";
export {
  DEFAULT_INPUT_CONFIG,
  parseInputConfiguration,
} from "./input/config";
export type {
  AxisBindingConfig,
  InputConfiguration,
  SamplerBindingConfig,
} from "./input/config";
export { InputManager, createInputManager } from "./input/manager";
export { ObserverList } from "./input/observers";
export { OneShotFuture, OneShotSignal } from "./input/one-shot";
export type { CancelToken } from "./input/one-shot";
export {
  DEFAULT_TOUCH_COOLDOWN_MS,
  InputSampler,
  ReentrantSampleError,
} from "./input/sampler";
export type { InputSamplerDeps, InputSamplerOptions } from "./input/sampler";

export { createBufferedDevice } from "./device/buffered-device";
export type { BufferedDevice } from "./device/buffered-device";
export { attachDomInput, createDomHitTester } from "./device/dom";
export type {
  DeviceQuery,
  EdgeType,
  FrameClock,
  HitTester,
  PointerButton,
  TouchPhase,
} from "./device/types";

export { createFrameClock } from "./runtime/clock";
export type { MutableFrameClock } from "./runtime/clock";
export { createTickDriver } from "./runtime/loop";
export type { TickDriver, TickDriverDeps } from "./runtime/loop";

export { createDurationMs, createKeyCode } from "./types/brands";
export type { DurationMs, KeyCode } from "./types/brands";
export { asTick } from "./types/tick";
export type { Tick } from "./types/tick";

export { debugLog, isDebugEnabled } from "./utils/debug";
export type { DebugTopic } from "./utils/debug";
