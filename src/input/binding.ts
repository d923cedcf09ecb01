import type { AxisSource } from "./axes";
import type { KeyCode } from "../types/brands";

/**
 * Which keys and axes drive a sampler. Immutable once built.
 * Keys behave as a set but are evaluated in first-listed order;
 * axis order decides magnitude ties.
 */
export type InputBinding = Readonly<{
  keys: ReadonlyArray<KeyCode>;
  axes: ReadonlyArray<AxisSource>;
}>;

export function createInputBinding(
  init: Readonly<{
    keys?: Iterable<KeyCode>;
    axes?: Iterable<AxisSource>;
  }> = {},
): InputBinding {
  // Set keeps first-occurrence order while dropping duplicates
  const keys = Object.freeze([...new Set(init.keys ?? [])]);
  const axes = Object.freeze([...(init.axes ?? [])]);
  return Object.freeze({ axes, keys });
}

export const EMPTY_BINDING: InputBinding = createInputBinding();

export function isEmptyBinding(binding: InputBinding): boolean {
  return binding.keys.length === 0 && binding.axes.length === 0;
}
