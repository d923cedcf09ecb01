/*
 * Activation State Machine Implementation using Robot3
 *
 * Tracks whether a sampler is active (value != 0) and when its value was last
 * written. Every write is a SET_VALUE event; both states accept it and move to
 * "active" or "inactive" depending on the value, including self-transitions,
 * so the last-transition tick moves on every write even when the state does not.
 *
 * ACTIVATION STATE FLOW:
 * inactive → active (SET_VALUE, value != 0)
 * inactive → inactive (SET_VALUE, value == 0)
 * active → inactive (SET_VALUE, value == 0)
 * active → active (SET_VALUE, value != 0)
 *
 * Side effects of a write (waiters, cancel signals, broadcasts) are owned by
 * the sampler, which runs them after send() returns so their order stays fixed.
 */

import {
  createMachine,
  state,
  transition,
  guard,
  reduce,
  interpret,
} from "robot3";

import type { Tick } from "../../types/tick";
import type { MachineState, MachineStates, Machine, Service } from "robot3";

export type ActivationState = "inactive" | "active";

export type ActivationContext = {
  value: number; // 0 = inactive, otherwise activation force
  lastTransitionTick: Tick | undefined; // Tick of the most recent SET_VALUE
};

export type ActivationEvent = { type: "SET_VALUE"; value: number; tick: Tick };

// Guards
const isActiveValue = (
  _ctx: ActivationContext,
  event: ActivationEvent,
): boolean => event.value !== 0;

const isInactiveValue = (
  _ctx: ActivationContext,
  event: ActivationEvent,
): boolean => event.value === 0;

// Reducer: store the written value and the tick it was written on
export const storeValue = (
  ctx: ActivationContext,
  event: ActivationEvent,
): ActivationContext => ({
  ...ctx,
  lastTransitionTick: event.tick,
  value: event.value,
});

const createActivationState = (): MachineState<ActivationEvent["type"]> =>
  state(
    transition(
      "SET_VALUE",
      "active",
      guard(isActiveValue),
      reduce(storeValue),
    ),
    transition(
      "SET_VALUE",
      "inactive",
      guard(isInactiveValue),
      reduce(storeValue),
    ),
  );

type ActivationEventType = ActivationEvent["type"];
type ActivationStatesObject = Record<
  ActivationState,
  MachineState<ActivationEventType>
>;
export type ActivationMachine = Machine<
  ActivationStatesObject,
  ActivationContext,
  ActivationState,
  ActivationEventType
>;

export const createDefaultActivationContext = (): ActivationContext => ({
  lastTransitionTick: undefined,
  value: 0,
});

export const createActivationMachine = (
  initialContext: ActivationContext,
): ActivationMachine => {
  const states = {
    active: createActivationState(),
    inactive: createActivationState(),
  } as const;

  // robot3's return type narrows the event type to `string`; cast back to
  // keep the stricter event/state typing at this module's boundary.
  return createMachine(
    initialContext.value !== 0 ? ("active" as const) : ("inactive" as const),
    states as unknown as MachineStates<
      ActivationStatesObject,
      ActivationEventType
    >,
    (_ctx: ActivationContext): ActivationContext => initialContext,
  ) as unknown as ActivationMachine;
};

type ActivationService = Service<ActivationMachine>;

/**
 * Thin wrapper around the robot3 service.
 * No duplicate state logic: transitions live in the machine above.
 */
export class ActivationMachineService {
  private readonly service: ActivationService;
  private currentStateName: ActivationState;

  constructor(initialContext?: ActivationContext) {
    const context = initialContext ?? createDefaultActivationContext();
    this.currentStateName = context.value !== 0 ? "active" : "inactive";
    this.service = interpret(createActivationMachine(context), (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  setValue(value: number, tick: Tick): ActivationState {
    this.service.send({ tick, type: "SET_VALUE", value });
    return this.currentStateName;
  }

  get state(): ActivationState {
    return this.currentStateName;
  }

  get context(): ActivationContext {
    return { ...this.service.context };
  }
}
