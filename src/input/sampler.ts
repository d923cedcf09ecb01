import { createDurationMs, type DurationMs } from "../types/brands";
import { isSameTick, type Tick } from "../types/tick";
import { debugLog } from "../utils/debug";

import { ActivationMachineService } from "./machines/activation";
import { ObserverList } from "./observers";
import { OneShotFuture, OneShotSignal, type CancelToken } from "./one-shot";

import type { InputBinding } from "./binding";
import type { DeviceQuery, FrameClock, HitTester } from "../device/types";


export const DEFAULT_TOUCH_COOLDOWN_MS: DurationMs = createDurationMs(100);

export class ReentrantSampleError extends Error {
  constructor(samplerName: string) {
    super(`InputSampler "${samplerName}" was sampled from inside its own sample()`);
    this.name = "ReentrantSampleError";
  }
}

export type InputSamplerDeps<TTarget> = Readonly<{
  device: DeviceQuery;
  clock: FrameClock;
  hitTester?: HitTester<TTarget>;
}>;

export type InputSamplerOptions<TTarget> = Readonly<{
  /** Objects whose click or touch activates the input. */
  objectTriggers?: Iterable<TTarget>;
  /** Minimum time between accepted touch-begin edges. */
  touchCooldownMs?: DurationMs;
  /** Used in debug logs and errors only. */
  name?: string;
}>;

type TriggerOp<TTarget> = { kind: "add" | "remove"; target: TTarget };

const NO_HIT: HitTester<never> = { hoveredObject: () => undefined };

/**
 * Polls keys, axes and object triggers once per tick and folds them into a
 * single activation value (0 = inactive, anything else = activation force).
 *
 * Transitions can be observed three ways, with the same semantics:
 * - polled flags (isActive, startedThisTick, endedThisTick),
 * - one-shot promises and cancel tokens bound to the next matching transition,
 * - onStart/onEnd observers notified on every write.
 *
 * Sources are applied keys → axes → object triggers; the last write in a tick
 * wins. Key edges write unconditionally, axes only when the value changes.
 */
export class InputSampler<TTarget = unknown> {
  readonly binding: InputBinding;
  readonly name: string;

  private readonly device: DeviceQuery;
  private readonly clock: FrameClock;
  private readonly hitTester: HitTester<TTarget>;
  private readonly activation = new ActivationMachineService();
  private readonly objectTriggers: Set<TTarget>;
  private readonly touchCooldownMs: DurationMs;
  private lastTouchTimeMs: number | undefined;

  private readonly startObservers = new ObserverList();
  private readonly endObservers = new ObserverList();

  private transitionWaiter: OneShotFuture<boolean> | undefined;
  private startWaiter: OneShotFuture<void> | undefined;
  private endWaiter: OneShotFuture<void> | undefined;
  private startCancel: OneShotSignal | undefined;
  private endCancel: OneShotSignal | undefined;

  private sampling = false;
  private disposed = false;
  private deferredTriggerOps: Array<TriggerOp<TTarget>> = [];

  constructor(
    binding: InputBinding,
    deps: InputSamplerDeps<TTarget>,
    options: InputSamplerOptions<TTarget> = {},
  ) {
    this.binding = binding;
    this.device = deps.device;
    this.clock = deps.clock;
    this.hitTester = deps.hitTester ?? NO_HIT;
    this.objectTriggers = new Set(options.objectTriggers ?? []);
    this.touchCooldownMs = options.touchCooldownMs ?? DEFAULT_TOUCH_COOLDOWN_MS;
    this.name = options.name ?? "anonymous";
  }

  /** Current activation force; 0 means inactive. */
  get value(): number {
    return this.activation.context.value;
  }

  get isActive(): boolean {
    return this.value !== 0;
  }

  /** Tick of the most recent write, undefined before the first one. */
  get lastTransitionTick(): Tick | undefined {
    return this.activation.context.lastTransitionTick;
  }

  get startedThisTick(): boolean {
    return this.isActive && this.transitionedThisTick();
  }

  get endedThisTick(): boolean {
    return !this.isActive && this.transitionedThisTick();
  }

  get objectTriggerCount(): number {
    return this.objectTriggers.size;
  }

  hasObjectTrigger(target: TTarget): boolean {
    return this.objectTriggers.has(target);
  }

  /**
   * Clicking or touching the target while it is hovered activates the input.
   * Changes made while sampling apply once the current sample() returns.
   */
  addObjectTrigger(target: TTarget): void {
    if (this.sampling) {
      this.deferredTriggerOps.push({ kind: "add", target });
      return;
    }
    this.objectTriggers.add(target);
  }

  removeObjectTrigger(target: TTarget): void {
    if (this.sampling) {
      this.deferredTriggerOps.push({ kind: "remove", target });
      return;
    }
    this.objectTriggers.delete(target);
  }

  /**
   * Resolves on the next write with whether the input is then active.
   * `continuation`, if given, runs synchronously during that write, before
   * onStart/onEnd observers; `await`ing the promise resumes only afterwards.
   */
  waitForAnyTransition(
    continuation?: (active: boolean) => void,
  ): Promise<boolean> {
    if (this.transitionWaiter === undefined) {
      this.transitionWaiter = new OneShotFuture<boolean>();
    }
    if (continuation !== undefined) {
      this.transitionWaiter.onResolved(continuation);
    }
    return this.transitionWaiter.promise;
  }

  /** Resolves on the next write that leaves the input active. */
  waitForStart(continuation?: () => void): Promise<void> {
    if (this.startWaiter === undefined) {
      this.startWaiter = new OneShotFuture<void>();
    }
    if (continuation !== undefined) this.startWaiter.onResolved(continuation);
    return this.startWaiter.promise;
  }

  /** Resolves on the next write that leaves the input inactive. */
  waitForEnd(continuation?: () => void): Promise<void> {
    if (this.endWaiter === undefined) {
      this.endWaiter = new OneShotFuture<void>();
    }
    if (continuation !== undefined) this.endWaiter.onResolved(continuation);
    return this.endWaiter.promise;
  }

  /** Token signaled on the next write that leaves the input active. */
  getStartCancelToken(): CancelToken {
    if (this.startCancel === undefined) {
      this.startCancel = new OneShotSignal();
    }
    return this.startCancel.token;
  }

  /** Token signaled on the next write that leaves the input inactive. */
  getEndCancelToken(): CancelToken {
    if (this.endCancel === undefined) {
      this.endCancel = new OneShotSignal();
    }
    return this.endCancel.token;
  }

  /** @returns Unsubscribe function */
  onStart(listener: () => void): () => void {
    return this.startObservers.subscribe(listener);
  }

  /** @returns Unsubscribe function */
  onEnd(listener: () => void): () => void {
    return this.endObservers.subscribe(listener);
  }

  /**
   * Run one tick of reconciliation. Called once per tick by the driver.
   * @throws ReentrantSampleError when called from one of this sampler's own callbacks
   */
  sample(): void {
    if (this.disposed) return;
    if (this.sampling) throw new ReentrantSampleError(this.name);
    this.sampling = true;
    try {
      this.sampleKeys();
      this.sampleAxes();
      this.sampleObjectTriggers();
    } finally {
      this.sampling = false;
      this.applyDeferredTriggerOps();
    }
  }

  /**
   * Drop observers and release cancel signals. Pending promises are abandoned:
   * they never resolve or reject. Further sample() calls do nothing.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.startObservers.clear();
    this.endObservers.clear();
    this.startCancel?.dispose();
    this.endCancel?.dispose();
    this.transitionWaiter = undefined;
    this.startWaiter = undefined;
    this.endWaiter = undefined;
    this.startCancel = undefined;
    this.endCancel = undefined;
    this.deferredTriggerOps = [];
  }

  private sampleKeys(): void {
    for (const key of this.binding.keys) {
      if (this.device.isKeyDown(key)) this.setValue(1);
      if (this.device.isKeyUp(key)) this.setValue(0);
    }
  }

  private sampleAxes(): void {
    if (this.binding.axes.length === 0) return;
    // Greatest magnitude wins; strict comparison keeps the first-listed on ties
    let maxValue = 0;
    for (const axis of this.binding.axes) {
      const axisValue = axis.sample();
      if (Math.abs(axisValue) > Math.abs(maxValue)) maxValue = axisValue;
    }
    if (maxValue !== this.value) this.setValue(maxValue);
  }

  private sampleObjectTriggers(): void {
    if (this.objectTriggers.size === 0) return;

    const touchBegan = this.device.isTouchBegan() && this.acceptTouchBegin();
    const clickedDown = this.device.isPointerDown(0);
    if (clickedDown || touchBegan) {
      const hovered = this.hitTester.hoveredObject();
      if (hovered !== undefined && this.objectTriggers.has(hovered)) {
        this.setValue(1);
      }
    }

    const touchEnded = this.device.isTouchEnded();
    const clickedUp = this.device.isPointerUp(0);
    if (touchEnded || clickedUp) this.setValue(0);
  }

  private transitionedThisTick(): boolean {
    const last = this.lastTransitionTick;
    return last !== undefined && isSameTick(last, this.clock.tick);
  }

  /** Touch-begin debounce; a rejected edge does not move the window. */
  private acceptTouchBegin(): boolean {
    const now = this.clock.timeMs;
    if (
      this.lastTouchTimeMs !== undefined &&
      now - this.lastTouchTimeMs <= this.touchCooldownMs
    ) {
      return false;
    }
    this.lastTouchTimeMs = now;
    return true;
  }

  /**
   * Write a value and notify, in this order: transition waiter, start/end
   * waiter, start/end cancel signal, then observers. Waiter continuations and
   * cancel listeners run inside tryResolve()/signal(), so they have all run
   * before the first observer. Waiters are cleared before settling so anything
   * requested from a callback binds to the next write.
   */
  private setValue(value: number): void {
    const tick = this.clock.tick;
    const active = this.activation.setValue(value, tick) === "active";
    debugLog("sampler", `${this.name} = ${String(value)}`, { tick });

    const transitionWaiter = this.transitionWaiter;
    this.transitionWaiter = undefined;
    transitionWaiter?.tryResolve(active);

    if (active) {
      const waiter = this.startWaiter;
      this.startWaiter = undefined;
      waiter?.tryResolve();
      const cancel = this.startCancel;
      this.startCancel = undefined;
      cancel?.signal();
      cancel?.dispose();
      this.startObservers.notify();
    } else {
      const waiter = this.endWaiter;
      this.endWaiter = undefined;
      waiter?.tryResolve();
      const cancel = this.endCancel;
      this.endCancel = undefined;
      cancel?.signal();
      cancel?.dispose();
      this.endObservers.notify();
    }
  }

  private applyDeferredTriggerOps(): void {
    if (this.deferredTriggerOps.length === 0) return;
    const ops = this.deferredTriggerOps;
    this.deferredTriggerOps = [];
    for (const op of ops) {
      if (op.kind === "add") this.objectTriggers.add(op.target);
      else this.objectTriggers.delete(op.target);
    }
    debugLog("sampler", `${this.name} applied deferred trigger changes`, {
      count: ops.length,
    });
  }
}
