import { describe, it, expect, jest } from "@jest/globals";

import { OneShotFuture, OneShotSignal } from "../../src/input/one-shot";
import { flushMicrotasks } from "../helpers/harness";

describe("OneShotFuture", () => {
  it("resolves with the first value and ignores later ones", async () => {
    const future = new OneShotFuture<number>();

    expect(future.isSettled).toBe(false);
    expect(future.tryResolve(1)).toBe(true);
    expect(future.tryResolve(2)).toBe(false);
    expect(future.isSettled).toBe(true);

    await expect(future.promise).resolves.toBe(1);
  });

  it("stays pending until resolved", async () => {
    const future = new OneShotFuture<void>();
    const resolved = jest.fn();
    void future.promise.then(resolved);

    await flushMicrotasks();
    expect(resolved).not.toHaveBeenCalled();

    future.tryResolve();
    await flushMicrotasks();
    expect(resolved).toHaveBeenCalledTimes(1);
  });
});

describe("OneShotFuture continuations", () => {
  it("runs continuations synchronously inside tryResolve", async () => {
    const future = new OneShotFuture<string>();
    const log: Array<string> = [];
    future.onResolved((value) => log.push(`continuation ${value}`));
    void future.promise.then((value) => log.push(`reaction ${value}`));

    future.tryResolve("x");
    log.push("after tryResolve");
    await flushMicrotasks();

    expect(log).toEqual([
      "continuation x",
      "after tryResolve",
      "reaction x",
    ]);
  });

  it("runs a continuation added after resolution immediately", () => {
    const future = new OneShotFuture<number>();
    future.tryResolve(7);
    const continuation = jest.fn();

    future.onResolved(continuation);

    expect(continuation).toHaveBeenCalledWith(7);
  });

  it("skips unsubscribed continuations and runs the rest once", () => {
    const future = new OneShotFuture<void>();
    const kept = jest.fn();
    const dropped = jest.fn();
    future.onResolved(kept);
    const unsubscribe = future.onResolved(dropped);
    unsubscribe();

    future.tryResolve();
    future.tryResolve();

    expect(kept).toHaveBeenCalledTimes(1);
    expect(dropped).not.toHaveBeenCalled();
  });
});

describe("OneShotSignal", () => {
  it("runs listeners once, in order, on the first signal", () => {
    const signal = new OneShotSignal();
    const log: Array<string> = [];
    signal.token.onSignaled(() => log.push("a"));
    signal.token.onSignaled(() => log.push("b"));

    signal.signal();
    signal.signal();

    expect(log).toEqual(["a", "b"]);
    expect(signal.isSignaled).toBe(true);
    expect(signal.token.isSignaled()).toBe(true);
  });

  it("aborts the AbortSignal view", () => {
    const signal = new OneShotSignal();
    const onAbort = jest.fn();
    signal.token.abortSignal.addEventListener("abort", onAbort);

    expect(signal.token.abortSignal.aborted).toBe(false);
    signal.signal();

    expect(signal.token.abortSignal.aborted).toBe(true);
    expect(onAbort).toHaveBeenCalledTimes(1);
  });

  it("runs a listener added after signaling immediately", () => {
    const signal = new OneShotSignal();
    signal.signal();
    const late = jest.fn();

    signal.token.onSignaled(late);

    expect(late).toHaveBeenCalledTimes(1);
  });

  it("skips unsubscribed listeners", () => {
    const signal = new OneShotSignal();
    const listener = jest.fn();
    const unsubscribe = signal.token.onSignaled(listener);

    unsubscribe();
    signal.signal();

    expect(listener).not.toHaveBeenCalled();
  });

  it("resolves whenSignaled", async () => {
    const signal = new OneShotSignal();
    const pending = signal.token.whenSignaled();

    signal.signal();

    await expect(pending).resolves.toBeUndefined();
  });

  it("keeps its signaled state after dispose and drops listeners", () => {
    const signal = new OneShotSignal();
    const listener = jest.fn();
    signal.token.onSignaled(listener);

    signal.dispose();
    signal.signal();

    expect(listener).not.toHaveBeenCalled();
    expect(signal.isDisposed).toBe(true);
    expect(signal.token.isSignaled()).toBe(true);
  });

  it("ignores listeners added to a disposed, unsignaled signal", () => {
    const signal = new OneShotSignal();
    signal.dispose();
    const listener = jest.fn();

    signal.token.onSignaled(listener);
    signal.signal();

    expect(listener).not.toHaveBeenCalled();
  });

  it("freezes the token so consumers cannot swap its methods", () => {
    const signal = new OneShotSignal();

    expect(Object.isFrozen(signal.token)).toBe(true);
    expect("signal" in signal.token).toBe(false);
  });
});
