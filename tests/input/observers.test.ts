import { describe, it, expect, jest } from "@jest/globals";

import { ObserverList } from "../../src/input/observers";

describe("ObserverList", () => {
  it("notifies observers in subscription order with the given arguments", () => {
    const list = new ObserverList<[string, number]>();
    const log: Array<string> = [];
    list.subscribe((name, n) => log.push(`a:${name}:${String(n)}`));
    list.subscribe((name, n) => log.push(`b:${name}:${String(n)}`));

    list.notify("x", 1);

    expect(log).toEqual(["a:x:1", "b:x:1"]);
    expect(list.size).toBe(2);
  });

  it("unsubscribes only the returned registration, once", () => {
    const list = new ObserverList();
    const observer = jest.fn();
    const first = list.subscribe(observer);
    list.subscribe(observer);

    first();
    first();
    list.notify();

    expect(observer).toHaveBeenCalledTimes(1);
    expect(list.size).toBe(1);
  });

  it("applies changes made during a notification from the next one", () => {
    const list = new ObserverList();
    const late = jest.fn();
    list.subscribe(() => {
      list.subscribe(late);
    });

    list.notify();
    expect(late).not.toHaveBeenCalled();

    list.notify();
    expect(late).toHaveBeenCalledTimes(1);
  });

  it("clears all observers", () => {
    const list = new ObserverList();
    const observer = jest.fn();
    list.subscribe(observer);

    list.clear();
    list.notify();

    expect(observer).not.toHaveBeenCalled();
    expect(list.size).toBe(0);
  });
});
