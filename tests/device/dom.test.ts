/**
 * @jest-environment jsdom
 */
import { describe, it, expect } from "@jest/globals";

import { createBufferedDevice } from "../../src/device/buffered-device";
import { attachDomInput, createDomHitTester } from "../../src/device/dom";
import { key } from "../helpers/harness";

describe("attachDomInput", () => {
  it("records key presses and releases by code", () => {
    const device = createBufferedDevice();
    const detach = attachDomInput(window, device);

    window.dispatchEvent(new KeyboardEvent("keydown", { code: "Space" }));
    window.dispatchEvent(new KeyboardEvent("keyup", { code: "Enter" }));
    device.advance();

    expect(device.isKeyDown(key("Space"))).toBe(true);
    expect(device.isKeyUp(key("Enter"))).toBe(true);
    detach();
  });

  it("ignores auto-repeat key downs", () => {
    const device = createBufferedDevice();
    const detach = attachDomInput(window, device);

    window.dispatchEvent(
      new KeyboardEvent("keydown", { code: "Space", repeat: true }),
    );

    expect(device.pendingEdgeCount).toBe(0);
    detach();
  });

  it("records mouse buttons as pointer edges", () => {
    const device = createBufferedDevice();
    const el = document.createElement("div");
    document.body.appendChild(el);
    const detach = attachDomInput(document, device);

    el.dispatchEvent(new MouseEvent("mousedown", { bubbles: true, button: 0 }));
    el.dispatchEvent(new MouseEvent("mouseup", { bubbles: true, button: 2 }));
    device.advance();

    expect(device.isPointerDown(0)).toBe(true);
    expect(device.isPointerUp(2)).toBe(true);
    detach();
    el.remove();
  });

  it("records touch phases", () => {
    const device = createBufferedDevice();
    const detach = attachDomInput(window, device);

    window.dispatchEvent(new Event("touchend"));
    device.advance();

    expect(device.isTouchEnded()).toBe(true);
    expect(device.isTouchBegan()).toBe(false);
    detach();
  });

  it("ignores canceled touches", () => {
    const device = createBufferedDevice();
    const detach = attachDomInput(window, device);

    window.dispatchEvent(new Event("touchcancel"));

    expect(device.pendingEdgeCount).toBe(0);
    detach();
  });

  it("stops recording after detach", () => {
    const device = createBufferedDevice();
    const detach = attachDomInput(window, device);
    detach();

    window.dispatchEvent(new KeyboardEvent("keydown", { code: "Space" }));

    expect(device.pendingEdgeCount).toBe(0);
  });
});

describe("createDomHitTester", () => {
  it("reports the element last under the pointer", () => {
    const root = document.createElement("div");
    const button = document.createElement("button");
    root.appendChild(button);
    document.body.appendChild(root);
    const { hitTester, detach } = createDomHitTester(root);

    expect(hitTester.hoveredObject()).toBeUndefined();

    button.dispatchEvent(new MouseEvent("mouseover", { bubbles: true }));
    expect(hitTester.hoveredObject()).toBe(button);

    root.dispatchEvent(new MouseEvent("mouseleave"));
    expect(hitTester.hoveredObject()).toBeUndefined();

    detach();
    root.remove();
  });

  it("forgets the hovered element on detach", () => {
    const root = document.createElement("div");
    document.body.appendChild(root);
    const { hitTester, detach } = createDomHitTester(root);
    root.dispatchEvent(new MouseEvent("mousedown", { bubbles: true }));
    expect(hitTester.hoveredObject()).toBe(root);

    detach();
    root.dispatchEvent(new MouseEvent("mouseover", { bubbles: true }));

    expect(hitTester.hoveredObject()).toBeUndefined();
    root.remove();
  });
});
