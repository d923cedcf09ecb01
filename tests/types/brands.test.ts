import { describe, it, expect } from "@jest/globals";

import {
  createDurationMs,
  createKeyCode,
  durationMsAsNumber,
  isDurationMs,
  isKeyCode,
  keyCodeAsString,
} from "../../src/types/brands";

describe("brands.ts", () => {
  it("constructors accept valid inputs and brand correctly", () => {
    expect(durationMsAsNumber(createDurationMs(0))).toBe(0);
    expect(durationMsAsNumber(createDurationMs(12.5))).toBe(12.5);
    expect(keyCodeAsString(createKeyCode("Space"))).toBe("Space");
  });

  it("constructors reject invalid inputs", () => {
    expect(() => createDurationMs(-1)).toThrow(
      "DurationMs must be a non-negative finite number",
    );
    expect(() => createDurationMs(Number.POSITIVE_INFINITY)).toThrow(
      "DurationMs must be a non-negative finite number",
    );
    expect(() => createDurationMs(Number.NaN)).toThrow(
      "DurationMs must be a non-negative finite number",
    );
    expect(() => createKeyCode("  ")).toThrow(
      "KeyCode must be a non-empty string",
    );
  });

  it("guards work as expected", () => {
    expect(isDurationMs(10)).toBe(true);
    expect(isDurationMs(-1)).toBe(false);
    expect(isDurationMs("10")).toBe(false);

    expect(isKeyCode("Enter")).toBe(true);
    expect(isKeyCode("")).toBe(false);
    expect(isKeyCode(13)).toBe(false);
  });
});
