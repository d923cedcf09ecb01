// Branded primitive types for type safety and domain modeling

// Duration in milliseconds - for time intervals/deltas
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// Key code - physical key identifier (KeyboardEvent.code style, e.g. "Space")
declare const KeyCodeBrand: unique symbol;
export type KeyCode = string & { readonly [KeyCodeBrand]: true };

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

// KeyCode constructors and guards
export function createKeyCode(value: string): KeyCode {
  if (value.trim().length === 0) {
    throw new Error("KeyCode must be a non-empty string");
  }
  return value as KeyCode;
}

export function isKeyCode(s: unknown): s is KeyCode {
  return typeof s === "string" && s.trim().length > 0;
}

// Conversion helpers for interop at boundaries
export const durationMsAsNumber = (d: DurationMs): number => d as number;
export const keyCodeAsString = (k: KeyCode): string => k as string;
