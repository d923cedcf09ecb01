import type { DeviceQuery } from "../device/types";

/**
 * Analog input producer sampled once per tick.
 * Nominal range is [-1, 1]; values outside it are passed through untouched.
 */
export type AxisSource = {
  sample(): number;
};

/** Which side of a device axis counts as activation. */
export type AxisTriggerMode = "positive" | "negative" | "both";

export type DeviceAxisOptions = Readonly<{
  mode?: AxisTriggerMode;
  /** Minimum magnitude that counts as activation. */
  tolerance?: number;
}>;

export const DEFAULT_AXIS_TOLERANCE = 0.001;

/**
 * Axis source reading a named device axis.
 * Samples on the wrong side for the mode, or below the tolerance, read as 0.
 */
export function createDeviceAxis(
  device: DeviceQuery,
  axisName: string,
  options: DeviceAxisOptions = {},
): AxisSource {
  const mode = options.mode ?? "both";
  const tolerance = options.tolerance ?? DEFAULT_AXIS_TOLERANCE;
  return {
    sample: (): number => {
      const value = device.axisValue(axisName);
      if (Math.abs(value) < tolerance) return 0;
      if (mode === "positive" && value < 0) return 0;
      if (mode === "negative" && value > 0) return 0;
      return value;
    },
  };
}

/** Fixed-value source, handy for scripted input and tests. */
export function createConstantAxis(value: number): AxisSource {
  return { sample: (): number => value };
}
