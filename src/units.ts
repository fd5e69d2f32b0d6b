import type { DisplayUnit } from "./types.js";

/**
 * Convert a Celsius temperature to the display unit.
 */
export function toUnit(tempC: number, unit: DisplayUnit): number {
  return unit === "°F" ? (tempC * 9) / 5 + 32 : tempC;
}
