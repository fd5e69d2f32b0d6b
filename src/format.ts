export type NumericInput = number | null | undefined;

/**
 * Format a number with exactly two decimal places.
 */
export function formatFixed(value: NumericInput, fallback = "—"): string {
  if (value === null || value === undefined || Number.isNaN(value)) {
    return fallback;
  }
  return value.toFixed(2);
}

/**
 * Format a temperature with its unit suffix, e.g. `21.35 °C`.
 */
export function formatTemperature(value: NumericInput, unit: string, fallback = "—"): string {
  const formatted = formatFixed(value, fallback);
  return formatted === fallback ? fallback : `${formatted} ${unit}`;
}

// "2026-10-19 12:00" in UTC
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return date.toISOString().slice(0, 16).replace("T", " ");
}

export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .split(" ")
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}
