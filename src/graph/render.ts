import type { FieldValue } from "./types.js";

/** Token the daemon reads as "unknown value". */
export const UNKNOWN_VALUE = "U";

/** Formats an attribute value: booleans become `yes`/`no`, everything else its string form. */
export function formatAttributeValue(value: string | number | boolean): string {
  if (typeof value === "boolean") {
    return value ? "yes" : "no";
  }
  return String(value);
}

/** `toFixed` switches to exponent notation from this magnitude on. */
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * Formats a field value. Numbers are floating-point measurements printed with
 * six decimals; NaN and infinities are reported as {@link UNKNOWN_VALUE}.
 */
export function formatFieldValue(value: FieldValue): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return UNKNOWN_VALUE;
    }
    // Doubles this large carry no fraction.
    return Math.abs(value) < FIXED_NOTATION_LIMIT ? value.toFixed(6) : `${BigInt(value).toString()}.000000`;
  }
  return value.toString();
}
