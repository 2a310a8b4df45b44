/**
 * Result of parsing a decimal cell value.
 */
export type ParsedDecimal =
  | { valid: true; value: number }
  | { valid: false; value: null };

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parses a locale-flexible decimal ("70,5" and "70.5" are the same number).
 *
 * Unlike `Number.parseFloat`, trailing garbage is rejected: "70kg" is invalid.
 */
export function parseDecimal(raw: unknown): ParsedDecimal {
  if (typeof raw === "number") {
    return Number.isFinite(raw)
      ? { valid: true, value: raw }
      : { valid: false, value: null };
  }
  if (typeof raw !== "string") return { valid: false, value: null };

  const s = raw.trim().replace(/,/g, ".");
  if (!DECIMAL_PATTERN.test(s)) return { valid: false, value: null };

  const n = Number(s);
  if (!Number.isFinite(n)) return { valid: false, value: null };
  return { valid: true, value: n };
}

/**
 * Rounds to two decimals from the exact binary value, so 1.005 (stored as
 * 1.00499...) gives 1. Exact binary ties such as 0.125 round up.
 */
export function round2(value: number): number {
  return Number(value.toFixed(2));
}

/**
 * Body-mass index: weight (kg) / height (m)², rounded to two decimals.
 *
 * Total: returns `null` when either input fails to parse or the height is
 * not positive.
 */
export function computeBmi(weightRaw: unknown, heightRaw: unknown): number | null {
  const weight = parseDecimal(weightRaw);
  const height = parseDecimal(heightRaw);
  if (!weight.valid || !height.valid) return null;
  if (height.value <= 0) return null;

  return round2(weight.value / (height.value * height.value));
}

/**
 * Renders a BMI for a grid cell: empty string for an empty BMI, never "NaN".
 */
export function formatBmi(bmi: number | null): string {
  return bmi === null ? "" : String(bmi);
}
