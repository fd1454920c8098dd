/**
 * Display formatting and the parenthesis pre-check
 */

/** Shown in place of a result that could not be computed */
export const ERROR_MARKER = "Error";

/** Decimal places kept for fractional results */
export const MAX_FRACTION_DIGITS = 10;

/**
 * Format a result for the display
 * - NaN / ±Infinity → "Error"
 * - whole numbers → integer literal, never exponent notation
 * - fractions → up to 10 decimals, trailing zeros trimmed
 *
 * @example
 * format(4);        // "4"
 * format(2.5);      // "2.5"
 * format(1 / 3);    // "0.3333333333"
 * format(NaN);      // "Error"
 */
export function format(value: number): string {
  if (!Number.isFinite(value)) return ERROR_MARKER;

  if (Number.isInteger(value)) {
    return BigInt(value).toString();
  }

  const trimmed = value
    .toFixed(MAX_FRACTION_DIGITS)
    .replace(/0+$/, "")
    .replace(/\.$/, "");
  return trimmed === "-0" ? "0" : trimmed;
}

/**
 * Check that parentheses never close before they open and all close
 */
export function isBalanced(expr: string): boolean {
  let depth = 0;
  for (const char of expr) {
    if (char === "(") {
      depth++;
    } else if (char === ")") {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

/** Cheap pre-check run before a full evaluation */
export function isValidExpression(expression: string): boolean {
  return isBalanced(expression);
}
