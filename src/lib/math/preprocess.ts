/**
 * Expression Preprocessor
 * Rewrites keypad display text into the canonical form the tokenizer reads
 */

import { DISPLAY_SYMBOLS } from "./operators.ts";

/** A decimal run (12, 12.5, 12., .5) directly followed by a percent sign */
const PERCENT_PATTERN = /(\d+(?:\.\d*)?|\.\d+)%/g;

/** The same run carrying a negative sign: at the start, after `(`, an operator or sqrt */
const SIGNED_PERCENT_PATTERN = /(^|[-+*/^(]|sqrt)-(\d+(?:\.\d*)?|\.\d+)%/g;

/**
 * Replace display-only symbols with calculation symbols
 *
 * @example
 * substituteSymbols("2×√9−1²"); // "2*sqrt9-1^2"
 */
export function substituteSymbols(raw: string): string {
  let result = raw;
  for (const [symbol, canonical] of Object.entries(DISPLAY_SYMBOLS)) {
    result = result.split(symbol).join(canonical);
  }
  return result;
}

/**
 * Rewrite every `<run>%` as `(<run>/100)`
 * A negative sign in operand position stays inside the group, so `-50%`
 * reads `(-50/100)`. A `%` without a preceding decimal run is left as is.
 *
 * @example
 * expandPercentages("100+50%"); // "100+(50/100)"
 * expandPercentages("2*-50%");  // "2*(-50/100)"
 */
export function expandPercentages(expr: string): string {
  return expr.replace(SIGNED_PERCENT_PATTERN, "$1(-$2/100)").replace(PERCENT_PATTERN, "($1/100)");
}

/**
 * Normalize a raw keypad expression. Never fails; ill-formed text is passed
 * through and rejected by the tokenizer or converter.
 */
export function preprocess(raw: string): string {
  return expandPercentages(substituteSymbols(raw));
}
