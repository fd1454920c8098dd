/**
 * Math Operator Utilities
 * Precedence table, operator/function recognition, and the mapping from
 * keypad display symbols to canonical calculation symbols
 */

import type { BinaryOperator, FunctionName } from "./types.ts";

/** Canonical binary operator characters */
export const BINARY_OPERATORS = "+-*/^" as const;

/** Function keywords recognized by the tokenizer */
export const FUNCTION_NAMES: readonly FunctionName[] = ["sqrt"];

/**
 * Operator precedence levels (higher = binds tighter)
 * - Level 1: Addition/subtraction
 * - Level 2: Multiplication/division
 * - Level 3: Exponentiation (only produced by the ² decoration)
 * All operators are left-associative.
 */
export const OPERATOR_PRECEDENCE: Record<BinaryOperator, number> = {
  "+": 1,
  "-": 1,
  "*": 2,
  "/": 2,
  "^": 3,
};

/** Functions rank above every binary operator */
export const FUNCTION_PRECEDENCE = 4;

/**
 * Display symbols shown on the keypad and their canonical replacements.
 * The symbol sets are disjoint, so substitution order does not matter.
 */
export const DISPLAY_SYMBOLS: Readonly<Record<string, string>> = {
  "×": "*",
  "÷": "/",
  "−": "-",
  "√": "sqrt",
  "²": "^2",
};

/** Keypad operator keys, as they appear in the display text */
export const KEYPAD_OPERATORS = "+−×÷" as const;

export type KeypadOperator = "+" | "−" | "×" | "÷";

/** Check if a character is a canonical binary operator */
export function isBinaryOperator(char: string): char is BinaryOperator {
  return char.length === 1 && BINARY_OPERATORS.includes(char);
}

/** Check if a character is one of the keypad's operator keys */
export function isKeypadOperator(char: string): char is KeypadOperator {
  return char.length === 1 && KEYPAD_OPERATORS.includes(char);
}

/**
 * Map an ASCII operator spelling to the keypad symbol it stands for
 * - - → −
 * - * → ×
 * - / → ÷
 * Returns null for characters that are not operator keys.
 */
export function toKeypadOperator(char: string): KeypadOperator | null {
  switch (char) {
    case "-":
      return "−";
    case "*":
      return "×";
    case "/":
      return "÷";
    default:
      return isKeypadOperator(char) ? char : null;
  }
}
