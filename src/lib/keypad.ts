/**
 * Keypad - immutable calculator editing state
 * Each key press is a pure transition from one KeypadState to the next
 */

import { evaluate, isErrorSentinel } from "./math/evaluator.ts";
import { ERROR_MARKER, format, isValidExpression } from "./math/format.ts";
import { isKeypadOperator, type KeypadOperator, toKeypadOperator } from "./math/operators.ts";

// =============================================================================
// TYPES
// =============================================================================

export interface KeypadState {
  /** Expression as displayed, or the error marker while in error state */
  readonly text: string;
  /** Set after "=" or a reset: the next digit starts a new expression */
  readonly awaitingNewExpression: boolean;
  readonly isError: boolean;
}

export type Digit = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

export type Key =
  | { kind: "digit"; digit: Digit }
  | { kind: "operator"; operator: KeypadOperator }
  | { kind: "decimal" }
  | { kind: "percent" }
  | { kind: "square" }
  | { kind: "sqrt" }
  | { kind: "parentheses" }
  | { kind: "delete" }
  | { kind: "clear" }
  | { kind: "equals" };

/** Shown when "=" is pressed with unbalanced parentheses */
export const INVALID_EXPRESSION_MARKER = "Invalid expression";

// =============================================================================
// HELPERS
// =============================================================================

export function initialKeypadState(): KeypadState {
  return { text: "0", awaitingNewExpression: true, isError: false };
}

export function displayText(state: KeypadState): string {
  return state.text === "" ? "0" : state.text;
}

function lastChar(text: string): string {
  return text.charAt(text.length - 1);
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

/** Trailing run of digits and decimal points */
function currentNumber(text: string): string {
  return /[\d.]*$/.exec(text)?.[0] ?? "";
}

/** Text ends in something a following "(" or "√" would multiply */
function endsWithOperand(text: string): boolean {
  const last = lastChar(text);
  return isDigit(last) || last === "." || last === ")" || last === "²" || last === "%";
}

/** Text the next edit builds on; a finished result is kept for chaining */
function workingText(state: KeypadState, keepResult: boolean): string {
  if (!state.awaitingNewExpression) return state.text;
  return keepResult ? state.text : "";
}

function editing(text: string): KeypadState {
  return { text, awaitingNewExpression: false, isError: false };
}

function errorState(marker: string): KeypadState {
  return { text: marker, awaitingNewExpression: false, isError: true };
}

// =============================================================================
// KEY HANDLERS
// =============================================================================

function pressDigit(state: KeypadState, digit: Digit): KeypadState {
  const base = state.isError ? initialKeypadState() : state;
  const text = workingText(base, false);
  // A number never starts with two zeros: "0" then "5" reads "5"
  if (currentNumber(text) === "0") return editing(text.slice(0, -1) + digit);
  return editing(text + digit);
}

function pressOperator(state: KeypadState, operator: KeypadOperator): KeypadState {
  if (state.isError) return state;
  const text = workingText(state, true);
  if (text === "") return editing(`0${operator}`);
  if (isKeypadOperator(lastChar(text))) return editing(text.slice(0, -1) + operator);
  return editing(text + operator);
}

function pressDecimal(state: KeypadState): KeypadState {
  if (state.isError) return state;
  const text = state.awaitingNewExpression ? "0" : state.text;
  return editing(currentNumber(text).includes(".") ? text : `${text}.`);
}

/** Postfix decorations (% and ²) attach to a number or a closed group */
function pressPostfix(state: KeypadState, symbol: "%" | "²"): KeypadState {
  if (state.isError) return state;
  const text = workingText(state, true);
  const last = lastChar(text);
  if (isDigit(last) || last === ")") return editing(text + symbol);
  return editing(text);
}

function pressSquareRoot(state: KeypadState): KeypadState {
  if (state.isError) return state;
  const text = workingText(state, false);
  return editing(endsWithOperand(text) ? `${text}×√` : `${text}√`);
}

/** One key toggles between opening and closing a group */
function pressParentheses(state: KeypadState): KeypadState {
  if (state.isError) return state;
  const text = workingText(state, false);
  let open = 0;
  let close = 0;
  for (const char of text) {
    if (char === "(") open++;
    if (char === ")") close++;
  }
  if (open <= close) {
    return editing(endsWithOperand(text) ? `${text}×(` : `${text}(`);
  }
  return editing(`${text})`);
}

function pressDelete(state: KeypadState): KeypadState {
  if (state.isError) return initialKeypadState();
  if (state.text === "") return state;
  const text = state.text.slice(0, -1);
  // A result's sign is written as ASCII "-", which no operator key replaces
  if (text === "" || text === "-") return initialKeypadState();
  return { ...state, text };
}

function pressEquals(state: KeypadState): KeypadState {
  if (state.isError || state.text === "") return state;
  if (!isValidExpression(state.text)) return errorState(INVALID_EXPRESSION_MARKER);

  const result = evaluate(state.text);
  if (isErrorSentinel(result)) return errorState(ERROR_MARKER);
  return { text: format(result), awaitingNewExpression: true, isError: false };
}

/**
 * Apply one key press
 *
 * @example
 * let state = initialKeypadState();
 * for (const key of parseKeys("12+3=")) state = pressKey(state, key);
 * displayText(state); // "15"
 */
export function pressKey(state: KeypadState, key: Key): KeypadState {
  switch (key.kind) {
    case "digit":
      return pressDigit(state, key.digit);
    case "operator":
      return pressOperator(state, key.operator);
    case "decimal":
      return pressDecimal(state);
    case "percent":
      return pressPostfix(state, "%");
    case "square":
      return pressPostfix(state, "²");
    case "sqrt":
      return pressSquareRoot(state);
    case "parentheses":
      return pressParentheses(state);
    case "delete":
      return pressDelete(state);
    case "clear":
      return initialKeypadState();
    case "equals":
      return pressEquals(state);
  }
}

/** Apply a sequence of key presses */
export function pressKeys(state: KeypadState, keys: readonly Key[]): KeypadState {
  return keys.reduce(pressKey, state);
}

// =============================================================================
// KEY PARSING
// =============================================================================

export interface ParseKeysResult {
  keys: Key[];
  /** First character that is not a key, with its index */
  error?: { char: string; index: number };
}

function isDigitKey(char: string): char is Digit {
  return char.length === 1 && isDigit(char);
}

const SIMPLE_KEYS: Readonly<Record<string, Key>> = {
  ".": { kind: "decimal" },
  "%": { kind: "percent" },
  "²": { kind: "square" },
  "^": { kind: "square" },
  "√": { kind: "sqrt" },
  r: { kind: "sqrt" },
  "(": { kind: "parentheses" },
  ")": { kind: "parentheses" },
  "<": { kind: "delete" },
  "⌫": { kind: "delete" },
  C: { kind: "clear" },
  "=": { kind: "equals" },
};

/**
 * Parse a string of key labels
 * Whitespace is ignored. "(" and ")" both press the single parentheses key.
 *
 * @example
 * parseKeys("2×(3+4)=").keys.length; // 8
 */
export function parseKeys(input: string): ParseKeysResult {
  const keys: Key[] = [];
  for (let index = 0; index < input.length; index++) {
    const char = input.charAt(index);
    if (/\s/.test(char)) continue;

    if (isDigitKey(char)) {
      keys.push({ kind: "digit", digit: char });
      continue;
    }

    const operator = toKeypadOperator(char);
    if (operator !== null) {
      keys.push({ kind: "operator", operator });
      continue;
    }

    const key = SIMPLE_KEYS[char];
    if (key === undefined) {
      return { keys, error: { char, index } };
    }
    keys.push(key);
  }
  return { keys };
}
