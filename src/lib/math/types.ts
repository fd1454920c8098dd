/**
 * Shared types for the expression pipeline
 * preprocess → tokenize → toPostfix → evaluatePostfix
 */

// =============================================================================
// TOKENS
// =============================================================================

/** Binary operators understood by the converter and evaluator */
export type BinaryOperator = "+" | "-" | "*" | "/" | "^";

/** Unary functions (prefix, applied to the next group or operand) */
export type FunctionName = "sqrt";

export interface NumberToken {
  type: "number";
  /** Literal text as typed, e.g. "12.5" or "-4" */
  value: string;
  position: number;
}

export interface OperatorToken {
  type: "operator";
  value: BinaryOperator;
  position: number;
}

export interface FunctionToken {
  type: "function";
  value: FunctionName;
  position: number;
}

export interface ParenToken {
  type: "lparen" | "rparen";
  position: number;
}

export type Token = NumberToken | OperatorToken | FunctionToken | ParenToken;

// =============================================================================
// RESULTS
// =============================================================================

export type CalcErrorKind =
  | "MalformedToken"
  | "UnbalancedParentheses"
  | "InvalidExpression"
  | "DivisionByZero"
  | "NegativeSquareRoot"
  | "NonFiniteResult";

export interface CalcError {
  kind: CalcErrorKind;
  message: string;
  /** Index into the canonical (preprocessed, whitespace-free) string */
  position?: number;
}

/** Tagged result passed between pipeline stages */
export type CalcResult<T> = { ok: true; value: T } | { ok: false; error: CalcError };

export function ok<T>(value: T): CalcResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: CalcErrorKind, message: string, position?: number): CalcResult<T> {
  return { ok: false, error: position === undefined ? { kind, message } : { kind, message, position } };
}
