/**
 * Postfix evaluation and the public evaluate() entry point
 */

import { toPostfix } from "./postfix.ts";
import { preprocess } from "./preprocess.ts";
import { tokenize } from "./tokenizer.ts";
import { type BinaryOperator, type CalcResult, type FunctionName, fail, ok, type Token } from "./types.ts";

/** Returned by evaluate() when the expression cannot be computed */
export const ERROR_SENTINEL = Number.NaN;

function applyOperator(operator: BinaryOperator, a: number, b: number): CalcResult<number> {
  switch (operator) {
    case "+":
      return ok(a + b);
    case "-":
      return ok(a - b);
    case "*":
      return ok(a * b);
    case "/":
      if (b === 0) return fail("DivisionByZero", "Division by zero");
      return ok(a / b);
    case "^":
      return ok(a ** b);
  }
}

function applyFunction(fn: FunctionName, operand: number): CalcResult<number> {
  switch (fn) {
    case "sqrt":
      if (operand < 0) return fail("NegativeSquareRoot", "Square root of negative number");
      return ok(Math.sqrt(operand));
  }
}

/**
 * Evaluate a postfix token sequence on a value stack
 * Operands pop as b then a; the result is `a OP b`.
 */
export function evaluatePostfix(tokens: readonly Token[]): CalcResult<number> {
  const stack: number[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case "number":
        stack.push(Number(token.value));
        break;

      case "operator": {
        const b = stack.pop();
        const a = stack.pop();
        if (a === undefined || b === undefined) {
          return fail("InvalidExpression", `Operator '${token.value}' is missing an operand`, token.position);
        }
        const result = applyOperator(token.value, a, b);
        if (!result.ok) return { ok: false, error: { ...result.error, position: token.position } };
        stack.push(result.value);
        break;
      }

      case "function": {
        const operand = stack.pop();
        if (operand === undefined) {
          return fail("InvalidExpression", `Function '${token.value}' is missing an operand`, token.position);
        }
        const result = applyFunction(token.value, operand);
        if (!result.ok) return { ok: false, error: { ...result.error, position: token.position } };
        stack.push(result.value);
        break;
      }

      default:
        return fail("InvalidExpression", "Parenthesis in postfix sequence", token.position);
    }
  }

  const [value] = stack;
  if (value === undefined || stack.length !== 1) {
    return fail("InvalidExpression", `Expected one result, found ${stack.length}`);
  }
  return ok(value);
}

/**
 * Run the whole pipeline and keep the failing stage's error
 * Blank input evaluates to 0.
 *
 * @example
 * calculate("2+3×4");  // { ok: true, value: 14 }
 * calculate("5÷0");    // { ok: false, error: { kind: "DivisionByZero", ... } }
 */
export function calculate(expression: string): CalcResult<number> {
  if (expression.trim() === "") return ok(0);

  const tokens = tokenize(preprocess(expression));
  if (!tokens.ok) return tokens;

  const postfix = toPostfix(tokens.value);
  if (!postfix.ok) return postfix;

  const result = evaluatePostfix(postfix.value);
  if (result.ok && !Number.isFinite(result.value)) {
    return fail("NonFiniteResult", "Result is out of range");
  }
  return result;
}

/**
 * Evaluate an expression, collapsing every failure to the NaN sentinel
 *
 * @example
 * evaluate("100+50%"); // 100.5
 * evaluate("5/0");     // NaN
 */
export function evaluate(expression: string): number {
  const result = calculate(expression);
  return result.ok ? result.value : ERROR_SENTINEL;
}

/** Whether a value returned by evaluate() signals an error */
export function isErrorSentinel(value: number): boolean {
  return Number.isNaN(value);
}
