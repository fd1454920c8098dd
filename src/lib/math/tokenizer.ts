/**
 * Math Expression Tokenizer
 * Splits a canonical expression into number, operator, function and
 * parenthesis tokens
 */

import { FUNCTION_NAMES, isBinaryOperator } from "./operators.ts";
import { type CalcResult, fail, ok, type Token } from "./types.ts";

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

/**
 * Read a number literal starting at `start`: digits with at most one
 * decimal point. Returns the end index (exclusive).
 */
function scanNumber(expr: string, start: number): number {
  let end = start;
  let seenDot = false;
  while (end < expr.length) {
    const c = expr.charAt(end);
    if (isDigit(c)) {
      end++;
    } else if (c === "." && !seenDot) {
      seenDot = true;
      end++;
    } else {
      break;
    }
  }
  return end;
}

/**
 * True when the next token must be an operand: at the start, after `(`,
 * after a binary operator, or after a function keyword
 */
function expectsOperand(previous: Token | undefined): boolean {
  return (
    previous === undefined ||
    previous.type === "lparen" ||
    previous.type === "operator" ||
    previous.type === "function"
  );
}

/**
 * Tokenize a canonical expression
 *
 * Whitespace is ignored. A `-` in operand position that directly precedes
 * a number is part of that number ("-4", "2*-3"); anywhere else `-` is
 * the subtraction operator. No implicit multiplication is inserted.
 *
 * @example
 * tokenize("2+sqrt(9)");
 * // ok: [2, +, sqrt, (, 9, )]
 * tokenize("2$3");
 * // fail: MalformedToken at position 1
 */
export function tokenize(expr: string): CalcResult<Token[]> {
  const input = expr.replace(/\s+/g, "");
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const char = input.charAt(i);
    const startPos = i;

    // Numbers, including a folded unary minus
    const next = input[i + 1] ?? "";
    const negative =
      char === "-" && expectsOperand(tokens[tokens.length - 1]) && (isDigit(next) || next === ".");
    if (isDigit(char) || char === "." || negative) {
      const end = scanNumber(input, negative ? i + 1 : i);
      const literal = input.slice(startPos, end);
      if (!Number.isFinite(Number(literal))) {
        return fail("MalformedToken", `Malformed number '${literal}' at position ${startPos}`, startPos);
      }
      tokens.push({ type: "number", value: literal, position: startPos });
      i = end;
      continue;
    }

    if (isBinaryOperator(char)) {
      tokens.push({ type: "operator", value: char, position: startPos });
      i++;
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({ type: char === "(" ? "lparen" : "rparen", position: startPos });
      i++;
      continue;
    }

    const keyword = FUNCTION_NAMES.find((name) => input.startsWith(name, i));
    if (keyword !== undefined) {
      tokens.push({ type: "function", value: keyword, position: startPos });
      i += keyword.length;
      continue;
    }

    return fail("MalformedToken", `Unexpected character '${char}' at position ${startPos}`, startPos);
  }

  return ok(tokens);
}
