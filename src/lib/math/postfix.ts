/**
 * Infix → Postfix conversion (Shunting-Yard Algorithm)
 */

import { FUNCTION_PRECEDENCE, OPERATOR_PRECEDENCE } from "./operators.ts";
import { type CalcResult, fail, ok, type OperatorToken, type Token } from "./types.ts";

/** Rank of a stacked token; parentheses never pop */
function stackRank(token: Token): number {
  switch (token.type) {
    case "operator":
      return OPERATOR_PRECEDENCE[token.value];
    case "function":
      return FUNCTION_PRECEDENCE;
    default:
      return 0;
  }
}

/** Pop operators that bind at least as tightly as the incoming one, then push it */
function pushOperator(token: OperatorToken, output: Token[], operatorStack: Token[]): void {
  const rank = OPERATOR_PRECEDENCE[token.value];
  let top = operatorStack[operatorStack.length - 1];
  while (top !== undefined && top.type !== "lparen" && stackRank(top) >= rank) {
    output.push(top);
    operatorStack.pop();
    top = operatorStack[operatorStack.length - 1];
  }
  operatorStack.push(token);
}

/** Pop back to the matching `(`; a function waiting on the group completes with it */
function closeGroup(token: Token, output: Token[], operatorStack: Token[]): CalcResult<void> {
  for (;;) {
    const top = operatorStack.pop();
    if (top === undefined) {
      return fail("UnbalancedParentheses", `Unmatched ')' at position ${token.position}`, token.position);
    }
    if (top.type === "lparen") break;
    output.push(top);
  }

  const top = operatorStack[operatorStack.length - 1];
  if (top?.type === "function") {
    output.push(top);
    operatorStack.pop();
  }
  return ok(undefined);
}

/**
 * Convert infix tokens to postfix order
 * Respects precedence; all binary operators are left-associative, and a
 * function applies to the group or single operand that follows it.
 *
 * @example
 * toPostfix(tokenize("2+3*4").value);  // 2 3 4 * +
 * toPostfix(tokenize("sqrt9+7").value); // 9 sqrt 7 +
 */
export function toPostfix(tokens: readonly Token[]): CalcResult<Token[]> {
  const output: Token[] = [];
  const operatorStack: Token[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case "number":
        output.push(token);
        break;

      case "function":
      case "lparen":
        operatorStack.push(token);
        break;

      case "rparen": {
        const closed = closeGroup(token, output, operatorStack);
        if (!closed.ok) return closed;
        break;
      }

      case "operator":
        pushOperator(token, output, operatorStack);
        break;
    }
  }

  // Pop remaining operators
  for (let top = operatorStack.pop(); top !== undefined; top = operatorStack.pop()) {
    if (top.type === "lparen") {
      return fail("UnbalancedParentheses", `Unclosed '(' at position ${top.position}`, top.position);
    }
    output.push(top);
  }

  return ok(output);
}
