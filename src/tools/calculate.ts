import { z } from "zod";
import { config } from "../config.ts";
import { calculate, ERROR_MARKER, format, isValidExpression } from "../lib/math/index.ts";
import type { MCPContext, ToolLog } from "./context.ts";

const expressionParam = z
  .string()
  .max(config.max_expression_length)
  .describe("Expression as typed on the keypad, e.g. 2×(3+4)−50% or √16+2²");

/**
 * Evaluate an expression and render the display string, plus the reason
 * when it shows "Error"
 */
export function calculateReport(expression: string, log: ToolLog): string {
  const result = calculate(expression);

  if (!result.ok) {
    log.debug("calculation failed", { expression, kind: result.error.kind });
    return [`**Result**: ${ERROR_MARKER}`, `- Reason: ${result.error.kind} (${result.error.message})`].join("\n");
  }

  const display = format(result.value);
  log.debug("calculated", { expression, display });
  return `**Result**: ${display}`;
}

export function validateReport(expression: string): string {
  return isValidExpression(expression)
    ? "Parentheses are balanced."
    : "Parentheses are unbalanced: a ')' closes nothing or a '(' is never closed.";
}

export const calculateTool = {
  name: "calculate",
  description: `Evaluate an arithmetic expression the way a pocket calculator does.

Supports + − × ÷ (or + - * /), parentheses, √ (or sqrt) before a number or group,
² after a number or group, and % after a number (50% = 0.5).
Division by zero, √ of a negative number and malformed input give "Error".`,

  parameters: z.object({
    expression: expressionParam,
  }),

  execute: async (args: { expression: string }, ctx: MCPContext) => {
    return calculateReport(args.expression, ctx.log);
  },
};

export const validateExpressionTool = {
  name: "validate_expression",
  description: "Check that an expression's parentheses are balanced before evaluating it",
  parameters: z.object({
    expression: expressionParam,
  }),
  execute: async (args: { expression: string }) => {
    return validateReport(args.expression);
  },
};
