import { UserError } from "fastmcp";
import { z } from "zod";
import { config } from "../config.ts";
import { displayText, type KeypadState, parseKeys } from "../lib/keypad.ts";
import { type KeypadSession, KeypadSessionManager } from "../lib/session.ts";
import type { MCPContext, ToolLog } from "./context.ts";

function describeState(state: KeypadState): string {
  if (state.isError) return "error (a digit, C or ⌫ starts over)";
  if (state.awaitingNewExpression) return "result (a digit starts a new expression)";
  return "editing";
}

export function formatKeypadSession(session: KeypadSession): string {
  return [
    `**Display**: ${displayText(session.state)}`,
    `- Session: ${session.id}`,
    `- State: ${describeState(session.state)}`,
    `- Keys pressed: ${session.key_count}`,
  ].join("\n");
}

/** Parse and apply keys; nothing is applied when any key is unknown */
export function pressKeypad(sessionId: string, input: string, log: ToolLog): string {
  const { keys, error } = parseKeys(input);
  if (error) {
    throw new UserError(`Unknown key '${error.char}' at index ${error.index}`);
  }

  const session = KeypadSessionManager.press(sessionId, keys);
  log.debug("keys pressed", { session_id: sessionId, keys: keys.length, display: displayText(session.state) });
  if (session.state.isError) {
    log.info("keypad entered error state", { session_id: sessionId });
  }
  return formatKeypadSession(session);
}

export const keypadTool = {
  name: "keypad",
  description: `Press calculator keys in a session and read the display.

Keys: 0-9, + − × ÷ (or - * /), . (decimal), % (percent), ² or ^ (square),
√ or r (square root), ( or ) (the parentheses key: opens or closes a group),
< or ⌫ (delete), C (clear), = (equals). Whitespace is ignored.

The session keeps its display between calls, so "12+" then "3=" shows 15.`,

  parameters: z.object({
    session_id: z.string().min(1).describe("Keypad session to press keys in (created on first use)"),
    keys: z.string().max(config.max_expression_length).describe("Keys to press, in order"),
  }),

  execute: async (args: { session_id: string; keys: string }, ctx: MCPContext) => {
    return pressKeypad(args.session_id, args.keys, ctx.log);
  },
};
