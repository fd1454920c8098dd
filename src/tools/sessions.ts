import { z } from "zod";
import { KeypadSessionManager } from "../lib/session.ts";

/**
 * Session management tools for keypad sessions
 */

export const listKeypadsTool = {
  name: "list_keypads",
  description: "List active keypad sessions with their displays and key counts",
  parameters: z.object({}),
  execute: async () => {
    const sessions = KeypadSessionManager.list();

    if (sessions.length === 0) {
      return "No active keypads.";
    }

    const lines = [
      `**Active Keypads** (${sessions.length})`,
      "",
      "| Session | Display | Keys | Age |",
      "|---------|---------|------|-----|",
    ];

    for (const s of sessions) {
      const display = s.is_error ? `${s.display} ⚠` : s.display;
      lines.push(`| ${s.id} | ${display} | ${s.key_count} | ${formatAge(s.age_ms)} |`);
    }

    return lines.join("\n");
  },
};

export const clearKeypadTool = {
  name: "clear_keypad",
  description: "Remove a keypad session, or all of them",
  parameters: z.object({
    session_id: z.string().optional().describe("Session ID to remove (omit for all)"),
    all: z.boolean().default(false).describe("Remove all sessions"),
  }),
  execute: async (args: { session_id?: string; all?: boolean }) => {
    if (args.all) {
      const count = KeypadSessionManager.clearAll();
      return `Cleared ${count} keypad(s).`;
    }

    if (!args.session_id) {
      return "Provide session_id or set all=true";
    }

    const cleared = KeypadSessionManager.clear(args.session_id);
    return cleared ? `Cleared keypad: ${args.session_id}` : `Keypad not found: ${args.session_id}`;
  },
};

export function formatAge(ms: number): string {
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  return `${Math.round(ms / 3_600_000)}h`;
}
