import { UserError } from "fastmcp";
import { afterEach, describe, expect, test, vi } from "vitest";
import { config } from "../src/config.ts";
import { KeypadSessionManager } from "../src/lib/session.ts";
import { calculateReport, validateReport } from "../src/tools/calculate.ts";
import { keypadTool, pressKeypad } from "../src/tools/keypad.ts";
import { clearKeypadTool, formatAge, listKeypadsTool } from "../src/tools/sessions.ts";

function fakeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

describe("calculate tool", () => {
  test("renders the formatted result", () => {
    const log = fakeLog();
    expect(calculateReport("2+3×4", log)).toBe("**Result**: 14");
    expect(log.debug).toHaveBeenCalledWith("calculated", { expression: "2+3×4", display: "14" });
  });

  test("explains an error", () => {
    const log = fakeLog();
    expect(calculateReport("5÷0", log)).toBe("**Result**: Error\n- Reason: DivisionByZero (Division by zero)");
    expect(log.debug).toHaveBeenCalledWith("calculation failed", { expression: "5÷0", kind: "DivisionByZero" });
  });

  test("validate_expression reports balance", () => {
    expect(validateReport("(2+3)×4")).toBe("Parentheses are balanced.");
    expect(validateReport("(2+3")).toBe(
      "Parentheses are unbalanced: a ')' closes nothing or a '(' is never closed.",
    );
  });
});

describe("keypad tools", () => {
  afterEach(() => {
    KeypadSessionManager.clearAll();
  });

  test("presses keys and shows the display", () => {
    const log = fakeLog();
    expect(pressKeypad("t1", "12+3=", log)).toBe(
      [
        "**Display**: 15",
        "- Session: t1",
        "- State: result (a digit starts a new expression)",
        "- Keys pressed: 5",
      ].join("\n"),
    );
  });

  test("continues a session across calls", () => {
    const log = fakeLog();
    pressKeypad("t2", "12+", log);
    expect(pressKeypad("t2", "3", log)).toBe(
      ["**Display**: 12+3", "- Session: t2", "- State: editing", "- Keys pressed: 4"].join("\n"),
    );
  });

  test("logs when a session enters the error state", () => {
    const log = fakeLog();
    const report = pressKeypad("t3", "1÷0=", log);
    expect(report).toContain("- State: error (a digit, C or ⌫ starts over)");
    expect(log.info).toHaveBeenCalledWith("keypad entered error state", { session_id: "t3" });
  });

  test("rejects unknown keys without pressing any", () => {
    expect(() => pressKeypad("t4", "2x3", fakeLog())).toThrow(UserError);
    expect(KeypadSessionManager.get("t4")).toBeUndefined();
  });

  test("key strings are limited to the configured expression length", () => {
    const limit = config.max_expression_length;
    expect(keypadTool.parameters.safeParse({ session_id: "t6", keys: "1".repeat(limit) }).success).toBe(true);
    expect(keypadTool.parameters.safeParse({ session_id: "t6", keys: "1".repeat(limit + 1) }).success).toBe(false);
  });

  test("list_keypads and clear_keypad", async () => {
    expect(await listKeypadsTool.execute()).toBe("No active keypads.");

    pressKeypad("t5", "7", fakeLog());
    const table = await listKeypadsTool.execute();
    expect(table).toContain("**Active Keypads** (1)");
    expect(table).toContain("| t5 | 7 | 1 |");

    expect(await clearKeypadTool.execute({ session_id: "t5" })).toBe("Cleared keypad: t5");
    expect(await clearKeypadTool.execute({ session_id: "t5" })).toBe("Keypad not found: t5");
    expect(await clearKeypadTool.execute({})).toBe("Provide session_id or set all=true");
    expect(await clearKeypadTool.execute({ all: true })).toBe("Cleared 0 keypad(s).");
  });
});

describe("formatAge", () => {
  test("seconds, minutes, hours", () => {
    expect(formatAge(5_000)).toBe("5s");
    expect(formatAge(120_000)).toBe("2m");
    expect(formatAge(7_200_000)).toBe("2h");
  });
});
