import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { parseKeys } from "../src/lib/keypad.ts";
import { KeypadSessionManagerImpl } from "../src/lib/session.ts";

function keys(input: string) {
  return parseKeys(input).keys;
}

describe("KeypadSessionManager", () => {
  let manager: KeypadSessionManagerImpl;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    manager = new KeypadSessionManagerImpl({ ttl_ms: 1000, cleanup_interval_ms: 0, max_sessions: 2 });
  });

  afterEach(() => {
    manager.destroy();
    vi.useRealTimers();
  });

  test("keeps the display between presses", () => {
    expect(manager.press("a", keys("12+")).state.text).toBe("12+");

    const session = manager.press("a", keys("3="));
    expect(session.state.text).toBe("15");
    expect(session.key_count).toBe(5);
  });

  test("sessions are independent", () => {
    manager.press("a", keys("1"));
    manager.press("b", keys("2"));
    expect(manager.get("a")?.state.text).toBe("1");
    expect(manager.get("b")?.state.text).toBe("2");
  });

  test("evicts the least recently used session when full", () => {
    manager.press("a", keys("1"));
    vi.setSystemTime(10);
    manager.press("b", keys("2"));
    vi.setSystemTime(20);
    manager.press("c", keys("3"));

    expect(manager.list().map((s) => s.id)).toEqual(["b", "c"]);
  });

  test("cleanup drops sessions idle past the TTL", () => {
    manager.press("a", keys("1"));
    vi.setSystemTime(500);
    manager.press("b", keys("2"));
    vi.setSystemTime(1200);

    expect(manager.cleanup()).toBe(1);
    expect(manager.get("a")).toBeUndefined();
    expect(manager.get("b")?.state.text).toBe("2");
  });

  test("get touches the session", () => {
    manager.press("a", keys("1"));
    vi.setSystemTime(900);
    manager.get("a");
    vi.setSystemTime(1500);

    expect(manager.cleanup()).toBe(0);
  });

  test("the cleanup timer expires sessions", () => {
    const timed = new KeypadSessionManagerImpl({ ttl_ms: 1000, cleanup_interval_ms: 100, max_sessions: 10 });
    timed.press("a", keys("1"));
    vi.advanceTimersByTime(1100);

    expect(timed.list()).toEqual([]);
    timed.destroy();
  });

  test("list reports display and age", () => {
    manager.press("a", keys("5÷0="));
    vi.setSystemTime(3000);

    expect(manager.list()).toEqual([{ id: "a", display: "Error", key_count: 4, is_error: true, age_ms: 3000 }]);
  });

  test("clear and clearAll", () => {
    manager.press("a", keys("1"));
    manager.press("b", keys("2"));

    expect(manager.clear("a")).toBe(true);
    expect(manager.clear("a")).toBe(false);
    expect(manager.clearAll()).toBe(1);
    expect(manager.list()).toEqual([]);
  });
});
