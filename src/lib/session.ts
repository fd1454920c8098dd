/**
 * Keypad Session Manager - one calculator state per session id, with TTL cleanup
 */

import { config } from "../config.ts";
import { displayText, initialKeypadState, type Key, type KeypadState, pressKeys } from "./keypad.ts";

export interface KeypadSession {
  id: string;
  created_at: number;
  updated_at: number;
  state: KeypadState;
  /** Total keys pressed over the session's lifetime */
  key_count: number;
}

export interface SessionManagerConfig {
  ttl_ms: number; // Time-to-live since last use
  cleanup_interval_ms: number; // 0 = manual cleanup only
  max_sessions: number;
}

const DEFAULT_CONFIG: SessionManagerConfig = {
  ttl_ms: 30 * 60 * 1000, // 30 minutes
  cleanup_interval_ms: 5 * 60 * 1000, // 5 minutes
  max_sessions: 100,
};

class KeypadSessionManagerImpl {
  private sessions: Map<string, KeypadSession> = new Map();
  private config: SessionManagerConfig;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(overrides: Partial<SessionManagerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...overrides };
    if (this.config.cleanup_interval_ms > 0) {
      this.startCleanup();
    }
  }

  private startCleanup(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.config.cleanup_interval_ms);
    // The timer alone must not keep the process alive
    this.cleanupTimer.unref();
  }

  /** Drop sessions idle for longer than the TTL; returns how many were removed */
  cleanup(): number {
    const now = Date.now();
    const expired: string[] = [];

    for (const [id, session] of this.sessions) {
      if (now - session.updated_at > this.config.ttl_ms) {
        expired.push(id);
      }
    }

    for (const id of expired) {
      this.sessions.delete(id);
    }
    return expired.length;
  }

  private evictOldest(): void {
    let oldest: KeypadSession | null = null;
    for (const session of this.sessions.values()) {
      if (!oldest || session.updated_at < oldest.updated_at) {
        oldest = session;
      }
    }
    if (oldest) this.sessions.delete(oldest.id);
  }

  getOrCreate(sessionId: string): KeypadSession {
    let session = this.sessions.get(sessionId);

    if (!session) {
      if (this.sessions.size >= this.config.max_sessions) {
        this.evictOldest();
      }

      const now = Date.now();
      session = {
        id: sessionId,
        created_at: now,
        updated_at: now,
        state: initialKeypadState(),
        key_count: 0,
      };
      this.sessions.set(sessionId, session);
    }

    return session;
  }

  get(sessionId: string): KeypadSession | undefined {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.updated_at = Date.now(); // Touch on access
    }
    return session;
  }

  /** Apply keys to a session's keypad, creating the session on first use */
  press(sessionId: string, keys: readonly Key[]): KeypadSession {
    const session = this.getOrCreate(sessionId);
    session.state = pressKeys(session.state, keys);
    session.key_count += keys.length;
    session.updated_at = Date.now();
    return session;
  }

  list(): { id: string; display: string; key_count: number; is_error: boolean; age_ms: number }[] {
    const now = Date.now();
    return Array.from(this.sessions.values()).map((s) => ({
      id: s.id,
      display: displayText(s.state),
      key_count: s.key_count,
      is_error: s.state.isError,
      age_ms: now - s.created_at,
    }));
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  clearAll(): number {
    const count = this.sessions.size;
    this.sessions.clear();
    return count;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.sessions.clear();
  }
}

// Export class for testing
export { KeypadSessionManagerImpl };

// Singleton instance
export const KeypadSessionManager = new KeypadSessionManagerImpl(config.session);
