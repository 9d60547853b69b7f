import { randomBytes } from 'crypto';

export interface Session {
  createdAt: number;
  lastSeenAt: number;
}

/**
 * Session id → Session. Every call is synchronous, so on the event loop each one is
 * atomic; nothing is held across an await, a CGI call included.
 */
export interface SessionStore {
  get(id: string): Session | undefined;
  /** Overwrites any existing entry */
  put(id: string, session: Session): void;
  /** No-op if absent */
  remove(id: string): void;
  /** Drop expired entries, returns how many were removed */
  sweep(now?: number): number;
}

export function createSession(now = Date.now()): Session {
  return { createdAt: now, lastSeenAt: now };
}

/** 256-bit random id, hex encoded */
export function generateSessionId(): string {
  return randomBytes(32).toString('hex');
}

export function isValidSessionId(id: string): boolean {
  return /^[a-f0-9]{64}$/.test(id);
}

/** In-memory store with an idle timeout; never persisted */
export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();

  constructor(private readonly ttlMs: number) {}

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isExpired(session, Date.now())) {
      this.sessions.delete(id);
      return undefined;
    }
    return { ...session };
  }

  put(id: string, session: Session): void {
    this.sessions.set(id, { ...session });
  }

  remove(id: string): void {
    this.sessions.delete(id);
  }

  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: Session, now: number): boolean {
    return this.ttlMs > 0 && now - session.lastSeenAt > this.ttlMs;
  }
}
