export interface SessionExchange {
  /** Redacted prompt as sent to the backend. */
  readonly prompt: string;
  /** Final response as returned to the caller. */
  readonly response: string;
  readonly at: string;
}

export interface Session {
  readonly id: string;
  readonly createdAt: number;
  lastSeenAt: number;
  history: SessionExchange[];
}

export interface SessionStoreOptions {
  ttlMs: number;
  maxHistory: number;
  now?: () => number;
}

/**
 * Conversation state keyed by session id. Sessions are created on first use,
 * expire `ttlMs` after their last use and keep at most `maxHistory` exchanges.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly maxHistory: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxHistory = options.maxHistory;
    this.now = options.now ?? Date.now;
  }

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.sessions.delete(id);
      return undefined;
    }
    return session;
  }

  getOrCreate(id: string): Session {
    const existing = this.get(id);
    if (existing) {
      existing.lastSeenAt = this.now();
      return existing;
    }
    const created: Session = { id, createdAt: this.now(), lastSeenAt: this.now(), history: [] };
    this.sessions.set(id, created);
    return created;
  }

  history(id: string): readonly SessionExchange[] {
    return [...(this.get(id)?.history ?? [])];
  }

  append(id: string, prompt: string, response: string): void {
    const session = this.getOrCreate(id);
    session.history.push(Object.freeze({ prompt, response, at: new Date(this.now()).toISOString() }));
    if (session.history.length > this.maxHistory) {
      session.history = session.history.slice(session.history.length - this.maxHistory);
    }
  }

  /** Returns false when there was no live session to reset. */
  reset(id: string): boolean {
    const live = this.get(id) !== undefined;
    this.sessions.delete(id);
    return live;
  }

  prune(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: Session): boolean {
    return this.now() - session.lastSeenAt > this.ttlMs;
  }
}
