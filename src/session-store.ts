import { EMPTY_PAGINATION, PaginationState } from './pagination.js';

export interface ViewerSession {
  id: string;
  selected?: string;       // result file currently shown
  pages: PaginationState;  // page per document stem
  touchedAt: number;
}

const DEFAULT_SESSION_TTL = 14400; // 4 hours in seconds

/**
 * Switch the session to `item`. Choosing a different item discards every stored page.
 */
export function selectDocument(session: ViewerSession, item: string): ViewerSession {
  if (session.selected === item) return session;
  return { ...session, selected: item, pages: EMPTY_PAGINATION };
}

/**
 * Viewing sessions, kept in process memory. Entries expire `ttlSeconds` after their
 * last read or write.
 */
export class SessionStore {
  private sessions = new Map<string, ViewerSession>();

  constructor(
    private readonly ttlSeconds: number = DEFAULT_SESSION_TTL,
    private readonly now: () => number = Date.now,
  ) {}

  private isExpired(session: ViewerSession): boolean {
    return this.now() - session.touchedAt > this.ttlSeconds * 1000;
  }

  async createSession(sessionId: string): Promise<ViewerSession> {
    const session: ViewerSession = { id: sessionId, pages: EMPTY_PAGINATION, touchedAt: this.now() };
    this.sessions.set(sessionId, session);
    console.log(`[SESSION] Created session ${sessionId}`);
    return session;
  }

  async getSession(sessionId: string): Promise<ViewerSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      console.log(`[SESSION] Session ${sessionId} expired`);
      return null;
    }
    const touched = { ...session, touchedAt: this.now() };
    this.sessions.set(sessionId, touched);
    return touched;
  }

  async getOrCreateSession(sessionId: string): Promise<ViewerSession> {
    return (await this.getSession(sessionId)) ?? this.createSession(sessionId);
  }

  async updateSession(sessionId: string, updates: Partial<Omit<ViewerSession, 'id'>>): Promise<ViewerSession | null> {
    const session = await this.getSession(sessionId);
    if (!session) {
      console.error(`[SESSION] ERROR: Cannot update session ${sessionId} - session not found!`);
      return null;
    }
    const updated: ViewerSession = { ...session, ...updates, id: sessionId, touchedAt: this.now() };
    this.sessions.set(sessionId, updated);
    return updated;
  }

  async saveSession(session: ViewerSession): Promise<ViewerSession> {
    const saved = { ...session, touchedAt: this.now() };
    this.sessions.set(session.id, saved);
    return saved;
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
    console.log(`[SESSION] Deleted session ${sessionId}`);
  }

  /** Drop expired sessions; returns how many were removed. */
  pruneExpired(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) console.log(`[SESSION] Pruned ${removed} expired sessions`);
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
