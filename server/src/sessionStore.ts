import { createSession, type Session } from '../../src/api/session.js';

/**
 * In-memory session store. Nothing survives a restart.
 *
 * Route handlers are synchronous, so a read-modify-save on one session
 * never interleaves with another request.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  create(): Session {
    const session = createSession(generateId());
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  save(session: Session): Session {
    this.sessions.set(session.id, session);
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}
