import { debug } from '../shared/debug.js';
import type { IntakeSession } from './state-machine.js';

/**
 * At most one live intake session per user.
 *
 * Owned by a conversation service instance; nothing here is process-global.
 */
export class IntakeSessionStore {
  private readonly sessions = new Map<string, IntakeSession>();

  get(userId: string): IntakeSession | null {
    return this.sessions.get(userId) ?? null;
  }

  /** Stores a new session, replacing (and abandoning) any previous one. */
  begin(session: IntakeSession): void {
    const userId = session.subject.userId;
    if (this.sessions.has(userId)) {
      debug('intake', 'Replacing unfinished session', { userId });
    }
    this.sessions.set(userId, session);
  }

  /** Drops whatever session the user has. A commit already under way still finishes. */
  discard(userId: string): void {
    if (this.sessions.delete(userId)) {
      debug('intake', 'Discarded unfinished session', { userId });
    }
  }

  /**
   * Removes the session if it is still the current one for its user. A
   * session replaced while it was committing leaves its successor alone.
   */
  end(session: IntakeSession): void {
    const userId = session.subject.userId;
    if (this.sessions.get(userId) === session) {
      this.sessions.delete(userId);
    }
  }

  size(): number {
    return this.sessions.size;
  }
}
