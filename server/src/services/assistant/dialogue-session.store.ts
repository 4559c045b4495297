import { DIALOGUE_SESSION_MAX_ENTRIES, DIALOGUE_SESSION_TTL_MS } from '../../config/index.js';
import { CacheManager, type Clock } from '../../lib/cache/cache-manager.js';

export interface DialogueSession {
  greeted: boolean;
}

/**
 * Per-conversation rule-engine state, keyed by tenant + client session id.
 * Entries idle past the TTL are forgotten; each read or write renews them.
 */
export class DialogueSessionStore {
  private readonly sessions: CacheManager<DialogueSession>;

  constructor(
    private readonly ttlMs: number = DIALOGUE_SESSION_TTL_MS,
    maxEntries: number = DIALOGUE_SESSION_MAX_ENTRIES,
    now?: Clock
  ) {
    this.sessions = new CacheManager<DialogueSession>(maxEntries, now);
  }

  /**
   * Snapshot of the session; a new session starts un-greeted.
   */
  get(tenantId: string, sessionId: string): DialogueSession {
    const key = this.key(tenantId, sessionId);
    const session = this.sessions.get(key) ?? { greeted: false };
    this.sessions.set(key, session, this.ttlMs);
    return { ...session };
  }

  save(tenantId: string, sessionId: string, session: DialogueSession): void {
    this.sessions.set(this.key(tenantId, sessionId), { ...session }, this.ttlMs);
  }

  size(): number {
    return this.sessions.size();
  }

  private key(tenantId: string, sessionId: string): string {
    return `${tenantId}:${sessionId}`;
  }
}
