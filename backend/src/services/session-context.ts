import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_LANGUAGE,
  type AuthState,
  type ChatPhase,
  type Language,
  type SessionView,
  type Turn
} from '@martin-chat/shared';

/**
 * Transient state of one browser session. Owned by that session alone and
 * discarded with it; nothing here is written to the store.
 */
export interface SessionContext {
  readonly sessionId: string;
  /** Identifier of the bound identity, '' before one exists */
  identifier: string;
  authState: AuthState;
  /** True once any identity (guest or member) is bound to the session */
  authenticated: boolean;
  guestMode: boolean;
  language: Language;
  /** Requests seen by this session; drives the guest cleanup schedule */
  cleanupCounter: number;
  /** Correlator written into guest identities created by this session */
  sessionTag: string;
  turns: Turn[];
  phase: ChatPhase;
}

export function createSessionContext(sessionId: string = uuidv4(), language: Language = DEFAULT_LANGUAGE): SessionContext {
  return {
    sessionId,
    identifier: '',
    authState: 'anonymous_guest',
    authenticated: false,
    guestMode: true,
    language,
    cleanupCounter: 0,
    sessionTag: '',
    turns: [],
    phase: 'chatting'
  };
}

export function toSessionView(session: SessionContext): SessionView {
  return {
    sessionId: session.sessionId,
    identifier: session.identifier,
    authState: session.authState,
    guestMode: session.guestMode,
    language: session.language,
    phase: session.phase,
    turnCount: session.turns.length
  };
}

/**
 * Live sessions of this process, keyed by session id. Sessions idle for longer
 * than `idleTimeoutMs` are dropped on the next access.
 */
export class SessionRegistry {
  private sessions: Map<string, SessionContext> = new Map();
  private lastSeen: Map<string, number> = new Map();
  private idleTimeoutMs: number;
  private clock: () => number;

  constructor(idleTimeoutMs: number = 24 * 60 * 60 * 1000, clock: () => number = Date.now) {
    this.idleTimeoutMs = idleTimeoutMs;
    this.clock = clock;
  }

  create(language: Language = DEFAULT_LANGUAGE): SessionContext {
    this.evictIdle();
    const session = createSessionContext(uuidv4(), language);
    this.sessions.set(session.sessionId, session);
    this.lastSeen.set(session.sessionId, this.clock());
    return session;
  }

  get(sessionId: string): SessionContext | null {
    this.evictIdle();
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    this.lastSeen.set(sessionId, this.clock());
    return session;
  }

  delete(sessionId: string): boolean {
    this.lastSeen.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictIdle(): void {
    const now = this.clock();
    for (const [sessionId, seenAt] of this.lastSeen) {
      if (now - seenAt > this.idleTimeoutMs) {
        this.delete(sessionId);
      }
    }
  }
}
