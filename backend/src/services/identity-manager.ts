import crypto from 'crypto';
import type { AuthResult, RegisterResult, SignUpResult } from '@martin-chat/shared';
import { StoreUnavailableError, type CredentialStore, type IdentityMap } from '../database/credential-store.js';
import type { SessionContext } from './session-context.js';
import { ReplyPendingError } from './dialogue-assembler.js';
import { Logger } from '../utils/logger.js';
import { STORE_ERRORS } from '../utils/error-messages.js';

export const DEFAULT_GUEST_CLEANUP_INTERVAL = 10;

const GUEST_PREFIX = 'Guest_';
const GUEST_SUFFIX_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const GUEST_SUFFIX_LENGTH = 8;
const SESSION_TAG_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const SESSION_TAG_LENGTH = 16;

/**
 * Unsalted SHA-256 hex digest. Not a credential-storage scheme; kept for
 * compatibility with existing store files.
 */
export function hashPassword(password: string): string {
  return crypto.createHash('sha256').update(password).digest('hex');
}

function randomString(alphabet: string, length: number): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += alphabet[crypto.randomInt(alphabet.length)];
  }
  return result;
}

/** Guest_ followed by 8 of [A-Z0-9]; collisions are possible and resolve last-write-wins */
export function generateGuestId(): string {
  return GUEST_PREFIX + randomString(GUEST_SUFFIX_ALPHABET, GUEST_SUFFIX_LENGTH);
}

export function generateSessionTag(): string {
  return randomString(SESSION_TAG_ALPHABET, SESSION_TAG_LENGTH);
}

export interface IdentityManagerOptions {
  /** Guest pruning runs on every Nth cleanupGuests call of a session */
  cleanupInterval?: number;
  now?: () => Date;
}

/**
 * Creates, authenticates and prunes identities. Store failures degrade to
 * "no data"; outcomes are returned as result codes, never thrown.
 */
export class IdentityManager {
  private store: CredentialStore;
  private cleanupInterval: number;
  private now: () => Date;

  constructor(store: CredentialStore, options: IdentityManagerOptions = {}) {
    this.store = store;
    this.cleanupInterval = options.cleanupInterval ?? DEFAULT_GUEST_CLEANUP_INTERVAL;
    this.now = options.now ?? (() => new Date());
  }

  async authenticate(identifier: string, secret: string): Promise<AuthResult> {
    const identities = await this.store.load();
    const identity = identities.get(identifier);
    if (!identity) {
      return 'not_found';
    }
    return identity.credentialDigest === hashPassword(secret) ? 'success' : 'invalid_password';
  }

  /**
   * Members cannot be registered twice. Guest records are always written
   * fresh, tagged with `sessionTag`.
   */
  async register(identifier: string, secret: string, isGuest: boolean, sessionTag: string = ''): Promise<RegisterResult> {
    const identities = await this.store.load();
    if (identities.has(identifier) && !isGuest) {
      return 'already_exists';
    }

    identities.set(identifier, {
      credentialDigest: secret ? hashPassword(secret) : '',
      createdAt: this.now().toISOString(),
      isGuest,
      guestSessionTag: isGuest ? sessionTag : '',
      history: []
    });
    await this.persist(identities, `register ${identifier}`);

    return 'success';
  }

  /**
   * Create a guest identity and bind it to the session. The session gets a
   * correlator first if it has none.
   */
  async createGuest(session: SessionContext): Promise<string> {
    if (!session.sessionTag) {
      session.sessionTag = generateSessionTag();
    }

    const guestId = generateGuestId();
    await this.register(guestId, '', true, session.sessionTag);

    session.identifier = guestId;
    session.authState = 'anonymous_guest';
    session.authenticated = true;
    session.guestMode = true;
    session.turns = [];
    Logger.session(`[Session ${session.sessionId}] Guest ${guestId} created`);

    return guestId;
  }

  /**
   * Runs on every request; prunes only on every Nth call of the session.
   * Keeps all members and the guests of the current session. Returns true
   * when a prune pass ran.
   */
  async cleanupGuests(session: SessionContext): Promise<boolean> {
    session.cleanupCounter += 1;
    if (session.cleanupCounter % this.cleanupInterval !== 0) {
      return false;
    }

    const identities = await this.store.load();
    const retained: IdentityMap = new Map();
    for (const [identifier, identity] of identities) {
      if (!identity.isGuest || identity.guestSessionTag === session.sessionTag) {
        retained.set(identifier, identity);
      }
    }

    if (retained.size !== identities.size) {
      Logger.store(`[Store] Pruning ${identities.size - retained.size} guest identities`);
      await this.persist(retained, 'guest cleanup');
    }

    return true;
  }

  /**
   * anonymous_guest -> authenticating -> authenticated_member. A failed
   * attempt leaves the session as it was. Throws ReplyPendingError while the
   * session waits for a reply.
   */
  async login(session: SessionContext, identifier: string, secret: string): Promise<AuthResult> {
    this.assertIdle(session);
    const previous = session.authState;
    session.authState = 'authenticating';

    const result = await this.authenticate(identifier, secret);
    if (result !== 'success') {
      session.authState = previous;
      Logger.session(`[Session ${session.sessionId}] Login for ${identifier} failed: ${result}`);
      return result;
    }

    session.identifier = identifier;
    session.authState = 'authenticated_member';
    session.authenticated = true;
    session.guestMode = false;
    session.turns = [];
    Logger.session(`[Session ${session.sessionId}] Logged in as ${identifier}`);

    return result;
  }

  /**
   * Register then log in. A registration whose write did not land cannot be
   * logged into and reports store_unavailable.
   */
  async signUp(session: SessionContext, identifier: string, secret: string): Promise<SignUpResult> {
    this.assertIdle(session);
    const result = await this.register(identifier, secret, false);
    if (result !== 'success') {
      return result;
    }
    const login = await this.login(session, identifier, secret);
    return login === 'success' ? 'success' : 'store_unavailable';
  }

  /** Drop back to a fresh guest identity on the same session */
  async logout(session: SessionContext): Promise<string> {
    this.assertIdle(session);
    Logger.session(`[Session ${session.sessionId}] ${session.identifier} logged out`);
    return this.createGuest(session);
  }

  // Identity changes mid-exchange would file the pending reply under the wrong account
  private assertIdle(session: SessionContext): void {
    if (session.phase === 'awaiting_reply') {
      throw new ReplyPendingError();
    }
  }

  private async persist(identities: IdentityMap, operation: string): Promise<boolean> {
    try {
      await this.store.save(identities);
      return true;
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        Logger.warn(STORE_ERRORS.WRITE_DEGRADED(operation), error.cause);
        return false;
      }
      throw error;
    }
  }
}
