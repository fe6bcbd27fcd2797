import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  IdentityManager,
  hashPassword,
  generateGuestId,
  generateSessionTag,
} from './identity-manager.js';
import { createSessionContext, type SessionContext } from './session-context.js';
import { ReplyPendingError } from './dialogue-assembler.js';
import {
  InMemoryCredentialStore,
  StoreUnavailableError,
  type Identity,
} from '../database/credential-store.js';

const FIXED_NOW = new Date('2025-05-10T12:00:00.000Z');

function member(secret: string): Identity {
  return {
    credentialDigest: hashPassword(secret),
    createdAt: '2025-05-01T00:00:00.000Z',
    isGuest: false,
    guestSessionTag: '',
    history: [],
  };
}

function guest(tag: string): Identity {
  return {
    credentialDigest: '',
    createdAt: '2025-05-01T00:00:00.000Z',
    isGuest: true,
    guestSessionTag: tag,
    history: [],
  };
}

class ReadOnlyStore extends InMemoryCredentialStore {
  async save(): Promise<void> {
    throw new StoreUnavailableError('Failed to write users.json');
  }
}

describe('hashPassword', () => {
  it('is the hex SHA-256 digest of the secret', () => {
    expect(hashPassword('password')).toBe('5e884898da28047151d0e56f8dc6292773603d0d6aabbdd62a11ef721d1542d8');
  });
});

describe('identifier generation', () => {
  it('generates Guest_ followed by 8 uppercase alphanumerics', () => {
    for (let i = 0; i < 20; i++) {
      expect(generateGuestId()).toMatch(/^Guest_[A-Z0-9]{8}$/);
    }
  });

  it('generates 16 character alphanumeric session tags', () => {
    expect(generateSessionTag()).toMatch(/^[A-Za-z0-9]{16}$/);
  });
});

describe('IdentityManager', () => {
  let store: InMemoryCredentialStore;
  let manager: IdentityManager;
  let session: SessionContext;

  beforeEach(() => {
    store = new InMemoryCredentialStore();
    manager = new IdentityManager(store, { now: () => FIXED_NOW });
    session = createSessionContext('session-1');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('register and authenticate', () => {
    it('authenticates with the secret used at registration', async () => {
      expect(await manager.register('alice@example.com', 'test-password', false)).toBe('success');

      expect(await manager.authenticate('alice@example.com', 'test-password')).toBe('success');
    });

    it('rejects a different secret', async () => {
      await manager.register('alice@example.com', 'test-password', false);

      expect(await manager.authenticate('alice@example.com', 'other-password')).toBe('invalid_password');
    });

    it('reports unknown identifiers', async () => {
      expect(await manager.authenticate('nobody@example.com', 'test-password')).toBe('not_found');
    });

    it('stores the digest, never the secret', async () => {
      await manager.register('alice@example.com', 'test-password', false);

      expect((await store.load()).get('alice@example.com')).toEqual({
        credentialDigest: hashPassword('test-password'),
        createdAt: '2025-05-10T12:00:00.000Z',
        isGuest: false,
        guestSessionTag: '',
        history: [],
      });
    });

    it('refuses to overwrite an existing member', async () => {
      await manager.register('alice@example.com', 'test-password', false);

      expect(await manager.register('alice@example.com', 'other-password', false)).toBe('already_exists');
      expect(await manager.authenticate('alice@example.com', 'test-password')).toBe('success');
    });

    it('rewrites guest records without failing', async () => {
      expect(await manager.register('Guest_ABCD1234', '', true, 'tag-one')).toBe('success');
      expect(await manager.register('Guest_ABCD1234', '', true, 'tag-two')).toBe('success');

      expect((await store.load()).get('Guest_ABCD1234')?.guestSessionTag).toBe('tag-two');
    });

    it('still reports success when the store cannot be written', async () => {
      const degraded = new IdentityManager(new ReadOnlyStore());

      expect(await degraded.register('alice@example.com', 'test-password', false)).toBe('success');
    });
  });

  describe('createGuest', () => {
    it('binds a new guest identity to the session', async () => {
      const guestId = await manager.createGuest(session);

      expect(guestId).toMatch(/^Guest_[A-Z0-9]{8}$/);
      expect(session.identifier).toBe(guestId);
      expect(session.authState).toBe('anonymous_guest');
      expect(session.authenticated).toBe(true);
      expect(session.guestMode).toBe(true);
      expect(session.sessionTag).toMatch(/^[A-Za-z0-9]{16}$/);

      expect((await store.load()).get(guestId)).toEqual({
        credentialDigest: '',
        createdAt: '2025-05-10T12:00:00.000Z',
        isGuest: true,
        guestSessionTag: session.sessionTag,
        history: [],
      });
    });

    it('reuses the session correlator when one exists', async () => {
      session.sessionTag = 'existingtag00000';
      const guestId = await manager.createGuest(session);

      expect(session.sessionTag).toBe('existingtag00000');
      expect((await store.load()).get(guestId)?.guestSessionTag).toBe('existingtag00000');
    });
  });

  describe('cleanupGuests', () => {
    beforeEach(async () => {
      session.sessionTag = 'current';
      await store.save(new Map([
        ['alice@example.com', member('test-password')],
        ['Guest_CURRENT1', guest('current')],
        ['Guest_OTHER001', guest('other')],
        ['Guest_OTHER002', guest('another')],
      ]));
    });

    it('prunes exactly on the 10th call', async () => {
      for (let i = 1; i < 10; i++) {
        expect(await manager.cleanupGuests(session)).toBe(false);
      }
      expect((await store.load()).size).toBe(4);

      expect(await manager.cleanupGuests(session)).toBe(true);
      expect([...(await store.load()).keys()]).toEqual(['alice@example.com', 'Guest_CURRENT1']);
    });

    it('follows the configured interval', async () => {
      const everyThird = new IdentityManager(store, { cleanupInterval: 3 });

      expect(await everyThird.cleanupGuests(session)).toBe(false);
      expect(await everyThird.cleanupGuests(session)).toBe(false);
      expect(await everyThird.cleanupGuests(session)).toBe(true);
      expect((await store.load()).size).toBe(2);
      expect(session.cleanupCounter).toBe(3);
    });

    it('does not write when nothing was pruned', async () => {
      await store.save(new Map([
        ['alice@example.com', member('test-password')],
        ['Guest_CURRENT1', guest('current')],
      ]));
      const saveSpy = vi.spyOn(store, 'save');
      const everyCall = new IdentityManager(store, { cleanupInterval: 1 });

      expect(await everyCall.cleanupGuests(session)).toBe(true);
      expect(saveSpy).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await manager.register('alice@example.com', 'test-password', false);
      await manager.createGuest(session);
      session.turns.push({ role: 'user', content: 'hello', timestamp: '2025-05-10T12:00:00.000Z' });
    });

    it('moves the session to authenticated_member and clears the transcript', async () => {
      expect(await manager.login(session, 'alice@example.com', 'test-password')).toBe('success');

      expect(session.identifier).toBe('alice@example.com');
      expect(session.authState).toBe('authenticated_member');
      expect(session.guestMode).toBe(false);
      expect(session.turns).toEqual([]);
    });

    it('leaves the session untouched on a wrong password', async () => {
      const guestId = session.identifier;

      expect(await manager.login(session, 'alice@example.com', 'wrong-password')).toBe('invalid_password');
      expect(session.identifier).toBe(guestId);
      expect(session.authState).toBe('anonymous_guest');
      expect(session.turns).toHaveLength(1);
    });

    it('reports unknown identifiers', async () => {
      expect(await manager.login(session, 'nobody@example.com', 'test-password')).toBe('not_found');
      expect(session.authState).toBe('anonymous_guest');
    });
  });

  describe('signUp', () => {
    it('registers and logs in', async () => {
      expect(await manager.signUp(session, 'bob@example.com', 'test-password')).toBe('success');

      expect(session.identifier).toBe('bob@example.com');
      expect(session.authState).toBe('authenticated_member');
    });

    it('reports store_unavailable when the new member cannot be read back', async () => {
      const degraded = new IdentityManager(new ReadOnlyStore());

      expect(await degraded.signUp(session, 'bob@example.com', 'test-password')).toBe('store_unavailable');
      expect(session.authState).toBe('anonymous_guest');
      expect(session.identifier).toBe('');
    });

    it('does not log in when the identifier is taken', async () => {
      await manager.register('bob@example.com', 'test-password', false);
      await manager.createGuest(session);
      const guestId = session.identifier;

      expect(await manager.signUp(session, 'bob@example.com', 'other-password')).toBe('already_exists');
      expect(session.identifier).toBe(guestId);
    });
  });

  describe('while a reply is pending', () => {
    beforeEach(async () => {
      await manager.register('alice@example.com', 'test-password', false);
      await manager.createGuest(session);
      session.phase = 'awaiting_reply';
    });

    it('refuses to log in', async () => {
      const guestId = session.identifier;

      await expect(manager.login(session, 'alice@example.com', 'test-password')).rejects.toBeInstanceOf(ReplyPendingError);
      expect(session.identifier).toBe(guestId);
      expect(session.authState).toBe('anonymous_guest');
    });

    it('refuses to sign up', async () => {
      await expect(manager.signUp(session, 'bob@example.com', 'test-password')).rejects.toBeInstanceOf(ReplyPendingError);
      expect((await store.load()).has('bob@example.com')).toBe(false);
    });

    it('refuses to log out', async () => {
      const guestId = session.identifier;

      await expect(manager.logout(session)).rejects.toBeInstanceOf(ReplyPendingError);
      expect(session.identifier).toBe(guestId);
    });
  });

  describe('logout', () => {
    it('returns the session to a fresh guest identity', async () => {
      await manager.signUp(session, 'bob@example.com', 'test-password');

      const guestId = await manager.logout(session);

      expect(guestId).toMatch(/^Guest_/);
      expect(session.identifier).toBe(guestId);
      expect(session.authState).toBe('anonymous_guest');
      expect(session.guestMode).toBe(true);
      expect((await store.load()).has('bob@example.com')).toBe(true);
    });
  });
});
