import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { HistoryEntrySchema, type HistoryEntry } from '@martin-chat/shared';
import { Logger } from '../utils/logger.js';
import { STORE_ERRORS } from '../utils/error-messages.js';

/**
 * One account in the shared store. Guests have an empty digest and carry the
 * correlator of the browser session that created them.
 */
export interface Identity {
  credentialDigest: string;
  createdAt: string;
  isGuest: boolean;
  guestSessionTag: string;
  history: HistoryEntry[];
}

export type IdentityMap = Map<string, Identity>;

/**
 * Repository for the identifier -> Identity mapping.
 *
 * `load` never throws: an absent or unreadable backing resource is an empty
 * store. `save` replaces the whole mapping; two writers that load, mutate and
 * save concurrently lose the first writer's changes (last writer wins).
 */
export interface CredentialStore {
  load(): Promise<IdentityMap>;
  save(identities: IdentityMap): Promise<void>;
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

// On-disk record layout
const StoredIdentitySchema = z.object({
  password: z.string(),
  created_at: z.string(),
  chat_history: z.array(HistoryEntrySchema).default([]),
  is_guest: z.boolean().default(false),
  guest_session_id: z.string().default('')
});

type StoredIdentity = z.infer<typeof StoredIdentitySchema>;

const StoredFileSchema = z.record(z.unknown());

function fromStored(record: StoredIdentity): Identity {
  return {
    credentialDigest: record.password,
    createdAt: record.created_at,
    isGuest: record.is_guest,
    guestSessionTag: record.guest_session_id,
    history: record.chat_history
  };
}

function toStored(identity: Identity): StoredIdentity {
  return {
    password: identity.credentialDigest,
    created_at: identity.createdAt,
    chat_history: identity.history,
    is_guest: identity.isGuest,
    guest_session_id: identity.guestSessionTag
  };
}

export function cloneIdentities(identities: IdentityMap): IdentityMap {
  return structuredClone(identities);
}

/**
 * Parse the store file contents. Invalid JSON yields an empty map; records
 * that fail validation are skipped one by one.
 */
export function parseIdentityFile(contents: string, source: string): IdentityMap {
  const identities: IdentityMap = new Map();
  if (!contents.trim()) return identities;

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    Logger.warn(STORE_ERRORS.PARSE_FAILED(source), error);
    return identities;
  }

  const file = StoredFileSchema.safeParse(raw);
  if (!file.success) {
    Logger.warn(STORE_ERRORS.PARSE_FAILED(source));
    return identities;
  }

  for (const [identifier, value] of Object.entries(file.data)) {
    const record = StoredIdentitySchema.safeParse(value);
    if (!record.success) {
      Logger.warn(STORE_ERRORS.RECORD_SKIPPED(identifier));
      continue;
    }
    identities.set(identifier, fromStored(record.data));
  }

  return identities;
}

export function serializeIdentities(identities: IdentityMap): string {
  const file: Record<string, StoredIdentity> = {};
  for (const [identifier, identity] of identities) {
    file[identifier] = toStored(identity);
  }
  return JSON.stringify(file, null, 2);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * JSON file implementation (./data/users.json by default).
 *
 * Loads are cached for `cacheTtlMs`; a successful save drops the cache so the
 * next load sees the file as written.
 */
export class JsonFileCredentialStore implements CredentialStore {
  private filePath: string;
  private cacheTtlMs: number;
  private clock: () => number;
  private cache: { identities: IdentityMap; loadedAt: number } | null = null;

  constructor(filePath: string = path.join('data', 'users.json'), cacheTtlMs: number = 5 * 60 * 1000, clock: () => number = Date.now) {
    this.filePath = filePath;
    this.cacheTtlMs = cacheTtlMs;
    this.clock = clock;
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<IdentityMap> {
    if (this.cache && this.clock() - this.cache.loadedAt < this.cacheTtlMs) {
      return cloneIdentities(this.cache.identities);
    }

    const identities = await this.readFile();
    this.cache = { identities, loadedAt: this.clock() };
    return cloneIdentities(identities);
  }

  async save(identities: IdentityMap): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, serializeIdentities(identities));
    } catch (error) {
      throw new StoreUnavailableError(STORE_ERRORS.WRITE_FAILED(this.filePath), { cause: error });
    } finally {
      // A failed write may have truncated the file, so the cache goes either way
      this.invalidate();
    }
    Logger.store(`[Store] Wrote ${identities.size} identities to ${this.filePath}`);
  }

  invalidate(): void {
    this.cache = null;
  }

  private async readFile(): Promise<IdentityMap> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // File doesn't exist yet
        return new Map();
      }
      Logger.warn(STORE_ERRORS.READ_FAILED(this.filePath), error);
      return new Map();
    }
    return parseIdentityFile(contents, this.filePath);
  }
}

/**
 * Process-local implementation with the same copy-in/copy-out semantics as the
 * file store.
 */
export class InMemoryCredentialStore implements CredentialStore {
  private identities: IdentityMap;

  constructor(initial: IdentityMap = new Map()) {
    this.identities = cloneIdentities(initial);
  }

  async load(): Promise<IdentityMap> {
    return cloneIdentities(this.identities);
  }

  async save(identities: IdentityMap): Promise<void> {
    this.identities = cloneIdentities(identities);
  }
}
