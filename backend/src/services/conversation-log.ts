import type { HistoryEntry } from '@martin-chat/shared';
import { StoreUnavailableError, type CredentialStore } from '../database/credential-store.js';
import { Logger } from '../utils/logger.js';
import { STORE_ERRORS } from '../utils/error-messages.js';

export const DEFAULT_RECENT_LIMIT = 10;

/**
 * Per-identity exchange history. Entries are only ever appended; they go away
 * with their identity and never individually.
 */
export class ConversationLog {
  private store: CredentialStore;
  private now: () => Date;

  constructor(store: CredentialStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /**
   * Append one exchange. Unknown identifiers are ignored and a failed write is
   * logged; returns whether the entry was persisted.
   */
  async appendTurn(identifier: string, prompt: string, response: string, model: string): Promise<boolean> {
    const identities = await this.store.load();
    const identity = identities.get(identifier);
    if (!identity) {
      Logger.debug(`[ConversationLog] No identity ${identifier}, entry dropped`);
      return false;
    }

    identity.history.push({
      timestamp: this.now().toISOString(),
      prompt,
      response,
      model
    });

    try {
      await this.store.save(identities);
      return true;
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        Logger.warn(STORE_ERRORS.WRITE_DEGRADED(`history entry for ${identifier}`), error.cause);
        return false;
      }
      throw error;
    }
  }

  /** The last `limit` entries, oldest first */
  async recentTurns(identifier: string, limit: number = DEFAULT_RECENT_LIMIT): Promise<HistoryEntry[]> {
    if (limit <= 0) return [];

    const identities = await this.store.load();
    const identity = identities.get(identifier);
    if (!identity) return [];

    return identity.history.slice(-limit);
  }
}
