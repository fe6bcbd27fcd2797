import express from 'express';
import supertest from 'supertest';
import type { ConnectionStatus, ModelInfo } from '@martin-chat/shared';
import { InMemoryCredentialStore } from '../database/credential-store.js';
import { SessionRegistry } from '../services/session-context.js';
import { IdentityManager } from '../services/identity-manager.js';
import { ConversationLog } from '../services/conversation-log.js';
import { DialogueAssembler } from '../services/dialogue-assembler.js';
import type { CompletionRequest, InferenceClient, ModelCatalog } from '../services/inference.js';
import { createSessionAuth } from '../middleware/auth.js';
import { sessionRouter } from './session.js';
import { authRouter } from './auth.js';
import { chatRouter } from './chat.js';
import { historyRouter } from './history.js';
import { modelRouter } from './models.js';
import { systemRouter } from './system.js';

export const TEST_MODEL = 'llama-3.1-8b-instant';
export const TEST_HISTORY_LIMIT = 5;

/**
 * In-process stand-in for the inference API. Replies are served from a queue;
 * an Error in the queue is thrown instead.
 */
export class FakeInference implements InferenceClient, ModelCatalog {
  requests: CompletionRequest[] = [];
  models: ModelInfo[] = [
    { id: 'llama-3.1-8b-instant', name: 'Llama 3.1 8B Instant' },
    { id: 'gemma2-9b-it', name: 'Gemma2 9B It' },
  ];
  status: ConnectionStatus = { ok: true, message: 'API Connected - 2 models available' };
  private replies: Array<string | Error> = [];

  queue(...replies: Array<string | Error>): void {
    this.replies.push(...replies);
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.replies.shift() ?? 'Fake reply';
    if (next instanceof Error) throw next;
    return next;
  }

  async listModels(): Promise<ModelInfo[]> {
    return this.models;
  }

  async checkConnection(): Promise<ConnectionStatus> {
    return this.status;
  }
}

export interface TestContext {
  app: express.Express;
  request: supertest.Agent;
  store: InMemoryCredentialStore;
  registry: SessionRegistry;
  inference: FakeInference;
}

/**
 * Test app wired like the real server, with an in-memory store and a fake
 * inference client.
 */
export function createTestApp(options: { cleanupInterval?: number } = {}): TestContext {
  const store = new InMemoryCredentialStore();
  const registry = new SessionRegistry();
  const inference = new FakeInference();
  const identityManager = new IdentityManager(store, { cleanupInterval: options.cleanupInterval });
  const conversationLog = new ConversationLog(store);
  const assembler = new DialogueAssembler(inference, conversationLog, { model: TEST_MODEL, temperature: 0.7 });
  const sessionAuth = createSessionAuth(registry, identityManager);

  const app = express();
  app.use(express.json());

  // Mount routes matching the real server's structure
  app.use('/api/session', sessionRouter({ registry, identityManager, sessionAuth }));
  app.use('/api/auth', sessionAuth, authRouter(identityManager));
  app.use('/api/chat', sessionAuth, chatRouter(assembler));
  app.use('/api/history', sessionAuth, historyRouter(conversationLog, TEST_HISTORY_LIMIT));
  app.use('/api/models', sessionAuth, modelRouter(inference, TEST_MODEL));
  app.use('/api/system', systemRouter(inference));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return { app, request: supertest(app), store, registry, inference };
}

/**
 * Start a guest session and return its token and session id.
 */
export async function startSession(
  request: supertest.Agent,
  body: Record<string, unknown> = {}
): Promise<{ token: string; sessionId: string; identifier: string }> {
  const res = await request.post('/api/session').send(body);
  if (res.status !== 200) {
    throw new Error(`Session creation failed: ${JSON.stringify(res.body)}`);
  }
  return {
    token: res.body.token,
    sessionId: res.body.session.sessionId,
    identifier: res.body.session.identifier,
  };
}

export function bearer(token: string): string {
  return `Bearer ${token}`;
}
