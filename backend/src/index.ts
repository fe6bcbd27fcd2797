import 'dotenv/config';
import express from 'express';
import compression from 'compression';
import cors from 'cors';
import { ConfigLoader, NO_CREDENTIAL } from './config/loader.js';
import { JsonFileCredentialStore } from './database/credential-store.js';
import { SessionRegistry } from './services/session-context.js';
import { IdentityManager } from './services/identity-manager.js';
import { ConversationLog } from './services/conversation-log.js';
import { DialogueAssembler } from './services/dialogue-assembler.js';
import { OpenAICompatibleService } from './services/openai-compatible.js';
import { createSessionAuth } from './middleware/auth.js';
import { sessionRouter } from './routes/session.js';
import { authRouter } from './routes/auth.js';
import { chatRouter } from './routes/chat.js';
import { historyRouter } from './routes/history.js';
import { modelRouter } from './routes/models.js';
import { systemRouter } from './routes/system.js';
import { Logger } from './utils/logger.js';
import { API_KEY_ERRORS, SERVER_ERRORS } from './utils/error-messages.js';

async function startServer() {
  Logger.printSettings();

  const configLoader = ConfigLoader.getInstance();
  const config = await configLoader.loadConfig();
  const apiKey = await configLoader.resolveApiKey();
  if (apiKey === NO_CREDENTIAL) {
    console.warn(API_KEY_ERRORS.MISSING);
  }

  const store = new JsonFileCredentialStore(config.storePath, config.storeCacheTtlMs);
  const registry = new SessionRegistry();
  const identityManager = new IdentityManager(store, { cleanupInterval: config.guestCleanupInterval });
  const conversationLog = new ConversationLog(store);
  const inference = new OpenAICompatibleService(apiKey, config.inference.baseUrl);
  const assembler = new DialogueAssembler(inference, conversationLog, {
    model: config.inference.model,
    temperature: config.inference.temperature
  });
  const sessionAuth = createSessionAuth(registry, identityManager);

  const app = express();

  // Enable gzip/deflate compression for HTTP responses
  app.use(compression({
    threshold: 1024,
    filter: (req, res) => {
      if (req.headers['x-no-compression']) {
        return false;
      }
      return compression.filter(req, res);
    }
  }));

  app.use(cors({
    origin: process.env.FRONTEND_URL || config.frontendUrl,
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/session', sessionRouter({ registry, identityManager, sessionAuth }));
  app.use('/api/auth', sessionAuth, authRouter(identityManager));
  app.use('/api/chat', sessionAuth, chatRouter(assembler));
  app.use('/api/history', sessionAuth, historyRouter(conversationLog, config.historyLimit));
  app.use('/api/models', sessionAuth, modelRouter(inference, config.inference.model));
  app.use('/api/system', systemRouter(inference));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const port = Number(process.env.PORT) || config.port;
  const server = app.listen(port, () => {
    Logger.info(`Server running on http://localhost:${port}`);
    Logger.info(`Store: ${store.getFilePath()}`);
    Logger.info(`Inference: ${config.inference.baseUrl} (${config.inference.model})`);
  });

  // Graceful shutdown
  process.on('SIGINT', () => {
    Logger.info('\nShutting down server...');
    server.close(() => {
      process.exit(0);
    });
  });
}

startServer().catch((error) => {
  console.error(SERVER_ERRORS.STARTUP_FAILED, error);
  process.exit(1);
});
