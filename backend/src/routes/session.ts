import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { CreateSessionRequestSchema, SetLanguageRequestSchema } from '@martin-chat/shared';
import { toSessionView, type SessionRegistry } from '../services/session-context.js';
import type { IdentityManager } from '../services/identity-manager.js';
import { generateToken, requireSession, type SessionRequest } from '../middleware/auth.js';
import { Logger } from '../utils/logger.js';
import { USER_FACING_ERRORS } from '../utils/error-messages.js';

export interface SessionRouterDeps {
  registry: SessionRegistry;
  identityManager: IdentityManager;
  sessionAuth: RequestHandler;
}

export function sessionRouter({ registry, identityManager, sessionAuth }: SessionRouterDeps): Router {
  const router = Router();

  // Start a session; every visitor begins as a guest
  router.post('/', async (req, res) => {
    try {
      const data = CreateSessionRequestSchema.parse(req.body ?? {});
      const session = registry.create(data.language);
      await identityManager.createGuest(session);
      Logger.session(`[Session ${session.sessionId}] Created (${registry.size} live)`);

      res.json({
        token: generateToken(session.sessionId),
        session: toSessionView(session)
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT, details: error.errors });
      }
      console.error('Session creation error:', error);
      res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL });
    }
  });

  router.get('/', sessionAuth, (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    res.json(toSessionView(session));
  });

  router.put('/language', sessionAuth, (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    const parsed = SetLanguageRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT, details: parsed.error.errors });
    }

    session.language = parsed.data.language;
    res.json(toSessionView(session));
  });

  return router;
}
