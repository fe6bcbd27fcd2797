import { Router } from 'express';
import { z } from 'zod';
import { LoginRequestSchema, RegisterRequestSchema } from '@martin-chat/shared';
import type { IdentityManager } from '../services/identity-manager.js';
import { ReplyPendingError } from '../services/dialogue-assembler.js';
import { toSessionView } from '../services/session-context.js';
import { requireSession, type SessionRequest } from '../middleware/auth.js';
import { SUCCESS_MESSAGES, USER_FACING_ERRORS } from '../utils/error-messages.js';

/** Mounted behind the session middleware: identities are always bound to a session */
export function authRouter(identityManager: IdentityManager): Router {
  const router = Router();

  // Register
  router.post('/register', async (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    try {
      const data = RegisterRequestSchema.parse(req.body);

      const result = await identityManager.signUp(session, data.email, data.password);
      if (result === 'already_exists') {
        return res.status(409).json({ error: USER_FACING_ERRORS.USER_EXISTS });
      }
      if (result === 'store_unavailable') {
        return res.status(503).json({ error: USER_FACING_ERRORS.STORE_UNAVAILABLE });
      }

      res.json({ message: SUCCESS_MESSAGES.REGISTERED, session: toSessionView(session) });
    } catch (error) {
      if (error instanceof ReplyPendingError) {
        return res.status(409).json({ error: error.message });
      }
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT, details: error.errors });
      }
      console.error('Registration error:', error);
      res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL });
    }
  });

  // Login
  router.post('/login', async (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    try {
      const data = LoginRequestSchema.parse(req.body);

      const result = await identityManager.login(session, data.email, data.password);
      switch (result) {
        case 'not_found':
          return res.status(404).json({ error: USER_FACING_ERRORS.USER_NOT_FOUND });
        case 'invalid_password':
          return res.status(401).json({ error: USER_FACING_ERRORS.INVALID_PASSWORD });
        case 'success':
          return res.json({ message: SUCCESS_MESSAGES.LOGIN, session: toSessionView(session) });
      }
    } catch (error) {
      if (error instanceof ReplyPendingError) {
        return res.status(409).json({ error: error.message });
      }
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT, details: error.errors });
      }
      console.error('Login error:', error);
      res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL });
    }
  });

  // Logout drops back to a fresh guest on the same session
  router.post('/logout', async (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    try {
      await identityManager.logout(session);
      res.json({ message: SUCCESS_MESSAGES.GUEST_CREATED, session: toSessionView(session) });
    } catch (error) {
      if (error instanceof ReplyPendingError) {
        return res.status(409).json({ error: error.message });
      }
      console.error('Logout error:', error);
      res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL });
    }
  });

  return router;
}
