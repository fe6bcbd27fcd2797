import { Router } from 'express';
import { HistoryQuerySchema } from '@martin-chat/shared';
import type { ConversationLog } from '../services/conversation-log.js';
import { requireSession, type SessionRequest } from '../middleware/auth.js';
import { USER_FACING_ERRORS } from '../utils/error-messages.js';

/** Sidebar history of the bound identity, oldest first */
export function historyRouter(conversationLog: ConversationLog, defaultLimit: number): Router {
  const router = Router();

  router.get('/', async (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    const query = HistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT, details: query.error.errors });
    }

    try {
      const entries = session.identifier
        ? await conversationLog.recentTurns(session.identifier, query.data.limit ?? defaultLimit)
        : [];
      res.json({ entries });
    } catch (error) {
      console.error('Error loading history:', error);
      res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL });
    }
  });

  return router;
}
