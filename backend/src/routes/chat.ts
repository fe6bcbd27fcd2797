import { Router, type Response } from 'express';
import { SendMessageRequestSchema } from '@martin-chat/shared';
import {
  DialogueError,
  ReplyPendingError,
  type DialogueAssembler
} from '../services/dialogue-assembler.js';
import { InferenceError } from '../services/inference.js';
import { requireSession, type SessionRequest } from '../middleware/auth.js';
import { USER_FACING_ERRORS } from '../utils/error-messages.js';

function sendDialogueError(res: Response, error: unknown, context: string) {
  if (error instanceof ReplyPendingError) {
    return res.status(409).json({ error: error.message });
  }
  if (error instanceof DialogueError) {
    return res.status(400).json({ error: error.message });
  }
  if (error instanceof InferenceError) {
    // Shown to the user as is; the user turn is already in the transcript
    return res.status(502).json({ error: error.message });
  }
  console.error(`${context} error:`, error);
  return res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL });
}

export function chatRouter(assembler: DialogueAssembler): Router {
  const router = Router();

  router.post('/messages', async (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    const parsed = SendMessageRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT, details: parsed.error.errors });
    }

    try {
      res.json(await assembler.send(session, parsed.data.content));
    } catch (error) {
      sendDialogueError(res, error, 'Chat');
    }
  });

  router.post('/wrap-up', async (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;

    try {
      res.json(await assembler.wrapUp(session));
    } catch (error) {
      sendDialogueError(res, error, 'Wrap-up');
    }
  });

  // Transient transcript of this session
  router.get('/turns', (req: SessionRequest, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    res.json({ turns: session.turns, phase: session.phase });
  });

  return router;
}
