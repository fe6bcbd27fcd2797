import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import type { SessionContext, SessionRegistry } from '../services/session-context.js';
import type { IdentityManager } from '../services/identity-manager.js';
import { USER_FACING_ERRORS } from '../utils/error-messages.js';

// Read per call: .env is loaded after this module is evaluated
function jwtSecret(): string {
  return process.env.JWT_SECRET || 'your-secret-key-change-in-production';
}

export interface SessionRequest extends Request {
  sessionId?: string;
  chatSession?: SessionContext;
}

export function generateToken(sessionId: string): string {
  return jwt.sign({ sessionId }, jwtSecret(), { expiresIn: '7d' });
}

export function verifyToken(token: string): { sessionId: string } | null {
  try {
    const payload = jwt.verify(token, jwtSecret());
    if (typeof payload === 'object' && typeof payload.sessionId === 'string') {
      return { sessionId: payload.sessionId };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Resolves the bearer token to a live session and runs the guest cleanup
 * schedule for it. Every request through here counts towards that schedule.
 */
export function createSessionAuth(registry: SessionRegistry, identityManager: IdentityManager) {
  return (req: SessionRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1];

    if (!token) {
      return res.status(401).json({ error: 'Access token required' });
    }

    const payload = verifyToken(token);
    if (!payload) {
      return res.status(403).json({ error: 'Invalid or expired token' });
    }

    const session = registry.get(payload.sessionId);
    if (!session) {
      return res.status(401).json({ error: USER_FACING_ERRORS.SESSION_NOT_FOUND });
    }

    req.sessionId = session.sessionId;
    req.chatSession = session;

    identityManager.cleanupGuests(session).then(() => next(), next);
  };
}

/** The session attached by createSessionAuth; answers 401 itself when there is none */
export function requireSession(req: SessionRequest, res: Response): SessionContext | null {
  if (!req.chatSession) {
    res.status(401).json({ error: USER_FACING_ERRORS.UNAUTHORIZED });
    return null;
  }
  return req.chatSession;
}
