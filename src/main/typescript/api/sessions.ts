/**
 * INPUT: POST /api/sessions, DELETE /api/sessions/:sessionId,
 *        POST /api/sessions/:sessionId/chat ({ question }), GET /api/sessions/:sessionId/history
 * OUTPUT: session id, ResolveResult, conversation history
 * POS: API layer, session lifecycle + chat endpoint; validates before calling assistantService
 */

import { Router, Request, Response } from 'express';
import { ApiErrorResponse } from '../models/assistant';
import { AssistantSession } from '../core/assistantSession';
import { createSession, endSession, getSession } from '../core/sessionStore';
import { askQuestion } from '../services/assistantService';
import { parseQuestion } from '../utils/validators';

export const sessionsRouter = Router();

function sendError(res: Response, status: number, message: string): void {
  const errResp: ApiErrorResponse = { success: false, message };
  res.status(status).json(errResp);
}

/** Looks up the :sessionId session; answers 404 and returns null when it is gone */
export function requireSession(req: Request, res: Response): AssistantSession | null {
  const session = getSession(req.params['sessionId'] ?? '');
  if (!session) {
    sendError(res, 404, 'session not found or expired, create a new session');
    return null;
  }
  return session;
}

// ─── POST /api/sessions ───────────────────────────────────────

sessionsRouter.post('/sessions', (_req: Request, res: Response): void => {
  const session = createSession();
  console.log(`[sessions] created ${session.id.slice(0, 8)}`);
  res.status(201).json({ success: true, sessionId: session.id, createdAt: session.createdAt });
});

// ─── DELETE /api/sessions/:sessionId ──────────────────────────

sessionsRouter.delete('/sessions/:sessionId', (req: Request, res: Response): void => {
  if (!endSession(req.params['sessionId'] ?? '')) {
    sendError(res, 404, 'session not found or expired');
    return;
  }
  res.json({ success: true });
});

// ─── GET /api/sessions/:sessionId/history ─────────────────────

sessionsRouter.get('/sessions/:sessionId/history', (req: Request, res: Response): void => {
  const session = requireSession(req, res);
  if (!session) return;
  res.json({ success: true, entries: session.history() });
});

// ─── POST /api/sessions/:sessionId/chat ───────────────────────

sessionsRouter.post('/sessions/:sessionId/chat', async (req: Request, res: Response): Promise<void> => {
  const body: unknown = req.body;
  const question = parseQuestion(
    body && typeof body === 'object' && 'question' in body ? body.question : undefined,
  );
  if (!question.valid) {
    sendError(res, 400, question.error);
    return;
  }

  const session = requireSession(req, res);
  if (!session) return;

  try {
    const result = await askQuestion(session, question.value);
    if (!result) {
      sendError(res, 400, 'question must be a non-empty string');
      return;
    }
    res.json({ success: true, ...result });
  } catch (err) {
    console.error('[sessions] chat resolution failed:', err);
    sendError(res, 500, 'Assistant is temporarily unavailable, please try again later');
  }
});
