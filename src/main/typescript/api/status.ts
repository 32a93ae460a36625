/**
 * INPUT: GET /api/status[?sessionId=]
 * OUTPUT: generation status, plus cache occupancy / rate limiter readiness for a session
 * POS: API layer, diagnostics panel data
 */

import { Router, Request, Response } from 'express';
import { peekSession } from '../core/sessionStore';
import { getGenerationStatus } from '../services/assistantService';

export const statusRouter = Router();

statusRouter.get('/status', (req: Request, res: Response): void => {
  const generation = getGenerationStatus();
  const sessionId = req.query['sessionId'];

  if (typeof sessionId !== 'string' || !sessionId) {
    res.json({ success: true, generation });
    return;
  }

  const session = peekSession(sessionId);
  if (!session) {
    res.status(404).json({ success: false, message: 'session not found or expired' });
    return;
  }
  res.json({ success: true, generation, session: session.status() });
});
