/**
 * INPUT: GET /api/resources
 * OUTPUT: knowledge base topics, reference cards, example prompts
 * POS: API layer, static reference panel content (no API cost)
 */

import { Router, Request, Response } from 'express';
import { listResources } from '../services/assistantService';

export const resourcesRouter = Router();

resourcesRouter.get('/resources', (_req: Request, res: Response): void => {
  res.json({ success: true, ...listResources() });
});
