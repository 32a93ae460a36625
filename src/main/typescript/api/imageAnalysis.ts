/**
 * INPUT: POST /api/sessions/:sessionId/image-analysis ({ imageBase64 }), GET /api/image-analysis/guidance
 * OUTPUT: { guidance, result } / offline alt text guidance
 * POS: API layer, image accessibility analysis; guidance costs nothing, analysis uses API quota
 */

import { Router, Request, Response } from 'express';
import { ApiErrorResponse } from '../models/assistant';
import { analyzeImage, getImageGuidance } from '../services/assistantService';
import { parseImageBase64 } from '../utils/validators';
import { requireSession } from './sessions';

export const imageAnalysisRouter = Router();

// ─── GET /api/image-analysis/guidance ─────────────────────────

imageAnalysisRouter.get('/image-analysis/guidance', (_req: Request, res: Response): void => {
  res.json({ success: true, guidance: getImageGuidance() });
});

// ─── POST /api/sessions/:sessionId/image-analysis ─────────────

imageAnalysisRouter.post(
  '/sessions/:sessionId/image-analysis',
  async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const image = parseImageBase64(
      body && typeof body === 'object' && 'imageBase64' in body ? body.imageBase64 : undefined,
    );
    if (!image.valid) {
      const errResp: ApiErrorResponse = { success: false, message: image.error };
      res.status(400).json(errResp);
      return;
    }

    const session = requireSession(req, res);
    if (!session) return;

    try {
      const analysis = await analyzeImage(session, image.value);
      res.json({ success: true, ...analysis });
    } catch (err) {
      console.error('[imageAnalysis] analysis failed:', err);
      const errResp: ApiErrorResponse = {
        success: false,
        message: 'Image analysis is temporarily unavailable, please try again later',
      };
      res.status(500).json(errResp);
    }
  },
);
