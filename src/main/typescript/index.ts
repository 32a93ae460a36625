/**
 * INPUT: environment variables (.env)
 * OUTPUT: Express HTTP server (chat, image analysis, resources, status APIs)
 * POS: application entry point, wires every router and middleware
 */

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { getConfig } from './config/appConfig';
import { sessionsRouter } from './api/sessions';
import { imageAnalysisRouter } from './api/imageAnalysis';
import { resourcesRouter } from './api/resources';
import { statusRouter } from './api/status';

const config = getConfig();
const app = express();

// Base64 images travel in the JSON body
app.use(express.json({ limit: '8mb' }));

// Front-end public API (CORS)
app.use('/api', (_req, res, next) => {
  res.header('Access-Control-Allow-Origin', '*');
  res.header('Access-Control-Allow-Headers', 'Content-Type');
  res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  next();
});
app.options('/api/*', (_req, res) => res.sendStatus(200));
app.use('/api', sessionsRouter);
app.use('/api', imageAnalysisRouter);
app.use('/api', resourcesRouter);
app.use('/api', statusRouter);

// Health check
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'accessibility-advocate-assistant' });
});

app.listen(config.port, () => {
  console.log('♿ Accessibility Advocate Assistant started');
  console.log(`📡 Listening on http://localhost:${config.port}`);
  console.log(`🤖 Model: ${config.modelName}`);
  console.log(
    `💰 Cost controls: ${config.rateLimitDelayMs / 1000}s between live calls, ${config.maxCacheSize} cached answers per session`,
  );
  if (!config.apiKey) {
    console.warn('⚠️  ANTHROPIC_API_KEY is not set: answering from offline content and fallback resources only');
  }
});
