/**
 * GET /api/resources, GET /api/status — reference content + diagnostics
 */

import request from 'supertest';
import express from 'express';

jest.mock('../services/assistantService');

import { resourcesRouter } from '../api/resources';
import { statusRouter } from '../api/status';
import { getGenerationStatus, listResources } from '../services/assistantService';
import { createSession, endSession, getSession } from '../core/sessionStore';

const mockListResources = listResources as jest.MockedFunction<typeof listResources>;
const mockGetGenerationStatus = getGenerationStatus as jest.MockedFunction<typeof getGenerationStatus>;

const UNCONFIGURED = {
  configured: false,
  model: 'test-model',
  message: 'API key not found: set ANTHROPIC_API_KEY to enable live answers and image analysis',
};

const app = express();
app.use(express.json());
app.use('/api', resourcesRouter);
app.use('/api', statusRouter);

afterEach(() => jest.clearAllMocks());

describe('GET /api/resources', () => {
  test('returns topics, reference cards and example prompts', async () => {
    mockListResources.mockReturnValue({
      topics: [{ topicId: 'forms', canonicalQuestion: 'Form design?', answerBody: '## Accessible Form Design' }],
      referenceCards: [{ title: 'Testing Tools', items: [{ label: 'WAVE', text: 'Web accessibility evaluation' }] }],
      examplePrompts: ['How do I structure headings for screen readers?'],
    });

    const res = await request(app).get('/api/resources');
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.topics[0].topicId).toBe('forms');
    expect(res.body.referenceCards[0].items[0].label).toBe('WAVE');
    expect(res.body.examplePrompts).toEqual(['How do I structure headings for screen readers?']);
  });
});

describe('GET /api/status', () => {
  beforeEach(() => {
    mockGetGenerationStatus.mockReturnValue(UNCONFIGURED);
  });

  test('without a session → generation status only', async () => {
    const res = await request(app).get('/api/status');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, generation: UNCONFIGURED });
  });

  test('with a session → cache and rate limiter signals', async () => {
    const session = createSession();
    session.cache.put('What is ARIA?', 'Accessible Rich Internet Applications.');

    const res = await request(app).get('/api/status').query({ sessionId: session.id });
    expect(res.status).toBe(200);
    expect(res.body.session).toEqual({
      sessionId: session.id,
      cacheSize: 1,
      maxCacheSize: session.cache.capacity,
      rateLimiterReady: true,
      msUntilReady: 0,
      historyLength: 0,
    });
    endSession(session.id);
  });

  test('polling status does not keep an idle session alive', async () => {
    const start = 1_700_000_000_000;
    const ttlMs = 30 * 60 * 1000;
    const nowSpy = jest.spyOn(Date, 'now').mockReturnValue(start);
    const session = createSession();

    nowSpy.mockReturnValue(start + ttlMs - 1);
    const polled = await request(app).get('/api/status').query({ sessionId: session.id });
    expect(polled.status).toBe(200);
    expect(session.updatedAt).toBe(start);

    nowSpy.mockReturnValue(start + ttlMs + 1);
    const expired = await request(app).get('/api/status').query({ sessionId: session.id });
    expect(expired.status).toBe(404);
    expect(getSession(session.id)).toBeNull();
    nowSpy.mockRestore();
  });

  test('unknown session → 404', async () => {
    const res = await request(app).get('/api/status').query({ sessionId: 'not-a-session' });
    expect(res.status).toBe(404);
  });
});
