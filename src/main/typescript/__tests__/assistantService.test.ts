/**
 * Tests: assistantService — end-to-end wiring without a credential (no network)
 */

import { createSession, endSession } from '../core/sessionStore';
import { Provenance } from '../models/enums';
import {
  askQuestion,
  getGenerationStatus,
  getImageGuidance,
  listResources,
} from '../services/assistantService';
import { accessibilityKnowledge } from '../services/knowledgeBase';

delete process.env['ANTHROPIC_API_KEY'];
delete process.env['MODEL_NAME'];

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => jest.restoreAllMocks());

describe('assistantService without a credential', () => {
  test('status reports generation as unconfigured', () => {
    expect(getGenerationStatus()).toEqual({
      configured: false,
      model: 'claude-sonnet-4-6',
      message: 'API key not found: set ANTHROPIC_API_KEY to enable live answers and image analysis',
    });
  });

  test('knowledge base questions are still answered offline', async () => {
    const session = createSession();
    const result = await askQuestion(session, 'What ratio do I need?');
    expect(result?.provenance).toBe(Provenance.OFFLINE);
    expect(result?.answer).toBe(accessibilityKnowledge.getTopic('color contrast')?.answerBody);
    endSession(session.id);
  });

  test('other questions fall back to generic resources', async () => {
    const session = createSession();
    const result = await askQuestion(session, 'tell me about video captions');
    expect(result?.provenance).toBe(Provenance.FALLBACK);
    expect(result?.answer).toBe(accessibilityKnowledge.getFallbackContent());
    expect(result?.error).toBeNull();
    expect(session.cache.size).toBe(0);
    expect(session.history()).toHaveLength(2);
    endSession(session.id);
  });

  test('image guidance is the alt text topic', () => {
    expect(getImageGuidance()).toBe(accessibilityKnowledge.getTopic('alt text')?.answerBody);
  });

  test('resources expose the bundled catalog', () => {
    const resources = listResources();
    expect(resources.topics.map((t) => t.topicId)).toEqual(['color contrast', 'alt text', 'keyboard navigation', 'forms']);
    expect(resources.referenceCards).toHaveLength(4);
    expect(resources.examplePrompts).toHaveLength(8);
  });
});
