/**
 * Tests: knowledgeBase — two-pass substring lookup, match order, data validation
 */

import { accessibilityKnowledge, KnowledgeBase, parseKnowledgeData } from '../services/knowledgeBase';

const contrastAnswer = accessibilityKnowledge.getTopic('color contrast')?.answerBody;
const keyboardAnswer = accessibilityKnowledge.getTopic('keyboard navigation')?.answerBody;

function minimalData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    topics: [
      { topicId: 'headings', canonicalQuestion: 'How do I structure headings?', answerBody: 'Use h1 to h6 in order.' },
      { topicId: 'tables', canonicalQuestion: 'How do I mark up tables?', answerBody: 'Use th with scope.' },
    ],
    keywords: [
      { keyword: 'h1', topicId: 'headings' },
      { keyword: 'caption', topicId: 'tables' },
    ],
    fallbackContent: 'See the WCAG quick reference.',
    referenceCards: [],
    examplePrompts: ['How do I structure headings?'],
    ...overrides,
  };
}

// ─── lookup ─────────────────────────────────────────────────────

describe('KnowledgeBase.lookup', () => {
  test('keyword "ratio" resolves to the color contrast answer', () => {
    expect(contrastAnswer).toBeDefined();
    expect(accessibilityKnowledge.lookup('What ratio do I need?')).toBe(contrastAnswer);
  });

  test('matching is case-insensitive', () => {
    expect(accessibilityKnowledge.lookup('COLOR CONTRAST for buttons')).toBe(contrastAnswer);
  });

  test('returns null when nothing matches', () => {
    expect(accessibilityKnowledge.lookup('tell me about video captions')).toBeNull();
  });

  test('returns null for an empty query', () => {
    expect(accessibilityKnowledge.lookup('')).toBeNull();
  });

  test('plain substring containment: "table" contains the keyword "tab"', () => {
    expect(accessibilityKnowledge.lookup('Is my table accessible?')).toBe(keyboardAnswer);
  });
});

describe('KnowledgeBase.match order', () => {
  test('topic pass runs before the keyword pass', () => {
    const match = accessibilityKnowledge.match('How do I write alt text with good contrast?');
    expect(match?.matchedBy).toBe('topic');
    expect(match?.topic.topicId).toBe('alt text');
  });

  test('with several topics present, the first topic in table order wins', () => {
    const match = accessibilityKnowledge.match('keyboard navigation versus color contrast');
    expect(match?.topic.topicId).toBe('color contrast');
  });

  test('with several keywords present, the first keyword in index order wins', () => {
    const match = accessibilityKnowledge.match('label the focus ring');
    expect(match).toEqual({
      topic: accessibilityKnowledge.getTopic('keyboard navigation'),
      matchedBy: 'keyword',
      term: 'focus',
    });
  });
});

// ─── static content ─────────────────────────────────────────────

describe('bundled knowledge data', () => {
  test('four topics in a fixed order', () => {
    expect(accessibilityKnowledge.listTopics().map((t) => t.topicId)).toEqual([
      'color contrast',
      'alt text',
      'keyboard navigation',
      'forms',
    ]);
  });

  test('topic entries are frozen', () => {
    expect(Object.isFrozen(accessibilityKnowledge.listTopics()[0])).toBe(true);
  });

  test('fallback content lists generic resources', () => {
    expect(accessibilityKnowledge.getFallbackContent()).toContain('https://www.w3.org/WAI/WCAG21/quickref/');
  });

  test('reference cards and example prompts are present', () => {
    expect(accessibilityKnowledge.getReferenceCards().map((c) => c.title)).toEqual([
      'WCAG 2.1 Quick Reference',
      'Testing Tools',
      'Color Contrast Requirements',
      'Keyboard Navigation',
    ]);
    expect(accessibilityKnowledge.getExamplePrompts()).toHaveLength(8);
  });

  test('getTopic is case-insensitive and returns null for unknown ids', () => {
    expect(accessibilityKnowledge.getTopic('FORMS')?.topicId).toBe('forms');
    expect(accessibilityKnowledge.getTopic('video')).toBeNull();
  });
});

// ─── parseKnowledgeData ─────────────────────────────────────────

describe('parseKnowledgeData', () => {
  test('accepts well-formed data and lowercases ids and keywords', () => {
    const data = parseKnowledgeData(
      minimalData({ keywords: [{ keyword: 'H1', topicId: 'Headings' }] }),
    );
    expect(data.keywords).toEqual([{ keyword: 'h1', topicId: 'headings' }]);
    expect(new KnowledgeBase(data).lookup('where does the h1 go?')).toBe('Use h1 to h6 in order.');
  });

  test('rejects a keyword that points at an unknown topic', () => {
    expect(() =>
      parseKnowledgeData(minimalData({ keywords: [{ keyword: 'video', topicId: 'media' }] })),
    ).toThrow('keyword "video" references unknown topic "media"');
  });

  test('rejects duplicate topic ids', () => {
    const topic = { topicId: 'headings', canonicalQuestion: 'Q?', answerBody: 'A.' };
    expect(() => parseKnowledgeData(minimalData({ topics: [topic, topic], keywords: [] }))).toThrow(
      'duplicate topic "headings"',
    );
  });

  test('rejects a blank answer body', () => {
    expect(() =>
      parseKnowledgeData(
        minimalData({ topics: [{ topicId: 'headings', canonicalQuestion: 'Q?', answerBody: '  ' }], keywords: [] }),
      ),
    ).toThrow('topics[0].answerBody must be a non-empty string');
  });

  test('rejects non-object input', () => {
    expect(() => parseKnowledgeData(null)).toThrow('knowledge data must be an object');
  });
});
