/**
 * INPUT: data/accessibilityKnowledge.json (topics, keyword index, static panels)
 * OUTPUT: KnowledgeBase (offline answer lookup + reference content)
 * POS: service layer, answers common questions with no API cost
 *
 * Matching is plain lowercase substring containment in two passes:
 *   1. topic ids, in the file's topic order
 *   2. keywords, in the file's keyword order
 * The first hit wins; array order is the documented total order.
 */

import rawKnowledge from '../data/accessibilityKnowledge.json';
import {
  KeywordMapping,
  KnowledgeData,
  KnowledgeMatch,
  ReferenceCard,
  ReferenceItem,
  TopicEntry,
} from '../models/assistant';

// ─── Load-time validation ──────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`knowledge data: ${field} must be a non-empty string`);
  }
  return value;
}

function requireArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`knowledge data: ${field} must be an array`);
  }
  return value;
}

function parseTopic(value: unknown, idx: number): TopicEntry {
  if (!isRecord(value)) throw new Error(`knowledge data: topics[${idx}] must be an object`);
  return {
    topicId: requireString(value['topicId'], `topics[${idx}].topicId`).toLowerCase(),
    canonicalQuestion: requireString(value['canonicalQuestion'], `topics[${idx}].canonicalQuestion`),
    answerBody: requireString(value['answerBody'], `topics[${idx}].answerBody`),
  };
}

function parseKeyword(value: unknown, idx: number): KeywordMapping {
  if (!isRecord(value)) throw new Error(`knowledge data: keywords[${idx}] must be an object`);
  return {
    keyword: requireString(value['keyword'], `keywords[${idx}].keyword`).toLowerCase(),
    topicId: requireString(value['topicId'], `keywords[${idx}].topicId`).toLowerCase(),
  };
}

function parseReferenceCard(value: unknown, idx: number): ReferenceCard {
  if (!isRecord(value)) throw new Error(`knowledge data: referenceCards[${idx}] must be an object`);
  const items = requireArray(value['items'], `referenceCards[${idx}].items`).map(
    (item, j): ReferenceItem => {
      if (!isRecord(item)) {
        throw new Error(`knowledge data: referenceCards[${idx}].items[${j}] must be an object`);
      }
      return {
        label: requireString(item['label'], `referenceCards[${idx}].items[${j}].label`),
        text: requireString(item['text'], `referenceCards[${idx}].items[${j}].text`),
      };
    },
  );
  return { title: requireString(value['title'], `referenceCards[${idx}].title`), items };
}

export function parseKnowledgeData(raw: unknown): KnowledgeData {
  if (!isRecord(raw)) throw new Error('knowledge data must be an object');

  const topics = requireArray(raw['topics'], 'topics').map(parseTopic);
  const keywords = requireArray(raw['keywords'], 'keywords').map(parseKeyword);

  const topicIds = new Set<string>();
  for (const topic of topics) {
    if (topicIds.has(topic.topicId)) {
      throw new Error(`knowledge data: duplicate topic "${topic.topicId}"`);
    }
    topicIds.add(topic.topicId);
  }

  // Every keyword must point at a known topic
  for (const { keyword, topicId } of keywords) {
    if (!topicIds.has(topicId)) {
      throw new Error(`knowledge data: keyword "${keyword}" references unknown topic "${topicId}"`);
    }
  }

  return {
    topics,
    keywords,
    fallbackContent: requireString(raw['fallbackContent'], 'fallbackContent'),
    referenceCards: requireArray(raw['referenceCards'], 'referenceCards').map(parseReferenceCard),
    examplePrompts: requireArray(raw['examplePrompts'], 'examplePrompts').map((p, i) =>
      requireString(p, `examplePrompts[${i}]`),
    ),
  };
}

// ─── Knowledge base ────────────────────────────────────────────

export class KnowledgeBase {
  private readonly topics: readonly TopicEntry[];
  private readonly keywords: readonly KeywordMapping[];
  private readonly topicsById: ReadonlyMap<string, TopicEntry>;

  constructor(private readonly data: KnowledgeData) {
    this.topics = Object.freeze(data.topics.map((t) => Object.freeze({ ...t })));
    this.keywords = Object.freeze(data.keywords.map((k) => Object.freeze({ ...k })));
    this.topicsById = new Map(this.topics.map((t) => [t.topicId, t]));
  }

  /** First topic or keyword contained in the query, or null */
  match(query: string): KnowledgeMatch | null {
    const normalized = query.toLowerCase();

    for (const topic of this.topics) {
      if (normalized.includes(topic.topicId)) {
        return { topic, matchedBy: 'topic', term: topic.topicId };
      }
    }

    for (const { keyword, topicId } of this.keywords) {
      const topic = this.topicsById.get(topicId);
      if (topic && normalized.includes(keyword)) {
        return { topic, matchedBy: 'keyword', term: keyword };
      }
    }

    return null;
  }

  lookup(query: string): string | null {
    return this.match(query)?.topic.answerBody ?? null;
  }

  getTopic(topicId: string): TopicEntry | null {
    return this.topicsById.get(topicId.toLowerCase()) ?? null;
  }

  listTopics(): readonly TopicEntry[] {
    return this.topics;
  }

  getFallbackContent(): string {
    return this.data.fallbackContent;
  }

  getReferenceCards(): readonly ReferenceCard[] {
    return this.data.referenceCards;
  }

  getExamplePrompts(): readonly string[] {
    return this.data.examplePrompts;
  }
}

/** Shared, read-only instance built from the bundled data file */
export const accessibilityKnowledge = new KnowledgeBase(parseKnowledgeData(rawKnowledge));
