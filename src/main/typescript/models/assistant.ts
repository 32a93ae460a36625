/**
 * INPUT: none (type definitions only)
 * OUTPUT: every type shared by the knowledge base, pipeline, session and API layers
 * POS: model layer
 */

import { ConversationRole, Provenance } from './enums';

// ─── Knowledge base ────────────────────────────────────────────

export interface TopicEntry {
  topicId: string;            // lowercase literal matched as a substring, e.g. "color contrast"
  canonicalQuestion: string;
  answerBody: string;         // markdown
}

export interface KeywordMapping {
  keyword: string;            // lowercase literal, e.g. "ratio"
  topicId: string;            // must exist in the topic table
}

export interface ReferenceItem {
  label: string;
  text: string;
}

export interface ReferenceCard {
  title: string;
  items: ReferenceItem[];
}

export interface KnowledgeData {
  topics: TopicEntry[];        // array order is the topic match order
  keywords: KeywordMapping[];  // array order is the keyword match order
  fallbackContent: string;
  referenceCards: ReferenceCard[];
  examplePrompts: string[];
}

export interface KnowledgeMatch {
  topic: TopicEntry;
  matchedBy: 'topic' | 'keyword';
  term: string;
}

// ─── Conversation ──────────────────────────────────────────────

export interface ConversationEntry {
  role: ConversationRole;
  content: string;
  provenance: Provenance;
  createdAt: number;
}

// ─── Generation ────────────────────────────────────────────────

export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export interface ImageInput {
  data: Buffer;
  mediaType: ImageMediaType;
}

// ─── Resolution results ───────────────────────────────────────

export interface ResolveResult {
  answer: string;
  provenance: Provenance;
  error: string | null;       // surfaced ServiceError / Unconfigured message
  notice: string | null;      // short status line for the UI
}

export interface ImageAnalysisResult {
  guidance: string;           // offline alt text guidance, always offered first
  result: ResolveResult;
}

// ─── Status ────────────────────────────────────────────────────

export interface GenerationStatus {
  configured: boolean;
  model: string;
  message: string;
}

export interface SessionStatus {
  sessionId: string;
  cacheSize: number;
  maxCacheSize: number;
  rateLimiterReady: boolean;
  msUntilReady: number;
  historyLength: number;
}

// ─── API Request / Response ───────────────────────────────────

export interface ApiErrorResponse {
  success: false;
  message: string;
}
