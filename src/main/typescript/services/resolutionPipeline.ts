/**
 * INPUT: AssistantSession + user question (or uploaded image)
 * OUTPUT: ResolveResult (answer + provenance + surfaced error + UI notice)
 * POS: service layer, cost-aware answer resolution
 *
 * Chat flow:
 *   CACHE_CHECK → KB_CHECK → RATE_LIMIT_WAIT → LIVE_CALL | FALLBACK, then both sides of the turn are recorded
 * Image flow skips CACHE_CHECK / KB_CHECK and always offers the offline alt text guidance first.
 */

import { AssistantSession } from '../core/assistantSession';
import { ConversationRole, Provenance, ResolutionStage } from '../models/enums';
import { ImageAnalysisResult, ImageInput, ResolveResult } from '../models/assistant';
import { KnowledgeBase } from './knowledgeBase';
import {
  GenerationClient,
  GenerationError,
  QuotaExceededError,
} from './generationClient';

// ─── Prompt templates ─────────────────────────────────────────

const CHAT_MAX_TOKENS = 600;   // ~300 words
const IMAGE_MAX_TOKENS = 500;

export function buildChatPrompt(question: string): string {
  return `You are an accessibility expert. Provide a concise, actionable answer for:

${question}

Focus on:
1. Direct answer
2. Relevant WCAG guidelines
3. Practical steps

Keep response under 300 words.`;
}

export const IMAGE_ANALYSIS_PROMPT = `Analyze this image for accessibility and provide:
1. Descriptive alt text (under 125 characters)
2. Key accessibility issues
3. Quick improvement suggestions

Keep response concise and actionable.`;

// ─── UI notices ───────────────────────────────────────────────

export const NOTICES = {
  cached: 'Retrieved from cache (no API cost)',
  offline: 'Offline content (no API cost)',
  quota: 'API quota exceeded. Showing available offline content.',
  unconfigured: 'Live generation is not configured. Showing general accessibility resources.',
} as const;

const ALT_TEXT_TOPIC = 'alt text';

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > 40 ? `${flat.slice(0, 40)}...` : flat;
}

// ─── Pipeline ─────────────────────────────────────────────────

export class ResolutionPipeline {
  constructor(
    private readonly knowledge: KnowledgeBase,
    private readonly client: GenerationClient,
  ) {}

  /** Returns null for an empty prompt; nothing is recorded or called in that case */
  async resolve(session: AssistantSession, prompt: string): Promise<ResolveResult | null> {
    const question = prompt.trim();
    if (!question) return null;

    const result = await this.resolveQuestion(session, question);
    this.recordTurn(session, question, result);
    return result;
  }

  async analyzeImage(session: AssistantSession, image: ImageInput): Promise<ImageAnalysisResult> {
    const guidance = this.altTextGuidance();
    const request = `Image analysis request (${image.mediaType}, ${image.data.length} bytes)`;

    const result = await this.liveOrFallback(session, request, () =>
      this.client.generateFromImage(IMAGE_ANALYSIS_PROMPT, image, { maxTokens: IMAGE_MAX_TOKENS }),
    );
    this.recordTurn(session, request, result);
    return { guidance, result };
  }

  /** Static alt text guidance offered before any paid image call */
  altTextGuidance(): string {
    return this.knowledge.getTopic(ALT_TEXT_TOPIC)?.answerBody ?? this.knowledge.getFallbackContent();
  }

  private async resolveQuestion(session: AssistantSession, question: string): Promise<ResolveResult> {
    // CACHE_CHECK
    const cached = session.cache.get(question);
    if (cached !== null) {
      this.trace(session, ResolutionStage.CACHE_CHECK, `hit "${preview(question)}"`);
      return { answer: cached, provenance: Provenance.CACHED, error: null, notice: NOTICES.cached };
    }

    // KB_CHECK
    const match = this.knowledge.match(question);
    if (match) {
      this.trace(session, ResolutionStage.KB_CHECK, `${match.matchedBy} "${match.term}" → ${match.topic.topicId}`);
      return { answer: match.topic.answerBody, provenance: Provenance.OFFLINE, error: null, notice: NOTICES.offline };
    }

    const result = await this.liveOrFallback(session, question, () =>
      this.client.generateText(buildChatPrompt(question), { maxTokens: CHAT_MAX_TOKENS }),
    );
    if (result.provenance === Provenance.LIVE) {
      session.cache.put(question, result.answer);
    }
    return result;
  }

  /** Unconfigured check → RATE_LIMIT_WAIT → LIVE_CALL, with fallback on failure */
  private async liveOrFallback(
    session: AssistantSession,
    label: string,
    call: () => Promise<string>,
  ): Promise<ResolveResult> {
    if (!this.client.isConfigured()) {
      this.trace(session, ResolutionStage.FALLBACK, 'generation client not configured');
      return this.fallback(NOTICES.unconfigured);
    }

    const wait = session.rateLimiter.msUntilReady();
    if (wait > 0) {
      this.trace(session, ResolutionStage.RATE_LIMIT_WAIT, `${wait}ms before the next live call`);
    }
    await session.rateLimiter.acquire();

    try {
      const answer = await call();
      this.trace(session, ResolutionStage.LIVE_CALL, `ok "${preview(label)}"`);
      return { answer, provenance: Provenance.LIVE, error: null, notice: null };
    } catch (err) {
      if (err instanceof QuotaExceededError) {
        this.trace(session, ResolutionStage.FALLBACK, 'quota exceeded');
        return this.fallback(NOTICES.quota);
      }
      if (err instanceof GenerationError) {
        console.error(`[resolutionPipeline] ${session.id.slice(0, 8)} ${err.code}: ${err.message}`);
        return {
          answer: `Error: ${err.message}`,
          provenance: Provenance.FALLBACK,
          error: err.message,
          notice: null,
        };
      }
      throw err;
    }
  }

  private fallback(notice: string): ResolveResult {
    return {
      answer: this.knowledge.getFallbackContent(),
      provenance: Provenance.FALLBACK,
      error: null,
      notice,
    };
  }

  private recordTurn(session: AssistantSession, request: string, result: ResolveResult): void {
    session.record(ConversationRole.USER, request, result.provenance);
    session.record(ConversationRole.ASSISTANT, result.answer, result.provenance);
  }

  private trace(session: AssistantSession, stage: ResolutionStage, detail: string): void {
    console.log(`[resolutionPipeline] ${session.id.slice(0, 8)} ${stage}: ${detail}`);
  }
}
