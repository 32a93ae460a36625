/**
 * INPUT: session id, cache capacity, rate limit interval
 * OUTPUT: AssistantSession (owns one cache, one rate limiter, one conversation)
 * POS: core module, per-session mutable state injected into the resolution pipeline
 */

import { ConversationRole, Provenance } from '../models/enums';
import { ConversationEntry, SessionStatus } from '../models/assistant';
import { ResponseCache } from './responseCache';
import { Clock, RateLimiter, Sleep } from './rateLimiter';

export interface SessionOptions {
  maxCacheSize: number;
  rateLimitDelayMs: number;
  now?: Clock;
  sleep?: Sleep;
}

export class AssistantSession {
  readonly cache: ResponseCache;
  readonly rateLimiter: RateLimiter;
  readonly createdAt: number;
  updatedAt: number;

  private readonly conversation: ConversationEntry[] = [];
  private readonly now: Clock;

  constructor(readonly id: string, options: SessionOptions) {
    this.now = options.now ?? (() => Date.now());
    this.cache = new ResponseCache(options.maxCacheSize);
    this.rateLimiter = new RateLimiter(options.rateLimitDelayMs, this.now, options.sleep);
    this.createdAt = this.now();
    this.updatedAt = this.createdAt;
  }

  /** Appends one entry; entries are never edited afterwards */
  record(role: ConversationRole, content: string, provenance: Provenance): ConversationEntry {
    const entry: ConversationEntry = Object.freeze({ role, content, provenance, createdAt: this.now() });
    this.conversation.push(entry);
    this.touch();
    return entry;
  }

  history(): readonly ConversationEntry[] {
    return this.conversation.slice();
  }

  touch(): void {
    this.updatedAt = this.now();
  }

  status(): SessionStatus {
    return {
      sessionId: this.id,
      cacheSize: this.cache.size,
      maxCacheSize: this.cache.capacity,
      rateLimiterReady: this.rateLimiter.isReady(),
      msUntilReady: this.rateLimiter.msUntilReady(),
      historyLength: this.conversation.length,
    };
  }

  /** Session end: drops cached answers, history and the rate limit baseline */
  end(): void {
    this.cache.clear();
    this.conversation.length = 0;
    this.rateLimiter.reset();
  }
}
