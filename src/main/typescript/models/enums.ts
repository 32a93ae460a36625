/**
 * INPUT: none
 * OUTPUT: provenance, conversation role and resolution stage enums
 * POS: model layer, shared constants for the whole assistant
 */

/** Where an answer came from */
export enum Provenance {
  /** Fresh answer from the generation service */
  LIVE = 'live',
  /** Served from the session response cache (no API cost) */
  CACHED = 'cached',
  /** Served from the bundled knowledge base (no API cost) */
  OFFLINE = 'offline',
  /** Static resource list or surfaced error */
  FALLBACK = 'fallback',
}

/** Author of a conversation entry */
export enum ConversationRole {
  USER = 'user',
  ASSISTANT = 'assistant',
}

/** Resolution pipeline stages that show up in the trace log */
export enum ResolutionStage {
  CACHE_CHECK = 'CACHE_CHECK',
  KB_CHECK = 'KB_CHECK',
  RATE_LIMIT_WAIT = 'RATE_LIMIT_WAIT',
  LIVE_CALL = 'LIVE_CALL',
  FALLBACK = 'FALLBACK',
}
